/**
 * JSON-compatible value stored in session data.
 */
export type JsonValue =
    | null
    | boolean
    | number
    | string
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Session-scoped key/value state owned by the application.
 */
export type SessionData = { [key: string]: JsonValue };

export type SessionId = string;
