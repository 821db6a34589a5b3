/**
 * Portable error codes surfaced by every session store.
 */
export type ErrorCode =
    | "BACKEND_ERROR"
    | "DECODE_ERROR"
    | "ENCODE_ERROR";

/**
 * Canonical error type used across session store packages.
 */
export class SessionStoreError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SessionStoreError";
        this.details = details;
    }
}

/**
 * Logger contract accepted by stores for optional diagnostics.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

/**
 * Type guard for {@link SessionStoreError}.
 */
export function isSessionStoreError(error: unknown): error is SessionStoreError {
    return error instanceof SessionStoreError;
}

/**
 * Human-readable description of an arbitrary thrown value.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
