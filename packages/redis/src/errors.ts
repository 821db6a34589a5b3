import { describeError, SessionStoreError, type ErrorCode } from "@session-persist/core";

export type RedisStoreErrorKind = "redis" | "decode" | "encode";

export type RedisCommandName = "GET" | "SET" | "DEL";

/**
 * Failure raised inside {@link RedisSessionStore} before it is mapped to the
 * portable {@link SessionStoreError}.
 */
export class RedisStoreError extends Error {
  constructor(
    public readonly kind: RedisStoreErrorKind,
    public readonly key: string,
    public readonly command: RedisCommandName,
    public readonly cause: unknown,
  ) {
    super(describeError(cause));
    this.name = "RedisStoreError";
  }
}

/**
 * Maps each {@link RedisStoreErrorKind} onto exactly one portable error code.
 */
export function toSessionStoreError(error: RedisStoreError): SessionStoreError {
  const details: Record<string, unknown> = {
    key: error.key,
    command: error.command,
  };

  if (error.kind === "redis") {
    details.redisCode = getErrorCode(error.cause);
    details.unavailable = isUnavailableError(error.cause);
  }

  return new SessionStoreError(errorCodeFor(error.kind), error.message, error, details);
}

function errorCodeFor(kind: RedisStoreErrorKind): ErrorCode {
  switch (kind) {
    case "redis":
      return "BACKEND_ERROR";
    case "decode":
      return "DECODE_ERROR";
    case "encode":
      return "ENCODE_ERROR";
  }
}

const UNAVAILABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "NR_CLOSED",
]);

const UNAVAILABLE_KEYWORDS = [
  "connect",
  "connection",
  "socket",
  "closed",
  "timeout",
  "read only",
  "readonly",
  "loading",
  "clusterdown",
  "try again",
  "no connection",
  "the client is closed",
];

/**
 * True when the failure means Redis could not be reached or is not serving,
 * rather than rejecting the command itself.
 */
export function isUnavailableError(error: unknown): boolean {
  if (UNAVAILABLE_CODES.has(getErrorCode(error))) {
    return true;
  }

  const msg = describeError(error).toLowerCase();
  return UNAVAILABLE_KEYWORDS.some((k) => msg.includes(k));
}

function getErrorCode(error: unknown): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    return String(error.code).toUpperCase();
  }
  return "";
}
