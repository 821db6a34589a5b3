import { decode, encode } from "@msgpack/msgpack";
import { z } from "zod";
import { describeError, SessionStoreError } from "../errors";
import type { SessionRecord } from "../store/SessionStore";
import type { JsonValue } from "../types";

/**
 * Codec contract for turning a session record into stored bytes and back.
 *
 * Implementations throw {@link SessionStoreError} with `ENCODE_ERROR` or
 * `DECODE_ERROR` when a value cannot be converted.
 */
export type SessionCodec = {
  encode: (record: SessionRecord) => Uint8Array;
  decode: (bytes: Uint8Array) => SessionRecord;
};

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.nan(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

// Unknown top-level fields are stripped.
const sessionRecordSchema = z.object({
  id: z.string(),
  data: z.record(z.string(), jsonValueSchema),
  expiresAt: z.number(),
});

// Nesting limit for encoded values; deeper data fails with ENCODE_ERROR.
export const MAX_ENCODE_DEPTH = 1024;

/**
 * MessagePack codec used by default for stored sessions.
 *
 * Integral numbers are written as MessagePack integers, so `-0` reads back as `0`.
 */
export function createMessagePackCodec(): SessionCodec {
  return {
    encode(record) {
      try {
        return encode(
          { id: record.id, data: record.data, expiresAt: record.expiresAt },
          { maxDepth: MAX_ENCODE_DEPTH },
        );
      } catch (error) {
        throw new SessionStoreError("ENCODE_ERROR", describeError(error), error, { sessionId: record.id });
      }
    },
    decode(bytes) {
      let raw: unknown;
      try {
        raw = decode(bytes);
      } catch (error) {
        throw new SessionStoreError("DECODE_ERROR", describeError(error), error, { byteLength: bytes.byteLength });
      }

      const parsed = sessionRecordSchema.safeParse(raw);
      if (!parsed.success) {
        throw new SessionStoreError(
          "DECODE_ERROR",
          `Stored value is not a session record: ${parsed.error.issues.map(formatIssue).join("; ")}`,
          parsed.error,
          { byteLength: bytes.byteLength },
        );
      }
      return parsed.data;
    },
  };
}

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}
