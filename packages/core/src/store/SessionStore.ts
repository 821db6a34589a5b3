import type { SessionData, SessionId } from "../types";

/**
 * Persisted session record handled by a {@link SessionStore}.
 *
 * `expiresAt` is an absolute instant in epoch milliseconds.
 */
export type SessionRecord = {
  id: SessionId;
  data: SessionData;
  expiresAt: number;
};

/**
 * Storage capability every session backend implements.
 */
export interface SessionStore {
  save(record: SessionRecord): Promise<void>;
  load(sessionId: SessionId): Promise<SessionRecord | null>;
  delete(sessionId: SessionId): Promise<void>;
  close?(): Promise<void>;
}
