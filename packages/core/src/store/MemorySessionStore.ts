import type { SessionId } from "../types";
import type { SessionRecord, SessionStore } from "./SessionStore";

export type MemorySessionStoreOptions = {
    cleanupIntervalSeconds?: number; // default 60, 0 disables the sweep
};

/**
 * Process-local {@link SessionStore} backed by a `Map`.
 */
export class MemorySessionStore implements SessionStore {
    private readonly map = new Map<SessionId, SessionRecord>();
    private readonly cleanupTimer: NodeJS.Timeout | null;

    constructor(options?: MemorySessionStoreOptions) {
        const intervalSeconds = options?.cleanupIntervalSeconds ?? 60;
        if (intervalSeconds > 0) {
            this.cleanupTimer = setInterval(() => this.deleteExpired(), intervalSeconds * 1000);
            this.cleanupTimer.unref?.();
        } else {
            this.cleanupTimer = null;
        }
    }

    async save(record: SessionRecord): Promise<void> {
        this.map.set(record.id, structuredClone(record));
    }

    async load(sessionId: SessionId): Promise<SessionRecord | null> {
        const record = this.map.get(sessionId);
        if (!record) return null;

        if (Date.now() >= record.expiresAt) {
            this.map.delete(sessionId);
            return null;
        }
        return structuredClone(record);
    }

    async delete(sessionId: SessionId): Promise<void> {
        this.map.delete(sessionId);
    }

    /**
     * Removes every expired record and returns how many were dropped.
     */
    deleteExpired(): number {
        const now = Date.now();
        let removed = 0;
        for (const [id, record] of this.map.entries()) {
            if (now >= record.expiresAt) {
                this.map.delete(id);
                removed++;
            }
        }
        return removed;
    }

    async close(): Promise<void> {
        if (this.cleanupTimer) clearInterval(this.cleanupTimer);
        this.map.clear();
    }
}
