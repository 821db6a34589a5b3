import {
  createMessagePackCodec,
  type Logger,
  type SessionCodec,
  type SessionId,
  type SessionRecord,
  type SessionStore,
} from "@session-persist/core";
import { RedisStoreError, toSessionStoreError, type RedisCommandName, type RedisStoreErrorKind } from "./errors";
import {
  RedisClientManager,
  deleteKey,
  getBytes,
  setWithExpireAt,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
} from "./internal/redisClient";

/**
 * Configuration for {@link RedisSessionStore}.
 */
export type RedisSessionStoreOptions = {
  keyPrefix?: string;
  codec?: SessionCodec;
  logger?: Logger;
};

const DEFAULT_KEY_PREFIX = "tower_session:";

/**
 * Redis-backed {@link SessionStore}.
 *
 * Every operation is a single command against the key `<keyPrefix><sessionId>`.
 * Records are written with `SET ... EXAT`, so Redis drops them exactly at
 * `expiresAt` and each save replaces the previous expiration.
 */
export class RedisSessionStore implements SessionStore {
  private readonly keyPrefix: string;
  private readonly codec: SessionCodec;
  private readonly logger: Logger | undefined;
  private readonly clientManager: RedisClientManager;

  constructor(connection: RedisConnectionInput, options?: RedisSessionStoreOptions) {
    this.clientManager = new RedisClientManager(connection, options?.logger);
    this.keyPrefix = options?.keyPrefix ?? DEFAULT_KEY_PREFIX;
    this.codec = options?.codec ?? createMessagePackCodec();
    this.logger = options?.logger;
  }

  async save(record: SessionRecord): Promise<void> {
    const key = this.makeKey(record.id);

    let bytes: Uint8Array;
    try {
      bytes = this.codec.encode(record);
    } catch (error) {
      throw this.fail("encode", key, "SET", error);
    }

    await this.run(key, "SET", (client) => setWithExpireAt(client, key, bytes, toUnixSeconds(record.expiresAt)));
  }

  async load(sessionId: SessionId): Promise<SessionRecord | null> {
    const key = this.makeKey(sessionId);
    const bytes = await this.run(key, "GET", (client) => getBytes(client, key));
    if (bytes === null) {
      this.logger?.debug("Session not found.", { key });
      return null;
    }

    try {
      return this.codec.decode(bytes);
    } catch (error) {
      this.logger?.warn("Failed to decode session record.", { key, error });
      throw this.fail("decode", key, "GET", error);
    }
  }

  async delete(sessionId: SessionId): Promise<void> {
    const key = this.makeKey(sessionId);
    await this.run(key, "DEL", (client) => deleteKey(client, key));
  }

  async close(): Promise<void> {
    await this.clientManager.close();
  }

  private async run<T>(
    key: string,
    command: RedisCommandName,
    fn: (client: RedisClientLike) => Promise<T>,
  ): Promise<T> {
    try {
      const client = await this.clientManager.getClient();
      return await fn(client);
    } catch (error) {
      this.logger?.warn("Redis session command failed.", { key, command, error });
      throw this.fail("redis", key, command, error);
    }
  }

  private fail(kind: RedisStoreErrorKind, key: string, command: RedisCommandName, error: unknown) {
    return toSessionStoreError(new RedisStoreError(kind, key, command, error));
  }

  private makeKey(sessionId: SessionId): string {
    return `${this.keyPrefix}${sessionId}`;
  }
}

function toUnixSeconds(epochMs: number): number {
  return Math.floor(epochMs / 1000);
}

export type { RedisClientLike, RedisConnectionInput, RedisConnectionParams };
