import type { Logger } from "@session-persist/core";

export type RedisCommandArgument = string | Buffer;

/**
 * Subset of the node-redis v4 client used by the session store.
 */
export interface RedisClientLike {
  sendCommand(args: RedisCommandArgument[], options?: { returnBuffers?: boolean }): Promise<unknown>;
  connect?(): Promise<unknown>;
  quit?(): Promise<unknown>;
  disconnect?(): Promise<void>;
  on?(event: "error", listener: (err: Error) => void): unknown;
  isOpen?: boolean;
}

export type RedisConnectionParams = {
  url?: string;
  host?: string;
  port?: number;
  username?: string;
  password?: string;
  database?: number;
  tls?: boolean;
  redisOptions?: Record<string, unknown>;
};

export type RedisClientWrapper = {
  client: RedisClientLike;
  manageClient?: boolean;
};

export type RedisConnectionInput = RedisClientLike | RedisClientWrapper | RedisConnectionParams;

export class RedisClientManager {
  private readonly ownClient: boolean;
  private readonly connectionInput: RedisConnectionInput;
  private readonly logger: Logger | undefined;
  private client: RedisClientLike | null = null;
  private clientInitPromise: Promise<RedisClientLike> | null = null;
  private connectPromise: Promise<unknown> | null = null;

  constructor(connection: RedisConnectionInput, logger?: Logger) {
    this.connectionInput = connection;
    this.logger = logger;

    if (isRedisClientLike(connection)) {
      this.ownClient = false;
      this.client = connection;
      return;
    }

    if (isClientWrapper(connection)) {
      this.ownClient = connection.manageClient ?? false;
      this.client = connection.client;
      return;
    }

    this.ownClient = true;
  }

  async getClient(): Promise<RedisClientLike> {
    if (this.client) {
      await this.ensureConnected(this.client);
      return this.client;
    }

    if (!this.clientInitPromise) {
      this.clientInitPromise = this.createOwnedClient().catch((error: unknown) => {
        this.clientInitPromise = null;
        throw error;
      });
    }

    this.client = await this.clientInitPromise;
    return this.client;
  }

  async close(): Promise<void> {
    if (!this.ownClient) {
      return;
    }

    const client = this.client ?? (this.clientInitPromise ? await this.clientInitPromise : null);
    if (!client || client.isOpen === false) {
      return;
    }

    if (typeof client.quit === "function") {
      await client.quit();
      return;
    }

    if (typeof client.disconnect === "function") {
      await client.disconnect();
    }
  }

  private async createOwnedClient(): Promise<RedisClientLike> {
    const connection = this.connectionInput;
    if (isRedisClientLike(connection) || isClientWrapper(connection)) {
      throw new Error("Only connection params create an owned client.");
    }

    const redisModule = await import("redis");
    const createClientFn = (
      redisModule as unknown as { createClient?: (options?: Record<string, unknown>) => RedisClientLike }
    ).createClient;

    if (!createClientFn) {
      throw new Error("redis.createClient is not available. Ensure 'redis' package is installed.");
    }

    const client = createClientFn(buildNodeRedisOptions(connection));
    // node-redis re-emits socket failures as "error" events
    client.on?.("error", (error) => {
      this.logger?.error("Redis client error.", { error });
    });

    try {
      await this.ensureConnected(client);
    } catch (error) {
      if (client.isOpen && typeof client.disconnect === "function") {
        await client.disconnect();
      }
      throw error;
    }
    return client;
  }

  private async ensureConnected(client: RedisClientLike): Promise<void> {
    if (client.isOpen !== false || typeof client.connect !== "function") {
      return;
    }

    // concurrent first calls share one connect
    if (!this.connectPromise) {
      this.connectPromise = client.connect().finally(() => {
        this.connectPromise = null;
      });
    }
    await this.connectPromise;
  }
}

/**
 * `SET key value EXAT seconds` in a single round trip.
 */
export async function setWithExpireAt(
  client: RedisClientLike,
  key: string,
  value: Uint8Array,
  expireAtSeconds: number,
): Promise<void> {
  await client.sendCommand(["SET", key, toBuffer(value), "EXAT", String(expireAtSeconds)]);
}

/**
 * `GET key` returning the raw stored bytes, or `null` for a nil reply.
 */
export async function getBytes(client: RedisClientLike, key: string): Promise<Uint8Array | null> {
  const reply = await client.sendCommand(["GET", key], { returnBuffers: true });
  if (reply === null || reply === undefined) {
    return null;
  }

  if (reply instanceof Uint8Array) {
    return reply;
  }

  throw new Error(`Unexpected GET reply of type ${typeof reply}; the client must return buffers.`);
}

export async function deleteKey(client: RedisClientLike, key: string): Promise<void> {
  await client.sendCommand(["DEL", key]);
}

export function isRedisClientLike(value: unknown): value is RedisClientLike {
  if (!value || typeof value !== "object") {
    return false;
  }

  return "sendCommand" in value && typeof value.sendCommand === "function";
}

export function isClientWrapper(value: unknown): value is RedisClientWrapper {
  if (!value || typeof value !== "object") {
    return false;
  }

  return "client" in value && isRedisClientLike(value.client);
}

function toBuffer(value: Uint8Array): Buffer {
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength);
}

function buildNodeRedisOptions(connection: RedisConnectionParams): Record<string, unknown> {
  const socket: Record<string, unknown> = {};

  if (connection.host) {
    socket.host = connection.host;
  }

  if (connection.port !== undefined) {
    socket.port = connection.port;
  }

  if (connection.tls) {
    socket.tls = true;
  }

  const options: Record<string, unknown> = {
    ...(connection.redisOptions ?? {}),
  };

  if (connection.url) {
    options.url = connection.url;
  }

  if (Object.keys(socket).length > 0) {
    const base = options.socket;
    options.socket = {
      ...(typeof base === "object" && base !== null ? base : {}),
      ...socket,
    };
  }

  if (connection.username) {
    options.username = connection.username;
  }

  if (connection.password) {
    options.password = connection.password;
  }

  if (connection.database !== undefined) {
    options.database = connection.database;
  }

  return options;
}
