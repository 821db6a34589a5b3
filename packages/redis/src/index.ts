export {
  RedisSessionStore,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  type RedisSessionStoreOptions,
} from "./RedisSessionStore";

export {
  RedisStoreError,
  isUnavailableError,
  toSessionStoreError,
  type RedisCommandName,
  type RedisStoreErrorKind,
} from "./errors";

export type { RedisClientWrapper, RedisCommandArgument } from "./internal/redisClient";
