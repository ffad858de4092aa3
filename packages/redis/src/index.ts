export {
  RedisSessionPersister,
  type FlushResult,
  type RedisClientLike,
  type RedisConnectionInput,
  type RedisConnectionParams,
  type RedisSessionPersisterOptions,
  type SessionCodec,
} from "./RedisSessionPersister";

export {
  RedisLockProvider,
  type ClientManagerOwner,
  type RedisLockProviderInput,
  type RedisLockProviderOptions,
} from "./RedisLockProvider";
