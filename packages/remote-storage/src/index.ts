export {
  type CreateRemoteStorageDeps,
  createRemoteStorage,
  createRemoteStorages,
} from "./adapters/create"
export { MemoryRemoteStorage } from "./adapters/memory/memory-remote-storage"
export {
  createNodeRedisConnector,
  NodeRedisConnection,
  type NodeRedisConnectionDeps,
  type NodeRedisConnectorDeps,
} from "./adapters/redis/node-redis-connection"
export { createRedisBytesClient, type RedisBytesClient } from "./adapters/redis/redis-client"
export {
  RedisRemoteStorage,
  type RedisRemoteStorageDeps,
  type RedisRemoteStorageOptions,
} from "./adapters/redis/redis-remote-storage"
export {
  createLogger,
  ENV_PREFIX,
  type LoadRemoteStorageConfigOptions,
  type LoggingConfig,
  loadRemoteStorageConfig,
  type RemoteStorageConfig,
} from "./config/load-remote-storage-config"
export {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_OPERATION_TIMEOUT_MS,
  parseRedisAttributes,
  type RedisAttributes,
  type RedisCredentials,
  type RedisSettings,
} from "./core/attributes"
export { DIGEST_SIZE, Digest } from "./core/digest"
export {
  DEFAULT_REDIS_PORT,
  type RedisEndpoint,
  type ResolvedEndpoint,
  resolveEndpoint,
} from "./core/endpoint"
export {
  RemoteStorageConfigError,
  type RemoteStorageConfigErrorCode,
  RemoteStorageError,
  type RemoteStorageFailure,
} from "./core/errors"
export { KEY_PREFIX, keyString } from "./core/key-string"
export {
  parseStorageEntries,
  parseStorageEntry,
  redactUrl,
  type StorageEntry,
} from "./core/storage-entry"
export type {
  RedisArgument,
  RedisConnection,
  RedisConnectOptions,
  RedisConnector,
  RedisReply,
} from "./ports/redis-connection"
export type {
  ConnectResult,
  GetResult,
  PutResult,
  RemoteStorage,
  RemoteStorageFailed,
  RemoveResult,
} from "./ports/remote-storage"
