export { CompositeCacheStore } from "./adapters/composite/composite-cache-store"
export type {
  CompositeCacheStoreDeps,
  CompositeCacheStoreOptions,
} from "./adapters/composite/composite-cache-store"
export { FileCacheStore } from "./adapters/file/file-cache-store"
export type { FileCacheStoreDeps, FileCacheStoreOptions } from "./adapters/file/file-cache-store"
export { MemoryCacheStore } from "./adapters/memory/memory-cache-store"
export type { MemoryCacheStoreDeps } from "./adapters/memory/memory-cache-store"
export { isValidTableName, PostgresCacheStore } from "./adapters/postgres/postgres-cache-store"
export type {
  PgPool,
  PgQueryable,
  PostgresCacheStoreDeps,
  PostgresCacheStoreOptions,
} from "./adapters/postgres/postgres-cache-store"
export { createPgPool } from "./adapters/postgres/postgres-pool"
export { RedisCacheStore } from "./adapters/redis/redis-cache-store"
export type {
  RedisCacheStoreDeps,
  RedisCacheStoreOptions,
} from "./adapters/redis/redis-cache-store"
export { createRedisBytesClient } from "./adapters/redis/redis-client"
export type { RedisBytesClient } from "./adapters/redis/redis-client"

export { CacheManager } from "./core/cache-manager"
export type { CacheManagerDeps, CacheManagerOptions } from "./core/cache-manager"
export { createCacheNamespace, prefixKey } from "./core/cache-namespace"
export { createCacheRegistry } from "./core/cache-registry"
export type { CacheRegistry, CacheRegistryDeps, ManagerOptions } from "./core/cache-registry"
export { jsonCodec, textCodec } from "./core/codec/json-codec"
export {
  CACHE_ENV_PREFIX,
  cacheEnvSchema,
  loadCacheConfig,
  parseCacheConfig,
  toCacheConfig,
} from "./core/config/cache-config"
export type {
  CacheConfig,
  CacheEnv,
  LoadCacheConfigOptions,
  LoadedCacheConfig,
} from "./core/config/cache-config"
export type { ConfigSource } from "./core/config/config-source"
export { DotenvSource } from "./core/config/dotenv-source"
export { EnvSource } from "./core/config/env-source"
export { LoadedConfig } from "./core/config/loaded-config"
export { ObjectSource } from "./core/config/object-source"
export { createCacheStore } from "./core/create-cache-store"
export type { CacheStoreResources } from "./core/create-cache-store"
export {
  CacheError,
  isCacheError,
  serializeCacheError,
} from "./core/errors/cache-error"
export type { CacheErrorCode, SerializedCacheError } from "./core/errors/cache-error"
export { idGeneratorFor, uuidV4, uuidV7 } from "./core/ids/id-generator"
export type { IdGenerator, TagTokenFormat } from "./core/ids/id-generator"
export type { LogContext, LogMeta } from "./core/logging/log-context"
export type { LogLevelName } from "./core/logging/log-level"
export type { Logger, LoggerOptions } from "./core/logging/logger"
export { createNullLogger, NullLogger } from "./core/logging/null-logger"
export { createPinoLogger, PinoLogger } from "./core/logging/pino-logger"
export { SingleFlight } from "./core/remember/single-flight"
export { CacheStatistics } from "./core/stats/cache-statistics"
export { normalizeTags, taggedEntryKey } from "./core/tags/physical-key"
export { TaggedCache, TagScope } from "./core/tags/tagged-cache"
export type { TaggedCacheDeps } from "./core/tags/tagged-cache"
export { TagVersionStore } from "./core/tags/tag-version-store"
export { type Clock, SystemClock } from "./core/time/clock"
export { resolveExpiresAtMs, ttlFromSeconds } from "./core/time/resolve-expiry"

export type {
  BackendKind,
  CompositePolicy,
  LeafBackendKind,
} from "./ports/backend-kind"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheKey } from "./ports/cache-key"
export type { CacheNamespace } from "./ports/cache-namespace"
export type { CacheSetOptions, CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { CacheStats } from "./ports/cache-stats"
export { supportsIncrement } from "./ports/cache-store"
export type { AtomicCounter, CacheStore } from "./ports/cache-store"
export type { CacheTag } from "./ports/cache-tag"
export type { Codec } from "./ports/codec"
export type { CounterResult } from "./ports/counter-result"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"
