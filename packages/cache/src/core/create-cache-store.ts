import { CompositeCacheStore } from "../adapters/composite/composite-cache-store"
import { FileCacheStore } from "../adapters/file/file-cache-store"
import { MemoryCacheStore } from "../adapters/memory/memory-cache-store"
import type { PgPool } from "../adapters/postgres/postgres-cache-store"
import { PostgresCacheStore } from "../adapters/postgres/postgres-cache-store"
import type { RedisBytesClient } from "../adapters/redis/redis-client"
import { RedisCacheStore } from "../adapters/redis/redis-cache-store"
import type { BackendKind } from "../ports/backend-kind"
import type { CacheStore } from "../ports/cache-store"
import type { CacheConfig } from "./config/cache-config"
import { invalidConfiguration } from "./errors/cache-error"
import type { Logger } from "./logging/logger"
import type { Clock } from "./time/clock"

/**
 * Shared resources handed to the factory. Backend clients are created on
 * first use so that only the configured backends open connections.
 */
export type CacheStoreResources = {
  clock: Clock
  logger: Logger
  redisClient(): RedisBytesClient
  pgPool(): PgPool
  onPostgresStore?(store: PostgresCacheStore): void
}

export function createCacheStore(
  kind: BackendKind,
  config: CacheConfig,
  resources: CacheStoreResources,
): CacheStore {
  const { clock } = resources

  switch (kind) {
    case "memory":
      return new MemoryCacheStore({ clock })

    case "file":
      return new FileCacheStore({ clock }, { directory: config.file.directory })

    case "network":
      return new RedisCacheStore(
        { client: resources.redisClient(), clock },
        {
          keyspacePrefix: config.redis.keyspacePrefix,
          batchSize: config.redis.batchSize,
        },
      )

    case "table": {
      const store = new PostgresCacheStore(
        { client: resources.pgPool(), clock },
        { tableName: config.postgres.tableName },
      )
      resources.onPostgresStore?.(store)

      return store
    }

    case "composite":
      return new CompositeCacheStore(
        {
          stores: config.composite.stores.map((leaf) =>
            createCacheStore(leaf, config, resources),
          ),
          logger: resources.logger,
        },
        { policy: config.composite.policy },
      )

    default: {
      const unknownKind: never = kind
      throw invalidConfiguration(`Unknown cache backend "${String(unknownKind)}"`)
    }
  }
}
