import type { PgPool, PostgresCacheStore } from "../adapters/postgres/postgres-cache-store"
import { createPgPool } from "../adapters/postgres/postgres-pool"
import { createRedisBytesClient, type RedisBytesClient } from "../adapters/redis/redis-client"
import type { CacheTtl } from "../ports/cache-options"
import type { CacheStore } from "../ports/cache-store"
import type { Codec } from "../ports/codec"
import { CacheManager } from "./cache-manager"
import { jsonCodec } from "./codec/json-codec"
import type { CacheConfig } from "./config/cache-config"
import { createCacheStore } from "./create-cache-store"
import { idGeneratorFor, type IdGenerator } from "./ids/id-generator"
import type { Logger } from "./logging/logger"
import { createPinoLogger } from "./logging/pino-logger"
import { CacheStatistics } from "./stats/cache-statistics"
import { TaggedCache } from "./tags/tagged-cache"
import { TagVersionStore } from "./tags/tag-version-store"
import { type Clock, SystemClock } from "./time/clock"

export type CacheRegistryDeps = {
  clock?: Clock
  logger?: Logger
  ids?: IdGenerator<string>
  createRedisClient?: (url: string) => RedisBytesClient
  createPgPool?: (connectionString: string) => PgPool
}

export type ManagerOptions<T> = {
  keyPrefix?: string
  defaultTtl?: CacheTtl
  singleFlight?: boolean
  codec?: Codec<T>
}

/**
 * Everything a process needs to use the cache, built once at start-up from
 * configuration. Managers and tagged caches handed out share one store and
 * one set of statistics.
 */
export interface CacheRegistry {
  readonly store: CacheStore
  readonly statistics: CacheStatistics
  readonly logger: Logger

  manager<T>(opts?: ManagerOptions<T>): CacheManager<T>
  tagged<T>(opts?: ManagerOptions<T>): TaggedCache<T>

  /**
   * Disconnect backend clients. The registry is unusable afterwards.
   */
  close(): Promise<void>
}

export async function createCacheRegistry(
  config: CacheConfig,
  deps: CacheRegistryDeps = {},
): Promise<CacheRegistry> {
  const clock = deps.clock ?? new SystemClock()
  const baseLogger =
    deps.logger ??
    createPinoLogger(
      { level: config.logging.level, prettify: config.logging.prettify },
      { service: config.logging.service },
    )
  const logger = baseLogger.child({ module: "cache-registry" })

  const clients: { redis?: RedisBytesClient; pool?: PgPool } = {}
  const postgresStores: PostgresCacheStore[] = []

  const store = createCacheStore(config.backend, config, {
    clock,
    logger: baseLogger,
    redisClient() {
      if (clients.redis === undefined) {
        const client = (deps.createRedisClient ?? createRedisBytesClient)(config.redis.url)
        client.on("error", (err) => logger.warn("redis client error", { store: "redis", err }))
        clients.redis = client
      }
      return clients.redis
    },
    pgPool() {
      clients.pool ??= (deps.createPgPool ?? connectPgPool)(config.postgres.url)
      return clients.pool
    },
    onPostgresStore(created) {
      postgresStores.push(created)
    },
  })

  const close = async () => {
    const { redis, pool } = clients
    const closing: Promise<unknown>[] = []
    if (redis?.isOpen) closing.push(redis.close())
    if (pool) closing.push(pool.end())

    const results = await Promise.allSettled(closing)

    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn("failed to close cache backend client", { err: result.reason })
      }
    }
  }

  try {
    if (clients.redis && !clients.redis.isOpen) await clients.redis.connect()

    if (config.postgres.ensureSchema) {
      for (const created of postgresStores) await created.ensureSchema()
    }
  } catch (err) {
    await close()
    throw err
  }

  const statistics = new CacheStatistics()
  const ids = deps.ids ?? idGeneratorFor(config.tagTokenFormat)

  const manager = <T>(opts: ManagerOptions<T> = {}) =>
    new CacheManager<T>(
      {
        store,
        codec: opts.codec ?? jsonCodec<T>(),
        logger: baseLogger,
        statistics,
      },
      {
        keyPrefix: opts.keyPrefix ?? config.keyPrefix,
        defaultTtl: opts.defaultTtl ?? config.defaultTtl,
        singleFlight: opts.singleFlight ?? config.singleFlight,
      },
    )

  logger.info("cache registry ready", { store: store.name })

  return {
    store,
    statistics,
    logger: baseLogger,
    manager,
    tagged<T>(opts: ManagerOptions<T> = {}) {
      const cache = manager<T>(opts)

      return new TaggedCache<T>({
        cache,
        versions: new TagVersionStore({ store, ids }, { keyPrefix: cache.keyPrefix }),
        logger: baseLogger,
      })
    },
    close,
  }
}

function connectPgPool(connectionString: string): PgPool {
  return createPgPool({ connectionString })
}
