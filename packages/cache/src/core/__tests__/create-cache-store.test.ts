import os from "node:os"
import type { Mock } from "vitest"
import { mock } from "vitest-mock-extended"
import { CompositeCacheStore } from "../../adapters/composite/composite-cache-store"
import { FileCacheStore } from "../../adapters/file/file-cache-store"
import { MemoryCacheStore } from "../../adapters/memory/memory-cache-store"
import { type PgPool, PostgresCacheStore } from "../../adapters/postgres/postgres-cache-store"
import { RedisCacheStore } from "../../adapters/redis/redis-cache-store"
import { FakeRedisBytesClient } from "../../tests/utils/fake-redis-client"
import { ManualTestClock } from "../../tests/utils/manual-test-clock"
import { parseCacheConfig } from "../config/cache-config"
import { type CacheStoreResources, createCacheStore } from "../create-cache-store"
import { isCacheError } from "../errors/cache-error"
import { createNullLogger } from "../logging/null-logger"

describe("createCacheStore", () => {
  let clock: ManualTestClock
  let redis: FakeRedisBytesClient
  let pool: PgPool
  let resources: CacheStoreResources
  let redisClient: Mock<() => FakeRedisBytesClient>
  let pgPool: Mock<() => PgPool>
  let onPostgresStore: Mock<(store: PostgresCacheStore) => void>

  beforeEach(() => {
    clock = new ManualTestClock()
    redis = new FakeRedisBytesClient(clock)
    pool = mock<PgPool>()
    redisClient = vi.fn(() => redis)
    pgPool = vi.fn(() => pool)
    onPostgresStore = vi.fn()
    resources = { clock, logger: createNullLogger(), redisClient, pgPool, onPostgresStore }
  })

  it("builds an in-memory store", () => {
    const store = createCacheStore("memory", parseCacheConfig(), resources)

    expect(store).toBeInstanceOf(MemoryCacheStore)
    expect(redisClient).not.toHaveBeenCalled()
    expect(pgPool).not.toHaveBeenCalled()
  })

  it("builds a file store in the configured directory", async () => {
    const directory = `${os.tmpdir()}/cache-factory-absent`
    const store = createCacheStore(
      "file",
      parseCacheConfig({ FILE_DIRECTORY: directory }),
      resources,
    )

    expect(store).toBeInstanceOf(FileCacheStore)
    expect(await store.get("k")).toStrictEqual({ kind: "miss" })
  })

  it("builds a redis store over the shared client", async () => {
    const store = createCacheStore(
      "network",
      parseCacheConfig({ REDIS_KEYSPACE_PREFIX: "shop:" }),
      resources,
    )
    await store.set("k", new Uint8Array([1]))

    expect(store).toBeInstanceOf(RedisCacheStore)
    expect(redis.storedKeys()).toStrictEqual(["shop:k"])
  })

  it("builds a postgres store and reports it", () => {
    const store = createCacheStore(
      "table",
      parseCacheConfig({ POSTGRES_TABLE: "cache.entries" }),
      resources,
    )

    expect(store).toBeInstanceOf(PostgresCacheStore)
    expect(pgPool).toHaveBeenCalledTimes(1)
    expect(onPostgresStore).toHaveBeenCalledWith(store)
  })

  it("builds a composite over the configured leaves", () => {
    const store = createCacheStore(
      "composite",
      parseCacheConfig({ COMPOSITE_STORES: "memory,network" }),
      resources,
    )

    expect(store).toBeInstanceOf(CompositeCacheStore)
    expect(redisClient).toHaveBeenCalledTimes(1)
  })

  it("rejects an invalid table name that bypassed validation", () => {
    const config = {
      ...parseCacheConfig(),
      postgres: { url: "", tableName: "a-b", ensureSchema: false },
    }
    let thrown: unknown

    try {
      createCacheStore("table", config, resources)
    } catch (err) {
      thrown = err
    }

    expect(isCacheError(thrown, "cache_configuration_invalid")).toBe(true)
  })
})
