import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { isCacheError } from "../../errors/cache-error"
import { type CacheConfig, loadCacheConfig, parseCacheConfig } from "../cache-config"

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  return undefined
}

const defaults: CacheConfig = {
  backend: "memory",
  defaultTtl: { kind: "seconds", seconds: 3600 },
  keyPrefix: "app",
  composite: { policy: "fallback", stores: ["memory"] },
  file: { directory: "./var/cache" },
  redis: { url: "redis://localhost:6379", keyspacePrefix: "cache:", batchSize: 500 },
  postgres: {
    url: "postgres://localhost:5432/cache",
    tableName: "cache_entries",
    ensureSchema: true,
  },
  tagTokenFormat: "uuid-v4",
  singleFlight: false,
  logging: { level: "info", prettify: false, service: "cache" },
}

describe("parseCacheConfig", () => {
  it("applies defaults", () => {
    expect(parseCacheConfig()).toStrictEqual(defaults)
  })

  it("coerces strings the way the environment provides them", () => {
    const config = parseCacheConfig({
      DEFAULT_TTL_SECONDS: "120",
      REDIS_BATCH_SIZE: "50",
      SINGLE_FLIGHT: "yes",
      POSTGRES_ENSURE_SCHEMA: "false",
      LOG_PRETTY: true,
    })

    expect(config.defaultTtl).toStrictEqual({ kind: "seconds", seconds: 120 })
    expect(config.redis.batchSize).toBe(50)
    expect(config.singleFlight).toBe(true)
    expect(config.postgres.ensureSchema).toBe(false)
    expect(config.logging.prettify).toBe(true)
  })

  it("maps a zero default TTL to no expiry", () => {
    expect(parseCacheConfig({ DEFAULT_TTL_SECONDS: "0" }).defaultTtl).toStrictEqual({
      kind: "forever",
    })
  })

  it("parses the composite store list", () => {
    const config = parseCacheConfig({
      BACKEND: "composite",
      COMPOSITE_POLICY: "replicate",
      COMPOSITE_STORES: " network, file ,",
    })

    expect(config.composite).toStrictEqual({ policy: "replicate", stores: ["network", "file"] })
  })

  it("accepts schema-qualified table names", () => {
    expect(parseCacheConfig({ POSTGRES_TABLE: "cache.entries" }).postgres.tableName).toBe(
      "cache.entries",
    )
  })

  it.each([
    ["an unknown backend", { BACKEND: "mongo" }],
    ["a negative TTL", { DEFAULT_TTL_SECONDS: "-5" }],
    ["a fractional TTL", { DEFAULT_TTL_SECONDS: "1.5" }],
    ["a nested composite", { COMPOSITE_STORES: "memory,composite" }],
    ["an empty composite", { COMPOSITE_STORES: " , " }],
    ["an unsafe table name", { POSTGRES_TABLE: "entries; drop table users" }],
    ["an unreadable flag", { SINGLE_FLIGHT: "maybe" }],
    ["an unknown log level", { LOG_LEVEL: "verbose" }],
    ["a zero batch size", { REDIS_BATCH_SIZE: "0" }],
  ])("rejects %s", (_label, raw) => {
    const err = thrownBy(() => parseCacheConfig(raw))

    expect(isCacheError(err, "cache_configuration_invalid")).toBe(true)
  })

  it("names the failing setting in the message", () => {
    expect(() => parseCacheConfig({ BACKEND: "mongo" })).toThrow(/BACKEND/)
  })
})

describe("loadCacheConfig", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "cache-config-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("reads CACHE_ variables from the environment", async () => {
    const loaded = await loadCacheConfig({
      env: { CACHE_BACKEND: "network", CACHE_REDIS_URL: "redis://cache:6379", HOME: "/root" },
    })

    expect(loaded.value.backend).toBe("network")
    expect(loaded.value.redis.url).toBe("redis://cache:6379")
    expect(loaded.explain("BACKEND")).toBe("env")
    expect(loaded.explain("KEY_PREFIX")).toBe("default")
    expect(loaded.unknownKeys()).toStrictEqual([])
  })

  it("reports unknown CACHE_ variables", async () => {
    const loaded = await loadCacheConfig({ env: { CACHE_BAKEND: "file" } })

    expect(loaded.value.backend).toBe("memory")
    expect(loaded.unknownKeys()).toStrictEqual(["BAKEND"])
  })

  it("layers dotenv, environment and overrides", async () => {
    await fs.writeFile(
      path.join(dir, ".env"),
      "CACHE_KEY_PREFIX=from-file\nCACHE_DEFAULT_TTL_SECONDS=10\n",
    )

    const loaded = await loadCacheConfig({
      dotenvFile: ".env",
      cwd: dir,
      env: { CACHE_KEY_PREFIX: "from-env" },
      overrides: { SINGLE_FLIGHT: true },
    })

    expect(loaded.value.keyPrefix).toBe("from-env")
    expect(loaded.value.defaultTtl).toStrictEqual({ kind: "seconds", seconds: 10 })
    expect(loaded.value.singleFlight).toBe(true)
    expect(loaded.explain("KEY_PREFIX")).toBe("env")
    expect(loaded.explain("DEFAULT_TTL_SECONDS")).toBe("dotenv:.env")
    expect(loaded.explain("SINGLE_FLIGHT")).toBe("object:overrides")
    expect(loaded.sourcesUsed().sort()).toStrictEqual(["dotenv:.env", "env", "object:overrides"])
  })

  it("ignores a missing dotenv file", async () => {
    const loaded = await loadCacheConfig({ dotenvFile: "absent.env", cwd: dir, env: {} })

    expect(loaded.value).toStrictEqual(defaults)
    expect(loaded.sourcesUsed()).toStrictEqual([])
  })

  it("rejects invalid values with the sources consulted", async () => {
    await expect(
      loadCacheConfig({ env: { CACHE_DEFAULT_TTL_SECONDS: "soon" } }),
    ).rejects.toMatchObject({
      code: "cache_configuration_invalid",
      context: { sources: ["env"] },
    })
  })
})
