import { z } from "zod"
import { isValidTableName } from "../../adapters/postgres/postgres-cache-store"
import {
  type BackendKind,
  backendKinds,
  type CompositePolicy,
  compositePolicies,
  type LeafBackendKind,
  leafBackendKinds,
} from "../../ports/backend-kind"
import type { CacheTtl } from "../../ports/cache-options"
import { invalidConfiguration } from "../errors/cache-error"
import { type TagTokenFormat, tagTokenFormats } from "../ids/id-generator"
import { type LogLevelName, logLevelNames } from "../logging/log-level"
import { ttlFromSeconds } from "../time/resolve-expiry"
import type { ConfigSource } from "./config-source"
import { DotenvSource } from "./dotenv-source"
import { EnvSource } from "./env-source"
import { LoadedConfig } from "./loaded-config"
import { loadSources } from "./load-config"
import { ObjectSource } from "./object-source"

export const CACHE_ENV_PREFIX = "CACHE_"

const flag = z.union([z.boolean(), z.stringbool()])

const leafList = z.preprocess(
  (value) =>
    typeof value === "string"
      ? value
          .split(",")
          .map((part) => part.trim())
          .filter((part) => part !== "")
      : value,
  z.array(z.enum(leafBackendKinds)).min(1),
)

/**
 * Raw settings, keyed by variable name without the `CACHE_` prefix.
 */
export const cacheEnvSchema = z.object({
  BACKEND: z.enum(backendKinds).default("memory"),
  DEFAULT_TTL_SECONDS: z.coerce.number().int().nonnegative().default(3600),
  KEY_PREFIX: z.string().default("app"),

  COMPOSITE_POLICY: z.enum(compositePolicies).default("fallback"),
  COMPOSITE_STORES: leafList.default(["memory"]),

  FILE_DIRECTORY: z.string().min(1).default("./var/cache"),

  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),
  REDIS_KEYSPACE_PREFIX: z.string().default("cache:"),
  REDIS_BATCH_SIZE: z.coerce.number().int().positive().default(500),

  POSTGRES_URL: z.string().min(1).default("postgres://localhost:5432/cache"),
  POSTGRES_TABLE: z
    .string()
    .refine(isValidTableName, { message: "must be a plain or schema-qualified SQL identifier" })
    .default("cache_entries"),
  POSTGRES_ENSURE_SCHEMA: flag.default(true),

  TAG_TOKEN_FORMAT: z.enum(tagTokenFormats).default("uuid-v4"),
  SINGLE_FLIGHT: flag.default(false),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
  SERVICE_NAME: z.string().min(1).default("cache"),
})

export type CacheEnv = z.infer<typeof cacheEnvSchema>

export type CacheConfig = {
  backend: BackendKind
  defaultTtl: CacheTtl
  keyPrefix: string
  composite: {
    policy: CompositePolicy
    stores: readonly LeafBackendKind[]
  }
  file: {
    directory: string
  }
  redis: {
    url: string
    keyspacePrefix: string
    batchSize: number
  }
  postgres: {
    url: string
    tableName: string
    ensureSchema: boolean
  }
  tagTokenFormat: TagTokenFormat
  singleFlight: boolean
  logging: {
    level: LogLevelName
    prettify: boolean
    service: string
  }
}

export function toCacheConfig(env: CacheEnv): CacheConfig {
  return {
    backend: env.BACKEND,
    defaultTtl: ttlFromSeconds(env.DEFAULT_TTL_SECONDS),
    keyPrefix: env.KEY_PREFIX,
    composite: {
      policy: env.COMPOSITE_POLICY,
      stores: env.COMPOSITE_STORES,
    },
    file: { directory: env.FILE_DIRECTORY },
    redis: {
      url: env.REDIS_URL,
      keyspacePrefix: env.REDIS_KEYSPACE_PREFIX,
      batchSize: env.REDIS_BATCH_SIZE,
    },
    postgres: {
      url: env.POSTGRES_URL,
      tableName: env.POSTGRES_TABLE,
      ensureSchema: env.POSTGRES_ENSURE_SCHEMA,
    },
    tagTokenFormat: env.TAG_TOKEN_FORMAT,
    singleFlight: env.SINGLE_FLIGHT,
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      service: env.SERVICE_NAME,
    },
  }
}

/**
 * Validate settings given in code, with the same names and defaults as the
 * environment variables.
 */
export function parseCacheConfig(raw: Record<string, unknown> = {}): CacheConfig {
  const result = cacheEnvSchema.safeParse(raw)

  if (!result.success) {
    throw invalidConfiguration(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      {},
      result.error,
    )
  }

  return toCacheConfig(result.data)
}

export type LoadCacheConfigOptions = {
  /**
   * @default process.env
   */
  env?: Record<string, string | undefined>

  /**
   * Optional .env file read before the environment.
   */
  dotenvFile?: string
  cwd?: string

  /**
   * Applied last, keyed without the prefix (`{ BACKEND: "file" }`).
   */
  overrides?: Record<string, unknown>
}

export type LoadedCacheConfig = LoadedConfig<CacheEnv, CacheConfig>

/**
 * Load `CACHE_*` settings from an optional dotenv file, the environment and
 * explicit overrides, in that order.
 */
export async function loadCacheConfig(
  options: LoadCacheConfigOptions = {},
): Promise<LoadedCacheConfig> {
  const sources: ConfigSource[] = []

  if (options.dotenvFile !== undefined) {
    sources.push(
      new DotenvSource({
        file: options.dotenvFile,
        required: false,
        prefix: CACHE_ENV_PREFIX,
        ...(options.cwd !== undefined && { cwd: options.cwd }),
      }),
    )
  }

  sources.push(
    new EnvSource({
      prefix: CACHE_ENV_PREFIX,
      ...(options.env !== undefined && { env: options.env }),
    }),
  )

  if (options.overrides !== undefined) sources.push(new ObjectSource(options.overrides))

  const { data, provenance, mergedKeys } = await loadSources(cacheEnvSchema, sources)

  return new LoadedConfig(toCacheConfig(data), data, provenance, mergedKeys)
}
