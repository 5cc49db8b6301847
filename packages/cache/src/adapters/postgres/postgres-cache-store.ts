import { backendUnavailable, invalidConfiguration } from "../../core/errors/cache-error"
import type { Clock } from "../../core/time/clock"
import { resolveExpiresAtMs } from "../../core/time/resolve-expiry"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { AtomicCounter, CacheStore } from "../../ports/cache-store"

export type PgQueryable = {
  query: (
    sql: string,
    params?: unknown[],
  ) => Promise<{ rows: Array<Record<string, unknown>> }>
}

export type PgPool = PgQueryable & {
  end: () => Promise<void>
}

export type PostgresCacheStoreDeps = {
  client: PgQueryable
  clock: Clock
}

export type PostgresCacheStoreOptions = {
  /**
   * Table holding the entries, optionally schema-qualified (`cache.entries`).
   */
  tableName: string
}

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/

export function isValidTableName(name: string): boolean {
  return TABLE_NAME.test(name)
}

/**
 * Entries live in one table: `key text primary key, value bytea,
 * expires_at bigint` (epoch ms, null for no expiry). Expired rows are
 * removed when read.
 */
export class PostgresCacheStore implements CacheStore, AtomicCounter {
  readonly name = "postgres"

  private readonly table: string

  public constructor(
    private readonly deps: PostgresCacheStoreDeps,
    opts: PostgresCacheStoreOptions,
  ) {
    if (!isValidTableName(opts.tableName)) {
      throw invalidConfiguration(`Invalid cache table name "${opts.tableName}"`, {
        tableName: opts.tableName,
      })
    }

    this.table = opts.tableName
  }

  async ensureSchema(): Promise<void> {
    await this.query(
      "ensureSchema",
      `create table if not exists ${this.table} (
        key text primary key,
        value bytea not null,
        expires_at bigint
      )`,
    )
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const found = await this.getMany([key])

    return found.get(key) ?? { kind: "miss" }
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    await this.setMany([[key, value]], opts)
  }

  async delete(key: CacheKey): Promise<void> {
    await this.query("delete", `delete from ${this.table} where key = $1`, [key])
  }

  async clear(): Promise<void> {
    await this.query("clear", `delete from ${this.table}`)
  }

  async has(key: CacheKey): Promise<boolean> {
    const rows = await this.query(
      "has",
      `select 1 as present from ${this.table}
       where key = $1 and (expires_at is null or expires_at > $2)`,
      [key, this.deps.clock.nowMs()],
    )

    return rows.length > 0
  }

  async getMany(
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    const unique = [...new Set(keys)]
    const out = new Map<CacheKey, CacheResult<Uint8Array>>()
    if (unique.length === 0) return out

    const nowMs = this.deps.clock.nowMs()
    const rows = await this.query(
      "get",
      `select key, value, expires_at from ${this.table} where key = any($1)`,
      [unique],
    )

    const live = new Map<CacheKey, Uint8Array>()
    const expired: CacheKey[] = []

    for (const row of rows) {
      const entry = parseRow(row)
      if (entry === undefined) continue

      if (entry.expiresAtMs !== null && entry.expiresAtMs <= nowMs) expired.push(entry.key)
      else live.set(entry.key, entry.value)
    }

    if (expired.length > 0) {
      await this.query(
        "get",
        `delete from ${this.table} where key = any($1) and expires_at <= $2`,
        [expired, nowMs],
      )
    }

    for (const key of unique) {
      const value = live.get(key)
      out.set(key, value === undefined ? { kind: "miss" } : { kind: "hit", value })
    }

    return out
  }

  async setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    // One upsert cannot touch the same row twice.
    const latest = new Map<CacheKey, Uint8Array>(entries)
    if (latest.size === 0) return

    const expiresAtMs = resolveExpiresAtMs(opts?.ttl, this.deps.clock.nowMs()) ?? null

    await this.query(
      "set",
      `insert into ${this.table} (key, value, expires_at)
       select key, value, $3::bigint from unnest($1::text[], $2::bytea[]) as t(key, value)
       on conflict (key) do update
       set value = excluded.value, expires_at = excluded.expires_at`,
      [[...latest.keys()], [...latest.values()].map((value) => Buffer.from(value)), expiresAtMs],
    )
  }

  async deleteMany(keys: readonly CacheKey[]): Promise<void> {
    if (keys.length === 0) return

    await this.query("deleteMany", `delete from ${this.table} where key = any($1)`, [
      [...new Set(keys)],
    ])
  }

  /**
   * Single upsert; an expired row restarts from 0 and loses its expiry.
   */
  async increment(key: CacheKey, delta: number): Promise<number> {
    const rows = await this.query(
      "increment",
      `insert into ${this.table} as entry (key, value, expires_at)
       values ($1, convert_to($2::bigint::text, 'UTF8'), null)
       on conflict (key) do update set
         value = convert_to((
           case when entry.expires_at is not null and entry.expires_at <= $3 then 0
                else convert_from(entry.value, 'UTF8')::bigint end + $2::bigint
         )::text, 'UTF8'),
         expires_at = case when entry.expires_at is not null and entry.expires_at <= $3
                           then null else entry.expires_at end
       returning convert_from(value, 'UTF8') as counter`,
      [key, String(delta), this.deps.clock.nowMs()],
    )

    const counter = Number(rows[0]?.counter)
    if (!Number.isSafeInteger(counter)) {
      throw backendUnavailable(this.name, "increment", new Error("no counter returned"))
    }

    return counter
  }

  private async query(
    operation: string,
    sql: string,
    params?: unknown[],
  ): Promise<Array<Record<string, unknown>>> {
    try {
      const res = await this.deps.client.query(sql, params)

      return res.rows
    } catch (err) {
      throw backendUnavailable(this.name, operation, err)
    }
  }
}

type EntryRow = {
  key: CacheKey
  value: Uint8Array
  expiresAtMs: number | null
}

// bigint columns come back from pg as strings.
function parseRow(row: Record<string, unknown>): EntryRow | undefined {
  const { key, value, expires_at: expiresAt } = row

  if (typeof key !== "string" || !(value instanceof Uint8Array)) return undefined

  return {
    key,
    value: new Uint8Array(value),
    expiresAtMs: expiresAt === null || expiresAt === undefined ? null : Number(expiresAt),
  }
}
