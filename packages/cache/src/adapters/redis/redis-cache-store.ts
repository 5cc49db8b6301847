import { backendUnavailable } from "../../core/errors/cache-error"
import type { Clock } from "../../core/time/clock"
import { resolveExpiresAtMs } from "../../core/time/resolve-expiry"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { AtomicCounter, CacheStore } from "../../ports/cache-store"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisBytesClient, RedisExpiration } from "./redis-client"

export type RedisCacheStoreOptions = {
  /**
   * Maximum number of keys processed in a single Redis operation when using
   * bulk methods (`getMany`, `setMany`, `deleteMany`) and `clear()` scans.
   *
   * Large bulk requests are split into batches of this size to avoid
   * oversized commands and uneven load spikes.
   */
  batchSize: number

  keyspacePrefix: KeyspacePrefix
}

export type RedisCacheStoreDeps = {
  client: RedisBytesClient
  clock: Clock
}

/**
 * A write whose expiry already passed becomes a delete; Redis rejects a
 * non-positive PX.
 */
type RedisWrite = { kind: "set"; expiration?: RedisExpiration } | { kind: "delete" }

export class RedisCacheStore implements CacheStore, AtomicCounter {
  readonly name = "redis"

  public constructor(
    private readonly deps: RedisCacheStoreDeps,
    private readonly opts: RedisCacheStoreOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    const buffer = await this.call("get", () => this.deps.client.get(this.fullKey(key)))

    return this.createCacheResult(buffer)
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    const fullKey = this.fullKey(key)
    const write = this.toRedisWrite(opts?.ttl)

    await this.call("set", () => {
      if (write.kind === "delete") return this.deps.client.del(fullKey)

      return write.expiration
        ? this.deps.client.set(fullKey, Buffer.from(value), write.expiration)
        : this.deps.client.set(fullKey, Buffer.from(value))
    })
  }

  async delete(key: CacheKey): Promise<void> {
    await this.call("delete", () => this.deps.client.del(this.fullKey(key)))
  }

  /**
   * Unlink every key under the keyspace prefix. Without a prefix this empties
   * the whole logical database the client is connected to.
   */
  async clear(): Promise<void> {
    const match = `${escapeGlob(this.opts.keyspacePrefix)}*`
    let cursor = "0"

    do {
      const reply = await this.call("clear", () =>
        this.deps.client.scan(cursor, { MATCH: match, COUNT: this.opts.batchSize }),
      )
      cursor = String(reply.cursor)

      const keys = reply.keys.map(String)
      if (keys.length > 0) await this.call("clear", () => this.deps.client.unlink(keys))
    } while (cursor !== "0")
  }

  async has(key: CacheKey): Promise<boolean> {
    const count = await this.call("has", () => this.deps.client.exists(this.fullKey(key)))

    return count > 0
  }

  async getMany(
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    const out = new Map<CacheKey, CacheResult<Uint8Array>>()
    const unique = [...new Set(keys)]

    for (const batch of this.chunks(unique, this.opts.batchSize)) {
      const fullKeys = batch.map((k) => this.fullKey(k))
      const buffers = await this.call("getMany", () => this.deps.client.mGet(fullKeys))

      for (const [i, key] of batch.entries()) {
        out.set(key, this.createCacheResult(buffers[i] ?? null))
      }
    }

    return out
  }

  async setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    if (entries.length === 0) return

    const write = this.toRedisWrite(opts?.ttl)

    for (const batch of this.chunks(entries, this.opts.batchSize)) {
      const tx = this.deps.client.multi()

      for (const [key, value] of batch) {
        const fullKey = this.fullKey(key)

        if (write.kind === "delete") tx.del(fullKey)
        else if (write.expiration) tx.set(fullKey, Buffer.from(value), write.expiration)
        else tx.set(fullKey, Buffer.from(value))
      }

      await this.call("setMany", () => tx.exec())
    }
  }

  async deleteMany(keys: readonly CacheKey[]): Promise<void> {
    const fullKeys = [...new Set(keys)].map((k) => this.fullKey(k))

    for (const batch of this.chunks(fullKeys, this.opts.batchSize)) {
      await this.call("deleteMany", () => this.deps.client.del(batch))
    }
  }

  async increment(key: CacheKey, delta: number): Promise<number> {
    return this.call("increment", () => this.deps.client.incrBy(this.fullKey(key), delta))
  }

  private async call<R>(operation: string, fn: () => Promise<R>): Promise<R> {
    try {
      return await fn()
    } catch (err) {
      throw backendUnavailable(this.name, operation, err)
    }
  }

  private *chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
    for (let i = 0; i < items.length; i += size) {
      yield items.slice(i, i + size)
    }
  }

  private createCacheResult(buffer: Buffer | null): CacheResult<Uint8Array> {
    if (buffer === null) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(buffer) }
  }

  private toRedisWrite(ttl: CacheTtl | undefined): RedisWrite {
    const nowMs = this.deps.clock.nowMs()
    const expiresAtMs = resolveExpiresAtMs(ttl, nowMs)

    if (expiresAtMs === undefined) return { kind: "set" }

    const remainingMs = Math.ceil(expiresAtMs - nowMs)
    if (remainingMs <= 0) return { kind: "delete" }

    return { kind: "set", expiration: { expiration: { type: "PX", value: remainingMs } } }
  }

  private fullKey(k: CacheKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}

function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, "\\$&")
}
