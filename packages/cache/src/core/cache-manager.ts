import type { CacheEntry } from "../ports/cache-entry"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { CacheStats } from "../ports/cache-stats"
import { type CacheStore, supportsIncrement } from "../ports/cache-store"
import type { Codec } from "../ports/codec"
import type { CounterResult } from "../ports/counter-result"
import { isReservedKey, prefixKey } from "./cache-namespace"
import { decodeCounter, encodeCounter } from "./counter"
import { corruptEntry, isCacheError } from "./errors/cache-error"
import type { Logger } from "./logging/logger"
import { SingleFlight } from "./remember/single-flight"
import type { CacheStatistics } from "./stats/cache-statistics"

export type CacheManagerDeps<T> = {
  store: CacheStore
  codec: Codec<T>
  logger: Logger
  statistics: CacheStatistics
}

export type CacheManagerOptions = {
  /**
   * Prepended to every key as `<prefix>:<key>`. Empty means no prefix.
   */
  keyPrefix: string

  /**
   * Lifetime used when a write does not pass its own `ttl`.
   */
  defaultTtl: CacheTtl

  /**
   * Collapse concurrent `remember` misses for the same key onto one producer
   * call. Off by default.
   */
  singleFlight?: boolean
}

/**
 * Typed façade over a byte store.
 *
 * Store failures never reach the caller: reads degrade to a miss, writes report
 * `false`, and the failure is logged and counted. Errors thrown by a
 * `remember` producer do propagate, as does a key starting with `tagversion:`,
 * which is reserved for tag version tokens.
 */
export class CacheManager<T> {
  private readonly logger: Logger
  private readonly inFlight: SingleFlight<T> | undefined

  constructor(
    private readonly deps: CacheManagerDeps<T>,
    private readonly opts: CacheManagerOptions,
  ) {
    this.logger = deps.logger.child({ module: "cache-manager", store: deps.store.name })
    this.inFlight = opts.singleFlight ? new SingleFlight<T>() : undefined
  }

  get statistics(): CacheStatistics {
    return this.deps.statistics
  }

  get keyPrefix(): string {
    return this.opts.keyPrefix
  }

  async get(key: CacheKey): Promise<CacheResult<T>> {
    const storeKey = this.storeKey(key)
    let res: CacheResult<Uint8Array>

    try {
      res = await this.deps.store.get(storeKey)
    } catch (err) {
      this.storeFailed("get", storeKey, err)
      return { kind: "miss" }
    }

    const decoded = this.decode(storeKey, res)
    if (decoded.corrupt) await this.discard([storeKey])

    return decoded.result
  }

  async getOrDefault(key: CacheKey, fallback: T): Promise<T> {
    const res = await this.get(key)

    return res.kind === "hit" ? res.value : fallback
  }

  async has(key: CacheKey): Promise<boolean> {
    const storeKey = this.storeKey(key)

    try {
      return await this.deps.store.has(storeKey)
    } catch (err) {
      this.storeFailed("has", storeKey, err)
      return false
    }
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<boolean> {
    const storeKey = this.storeKey(key)

    try {
      await this.deps.store.set(storeKey, this.deps.codec.encode(value), {
        ttl: opts?.ttl ?? this.opts.defaultTtl,
      })
    } catch (err) {
      this.storeFailed("set", storeKey, err)
      return false
    }

    this.deps.statistics.recordSet()
    return true
  }

  async delete(key: CacheKey): Promise<boolean> {
    const storeKey = this.storeKey(key)

    try {
      await this.deps.store.delete(storeKey)
    } catch (err) {
      this.storeFailed("delete", storeKey, err)
      return false
    }

    this.deps.statistics.recordDelete()
    return true
  }

  /**
   * Read and remove `key`. The delete is only attempted on a hit.
   */
  async pull(key: CacheKey): Promise<CacheResult<T>> {
    const res = await this.get(key)
    if (res.kind === "hit") await this.delete(key)

    return res
  }

  async getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    const unique = [...new Set(keys)]
    const out = new Map<CacheKey, CacheResult<T>>()
    if (unique.length === 0) return out

    const storeKeys = unique.map((key) => this.storeKey(key))
    let found: Map<CacheKey, CacheResult<Uint8Array>>

    try {
      found = await this.deps.store.getMany(storeKeys)
    } catch (err) {
      this.storeFailed("getMany", storeKeys.join(","), err)
      for (const key of unique) out.set(key, { kind: "miss" })
      return out
    }

    const corrupt: CacheKey[] = []

    for (const key of unique) {
      const storeKey = this.storeKey(key)
      const decoded = this.decode(storeKey, found.get(storeKey) ?? { kind: "miss" })
      if (decoded.corrupt) corrupt.push(storeKey)

      out.set(key, decoded.result)
    }

    if (corrupt.length > 0) await this.discard(corrupt)

    return out
  }

  async setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<boolean> {
    if (entries.length === 0) return true

    const keyed = entries.map(([key, value]) => [this.storeKey(key), value] as const)

    try {
      const encoded: CacheEntry<Uint8Array>[] = keyed.map(
        ([storeKey, value]) => [storeKey, this.deps.codec.encode(value)] as const,
      )

      await this.deps.store.setMany(encoded, { ttl: opts?.ttl ?? this.opts.defaultTtl })
    } catch (err) {
      this.storeFailed("setMany", entries.map(([key]) => key).join(","), err)
      return false
    }

    this.deps.statistics.recordSet(entries.length)
    return true
  }

  async deleteMany(keys: readonly CacheKey[]): Promise<boolean> {
    const unique = [...new Set(keys)]
    if (unique.length === 0) return true

    const storeKeys = unique.map((key) => this.storeKey(key))

    try {
      await this.deps.store.deleteMany(storeKeys)
    } catch (err) {
      this.storeFailed("deleteMany", unique.join(","), err)
      return false
    }

    this.deps.statistics.recordDelete(unique.length)
    return true
  }

  /**
   * Empty the whole backend, including entries written under other prefixes
   * and tag version tokens.
   */
  async clear(): Promise<boolean> {
    try {
      await this.deps.store.clear()
    } catch (err) {
      this.storeFailed("clear", "*", err)
      return false
    }

    return true
  }

  /**
   * Return the cached value for `key`, or run `producer`, store its result and
   * return it. A failed write after the producer ran is logged; the produced
   * value is still returned.
   */
  async remember(
    key: CacheKey,
    producer: () => Promise<T>,
    opts?: Partial<CacheSetOptions>,
  ): Promise<T> {
    const cached = await this.get(key)
    if (cached.kind === "hit") return cached.value

    const produce = async () => {
      const value = await producer()
      await this.set(key, value, opts)

      return value
    }

    return this.inFlight ? this.inFlight.run(this.storeKey(key), produce) : produce()
  }

  rememberForever(key: CacheKey, producer: () => Promise<T>): Promise<T> {
    return this.remember(key, producer, { ttl: { kind: "forever" } })
  }

  /**
   * Add `delta` to the integer stored under `key`. A missing key counts from 0.
   *
   * Stores without a native counter get a read-modify-write that is not atomic
   * across processes and writes the result without expiry.
   */
  async increment(key: CacheKey, delta = 1): Promise<CounterResult> {
    if (!Number.isSafeInteger(delta)) {
      throw new RangeError(`delta must be a safe integer, got ${delta}`)
    }

    const storeKey = this.storeKey(key)
    const store = this.deps.store

    try {
      if (supportsIncrement(store)) {
        return { ok: true, value: await store.increment(storeKey, delta) }
      }

      const current = await store.get(storeKey)
      const value = (current.kind === "hit" ? decodeCounter(storeKey, current.value) : 0) + delta

      await store.set(storeKey, encodeCounter(value), { ttl: { kind: "forever" } })

      return { ok: true, value }
    } catch (err) {
      if (isCacheError(err, "cache_value_not_numeric")) {
        this.logger.warn("cached value is not an integer", {
          operation: "increment",
          key: storeKey,
          err,
        })
      } else {
        this.storeFailed("increment", storeKey, err)
      }

      return { ok: false }
    }
  }

  decrement(key: CacheKey, delta = 1): Promise<CounterResult> {
    return this.increment(key, -delta)
  }

  getStats(): CacheStats {
    return this.deps.statistics.getStats()
  }

  private storeKey(key: CacheKey): CacheKey {
    if (isReservedKey(key)) {
      throw new RangeError(`key "${key}" is reserved for tag versions`)
    }

    return prefixKey(this.opts.keyPrefix, key)
  }

  private decode(
    storeKey: CacheKey,
    res: CacheResult<Uint8Array>,
  ): { result: CacheResult<T>; corrupt: boolean } {
    if (res.kind === "miss") {
      this.deps.statistics.recordMiss()
      return { result: res, corrupt: false }
    }

    try {
      const value = this.deps.codec.decode(res.value)
      this.deps.statistics.recordHit()

      return { result: { kind: "hit", value }, corrupt: false }
    } catch (err) {
      this.deps.statistics.recordMiss()
      this.logger.warn("discarding undecodable cache entry", {
        operation: "get",
        key: storeKey,
        err: corruptEntry(this.deps.store.name, storeKey, err),
      })

      return { result: { kind: "miss" }, corrupt: true }
    }
  }

  private async discard(storeKeys: CacheKey[]): Promise<void> {
    try {
      await this.deps.store.deleteMany(storeKeys)
    } catch (err) {
      this.storeFailed("deleteMany", storeKeys.join(","), err)
    }
  }

  private storeFailed(operation: string, key: string, err: unknown): void {
    this.deps.statistics.recordError()
    this.logger.warn("cache store operation failed", { operation, key, err })
  }
}
