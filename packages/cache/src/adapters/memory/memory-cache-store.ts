import { decodeCounter, encodeCounter } from "../../core/counter"
import type { Clock } from "../../core/time/clock"
import { isExpired, resolveExpiresAtMs } from "../../core/time/resolve-expiry"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { AtomicCounter, CacheStore } from "../../ports/cache-store"
import type { Milliseconds } from "../../ports/time"

export type MemoryCacheStoreDeps = {
  clock: Clock
}

export type MemoryCacheRecord = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * Process-local store backed by a `Map`. Expired entries are dropped when
 * they are next touched. Values are copied on write.
 */
export class MemoryCacheStore implements CacheStore, AtomicCounter {
  readonly name = "memory"

  private readonly records = new Map<CacheKey, MemoryCacheRecord>()

  public constructor(private readonly deps: MemoryCacheStoreDeps) {}

  get size(): number {
    return this.records.size
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    return this.read(key)
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    this.write(key, value, resolveExpiresAtMs(opts?.ttl, this.deps.clock.nowMs()))
  }

  async delete(key: CacheKey): Promise<void> {
    this.records.delete(key)
  }

  async clear(): Promise<void> {
    this.records.clear()
  }

  async has(key: CacheKey): Promise<boolean> {
    return this.read(key).kind === "hit"
  }

  async getMany(
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    const out = new Map<CacheKey, CacheResult<Uint8Array>>()

    for (const key of keys) {
      if (!out.has(key)) out.set(key, this.read(key))
    }

    return out
  }

  async setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    const expiresAtMs = resolveExpiresAtMs(opts?.ttl, this.deps.clock.nowMs())

    for (const [key, value] of entries) {
      this.write(key, value, expiresAtMs)
    }
  }

  async deleteMany(keys: readonly CacheKey[]): Promise<void> {
    for (const key of keys) {
      this.records.delete(key)
    }
  }

  async increment(key: CacheKey, delta: number): Promise<number> {
    const current = this.read(key)
    const value = (current.kind === "hit" ? decodeCounter(key, current.value) : 0) + delta

    this.write(key, encodeCounter(value), this.records.get(key)?.expiresAtMs)

    return value
  }

  private read(key: CacheKey): CacheResult<Uint8Array> {
    const record = this.records.get(key)
    if (record === undefined) return { kind: "miss" }

    if (isExpired(record.expiresAtMs, this.deps.clock.nowMs())) {
      this.records.delete(key)
      return { kind: "miss" }
    }

    return { kind: "hit", value: record.value }
  }

  private write(key: CacheKey, value: Uint8Array, expiresAtMs: Milliseconds | undefined) {
    this.records.set(key, {
      value: new Uint8Array(value),
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })
  }
}
