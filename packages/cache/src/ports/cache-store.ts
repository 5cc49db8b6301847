import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * CacheStore is the uniform blob-store contract every backend implements.
 *
 * @remarks
 * - Stores hold derived, non-authoritative bytes. Entries may disappear at any
 *   time (backend eviction, restarts).
 * - An entry whose expiry has passed reads as a miss and is deleted lazily.
 * - Operations must be safe to call concurrently. I/O failures reject with a
 *   `CacheError` (`cache_backend_unavailable`); they never crash the process.
 * - A store instance is shared by every caller for the life of the process.
 */
export interface CacheStore {
  /** Adapter name used in logs and errors ("memory", "redis"...). */
  readonly name: string

  /**
   * Read the bytes stored under `key`.
   */
  get(key: CacheKey): Promise<CacheResult<Uint8Array>>

  /**
   * Write `value` under `key`, replacing any previous entry and its expiry.
   *
   * Without a `ttl` the entry never expires.
   */
  set(key: CacheKey, value: Uint8Array, opts?: Partial<CacheSetOptions>): Promise<void>

  /**
   * Remove `key`. Deleting an absent key is a no-op.
   */
  delete(key: CacheKey): Promise<void>

  /**
   * Remove every entry this store owns.
   */
  clear(): Promise<void>

  /**
   * Whether a live (non-expired) entry exists for `key`.
   */
  has(key: CacheKey): Promise<boolean>

  /**
   * Read several keys at once.
   *
   * @remarks
   * The returned map holds one result per distinct key, in order of first
   * occurrence in `keys`.
   */
  getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<Uint8Array>>>

  /**
   * Write several entries sharing the same options. For duplicate keys the
   * last entry wins.
   */
  setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void>

  /**
   * Remove several keys. Absent keys are ignored.
   */
  deleteMany(keys: readonly CacheKey[]): Promise<void>
}

/**
 * Optional capability: atomic numeric increment performed by the backend.
 *
 * @remarks
 * Counters are stored as the decimal text of an integer, which is also what the
 * JSON codec produces for numbers. A missing or expired key counts from 0.
 * An existing expiry is kept.
 */
export interface AtomicCounter {
  increment(key: CacheKey, delta: number): Promise<number>
}

export function supportsIncrement(
  store: CacheStore,
): store is CacheStore & AtomicCounter {
  return "increment" in store && typeof store.increment === "function"
}
