import { backendUnavailable, invalidConfiguration } from "../../core/errors/cache-error"
import type { Logger } from "../../core/logging/logger"
import type { CompositePolicy } from "../../ports/backend-kind"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStore } from "../../ports/cache-store"

export type CompositeCacheStoreDeps = {
  /**
   * Underlying stores in priority order. The first one is the primary.
   */
  stores: readonly CacheStore[]
  logger: Logger
}

export type CompositeCacheStoreOptions = {
  policy: CompositePolicy
}

/**
 * Combines several stores under a {@link CompositePolicy}.
 *
 * A read rejects only when every store failed. A write rejects only when the
 * primary failed; under `replicate`, secondary failures are logged.
 */
export class CompositeCacheStore implements CacheStore {
  readonly name = "composite"

  private readonly primary: CacheStore
  private readonly logger: Logger

  public constructor(
    private readonly deps: CompositeCacheStoreDeps,
    private readonly opts: CompositeCacheStoreOptions,
  ) {
    const [primary] = deps.stores
    if (primary === undefined) {
      throw invalidConfiguration("A composite cache store needs at least one store")
    }

    this.primary = primary
    this.logger = deps.logger.child({ module: "composite-cache-store" })
  }

  get policy(): CompositePolicy {
    return this.opts.policy
  }

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    if (this.opts.policy === "replicate") {
      return this.firstAnswer("get", (store) => store.get(key))
    }

    const found = await this.lookup("get", [key])

    return found.get(key) ?? { kind: "miss" }
  }

  async has(key: CacheKey): Promise<boolean> {
    if (this.opts.policy === "replicate") {
      return this.firstAnswer("has", (store) => store.has(key))
    }

    let failures = 0
    let lastError: unknown

    for (const store of this.deps.stores) {
      try {
        if (await store.has(key)) return true
      } catch (err) {
        failures++
        lastError = err
        this.storeFailed(store, "has", err)
      }
    }

    if (failures === this.deps.stores.length) {
      throw backendUnavailable(this.name, "has", lastError)
    }

    return false
  }

  async getMany(
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    if (this.opts.policy === "replicate") {
      return this.firstAnswer("getMany", (store) => store.getMany(keys))
    }

    return this.lookup("getMany", keys)
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    await this.write("set", (store) => store.set(key, value, opts))
  }

  async delete(key: CacheKey): Promise<void> {
    await this.write("delete", (store) => store.delete(key))
  }

  async clear(): Promise<void> {
    await this.write("clear", (store) => store.clear())
  }

  async setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    await this.write("setMany", (store) => store.setMany(entries, opts))
  }

  async deleteMany(keys: readonly CacheKey[]): Promise<void> {
    await this.write("deleteMany", (store) => store.deleteMany(keys))
  }

  /**
   * Fallback read: each store is asked only for the keys still missing.
   */
  private async lookup(
    operation: string,
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    const out = new Map<CacheKey, CacheResult<Uint8Array>>()
    for (const key of keys) out.set(key, { kind: "miss" })

    let remaining = [...out.keys()]
    let failures = 0
    let lastError: unknown

    for (const store of this.deps.stores) {
      if (remaining.length === 0) break

      try {
        const found = await store.getMany(remaining)

        for (const [key, res] of found) {
          if (res.kind === "hit" && out.has(key)) out.set(key, res)
        }

        remaining = remaining.filter((key) => out.get(key)?.kind !== "hit")
      } catch (err) {
        failures++
        lastError = err
        this.storeFailed(store, operation, err)
      }
    }

    if (failures === this.deps.stores.length) {
      throw backendUnavailable(this.name, operation, lastError)
    }

    return out
  }

  private async firstAnswer<R>(
    operation: string,
    read: (store: CacheStore) => Promise<R>,
  ): Promise<R> {
    let lastError: unknown

    for (const store of this.deps.stores) {
      try {
        return await read(store)
      } catch (err) {
        lastError = err
        this.storeFailed(store, operation, err)
      }
    }

    throw backendUnavailable(this.name, operation, lastError)
  }

  private async write(
    operation: string,
    apply: (store: CacheStore) => Promise<void>,
  ): Promise<void> {
    if (this.opts.policy === "fallback") {
      try {
        await apply(this.primary)
      } catch (err) {
        throw backendUnavailable(this.name, operation, err)
      }
      return
    }

    const results = await Promise.allSettled(this.deps.stores.map((store) => apply(store)))

    const [primaryResult, ...secondaryResults] = results

    for (const [i, result] of secondaryResults.entries()) {
      const store = this.deps.stores[i + 1]
      if (result.status === "rejected" && store) this.storeFailed(store, operation, result.reason)
    }

    if (primaryResult?.status === "rejected") {
      throw backendUnavailable(this.name, operation, primaryResult.reason)
    }
  }

  private storeFailed(store: CacheStore, operation: string, err: unknown): void {
    this.logger.warn("composite member failed", {
      operation,
      store: store.name,
      err,
    })
  }
}
