import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheTag } from "../../ports/cache-tag"
import type { CacheManager } from "../cache-manager"
import type { Logger } from "../logging/logger"
import { normalizeTags, taggedEntryKey } from "./physical-key"
import type { TagVersionStore } from "./tag-version-store"

export type TaggedCacheDeps<T> = {
  cache: CacheManager<T>
  versions: TagVersionStore
  logger: Logger
}

/**
 * Entries grouped under tags that can be invalidated together.
 *
 * An entry is stored under a key derived from the current version token of
 * each of its tags. Flushing a tag replaces its token, so every entry written
 * under the old token stops being reachable and ages out through its own TTL.
 * Reads and writes must name the same tag set; order and duplicates do not
 * matter.
 */
export class TaggedCache<T> {
  private readonly logger: Logger

  constructor(private readonly deps: TaggedCacheDeps<T>) {
    this.logger = deps.logger.child({ module: "tagged-cache" })
  }

  tags(...tags: CacheTag[]): TagScope<T> {
    return new TagScope(this, normalizeTags(tags))
  }

  async get(tags: readonly CacheTag[], key: CacheKey): Promise<CacheResult<T>> {
    const normalized = normalizeTags(tags)
    const tokens = await this.currentTokens("get", normalized, key)

    if (tokens === undefined) {
      this.deps.cache.statistics.recordMiss()
      return { kind: "miss" }
    }

    return this.deps.cache.get(taggedEntryKey(normalized, tokens, key))
  }

  async set(
    tags: readonly CacheTag[],
    key: CacheKey,
    value: T,
    opts?: Partial<CacheSetOptions>,
  ): Promise<boolean> {
    const normalized = normalizeTags(tags)
    let tokens: string[]

    try {
      tokens = await this.deps.versions.ensure(normalized)
    } catch (err) {
      this.versionsFailed("set", normalized, key, err)
      return false
    }

    return this.deps.cache.set(taggedEntryKey(normalized, tokens, key), value, opts)
  }

  /**
   * Remove the entry stored under the current tokens of `tags`. Reports `true`
   * when no entry can exist because a tag has never been written.
   */
  async delete(tags: readonly CacheTag[], key: CacheKey): Promise<boolean> {
    const normalized = normalizeTags(tags)
    let tokens: string[] | undefined

    try {
      tokens = await this.deps.versions.current(normalized)
    } catch (err) {
      this.versionsFailed("delete", normalized, key, err)
      return false
    }

    if (tokens === undefined) return true

    return this.deps.cache.delete(taggedEntryKey(normalized, tokens, key))
  }

  /**
   * Read-through on the entry under the current tokens of `tags`. Concurrent
   * misses share one producer call when the manager runs single-flight.
   */
  async remember(
    tags: readonly CacheTag[],
    key: CacheKey,
    producer: () => Promise<T>,
    opts?: Partial<CacheSetOptions>,
  ): Promise<T> {
    const normalized = normalizeTags(tags)
    let tokens: string[]

    try {
      tokens = await this.deps.versions.ensure(normalized)
    } catch (err) {
      this.versionsFailed("remember", normalized, key, err)
      this.deps.cache.statistics.recordMiss()
      return producer()
    }

    return this.deps.cache.remember(taggedEntryKey(normalized, tokens, key), producer, opts)
  }

  /**
   * Invalidate every entry carrying any of `tags`. Entries are not deleted;
   * they become unreachable.
   */
  async flush(...tags: CacheTag[]): Promise<boolean> {
    const normalized = normalizeTags(tags)

    try {
      await this.deps.versions.rotate(normalized)
    } catch (err) {
      this.versionsFailed("flush", normalized, undefined, err)
      return false
    }

    this.logger.debug("flushed tags", { operation: "flush", tags: normalized })
    return true
  }

  private async currentTokens(
    operation: string,
    tags: readonly CacheTag[],
    key: CacheKey,
  ): Promise<string[] | undefined> {
    try {
      return await this.deps.versions.current(tags)
    } catch (err) {
      this.versionsFailed(operation, tags, key, err)
      return undefined
    }
  }

  private versionsFailed(
    operation: string,
    tags: readonly CacheTag[],
    key: CacheKey | undefined,
    err: unknown,
  ): void {
    this.deps.cache.statistics.recordError()
    this.logger.warn("tag version lookup failed", {
      operation,
      tags,
      ...(key !== undefined && { key }),
      err,
    })
  }
}

/**
 * A {@link TaggedCache} bound to a fixed set of tags.
 *
 * @example
 * ```ts
 * const users = tagged.tags("users")
 * await users.set("user:1", { name: "Alice" })
 * await users.flush()
 * ```
 */
export class TagScope<T> {
  constructor(
    private readonly cache: TaggedCache<T>,
    readonly tags: readonly CacheTag[],
  ) {}

  get(key: CacheKey): Promise<CacheResult<T>> {
    return this.cache.get(this.tags, key)
  }

  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<boolean> {
    return this.cache.set(this.tags, key, value, opts)
  }

  delete(key: CacheKey): Promise<boolean> {
    return this.cache.delete(this.tags, key)
  }

  remember(
    key: CacheKey,
    producer: () => Promise<T>,
    opts?: Partial<CacheSetOptions>,
  ): Promise<T> {
    return this.cache.remember(this.tags, key, producer, opts)
  }

  flush(): Promise<boolean> {
    return this.cache.flush(...this.tags)
  }
}
