import type { CacheKey } from "../ports/cache-key"
import type { CacheNamespace } from "../ports/cache-namespace"

export function createCacheNamespace(prefix: string): CacheNamespace {
  return {
    prefix,
    key(...parts) {
      const tail = parts.map(String).join(":")

      return prefix === "" ? tail : `${prefix}:${tail}`
    },
  }
}

export function prefixKey(prefix: string, key: CacheKey): CacheKey {
  return prefix === "" ? key : `${prefix}:${key}`
}

/**
 * Logical keys under this segment belong to tag version tokens.
 */
export const TAG_VERSION_SEGMENT = "tagversion:"

export function isReservedKey(key: CacheKey): boolean {
  return key.startsWith(TAG_VERSION_SEGMENT)
}
