import type { CacheKey } from "./cache-key"

/**
 * CacheNamespace builds keys that share one prefix.
 *
 * @example
 * ```
 * <namespace prefix> + ":" + <key parts joined by ":">
 * ```
 */
export interface CacheNamespace {
  readonly prefix: string

  key(...parts: readonly (string | number)[]): CacheKey
}
