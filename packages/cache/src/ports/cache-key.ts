/**
 * CacheKey is a plain, application-chosen string naming a piece of data.
 *
 * Keys are unique within a manager's namespace; the manager prepends its
 * `keyPrefix` before the key reaches a store.
 *
 * @example
 * ```ts
 * const key: CacheKey = "user:1"
 * ```
 */
export type CacheKey = string
