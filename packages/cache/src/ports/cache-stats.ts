/**
 * Point-in-time snapshot of cache counters.
 */
export type CacheStats = {
  readonly hits: number
  readonly misses: number
  readonly sets: number
  readonly deletes: number

  /** Store failures observed by the manager. */
  readonly errors: number

  /** `hits / (hits + misses)`, or 0 before the first read. */
  readonly hitRate: number
}
