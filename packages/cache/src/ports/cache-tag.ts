/**
 * CacheTag is a plain string label grouping entries for bulk invalidation.
 *
 * @remarks
 * - Tags should be stable and low-cardinality ("users", "feature-flags").
 * - Flushing a tag costs one write regardless of how many entries carry it.
 *
 * @example
 * ```ts
 * const tag: CacheTag = "users"
 * ```
 */
export type CacheTag = string
