import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }
type UntilDateTtl = { kind: "until"; expiresAt: Date }
type ForeverTtl = { kind: "forever" }

/**
 * Lifetime of a cache entry, expressed at the call site.
 *
 * @remarks
 * - A zero `seconds` / `milliseconds` duration means the entry never expires.
 * - A negative duration, or an `until` date in the past, stores an entry that
 *   is already expired (the next read is a miss).
 */
export type CacheTtl = SecondsTtl | MillisecondsTtl | UntilDateTtl | ForeverTtl

export type CacheSetOptions = {
  ttl: CacheTtl
}
