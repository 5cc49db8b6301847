import type { CacheTtl } from "../../ports/cache-options"
import type { Milliseconds } from "../../ports/time"

/**
 * Convert a call-site TTL into an absolute expiry in epoch milliseconds.
 *
 * Returns `undefined` for entries that never expire: no TTL, `forever`, or a
 * zero duration.
 */
export function resolveExpiresAtMs(
  ttl: CacheTtl | undefined,
  nowMs: Milliseconds,
): Milliseconds | undefined {
  if (ttl === undefined) return undefined

  switch (ttl.kind) {
    case "forever":
      return undefined
    case "seconds":
      return ttl.seconds === 0 ? undefined : nowMs + ttl.seconds * 1000
    case "milliseconds":
      return ttl.milliseconds === 0 ? undefined : nowMs + ttl.milliseconds
    case "until":
      return ttl.expiresAt.getTime()
  }
}

export function isExpired(expiresAtMs: Milliseconds | undefined, nowMs: Milliseconds) {
  if (expiresAtMs === undefined) return false

  return expiresAtMs <= nowMs
}

export function ttlFromSeconds(seconds: number): CacheTtl {
  if (seconds === 0) return { kind: "forever" }

  return { kind: "seconds", seconds }
}
