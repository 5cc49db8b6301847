import type { CacheTag } from "../../ports/cache-tag"

export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the store adapter involved ("memory", "redis", "composite"...). */
  store: string
  operation: string
  key: string
  tags: readonly CacheTag[]
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
