import type { LogContext, LogContextPatch, LogMeta } from "./log-context"
import type { LogLevelName } from "./log-level"

export interface Logger<TContext extends LogContext = LogContext> {
  trace(message: string, meta?: LogMeta<TContext>): void
  debug(message: string, meta?: LogMeta<TContext>): void
  info(message: string, meta?: LogMeta<TContext>): void
  warn(message: string, meta?: LogMeta<TContext>): void
  error(message: string, meta?: LogMeta<TContext>): void
  fatal(message: string, meta?: LogMeta<TContext>): void

  /**
   * Creates a child logger whose entries carry `context` in addition to the
   * parent's bindings.
   */
  child<U extends LogContextPatch>(context: U): Logger<TContext & U>
}

export type LoggerOptions = {
  /**
   * Minimum level to emit; entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Human-readable output through pino-pretty. Meant for local development.
   */
  prettify?: boolean
}
