import pino, {
  type DestinationStream,
  type Logger as PinoLoggerBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import { isCacheError, serializeCacheError } from "../errors/cache-error"
import type { LogContext, LogContextPatch, LogMeta } from "./log-context"
import type { Logger, LoggerOptions } from "./logger"

export type PinoLoggerDeps = {
  /**
   * Parent pino logger; when set, this adapter only adds bindings via `.child()`.
   */
  base?: PinoLoggerBase

  /**
   * Destination stream for pino output (defaults to stdout).
   */
  destination?: DestinationStream
}

export class PinoLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  protected readonly logger: PinoLoggerBase

  constructor(
    protected readonly deps: PinoLoggerDeps = {},
    protected readonly opts: Partial<LoggerOptions> = {},
    bindings: LogContextPatch = {},
  ) {
    this.logger = this.init(bindings)
  }

  private init(bindings: LogContextPatch): PinoLoggerBase {
    if (this.deps.base) return this.deps.base.child(bindings)

    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: serializeErr },
      ...(this.opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "hostname",
          },
        },
      }),
    }

    const base = this.deps.destination
      ? pino(pinoOpts, this.deps.destination)
      : pino(pinoOpts)

    return base.child(bindings)
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.logger.trace({ ...meta }, message)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.logger.debug({ ...meta }, message)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.logger.info({ ...meta }, message)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.logger.warn({ ...meta }, message)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.logger.error({ ...meta }, message)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.logger.fatal({ ...meta }, message)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new PinoLogger<TContext & U>({ base: this.logger }, this.opts, context)
  }
}

// Cache errors keep their code and context; anything else goes through pino's own.
function serializeErr(err: unknown): unknown {
  if (isCacheError(err)) return serializeCacheError(err)

  return err instanceof Error ? errWithCause(err) : err
}

export function createPinoLogger<TContext extends LogContext = LogContext>(
  opts: Partial<LoggerOptions> = {},
  bindings: LogContextPatch = {},
  deps: PinoLoggerDeps = {},
): Logger<TContext> {
  return new PinoLogger<TContext>(deps, opts, bindings)
}
