export type CacheErrorCode =
  | "cache_backend_unavailable"
  | "cache_corrupt_entry"
  | "cache_value_not_numeric"
  | "cache_configuration_invalid"

/**
 * Contextual metadata attached to errors (store name, key, operation...).
 */
export type CacheErrorContext = Readonly<Record<string, unknown>>

export type CacheErrorOptions = Readonly<{
  code: CacheErrorCode
  context?: CacheErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * JSON-safe error shape for logs.
 */
export type SerializedCacheError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedCacheError
}>

export class CacheError extends Error {
  readonly code: CacheErrorCode
  readonly context: CacheErrorContext
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (backend down, corrupt blob),
   * `false` for deployment or programming mistakes.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: CacheErrorOptions) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedCacheError {
    return serializeCacheError(this)
  }
}

export function serializeCacheError(err: unknown): SerializedCacheError {
  if (err instanceof CacheError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...(err.cause !== undefined && { cause: serializeCacheError(err.cause) }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...(err.cause !== undefined && { cause: serializeCacheError(err.cause) }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}

export function isCacheError(err: unknown, code?: CacheErrorCode): err is CacheError {
  if (!(err instanceof CacheError)) return false

  return code === undefined || err.code === code
}

/**
 * Wrap a failure raised by a backend client into a retryable
 * `cache_backend_unavailable` error. Existing cache errors pass through.
 */
export function backendUnavailable(
  store: string,
  operation: string,
  cause: unknown,
): CacheError {
  if (cause instanceof CacheError) return cause

  const reason = cause instanceof Error ? cause.message : String(cause)

  return new CacheError(`${store}: ${operation} failed: ${reason}`, {
    code: "cache_backend_unavailable",
    context: { store, operation },
    cause,
    isRetryable: true,
  })
}

export function corruptEntry(store: string, key: string, cause?: unknown): CacheError {
  return new CacheError(`${store}: entry for "${key}" could not be decoded`, {
    code: "cache_corrupt_entry",
    context: { store, key },
    cause,
  })
}

export function invalidConfiguration(
  message: string,
  context?: CacheErrorContext,
  cause?: unknown,
): CacheError {
  return new CacheError(message, {
    code: "cache_configuration_invalid",
    ...(context !== undefined && { context }),
    cause,
    isOperational: false,
  })
}
