import { textCodec } from "./codec/json-codec"
import { CacheError } from "./errors/cache-error"

const INTEGER = /^-?\d+$/

export function encodeCounter(value: number): Uint8Array {
  return textCodec.encode(String(value))
}

/**
 * Parse the decimal text a counter is stored as. Throws
 * `cache_value_not_numeric` for anything that is not a safe integer.
 */
export function decodeCounter(key: string, bytes: Uint8Array): number {
  let text: string

  try {
    text = textCodec.decode(bytes)
  } catch (err) {
    throw notNumeric(key, err)
  }

  const value = Number(text)

  if (!INTEGER.test(text) || !Number.isSafeInteger(value)) throw notNumeric(key)

  return value
}

function notNumeric(key: string, cause?: unknown): CacheError {
  return new CacheError(`Value stored under "${key}" is not an integer`, {
    code: "cache_value_not_numeric",
    context: { key },
    cause,
  })
}
