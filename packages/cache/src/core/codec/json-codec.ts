import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

/**
 * UTF-8 JSON codec. `decode` throws on invalid UTF-8 or JSON; it does not
 * validate the decoded shape.
 */
export function jsonCodec<T>(): Codec<T> {
  return {
    encode(value) {
      return encoder.encode(JSON.stringify(value))
    },
    decode(bytes) {
      return JSON.parse(decoder.decode(bytes))
    },
  }
}

export const textCodec: Codec<string> = {
  encode(value) {
    return encoder.encode(value)
  },
  decode(bytes) {
    return decoder.decode(bytes)
  },
}
