import { v4, v7 } from "uuid"

export interface IdGenerator<T = string> {
  generate(): T
}

/** 122 random bits per id. */
export const uuidV4: IdGenerator<string> = { generate: () => v4() }

/** Time-ordered, with 74 random bits per id. */
export const uuidV7: IdGenerator<string> = { generate: () => v7() }

export const tagTokenFormats = ["uuid-v4", "uuid-v7"] as const

export type TagTokenFormat = (typeof tagTokenFormats)[number]

export function idGeneratorFor(format: TagTokenFormat): IdGenerator<string> {
  switch (format) {
    case "uuid-v4":
      return uuidV4
    case "uuid-v7":
      return uuidV7
  }
}
