import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheStore } from "../../ports/cache-store"
import type { CacheTag } from "../../ports/cache-tag"
import { prefixKey, TAG_VERSION_SEGMENT } from "../cache-namespace"
import { textCodec } from "../codec/json-codec"
import type { IdGenerator } from "../ids/id-generator"

export type TagVersionStoreDeps = {
  store: CacheStore
  ids: IdGenerator<string>
}

export type TagVersionStoreOptions = {
  /**
   * Same prefix as the manager the tagged entries go through.
   */
  keyPrefix: string
}

/**
 * Keeps one random version token per tag, stored without expiry under
 * `<keyPrefix>:tagversion:<tag>`. Managers refuse logical keys in that space.
 *
 * Two processes creating the first token for a tag at the same time may both
 * write one; the loser's entries are simply never read again.
 */
export class TagVersionStore {
  constructor(
    private readonly deps: TagVersionStoreDeps,
    private readonly opts: TagVersionStoreOptions,
  ) {}

  keyFor(tag: CacheTag): CacheKey {
    return prefixKey(this.opts.keyPrefix, `${TAG_VERSION_SEGMENT}${tag}`)
  }

  /**
   * Tokens for `tags`, in the same order, or `undefined` when any tag has no
   * token yet.
   */
  async current(tags: readonly CacheTag[]): Promise<string[] | undefined> {
    const found = await this.read(tags)
    const tokens: string[] = []

    for (const token of found) {
      if (token === undefined) return undefined
      tokens.push(token)
    }

    return tokens
  }

  /**
   * Tokens for `tags`, creating the missing ones.
   */
  async ensure(tags: readonly CacheTag[]): Promise<string[]> {
    const found = await this.read(tags)
    const created: [CacheKey, Uint8Array][] = []

    const tokens = tags.map((tag, i) => {
      const existing = found[i]
      if (existing !== undefined) return existing

      const token = this.deps.ids.generate()
      created.push([this.keyFor(tag), textCodec.encode(token)])

      return token
    })

    if (created.length > 0) {
      await this.deps.store.setMany(created, { ttl: { kind: "forever" } })
    }

    return tokens
  }

  /**
   * Replace the token of every tag in `tags`.
   */
  async rotate(tags: readonly CacheTag[]): Promise<string[]> {
    const rotated = tags.map((tag) => [tag, this.deps.ids.generate()] as const)

    if (rotated.length > 0) {
      await this.deps.store.setMany(
        rotated.map(([tag, token]) => [this.keyFor(tag), textCodec.encode(token)] as const),
        { ttl: { kind: "forever" } },
      )
    }

    return rotated.map(([, token]) => token)
  }

  private async read(tags: readonly CacheTag[]): Promise<(string | undefined)[]> {
    if (tags.length === 0) return []

    const res = await this.deps.store.getMany(tags.map((tag) => this.keyFor(tag)))

    return tags.map((tag) => decodeToken(res.get(this.keyFor(tag))))
  }
}

// An undecodable token is treated as absent and gets replaced on the next write.
function decodeToken(res: CacheResult<Uint8Array> | undefined): string | undefined {
  if (res === undefined || res.kind === "miss") return undefined

  try {
    return textCodec.decode(res.value)
  } catch {
    return undefined
  }
}
