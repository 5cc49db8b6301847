import { createHash } from "node:crypto"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTag } from "../../ports/cache-tag"

/**
 * Deduplicated, lexicographically sorted copy of `tags`.
 */
export function normalizeTags(tags: readonly CacheTag[]): CacheTag[] {
  return [...new Set(tags)].sort()
}

/**
 * Key a tagged entry is stored under. It changes whenever any token in
 * `tokens` changes, which is what makes a flushed entry unreachable.
 *
 * `tags` must be normalized and `tokens` aligned with it.
 */
export function taggedEntryKey(
  tags: readonly CacheTag[],
  tokens: readonly string[],
  key: CacheKey,
): CacheKey {
  const digest = createHash("sha256")
    .update(JSON.stringify([tags, tokens, key]))
    .digest("hex")

  return `tagged:${digest}`
}
