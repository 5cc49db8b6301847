import { type ZodType, z } from "zod"
import { invalidConfiguration } from "../errors/cache-error"
import type { ConfigSource } from "./config-source"

export type LoadedSources<T> = {
  data: T
  provenance: Map<string, string>
  mergedKeys: Set<string>
}

/**
 * Merge `sources` in order (later wins) and validate the result with
 * `schema`. Throws `cache_configuration_invalid` with zod's readable report.
 */
export async function loadSources<T extends Record<string, unknown>>(
  schema: ZodType<T>,
  sources: readonly ConfigSource[],
): Promise<LoadedSources<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged[key] = value
        provenance.set(key, source.name)
      }
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw invalidConfiguration(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { sources: sources.map((source) => source.name) },
      result.error,
    )
  }

  return { data: result.data, provenance, mergedKeys: new Set(Object.keys(merged)) }
}
