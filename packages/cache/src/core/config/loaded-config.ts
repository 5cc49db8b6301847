/**
 * Validated configuration plus where each value came from.
 *
 * @example
 * ```ts
 * const loaded = await loadCacheConfig({ env: process.env })
 *
 * loaded.value.backend        // "redis"
 * loaded.explain("BACKEND")   // "env"
 * loaded.unknownKeys()        // ["BAKEND"]
 * ```
 */
export class LoadedConfig<TRaw extends Record<string, unknown>, TValue> {
  constructor(
    readonly value: TValue,
    private readonly raw: Readonly<TRaw>,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly mergedKeys: ReadonlySet<string>,
  ) {}

  /**
   * The source that provided the final value for `key`, or "default".
   */
  explain(key: keyof TRaw & string): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  /**
   * Keys present in the sources but unknown to the schema (typos, stale
   * variables).
   */
  unknownKeys(): string[] {
    return [...this.mergedKeys].filter((key) => !(key in this.raw))
  }
}
