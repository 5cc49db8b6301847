/**
 * A source of raw configuration values.
 *
 * A source only loads. It does not validate, coerce or merge. Sources are
 * applied in order and later sources override earlier ones. Returning
 * `undefined` for a key means "value not provided".
 */
export interface ConfigSource {
  /**
   * Human-readable name used for provenance ("env", "dotenv:.env").
   */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
