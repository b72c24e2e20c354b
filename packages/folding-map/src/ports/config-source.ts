/**
 * A source of raw folding configuration values.
 *
 * A ConfigSource only *loads* values; validation happens downstream.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance, e.g. `"env"` or `"object:overrides"`.
   */
  readonly name: string

  /**
   * Load raw values. Returning `undefined` for a key means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
