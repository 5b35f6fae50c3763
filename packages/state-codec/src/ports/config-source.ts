/**
 * A source of codec settings.
 *
 * A source only *loads* raw values. Validation, coercion and merging happen
 * in `loadCodecSettings`. Sources are applied in order; later sources
 * override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "object:overrides"
   */
  readonly name: string

  /**
   * Load raw values keyed by setting name. `undefined` means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
