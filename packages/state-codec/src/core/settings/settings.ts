import type { CodecSettings } from "./codec-settings"

type SettingName = keyof CodecSettings & string

/**
 * Validated codec settings with the source of each value.
 */
export class Settings {
  constructor(
    private readonly data: Readonly<CodecSettings>,
    private readonly provenance: Readonly<Record<string, string>>,
    private readonly providedKeys: ReadonlySet<string>,
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<CodecSettings> {
    return this.data
  }

  /**
   * Name of the source that provided the final value, or `default` when the
   * schema default was used.
   */
  explain(key: SettingName): string {
    return this.provenance[key] ?? "default"
  }

  /** Sources that contributed at least one value, in order of first use. */
  sourcesUsed(): string[] {
    return [...new Set(Object.values(this.provenance))]
  }

  /** Keys that sources provided but no setting uses, such as typos. */
  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.data))

    return [...this.providedKeys].filter((key) => !known.has(key))
  }
}
