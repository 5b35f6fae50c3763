import type { ConfigSource } from "../../ports/config-source"

export type EnvSourceOptions = {
  /** Only variables starting with the prefix are read. Default: `STRATA_` */
  prefix?: string
  env?: Record<string, string | undefined>
}

/** `LOG_LEVEL` to `logLevel`. */
function toSettingName(variable: string): string {
  return variable
    .toLowerCase()
    .replace(/_+([a-z0-9])/g, (_match, letter: string) => letter.toUpperCase())
}

/**
 * Reads settings from environment variables: `STRATA_MAX_PROBLEMS` provides
 * `maxProblems`.
 */
export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? "STRATA_"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix) && key.length > this.prefix.length) {
        values[toSettingName(key.slice(this.prefix.length))] = value
      }
    }

    return values
  }
}
