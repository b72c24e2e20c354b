import type { ConfigSource } from "../../ports/config-source"

export type EnvSourceOptions = {
  /**
   * Only variables starting with this prefix, in any case, are read; the
   * prefix is stripped from their names.
   *
   * @default "KEYFOLD_"
   */
  prefix?: string
  env?: Record<string, string | undefined>

  /** @default "env" */
  name?: string
}

/**
 * Reads settings from environment variables such as `KEYFOLD_RETENTION`.
 *
 * Values are trimmed; variables that are empty after trimming count as
 * unset, so `KEYFOLD_RETENTION=` falls back to the next source or default.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.name = options.name ?? "env"
    this.prefix = (options.prefix ?? "KEYFOLD_").toUpperCase()
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const settings: Record<string, string> = {}

    for (const [key, raw] of Object.entries(this.env)) {
      if (!key.toUpperCase().startsWith(this.prefix)) continue

      const value = raw?.trim()
      if (value) settings[key.slice(this.prefix.length)] = value
    }

    return settings
  }
}
