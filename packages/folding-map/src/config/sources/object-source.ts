import type { ConfigSource } from "../../ports/config-source"

/**
 * Settings given in code: a plain object, or any iterable of entries such as
 * a `Map` or another `FoldingMap`.
 */
export type ObjectSourceValues =
  | Readonly<Record<string, unknown>>
  | Iterable<readonly [string, unknown]>

export type ObjectSourceOptions = {
  /**
   * Provenance reported by `explain()`.
   *
   * @default "object:overrides"
   */
  name?: string
}

function isEntryIterable(values: ObjectSourceValues): values is Iterable<readonly [string, unknown]> {
  return Symbol.iterator in values
}

export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: ObjectSourceValues,
    options: ObjectSourceOptions = {},
  ) {
    this.name = options.name ?? "object:overrides"
  }

  /**
   * A snapshot of the values at load time. Entries are taken in order, so
   * with repeated keys the last one wins.
   */
  async load(): Promise<Record<string, unknown>> {
    if (isEntryIterable(this.values)) return Object.fromEntries(this.values)

    return { ...this.values }
  }
}
