import { createNullLogger, type Logger } from "@keyfold/logger"
import { z } from "zod"
import { FoldingMap } from "../core/folding-map"
import { createFirstSeenFolding } from "../core/retention/first-seen"
import { FoldingConfigError } from "../errors/folding-config-error"
import type { ConfigSource } from "../ports/config-source"
import { configKey } from "./config-key"
import {
  type FoldingConfig,
  type FoldingConfigKey,
  foldingConfigSchema,
  type LoadedFoldingConfig,
} from "./folding-config"
import { EnvSource } from "./sources/env-source"

export type LoadFoldingConfigOptions = {
  /**
   * Applied in order; later sources override earlier ones.
   *
   * @default [new EnvSource()]
   */
  sources?: ConfigSource[]
  logger?: Logger
}

type ProvidedValue = {
  value: unknown
  source: string
}

class FoldingSettings implements LoadedFoldingConfig {
  constructor(
    private readonly data: Readonly<FoldingConfig>,
    private readonly provenance: Readonly<Partial<Record<FoldingConfigKey, string>>>,
    private readonly sourceNames: readonly string[],
    private readonly unrecognized: readonly string[],
  ) {
    Object.freeze(this.data)
  }

  get value(): Readonly<FoldingConfig> {
    return this.data
  }

  explain(key: FoldingConfigKey): string {
    return this.provenance[key] ?? "default"
  }

  sourcesUsed(): string[] {
    const used = new Set(Object.values(this.provenance))

    return [...new Set(this.sourceNames)].filter((name) => used.has(name))
  }

  unknownKeys(): string[] {
    return [...this.unrecognized]
  }
}

export async function loadFoldingConfig({
  sources,
  logger,
}: LoadFoldingConfigOptions = {}): Promise<LoadedFoldingConfig> {
  const log = (logger ?? createNullLogger()).child({ module: "folding-config" })
  const resolvedSources = sources ?? [new EnvSource()]
  const sourceNames = resolvedSources.map((source) => source.name)

  const provided = new FoldingMap<string, ProvidedValue>(null, {
    folding: createFirstSeenFolding({ normalize: configKey<string>, label: "config-key" }),
  })

  for (const source of resolvedSources) {
    const values = await source.load()
    let applied = 0

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        provided.set(key, { value, source: source.name })
        applied++
      }
    }

    log.debug("folding config source applied", {
      source: source.name,
      applied,
      size: provided.size,
    })
  }

  const raw: Record<string, unknown> = {}
  const provenance: Partial<Record<FoldingConfigKey, string>> = {}
  const settingKeys = foldingConfigSchema.keyof().options

  for (const key of settingKeys) {
    const found = provided.lookup(key)

    if (found.kind === "found") {
      raw[key] = found.value.value
      provenance[key] = found.value.source
    }
  }

  const result = foldingConfigSchema.safeParse(raw)

  if (!result.success) {
    throw new FoldingConfigError(
      z.prettifyError(result.error),
      sourceNames,
    )
  }

  const known = new Set(settingKeys.map((key) => provided.canonicalize(key)))
  const unrecognized = [...provided.keys()].filter((key) => !known.has(provided.canonicalize(key)))

  if (unrecognized.length > 0) {
    log.warn("unknown folding config keys", { keys: unrecognized })
  }

  return new FoldingSettings(result.data, provenance, sourceNames, unrecognized)
}
