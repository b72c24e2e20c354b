import { z } from "zod"
import { normalizerNames } from "../core/normalizers/normalizers"
import type { RetentionPolicy } from "../ports/retention-policy"

export const retentionPolicies = [
  "first-seen",
  "canonical",
  "most-recent",
] as const satisfies readonly RetentionPolicy[]

export const foldingConfigSchema = z.object({
  retention: z.enum(retentionPolicies).default("first-seen"),
  normalizer: z.enum(normalizerNames).default("fold-case"),
})

export type FoldingConfig = z.infer<typeof foldingConfigSchema>

export type FoldingConfigKey = keyof FoldingConfig & string

/**
 * Validated folding configuration with the provenance of each setting.
 */
export interface LoadedFoldingConfig {
  readonly value: Readonly<FoldingConfig>

  /**
   * Name of the source that provided `key`, or `"default"` when the schema
   * default applied.
   */
  explain(key: FoldingConfigKey): string

  /** Names of the sources that contributed at least one setting, in order. */
  sourcesUsed(): string[]

  /** Keys present in sources that match no setting, as first spelled. */
  unknownKeys(): string[]
}
