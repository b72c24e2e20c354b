import type { KeepRetention } from "../../ports/key-folding"
import type { Normalizer } from "../../ports/normalizer"
import type { RetentionPolicy } from "../../ports/retention-policy"

export type KeyFoldingOptions<K, C> = {
  normalize: Normalizer<K, C>

  /**
   * Normalizer label used in the folding's name.
   *
   * @default the normalizer's function name, or `"custom"`
   */
  label?: string
}

export const KEEP: KeepRetention = { kind: "keep" }

export function foldingName<K, C>(
  options: KeyFoldingOptions<K, C>,
  policy: RetentionPolicy,
): string {
  const label = options.label ?? (options.normalize.name || "custom")

  return `${label}/${policy}`
}
