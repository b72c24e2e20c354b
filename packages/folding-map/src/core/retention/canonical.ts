import type { KeyFolding } from "../../ports/key-folding"
import { foldingName, KEEP, type KeyFoldingOptions } from "./key-folding-options"

/**
 * The canonical form is the preserved key, so enumeration is independent of
 * which equivalent key happened to be used first.
 *
 * Requires a normalizer whose canonical values are themselves keys.
 */
export function createCanonicalFolding<K>(options: KeyFoldingOptions<K, K>): KeyFolding<K, K> {
  return {
    name: foldingName(options, "canonical"),
    canonicalize: options.normalize,
    choosePreservedKey: (_incoming, existing, canonical) =>
      existing.kind === "found" ? KEEP : { kind: "replace", key: canonical },
  }
}
