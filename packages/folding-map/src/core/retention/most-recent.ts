import type { KeyFolding } from "../../ports/key-folding"
import { foldingName, type KeyFoldingOptions } from "./key-folding-options"

/**
 * Every set re-keys its class under the key it was called with, as if the
 * old entry had been deleted first. The class moves to the end of iteration
 * order, even when the key is unchanged.
 */
export function createMostRecentFolding<K, C>(options: KeyFoldingOptions<K, C>): KeyFolding<K, C> {
  return {
    name: foldingName(options, "most-recent"),
    canonicalize: options.normalize,
    choosePreservedKey: (incoming) => ({ kind: "replace", key: incoming }),
  }
}
