import type { KeyFolding } from "../../ports/key-folding"
import { foldingName, KEEP, type KeyFoldingOptions } from "./key-folding-options"

/**
 * The key that first populates a class represents it until the class is
 * deleted; later equivalent keys only update the value.
 */
export function createFirstSeenFolding<K, C>(options: KeyFoldingOptions<K, C>): KeyFolding<K, C> {
  return {
    name: foldingName(options, "first-seen"),
    canonicalize: options.normalize,
    choosePreservedKey: () => KEEP,
  }
}
