import type { KeyFolding } from "../../ports/key-folding"
import type { RetentionPolicy } from "../../ports/retention-policy"
import { foldCase } from "../normalizers/fold-case"
import { createCanonicalFolding } from "./canonical"
import { createFirstSeenFolding } from "./first-seen"
import type { KeyFoldingOptions } from "./key-folding-options"
import { createMostRecentFolding } from "./most-recent"

/**
 * Select a retention policy by name. The normalizer must map keys to keys,
 * since any of the three policies may be chosen.
 */
export function createKeyFolding<K>(
  policy: RetentionPolicy,
  options: KeyFoldingOptions<K, K>,
): KeyFolding<K, K> {
  switch (policy) {
    case "first-seen":
      return createFirstSeenFolding(options)
    case "canonical":
      return createCanonicalFolding(options)
    case "most-recent":
      return createMostRecentFolding(options)
  }
}

/**
 * Case-insensitive folding with first-seen retention; the FoldingMap default.
 */
export function createCaseFolding<K>(): KeyFolding<K, K | string> {
  return createFirstSeenFolding<K, K | string>({ normalize: foldCase, label: "fold-case" })
}
