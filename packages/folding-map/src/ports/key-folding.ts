import type { FoldResult } from "./fold-result"

/**
 * Keep the class's current preserved key and its iteration position.
 * For a class that is not yet populated, the incoming key is used.
 */
export type KeepRetention = {
  readonly kind: "keep"
}

/**
 * Drop the class's current entry (if any) and store the value under `key`,
 * at the end of iteration order.
 */
export type ReplaceRetention<K> = {
  readonly kind: "replace"
  readonly key: K
}

export type Retention<K> = KeepRetention | ReplaceRetention<K>

/**
 * The capability pair a FoldingMap is parametric over: how keys fold into
 * equivalence classes, and which literal key represents each class.
 *
 * @remarks
 * Implementations must be stateless; a map and its copies share one
 * instance. A `replace` retention must name a key that canonicalizes to
 * the same class as the incoming key.
 */
export interface KeyFolding<K, C = unknown> {
  /** Label used in logs and `toString()`, e.g. `"fold-case/first-seen"`. */
  readonly name: string

  canonicalize(key: K): C

  /**
   * Decide the preserved key for a `set(incoming, ...)` call.
   *
   * @param existing The class's current preserved key, if populated.
   * @param canonical `canonicalize(incoming)`, already computed.
   */
  choosePreservedKey(incoming: K, existing: FoldResult<K>, canonical: C): Retention<K>
}
