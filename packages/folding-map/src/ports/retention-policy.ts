/**
 * First-seen retention.
 *
 * The first key used to populate an equivalence class stays its preserved
 * key until the class is deleted.
 */
export type FirstSeenRetentionPolicy = "first-seen"

/**
 * Canonical retention.
 *
 * The preserved key is always the canonical form of the key, independent
 * of insertion history.
 */
export type CanonicalRetentionPolicy = "canonical"

/**
 * Most-recent retention.
 *
 * Every set replaces the preserved key with the key it was called with and
 * moves the class to the end of iteration order.
 */
export type MostRecentRetentionPolicy = "most-recent"

export type RetentionPolicy =
  | FirstSeenRetentionPolicy
  | CanonicalRetentionPolicy
  | MostRecentRetentionPolicy
