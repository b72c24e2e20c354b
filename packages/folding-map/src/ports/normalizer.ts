/**
 * Maps a key to the canonical value identifying its equivalence class.
 *
 * @remarks
 * - Must be total: every key of type `K` yields a canonical value.
 * - Canonical values are compared with SameValueZero (they key a `Map`),
 *   so structured keys must canonicalize to a primitive to fold together.
 * - Should be idempotent when used with the canonical retention policy.
 */
export type Normalizer<K, C = unknown> = (key: K) => C
