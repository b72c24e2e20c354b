const WHITESPACE = /\s+/g

/**
 * Strings with all whitespace removed, so `"the clown"` and
 * `"  the   clown "` fold together. Case-sensitive.
 */
export function stripWhitespace<K>(key: K): K | string {
  return typeof key === "string" ? key.replace(WHITESPACE, "") : key
}
