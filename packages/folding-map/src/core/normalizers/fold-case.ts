/**
 * Default normalizer: strings fold to lower case, every other key is its
 * own canonical form.
 */
export function foldCase<K>(key: K): K | string {
  return typeof key === "string" ? key.toLowerCase() : key
}
