function isNumberList(value: unknown): value is readonly number[] {
  return Array.isArray(value) && value.every((item) => typeof item === "number")
}

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string")
}

/**
 * Keys that are permutations of each other fold together.
 *
 * - strings: their characters, sorted (`"abc"` and `"bca"` fold)
 * - arrays of only numbers: sorted numerically, encoded as `numbers:[...]`
 * - arrays of only strings: sorted, encoded as `strings:[...]`
 * - anything else is its own canonical form
 *
 * Both list tags contain a descending character pair, which a string with
 * sorted characters never does, so no list folds together with a string.
 * The empty array is both a number list and a string list; it encodes as
 * `numbers:[]`.
 */
export function sortElements<K>(key: K): K | string {
  if (typeof key === "string") return [...key].sort().join("")

  if (isNumberList(key)) {
    return `numbers:[${[...key].sort((a, b) => a - b).map(String).join(",")}]`
  }

  if (isStringList(key)) return `strings:${JSON.stringify([...key].sort())}`

  return key
}
