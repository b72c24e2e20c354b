/**
 * Printable form of an arbitrary key, for error messages and `toString()`.
 * Never throws, including for objects without a prototype. An array that
 * contains itself prints the repeat as `[...]`.
 */
export function describeKey(key: unknown): string {
  return describe(key, new Set())
}

function describe(key: unknown, open: Set<unknown>): string {
  switch (typeof key) {
    case "string":
      return JSON.stringify(key)
    case "bigint":
      return `${key}n`
    case "symbol":
      return key.toString()
    case "function":
      return `[function ${key.name || "anonymous"}]`
    case "object":
      if (key === null) return "null"
      if (Array.isArray(key)) return describeArray(key, open)
      return Object.prototype.toString.call(key)
    default:
      return String(key)
  }
}

// `open` holds the arrays currently being printed; siblings may share one.
function describeArray(items: readonly unknown[], open: Set<unknown>): string {
  if (open.has(items)) return "[...]"

  open.add(items)
  const body = items.map((item) => describe(item, open)).join(", ")
  open.delete(items)

  return `[${body}]`
}
