import { describeKey } from "../core/utils/describe-key"
import { FoldingMapError } from "./folding-map-error"

/**
 * Raised when a key's equivalence class holds no entry.
 */
export class KeyNotFoundError extends FoldingMapError<"key_not_found"> {
  /** The key as the caller passed it. */
  readonly key: unknown

  constructor(key: unknown, operation: "get" | "delete") {
    const printable = describeKey(key)

    super(`No entry for key ${printable}`, {
      code: "key_not_found",
      context: { key: printable, operation },
    })

    this.key = key
  }
}
