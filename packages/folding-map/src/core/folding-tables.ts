import type { FoldResult } from "../ports/fold-result"
import type { Retention } from "../ports/key-folding"

type PreservedSlot<K> = { readonly key: K }

type ValueSlot<V> = { value: V }

const NOT_FOUND = { kind: "not_found" } as const

/**
 * The two tables behind a FoldingMap, kept in lockstep:
 *
 * - canonical key -> preserved key
 * - preserved key -> value
 *
 * Every canonical entry has exactly one value entry under its preserved key,
 * and every mutation touches both tables or neither. Both tables box their
 * contents so a stored `undefined` is never mistaken for a miss.
 *
 * Iteration follows the value table, i.e. the order in which classes were
 * first populated (or last replaced).
 */
export class FoldingTables<K, V> {
  private readonly byCanonical = new Map<unknown, PreservedSlot<K>>()
  private readonly byPreserved = new Map<K, ValueSlot<V>>()

  size(): number {
    return this.byPreserved.size
  }

  preservedKey(canonical: unknown): FoldResult<K> {
    const slot = this.byCanonical.get(canonical)

    return slot ? { kind: "found", value: slot.key } : NOT_FOUND
  }

  read(canonical: unknown): FoldResult<V> {
    const preserved = this.byCanonical.get(canonical)
    if (!preserved) return NOT_FOUND

    const slot = this.byPreserved.get(preserved.key)

    return slot ? { kind: "found", value: slot.value } : NOT_FOUND
  }

  /**
   * Store `value` for the class of `canonical`.
   *
   * `incoming` is the key the caller used; it becomes the preserved key of a
   * class that is not yet populated when the retention is `keep`.
   */
  write(canonical: unknown, incoming: K, retention: Retention<K>, value: V): void {
    const existing = this.byCanonical.get(canonical)

    if (existing && retention.kind === "keep") {
      const slot = this.byPreserved.get(existing.key)

      if (slot) {
        slot.value = value

        return
      }
    }

    if (existing) this.byPreserved.delete(existing.key)

    const key = retention.kind === "replace" ? retention.key : incoming

    this.byCanonical.set(canonical, { key })
    this.byPreserved.set(key, { value })
  }

  /**
   * Remove the class of `canonical`, returning its value.
   *
   * Both tables are consulted before either is touched, so a miss leaves no
   * trace.
   */
  remove(canonical: unknown): FoldResult<V> {
    const preserved = this.byCanonical.get(canonical)
    if (!preserved) return NOT_FOUND

    const slot = this.byPreserved.get(preserved.key)
    if (!slot) return NOT_FOUND

    this.byCanonical.delete(canonical)
    this.byPreserved.delete(preserved.key)

    return { kind: "found", value: slot.value }
  }

  clear(): void {
    this.byCanonical.clear()
    this.byPreserved.clear()
  }

  /**
   * Replace this table pair's contents with a copy of `source`'s, preserving
   * order. Values are shared, not cloned.
   */
  copyFrom(source: FoldingTables<K, V>): void {
    this.clear()

    for (const [canonical, slot] of source.byCanonical) {
      this.byCanonical.set(canonical, { key: slot.key })
    }

    for (const [key, slot] of source.byPreserved) {
      this.byPreserved.set(key, { value: slot.value })
    }
  }

  *keys(): IterableIterator<K> {
    for (const key of this.byPreserved.keys()) yield key
  }

  *values(): IterableIterator<V> {
    for (const slot of this.byPreserved.values()) yield slot.value
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, slot] of this.byPreserved) yield [key, slot.value]
  }
}
