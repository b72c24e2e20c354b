import { createNullLogger, type Logger } from "@keyfold/logger"
import { KeyNotFoundError } from "../errors/key-not-found-error"
import type { FoldResult } from "../ports/fold-result"
import type { FoldingMapOptions } from "../ports/folding-map-options"
import type { KeyFolding } from "../ports/key-folding"
import { FoldingTables } from "./folding-tables"
import { createCaseFolding } from "./retention/create-key-folding"
import { describeKey } from "./utils/describe-key"
import { sameValueZero } from "./utils/same-value-zero"

export function isFoldingMap(value: unknown): value is FoldingMap<unknown, unknown> {
  return value instanceof FoldingMap
}

/**
 * A mutable mapping in which keys that canonicalize to the same value share
 * one entry.
 *
 * Each equivalence class remembers one literal key, the preserved key, which
 * is what `keys()` and `entries()` report. The folding strategy decides both
 * how keys canonicalize and which key is preserved.
 *
 * The API mirrors `Map`: `get` and `delete` report a miss with `undefined`
 * and `false`. `getOrThrow` and `deleteOrThrow` raise `KeyNotFoundError`
 * instead; `lookup` returns a `FoldResult`.
 *
 * @example
 * ```ts
 * const clowns = new FoldingMap<string, string>()
 *
 * clowns.set("Clown", "Bozo")
 * clowns.set("clown", "Krusty")
 *
 * clowns.get("CLOWN")  // "Krusty"
 * [...clowns.keys()]   // ["Clown"]
 * ```
 */
export class FoldingMap<K, V> implements Iterable<[K, V]> {
  readonly [Symbol.toStringTag] = "FoldingMap"

  private readonly tables = new FoldingTables<K, V>()
  private readonly folding: KeyFolding<K>
  private readonly baseLogger: Logger
  private readonly logger: Logger

  constructor(entries?: Iterable<readonly [K, V]> | null, options: FoldingMapOptions<K> = {}) {
    this.folding = options.folding ?? createCaseFolding<K>()
    this.baseLogger = options.logger ?? createNullLogger()
    this.logger = this.baseLogger.child({
      module: "folding-map",
      folding: this.folding.name,
    })

    if (entries) {
      for (const [key, value] of entries) this.set(key, value)
    }
  }

  /**
   * Build a map from an object's own enumerable string keys, in property
   * order. Later properties that fold onto an earlier one overwrite it.
   */
  static fromObject<V>(
    record: Readonly<Record<string, V>>,
    options?: FoldingMapOptions<string>,
  ): FoldingMap<string, V> {
    return new FoldingMap<string, V>(Object.entries(record), options)
  }

  /** Number of populated equivalence classes. */
  get size(): number {
    return this.tables.size()
  }

  /** The canonical value that identifies `key`'s equivalence class. */
  canonicalize(key: K): unknown {
    return this.folding.canonicalize(key)
  }

  /** The key currently representing `key`'s equivalence class. */
  preservedKey(key: K): FoldResult<K> {
    return this.tables.preservedKey(this.canonicalize(key))
  }

  lookup(key: K): FoldResult<V> {
    return this.tables.read(this.canonicalize(key))
  }

  get(key: K): V | undefined {
    const result = this.lookup(key)

    return result.kind === "found" ? result.value : undefined
  }

  /**
   * @throws {KeyNotFoundError} when `key`'s class holds no entry.
   */
  getOrThrow(key: K): V {
    const result = this.lookup(key)

    if (result.kind === "not_found") throw this.notFound(key, "get")

    return result.value
  }

  has(key: K): boolean {
    return this.lookup(key).kind === "found"
  }

  set(key: K, value: V): this {
    const canonical = this.canonicalize(key)
    const existing = this.tables.preservedKey(canonical)
    const retention = this.folding.choosePreservedKey(key, existing, canonical)

    if (existing.kind === "found" && retention.kind === "replace") {
      this.logger.debug("preserved key replaced", {
        operation: "set",
        previous: describeKey(existing.value),
        preserved: describeKey(retention.key),
        size: this.size,
      })
    }

    this.tables.write(canonical, key, retention, value)

    return this
  }

  /**
   * Remove `key`'s class. Returns `false`, and changes nothing, when the
   * class holds no entry.
   */
  delete(key: K): boolean {
    return this.tables.remove(this.canonicalize(key)).kind === "found"
  }

  /**
   * @throws {KeyNotFoundError} when `key`'s class holds no entry; the map is
   * left untouched.
   */
  deleteOrThrow(key: K): void {
    if (this.tables.remove(this.canonicalize(key)).kind === "not_found") {
      throw this.notFound(key, "delete")
    }
  }

  clear(): void {
    this.tables.clear()
  }

  keys(): IterableIterator<K> {
    return this.tables.keys()
  }

  values(): IterableIterator<V> {
    return this.tables.values()
  }

  entries(): IterableIterator<[K, V]> {
    return this.tables.entries()
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  forEach(callback: (value: V, key: K, map: this) => void): void {
    for (const [key, value] of this.entries()) callback(value, key, this)
  }

  /**
   * Folding-aware equality.
   *
   * Against another FoldingMap, both sides are compared as sets of
   * (canonical key, value) pairs, each side canonicalizing with its own
   * folding. Against a plain map, preserved keys are compared as-is.
   * Values compare with SameValueZero.
   */
  equals(other: ReadonlyMap<unknown, unknown> | FoldingMap<unknown, unknown>): boolean {
    if (this.size !== other.size) return false

    if (isFoldingMap(other)) {
      const theirs = other.canonicalEntries()

      for (const [canonical, value] of this.canonicalEntries()) {
        if (!theirs.has(canonical) || !sameValueZero(theirs.get(canonical), value)) return false
      }

      return true
    }

    for (const [key, value] of this.entries()) {
      if (!other.has(key) || !sameValueZero(other.get(key), value)) return false
    }

    return true
  }

  /**
   * Shallow copy sharing this map's folding and logger. The copy's tables
   * are independent; values are not cloned.
   */
  copy(): FoldingMap<K, V> {
    const copy = new FoldingMap<K, V>(null, {
      folding: this.folding,
      logger: this.baseLogger,
    })
    copy.tables.copyFrom(this.tables)

    return copy
  }

  toString(): string {
    const body = [...this.entries()]
      .map(([key, value]) => `${describeKey(key)} => ${describeKey(value)}`)
      .join(", ")

    return `FoldingMap(${this.folding.name}) {${body}}`
  }

  private canonicalEntries(): Map<unknown, V> {
    const out = new Map<unknown, V>()

    for (const [key, value] of this.entries()) out.set(this.canonicalize(key), value)

    return out
  }

  private notFound(key: K, operation: "get" | "delete"): KeyNotFoundError {
    const err = new KeyNotFoundError(key, operation)

    this.logger.debug("key not found", { operation, size: this.size, err })

    return err
  }
}
