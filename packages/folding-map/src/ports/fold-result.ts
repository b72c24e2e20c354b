export type FoldFound<T> = {
  readonly kind: "found"
  readonly value: T
}

export type FoldNotFound = {
  readonly kind: "not_found"
}

/**
 * Result of looking up a key by its equivalence class.
 *
 * @remarks
 * Keys and values may legitimately be `undefined`, so presence is carried
 * by `kind` rather than by the value.
 */
export type FoldResult<T> = FoldFound<T> | FoldNotFound
