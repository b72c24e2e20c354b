/**
 * The equality `Map` uses for its keys: `===`, except `NaN` equals `NaN`.
 */
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (Number.isNaN(a) && Number.isNaN(b))
}
