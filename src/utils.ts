/**
 * Structural equality over plain data: primitives, arrays and plain objects.
 * Snapshots never hold functions, maps or class instances, so nothing else
 * needs handling.
 */
export function isDeepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((item, i) => isDeepEqual(item, b[i]))
  }

  const aKeys = Object.keys(a)
  const bKeys = Object.keys(b)
  if (aKeys.length !== bKeys.length) return false

  return aKeys.every(key =>
    Object.hasOwn(b, key) && isDeepEqual(Reflect.get(a, key), Reflect.get(b, key))
  )
}
