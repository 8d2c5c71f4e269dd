/**
 * Freezes `value` and everything reachable from it, in place.
 *
 * An object that is already frozen is taken to be frozen all the way down and
 * is not walked, so refreezing a committed state only visits the nodes the
 * last update created.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value
  }

  Object.freeze(value)
  for (const child of Object.values(value)) {
    deepFreeze(child)
  }
  return value
}
