/**
 * Freezes `value` and everything reachable from it. Children of an object
 * that is already frozen are still visited, since `Object.freeze` is shallow.
 */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    if (!Object.isFrozen(value)) Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
