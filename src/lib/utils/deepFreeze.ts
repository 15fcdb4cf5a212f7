/**
 * Deep Freeze — recursively freezes an object graph in place.
 * Children are visited even when a parent is already frozen.
 * Returns the same reference.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
  if (typeof value !== "object" || value === null || seen.has(value)) return value;
  seen.add(value);
  for (const child of Object.values(value)) {
    deepFreeze(child, seen);
  }
  Object.freeze(value);
  return value;
}
