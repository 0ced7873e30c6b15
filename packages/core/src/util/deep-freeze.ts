/**
 * Recursively freeze plain objects and arrays. Catalog entries and composite
 * schemas are shared between callers and must never change after creation.
 */
export function deepFreeze<T>(value: T): T {
  if (value === null || typeof value !== 'object' || Object.isFrozen(value)) {
    return value;
  }
  Object.freeze(value);
  for (const key of Reflect.ownKeys(value)) {
    deepFreeze(Reflect.get(value, key));
  }
  return value;
}
