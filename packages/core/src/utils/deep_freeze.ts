/**
 * Freezes an object graph in place and returns it.
 *
 * Functions are left untouched so compiled validators can sit inside frozen
 * tables without being frozen themselves.
 *
 * @example
 * const table = deepFreeze({ NODE: { required: ['alias'] } });
 * Object.isFrozen(table.NODE.required) // true
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }

  Object.freeze(value);
  return value;
}
