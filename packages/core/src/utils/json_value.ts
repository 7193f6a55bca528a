/**
 * JSON value helpers
 *
 * Requests are serialized to JSON before signing, so anything that cannot
 * survive that trip is rejected up front.
 *
 * @module utils/json_value
 */

import type { JsonValue } from '../types/common.types';

/**
 * True for object literals and objects parsed from JSON. Arrays, class
 * instances (Date, Map, ...) and null are not plain objects.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

/**
 * Checks that a value round-trips through JSON unchanged: strings, finite
 * numbers, booleans, null, and arrays or plain objects of those. Cycles are
 * rejected, and so is a `__proto__` key at any depth.
 */
export function isJsonValue(value: unknown): value is JsonValue {
  return checkJsonValue(value, new WeakSet<object>());
}

function checkJsonValue(value: unknown, ancestors: WeakSet<object>): boolean {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (!Array.isArray(value) && !isPlainObject(value)) {
    return false;
  }
  if (ancestors.has(value) || Object.prototype.hasOwnProperty.call(value, '__proto__')) {
    return false;
  }

  ancestors.add(value);
  const children: unknown[] = Array.isArray(value) ? value : Object.values(value);
  const valid = children.every(child => checkJsonValue(child, ancestors));
  ancestors.delete(value);
  return valid;
}
