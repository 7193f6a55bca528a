import { createHash } from "crypto";
import type { CanonicalRequest } from "../types/request.types";

/**
 * Writes a value as JSON with object members in sorted key order, at every level.
 * Members are written out directly, never through an intermediate object, so
 * integer-like and `__proto__` keys keep their sorted place.
 * @param value The value to serialize.
 * @returns The JSON text, or undefined where JSON.stringify would drop the value.
 */
function writeSorted(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return `[${value.map(item => writeSorted(item) ?? 'null').join(',')}]`;
  }
  if (typeof value !== 'object' || value === null) {
    const text: string | undefined = JSON.stringify(value);
    return text;
  }
  const entries: [string, unknown][] = Object.entries(value);
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  const members: string[] = [];
  for (const [key, child] of entries) {
    const text = writeSorted(child);
    if (text !== undefined) {
      members.push(`${JSON.stringify(key)}:${text}`);
    }
  }
  return `{${members.join(',')}}`;
}

/**
 * Canonically serializes a JSON value: keys sorted by code unit at every level,
 * no whitespace.
 * @returns A deterministic JSON string.
 */
export function canonicalJson(value: unknown): string {
  return writeSorted(value) ?? 'null';
}

/**
 * Serializes a request into the exact text a signer signs.
 */
export function serializeRequest(request: CanonicalRequest): string {
  return canonicalJson(request);
}

/**
 * Calculates the SHA-256 digest (hex) of a request's canonical serialization.
 */
export function calculateRequestDigest(request: CanonicalRequest): string {
  return createHash("sha256").update(serializeRequest(request), "utf8").digest("hex");
}
