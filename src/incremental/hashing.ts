/**
 * Content hashing for dedup keys, dataset fingerprints and build units.
 *
 * Values are serialized to canonical JSON (object keys sorted at every
 * depth) before hashing, so two structurally equal values always hash the
 * same regardless of key insertion order. Values with a `toJSON` method
 * (dates) are hashed through it; any other non-plain object is rejected.
 */

import { createHash } from 'node:crypto';
import { ValidationError } from '../validation/errors.js';

/**
 * Compute a SHA-256 hex digest for the given content string.
 *
 * @returns 64-character lowercase hex string.
 */
export function computeHash(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}

export interface CanonicalJsonOptions {
  /** Object keys left out at every depth. */
  omitKeys?: readonly string[];
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function canonicalize(value: unknown, omit: ReadonlySet<string>): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => canonicalize(entry, omit));
  }
  if (value !== null && typeof value === 'object') {
    if (hasToJSON(value)) {
      return canonicalize(value.toJSON(), omit);
    }
    if (!isPlainObject(value)) {
      throw new ValidationError(
        `Cannot hash a ${value.constructor.name} value; use plain objects, arrays and primitives`,
      );
    }
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value)
      .filter(([key, entry]) => entry !== undefined && !omit.has(key))
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, entry] of entries) {
      sorted[key] = canonicalize(entry, omit);
    }
    return sorted;
  }
  return value;
}

/**
 * Serialize a value to JSON with object keys sorted at every depth.
 *
 * @throws {ValidationError} for a Map, Set or class instance without `toJSON`
 */
export function canonicalJson(value: unknown, options: CanonicalJsonOptions = {}): string {
  const json = JSON.stringify(canonicalize(value, new Set(options.omitKeys ?? [])));
  // JSON.stringify(undefined) yields undefined
  return json ?? 'null';
}

/**
 * Hash a value through its canonical JSON form.
 */
export function hashValue(value: unknown, options: CanonicalJsonOptions = {}): string {
  return computeHash(canonicalJson(value, options));
}
