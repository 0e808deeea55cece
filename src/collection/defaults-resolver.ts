/**
 * Defaults resolution for pending items.
 *
 * Each field an item's kind recognizes takes, in order: the explicit
 * value (an explicit `null` included), the collection default, the kind's
 * built-in default. Explicit fields the kind does not recognize are kept
 * as given so validation can report them at compile time.
 */

import type { z } from 'zod';
import {
  CommonFieldsSchema,
  ITEM_SCHEMAS,
  isItemKind,
  type FieldMap,
} from '../types/content.js';

/** Field name of the item kind in builder input; never stored as a field. */
export const KIND_FIELD = 'kind';

const recognizedCache = new Map<string, readonly string[]>();
const builtinCache = new Map<string, FieldMap>();

function schemaFor(kind: string): z.AnyZodObject {
  return isItemKind(kind) ? ITEM_SCHEMAS[kind] : CommonFieldsSchema;
}

/**
 * Fields an item kind recognizes. Unknown kinds recognize the common fields.
 */
export function recognizedFields(kind: string): readonly string[] {
  const cached = recognizedCache.get(kind);
  if (cached) return cached;

  const fields = Object.freeze(Object.keys(schemaFor(kind).shape));
  if (isItemKind(kind)) recognizedCache.set(kind, fields);
  return fields;
}

/**
 * Built-in defaults of an item kind, read from its field schema: every
 * field whose schema accepts a missing value and yields something for it.
 */
export function builtinDefaults(kind: string): FieldMap {
  const cached = builtinCache.get(kind);
  if (cached) return cached;

  const shape: z.ZodRawShape = schemaFor(kind).shape;
  const defaults: Record<string, unknown> = {};
  for (const [field, fieldSchema] of Object.entries(shape)) {
    const result = fieldSchema.safeParse(undefined);
    if (result.success && result.data !== undefined) {
      defaults[field] = result.data;
    }
  }

  const frozen = Object.freeze(defaults);
  if (isItemKind(kind)) builtinCache.set(kind, frozen);
  return frozen;
}

function isPresent(map: FieldMap, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, field) && map[field] !== undefined;
}

/**
 * Resolve an item's fields against collection defaults.
 *
 * @param kind     - Item kind as given by the caller
 * @param explicit - Fields the caller set (`kind` excluded)
 * @param defaults - Collection-level defaults
 * @returns Frozen resolved field map
 */
export function resolveFields(kind: string, explicit: FieldMap, defaults: FieldMap): FieldMap {
  const resolved: Record<string, unknown> = {};
  const builtins = builtinDefaults(kind);

  for (const field of recognizedFields(kind)) {
    if (isPresent(explicit, field)) {
      resolved[field] = explicit[field];
    } else if (isPresent(defaults, field)) {
      resolved[field] = defaults[field];
    } else if (isPresent(builtins, field)) {
      resolved[field] = builtins[field];
    }
  }

  // Unrecognized explicit fields pass through untouched.
  for (const [field, value] of Object.entries(explicit)) {
    if (field === KIND_FIELD || value === undefined || field in resolved) continue;
    resolved[field] = value;
  }

  return Object.freeze(resolved);
}

/**
 * Merge two default maps, first writer wins per field.
 */
export function mergeDefaults(existing: FieldMap, incoming: FieldMap): FieldMap {
  const merged: Record<string, unknown> = { ...existing };
  for (const [field, value] of Object.entries(incoming)) {
    if (value === undefined || isPresent(merged, field)) continue;
    merged[field] = value;
  }
  return Object.freeze(merged);
}
