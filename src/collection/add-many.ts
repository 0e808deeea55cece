/**
 * Vectorized item expansion.
 *
 * `addMany()` turns one input whose expandable fields hold arrays into
 * one item per array position, zipping the arrays together.
 */

import type { Collection, ItemInput } from '../types/content.js';
import { ValidationError } from '../validation/errors.js';
import { add } from './collection.js';

/** Fields whose array values are expanded into one item per element. */
export const EXPANDABLE_FIELDS = ['xVar', 'yVar', 'stackVar', 'groupVar', 'valueVar', 'title'] as const;

const EXPANDABLE = new Set<string>(EXPANDABLE_FIELDS);

export interface AddManyOptions {
  /**
   * Title template. `{i}` is the 1-based item number; `{field}` is that
   * field's value for the item.
   */
  titleTemplate?: string;
  /** Group path template, same placeholders as `titleTemplate`. */
  groupPathTemplate?: string;
}

/**
 * Fill `{i}` and `{field}` placeholders. Unknown placeholders are left as is.
 */
export function fillTemplate(template: string, position: number, fields: Record<string, unknown>): string {
  return template.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (placeholder: string, name: string) => {
    if (name === 'i') return String(position);
    const value = fields[name];
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      return String(value);
    }
    return placeholder;
  });
}

/**
 * Add one item per position of the expandable array fields.
 *
 * Every expandable field given as an array of more than one element must
 * have the same length L; L items are added, each taking the element at its
 * position. One-element arrays count as plain values. Other fields are
 * copied to every item, except a `groupPath` array of length L, which is
 * zipped as well.
 *
 * @throws {ValidationError} if no expandable field has more than one value,
 *   or the expandable arrays differ in length
 */
export function addMany(collection: Collection, input: ItemInput, options: AddManyOptions = {}): Collection {
  const vectorFields: string[] = [];
  const lengths: Record<string, number> = {};

  for (const field of EXPANDABLE_FIELDS) {
    const value = input[field];
    if (Array.isArray(value) && value.length > 1) {
      vectorFields.push(field);
      lengths[field] = value.length;
    }
  }

  if (vectorFields.length === 0) {
    throw new ValidationError(
      'addMany: no expandable field has more than one value. Use add() for a single item. ' +
      `Expandable fields: ${EXPANDABLE_FIELDS.join(', ')}`,
    );
  }

  const count = lengths[vectorFields[0]];
  const mismatched = vectorFields.some((field) => lengths[field] !== count);
  if (mismatched) {
    const found = vectorFields.map((field) => `${field} = ${lengths[field]}`).join(', ');
    throw new ValidationError(
      `addMany: all expandable fields must have the same length. Found: ${found}`,
      undefined,
      vectorFields.find((field) => lengths[field] !== count),
    );
  }

  const groupPathVector = Array.isArray(input.groupPath) && input.groupPath.length === count
    ? input.groupPath
    : null;

  let result = collection;
  for (let position = 0; position < count; position++) {
    const itemInput: ItemInput = { kind: input.kind };

    for (const [field, value] of Object.entries(input)) {
      if (field === 'kind') continue;
      if (vectorFields.includes(field) && Array.isArray(value)) {
        itemInput[field] = value[position];
      } else if (Array.isArray(value) && value.length === 1 && EXPANDABLE.has(field)) {
        itemInput[field] = value[0];
      } else {
        itemInput[field] = value;
      }
    }

    if (groupPathVector) {
      itemInput.groupPath = groupPathVector[position];
    }
    if (options.groupPathTemplate !== undefined) {
      itemInput.groupPath = fillTemplate(options.groupPathTemplate, position + 1, itemInput);
    }
    if (options.titleTemplate !== undefined) {
      itemInput.title = fillTemplate(options.titleTemplate, position + 1, itemInput);
    }

    result = add(result, itemInput);
  }

  return result;
}
