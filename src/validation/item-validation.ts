/**
 * Compile-time validation of pending items.
 *
 * Collections accept any item structurally; this is where unknown kinds,
 * unrecognized fields and malformed values are reported. Each pending
 * item becomes a member of the closed `ContentItem` union.
 */

import type { z } from 'zod';
import {
  ITEM_KINDS,
  ITEM_SCHEMAS,
  isItemKind,
  type ContentItem,
  type DatasetBinding,
  type PendingItem,
} from '../types/content.js';
import { parseGroupPath } from '../tabs/group-path.js';
import { ValidationError, itemContext } from './errors.js';

/**
 * Parse a pending item's fields with its kind's schema.
 *
 * The first issue becomes a ValidationError naming the field.
 */
function parseFields<S extends z.ZodTypeAny>(schema: S, pending: PendingItem): z.output<S> {
  const result = schema.safeParse(pending.fields);
  if (result.success) {
    return result.data;
  }

  const issue = result.error.issues[0];
  const field = issue.code === 'unrecognized_keys'
    ? issue.keys[0]
    : issue.path.map(String).join('.') || undefined;
  const message = issue.code === 'unrecognized_keys'
    ? `unrecognized field(s) ${issue.keys.map((k) => `"${k}"`).join(', ')}`
    : `${field ?? 'fields'}: ${issue.message}`;

  throw new ValidationError(
    `${itemContext(pending.insertionIndex, pending.kind)}: ${message}`,
    pending.insertionIndex,
    field,
  );
}

/**
 * Validate nested children of a layout or sidebar block.
 *
 * Pagination breaks are only allowed at the top level.
 */
function validateChildren(parent: PendingItem, children: readonly PendingItem[]): ContentItem[] {
  return children.map((child) => {
    if (child.kind === 'pagination') {
      throw new ValidationError(
        `${itemContext(parent.insertionIndex, parent.kind)}: pagination breaks cannot be nested ` +
        `(child ${child.insertionIndex})`,
        parent.insertionIndex,
        'children',
      );
    }
    try {
      return validateItem(child);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new ValidationError(
          `${itemContext(parent.insertionIndex, parent.kind)} > ${err.message}`,
          parent.insertionIndex,
          err.field ? `children.${err.field}` : 'children',
        );
      }
      throw err;
    }
  });
}

/**
 * Validate one pending item and return its typed form.
 *
 * @throws {ValidationError} for an unknown kind or any invalid field
 */
export function validateItem(pending: PendingItem): ContentItem {
  const { kind, insertionIndex } = pending;

  if (!isItemKind(kind)) {
    throw new ValidationError(
      `${itemContext(insertionIndex)}: unknown item kind "${kind}". Known kinds: ${ITEM_KINDS.join(', ')}`,
      insertionIndex,
      'kind',
    );
  }

  switch (kind) {
    case 'viz': {
      const fields = parseFields(ITEM_SCHEMAS.viz, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'text': {
      const fields = parseFields(ITEM_SCHEMAS.text, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'image': {
      const fields = parseFields(ITEM_SCHEMAS.image, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'callout': {
      const fields = parseFields(ITEM_SCHEMAS.callout, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'divider': {
      const fields = parseFields(ITEM_SCHEMAS.divider, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'code': {
      const fields = parseFields(ITEM_SCHEMAS.code, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'html': {
      const fields = parseFields(ITEM_SCHEMAS.html, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'metric': {
      const fields = parseFields(ITEM_SCHEMAS.metric, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'input': {
      const fields = parseFields(ITEM_SCHEMAS.input, pending);
      return { ...fields, kind, insertionIndex, groupPath: parseGroupPath(fields.groupPath, insertionIndex) };
    }
    case 'layout': {
      const fields = parseFields(ITEM_SCHEMAS.layout, pending);
      return {
        ...fields,
        kind,
        insertionIndex,
        groupPath: parseGroupPath(fields.groupPath, insertionIndex),
        children: validateChildren(pending, fields.children.items),
      };
    }
    case 'sidebar': {
      const fields = parseFields(ITEM_SCHEMAS.sidebar, pending);
      return {
        ...fields,
        kind,
        insertionIndex,
        groupPath: parseGroupPath(fields.groupPath, insertionIndex),
        children: validateChildren(pending, fields.children.items),
      };
    }
    case 'pagination': {
      parseFields(ITEM_SCHEMAS.pagination, pending);
      return { kind, insertionIndex };
    }
    default: {
      const unreachable: never = kind;
      throw new ValidationError(`Unhandled item kind: ${String(unreachable)}`, insertionIndex, 'kind');
    }
  }
}

/**
 * Check that every dataset an item names is bound to the collection.
 *
 * Only enforced when the collection binds at least one dataset; an
 * unbound collection names datasets the renderer provides.
 */
export function checkDatasetReferences(
  items: readonly ContentItem[],
  datasets: Readonly<Record<string, DatasetBinding>>,
): void {
  const bound = Object.keys(datasets);
  if (bound.length === 0) return;

  for (const item of items) {
    if (item.kind === 'pagination') continue;
    if (item.dataset !== null && !(item.dataset in datasets)) {
      throw new ValidationError(
        `${itemContext(item.insertionIndex, item.kind)}: dataset "${item.dataset}" is not bound. ` +
        `Available datasets: ${bound.join(', ')}`,
        item.insertionIndex,
        'dataset',
      );
    }
    if (item.kind === 'layout' || item.kind === 'sidebar') {
      checkDatasetReferences(item.children, datasets);
    }
  }
}

/**
 * Validate every item of a collection in order.
 */
export function validateItems(items: readonly PendingItem[]): ContentItem[] {
  return items.map((item) => validateItem(item));
}
