/**
 * Collection builder.
 *
 * Collections are frozen values: every builder call returns a new
 * collection and leaves its argument untouched. Items are resolved
 * against the collection defaults when they are added and validated only
 * when the collection is compiled.
 */

import {
  COLLECTION_BRAND,
  type Collection,
  type DatasetBinding,
  type FieldMap,
  type ItemInput,
  type PendingItem,
} from '../types/content.js';
import { canonicalJson, computeHash } from '../incremental/hashing.js';
import { ValidationError, itemContext } from '../validation/errors.js';
import { KIND_FIELD, mergeDefaults, resolveFields } from './defaults-resolver.js';

// ============================================================================
// Construction
// ============================================================================

export interface NewCollectionOptions {
  /** Field defaults applied to every item added afterwards. */
  defaults?: Record<string, unknown>;
  /** Group segment -> display label. */
  groupLabels?: Record<string, string>;
}

/** Dataset rows, fingerprinted by hashing their canonical JSON. */
export interface RowsSource {
  rows: readonly Record<string, unknown>[];
}

/** A dataset held elsewhere, identified by a fingerprint the caller computed. */
export interface FingerprintSource {
  fingerprint: string;
}

export type DatasetSource = RowsSource | FingerprintSource;

/**
 * Freeze a collection value. Internal to the builder modules.
 */
export function freezeCollection(fields: Omit<Collection, typeof COLLECTION_BRAND>): Collection {
  return Object.freeze({
    [COLLECTION_BRAND]: true as const,
    items: Object.freeze([...fields.items]),
    defaults: fields.defaults,
    groupLabels: Object.freeze({ ...fields.groupLabels }),
    datasets: Object.freeze({ ...fields.datasets }),
    primaryDataset: fields.primaryDataset,
    nextIndex: fields.nextIndex,
  });
}

export function newCollection(options: NewCollectionOptions = {}): Collection {
  return freezeCollection({
    items: [],
    defaults: mergeDefaults({}, options.defaults ?? {}),
    groupLabels: options.groupLabels ?? {},
    datasets: {},
    primaryDataset: null,
    nextIndex: 1,
  });
}

/**
 * Add field defaults. Fields that already have a default keep it.
 *
 * Only items added afterwards see the new defaults.
 */
export function withDefaults(collection: Collection, defaults: Record<string, unknown>): Collection {
  return freezeCollection({
    ...collection,
    defaults: mergeDefaults(collection.defaults, defaults),
  });
}

// ============================================================================
// Items
// ============================================================================

function splitInput(input: ItemInput): { kind: string; explicit: FieldMap } {
  const explicit: Record<string, unknown> = {};
  for (const [field, value] of Object.entries(input)) {
    if (field === KIND_FIELD || value === undefined) continue;
    explicit[field] = value;
  }
  return { kind: input.kind, explicit: Object.freeze(explicit) };
}

/**
 * Append an item. Its kind and fields are not checked until compile.
 */
export function add(collection: Collection, input: ItemInput): Collection {
  const { kind, explicit } = splitInput(input);
  const item: PendingItem = Object.freeze({
    insertionIndex: collection.nextIndex,
    kind,
    fields: resolveFields(kind, explicit, collection.defaults),
    explicit,
  });

  return freezeCollection({
    ...collection,
    items: [...collection.items, item],
    nextIndex: collection.nextIndex + 1,
  });
}

/**
 * Append a pagination break: the current page ends after the items added
 * so far.
 */
export function addPaginationBreak(collection: Collection): Collection {
  return add(collection, { kind: 'pagination' });
}

/**
 * Replace explicit fields of one pending item and resolve it again.
 *
 * A `kind` in the patch changes the item kind, which lets a structure
 * built with an unknown kind be repaired before compile. Fields set to
 * `undefined` in the patch become absent again.
 *
 * @throws {ValidationError} if no item has the given insertion index
 */
export function override(
  collection: Collection,
  insertionIndex: number,
  patch: Partial<ItemInput>,
): Collection {
  const position = collection.items.findIndex((item) => item.insertionIndex === insertionIndex);
  if (position === -1) {
    throw new ValidationError(
      `${itemContext(insertionIndex)}: no such item in this collection`,
      insertionIndex,
    );
  }

  const current = collection.items[position];
  const kind = typeof patch.kind === 'string' ? patch.kind : current.kind;
  const merged: Record<string, unknown> = { ...current.explicit };
  for (const [field, value] of Object.entries(patch)) {
    if (field === KIND_FIELD) continue;
    if (value === undefined) {
      delete merged[field];
    } else {
      merged[field] = value;
    }
  }

  const explicit = Object.freeze(merged);
  const replaced: PendingItem = Object.freeze({
    insertionIndex,
    kind,
    fields: resolveFields(kind, explicit, collection.defaults),
    explicit,
  });

  const items = [...collection.items];
  items[position] = replaced;
  return freezeCollection({ ...collection, items });
}

// ============================================================================
// Labels and datasets
// ============================================================================

/**
 * Set display labels for group segments. Existing labels for other
 * segments are kept.
 */
export function setGroupLabels(collection: Collection, labels: Record<string, string>): Collection {
  return freezeCollection({
    ...collection,
    groupLabels: { ...collection.groupLabels, ...labels },
  });
}

/**
 * Fingerprint a dataset source.
 */
export function fingerprintDataset(source: DatasetSource): string {
  if ('rows' in source) {
    return computeHash(canonicalJson(source.rows));
  }
  return source.fingerprint;
}

/**
 * Bind a named dataset. The first dataset bound becomes the primary one,
 * used by items that name no dataset. Binding a name again replaces it.
 */
export function bindDataset(collection: Collection, name: string, source: DatasetSource): Collection {
  if (name.trim().length === 0) {
    throw new ValidationError('Dataset name must not be empty', undefined, 'dataset');
  }

  const binding: DatasetBinding = Object.freeze({ name, fingerprint: fingerprintDataset(source) });
  return freezeCollection({
    ...collection,
    datasets: { ...collection.datasets, [name]: binding },
    primaryDataset: collection.primaryDataset ?? name,
  });
}
