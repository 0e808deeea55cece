/**
 * Collection merging.
 *
 * Concatenates items in source order, renumbers insertion indices 1..N,
 * unions group labels (later source wins) and defaults (first writer
 * wins), and commits each distinct bound dataset once.
 */

import {
  isCollection,
  type Collection,
  type DatasetBinding,
  type FieldMap,
  type PendingItem,
} from '../types/content.js';
import { freezeCollection, newCollection } from './collection.js';
import { mergeDefaults } from './defaults-resolver.js';

interface DatasetRewrite {
  /** Source dataset name -> committed name. */
  renames: ReadonlyMap<string, string>;
  /** Committed name of the source's primary dataset, when it has one. */
  sourcePrimary: string | null;
  /** Primary dataset of the merged collection. */
  mergedPrimary: string | null;
}

/**
 * Commit a source's datasets into the merged set.
 *
 * A binding whose fingerprint is already committed reuses that name. A
 * name already committed with another fingerprint is renamed `<name>_2`,
 * `<name>_3`, ...
 */
function commitDatasets(
  committed: Map<string, DatasetBinding>,
  source: Collection,
): Map<string, string> {
  const renames = new Map<string, string>();

  for (const binding of Object.values(source.datasets)) {
    const sameContent = [...committed.values()].find((c) => c.fingerprint === binding.fingerprint);
    if (sameContent) {
      renames.set(binding.name, sameContent.name);
      continue;
    }

    let name = binding.name;
    for (let suffix = 2; committed.has(name); suffix++) {
      name = `${binding.name}_${suffix}`;
    }
    committed.set(name, Object.freeze({ name, fingerprint: binding.fingerprint }));
    renames.set(binding.name, name);
  }

  return renames;
}

/**
 * Dataset and children values an item takes after the merge, or null
 * when it is unchanged.
 */
function rewritePatch(fields: FieldMap, rewrite: DatasetRewrite): Record<string, unknown> | null {
  const { renames, sourcePrimary, mergedPrimary } = rewrite;
  const patch: Record<string, unknown> = {};

  const dataset = fields.dataset;
  if (typeof dataset === 'string') {
    const renamed = renames.get(dataset);
    if (renamed !== undefined && renamed !== dataset) {
      patch.dataset = renamed;
    }
  } else if (dataset === null && sourcePrimary !== null && sourcePrimary !== mergedPrimary) {
    // Items relying on their source's primary dataset keep pointing at it.
    patch.dataset = sourcePrimary;
  }

  const children = fields.children;
  if (isCollection(children)) {
    const rewritten = rewriteChildren(children, rewrite);
    if (rewritten !== children) {
      patch.children = rewritten;
    }
  }

  return Object.keys(patch).length > 0 ? patch : null;
}

function rewriteItem(item: PendingItem, rewrite: DatasetRewrite): PendingItem {
  const patch = rewritePatch(item.fields, rewrite);
  if (patch === null) return item;
  return Object.freeze({
    ...item,
    fields: Object.freeze({ ...item.fields, ...patch }),
    explicit: Object.freeze({ ...item.explicit, ...patch }),
  });
}

function rewriteChildren(children: Collection, rewrite: DatasetRewrite): Collection {
  let changed = false;
  const items = children.items.map((item) => {
    const rewritten = rewriteItem(item, rewrite);
    if (rewritten !== item) changed = true;
    return rewritten;
  });
  return changed ? freezeCollection({ ...children, items }) : children;
}

/**
 * Merge collections into one.
 *
 * Each source's items keep their relative order and their resolved
 * fields; insertion indices are renumbered 1..N over the result.
 */
export function merge(...collections: Collection[]): Collection {
  if (collections.length === 0) {
    return newCollection();
  }

  const committed = new Map<string, DatasetBinding>();
  const renamesPerSource = collections.map((source) => commitDatasets(committed, source));

  let mergedPrimary: string | null = null;
  for (const [position, source] of collections.entries()) {
    if (source.primaryDataset !== null) {
      mergedPrimary = renamesPerSource[position].get(source.primaryDataset) ?? source.primaryDataset;
      break;
    }
  }

  const items: PendingItem[] = [];
  let defaults: FieldMap = {};
  let groupLabels: Record<string, string> = {};

  for (const [position, source] of collections.entries()) {
    const renames = renamesPerSource[position];
    const rewrite: DatasetRewrite = {
      renames,
      sourcePrimary: source.primaryDataset === null
        ? null
        : renames.get(source.primaryDataset) ?? source.primaryDataset,
      mergedPrimary,
    };

    for (const item of source.items) {
      items.push(Object.freeze({
        ...rewriteItem(item, rewrite),
        insertionIndex: items.length + 1,
      }));
    }

    defaults = mergeDefaults(defaults, source.defaults);
    groupLabels = { ...groupLabels, ...source.groupLabels };
  }

  return freezeCollection({
    items,
    defaults,
    groupLabels,
    datasets: Object.fromEntries(committed),
    primaryDataset: mergedPrimary,
    nextIndex: items.length + 1,
  });
}
