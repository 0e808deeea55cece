/**
 * Tab hierarchy assembly.
 *
 * Items with a group path are placed in nested groups; groups appear in
 * the order their path was first seen, and items keep insertion order
 * inside a group. Ungrouped items stay at the top level, interleaved with
 * groups where they occurred.
 */

import { groupPathKey } from './group-path.js';

export type TabEntry<T> =
  | { type: 'item'; item: T }
  | { type: 'group'; group: GroupNode<T> };

export interface GroupNode<T> {
  segment: string;
  /** Display label: the configured label for the segment, else the segment. */
  label: string;
  /** Full path from the top level, this segment last. */
  path: string[];
  entries: TabEntry<T>[];
}

export interface TabTree<T> {
  entries: TabEntry<T>[];
}

export function assembleTabs<T>(
  items: readonly T[],
  getPath: (item: T) => readonly string[] | null,
  labels: Readonly<Record<string, string>> = {},
): TabTree<T> {
  const root: TabEntry<T>[] = [];
  const groups = new Map<string, GroupNode<T>>();

  for (const item of items) {
    const path = getPath(item);
    let entries = root;

    if (path !== null) {
      for (let depth = 1; depth <= path.length; depth++) {
        const prefix = path.slice(0, depth);
        const key = groupPathKey(prefix);
        let node = groups.get(key);
        if (node === undefined) {
          const segment = prefix[depth - 1];
          node = { segment, label: labels[segment] ?? segment, path: prefix, entries: [] };
          groups.set(key, node);
          entries.push({ type: 'group', group: node });
        }
        entries = node.entries;
      }
    }

    entries.push({ type: 'item', item });
  }

  return { entries: root };
}

/** Items placed directly in a group, not in its subgroups. */
export function directItems<T>(node: GroupNode<T>): T[] {
  return node.entries.flatMap((entry) => (entry.type === 'item' ? [entry.item] : []));
}

export function childGroups<T>(node: GroupNode<T>): GroupNode<T>[] {
  return node.entries.flatMap((entry) => (entry.type === 'group' ? [entry.group] : []));
}

/** Every item of the tree in rendering order (depth first). */
export function flattenTabs<T>(tree: TabTree<T> | GroupNode<T>): T[] {
  const out: T[] = [];
  const visit = (entries: readonly TabEntry<T>[]): void => {
    for (const entry of entries) {
      if (entry.type === 'item') {
        out.push(entry.item);
      } else {
        visit(entry.group.entries);
      }
    }
  };
  visit(tree.entries);
  return out;
}

/** Find the group at an exact path, or null. */
export function findGroup<T>(tree: TabTree<T>, path: readonly string[]): GroupNode<T> | null {
  let entries = tree.entries;
  let found: GroupNode<T> | null = null;
  for (const segment of path) {
    found = null;
    for (const entry of entries) {
      if (entry.type === 'group' && entry.group.segment === segment) {
        found = entry.group;
        break;
      }
    }
    if (found === null) return null;
    entries = found.entries;
  }
  return found;
}

/**
 * Map every item of a tree, keeping its shape.
 */
export function mapTabs<T, U>(tree: TabTree<T>, fn: (item: T) => U): TabTree<U> {
  const mapEntries = (entries: readonly TabEntry<T>[]): TabEntry<U>[] =>
    entries.map((entry): TabEntry<U> =>
      entry.type === 'item'
        ? { type: 'item', item: fn(entry.item) }
        : { type: 'group', group: { ...entry.group, entries: mapEntries(entry.group.entries) } },
    );
  return { entries: mapEntries(tree.entries) };
}
