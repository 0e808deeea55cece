/**
 * Readable, page-unique identifiers for compiled items.
 *
 * Base names come from the first source that yields one:
 *   1. the item's group path, segments joined with dashes
 *   2. the fields an item binds: `<vizType>-<v1>[-<v2>]`, or an input's id
 *   3. the item title
 *   4. `<vizType | kind>-<position>`, position counted within the page
 *
 * Collisions get `-2`, `-3`, ... in first-seen order.
 */

import type { ContentBlock, VizItem, VizType } from '../types/content.js';

/** Default maximum length of a sanitized base name. */
export const MAX_CHUNK_NAME_LENGTH = 50;

/**
 * Lowercase, collapse every non-alphanumeric run to one dash, trim dashes,
 * truncate. Applying it twice gives the same result.
 */
export function sanitizeChunkName(raw: string, maxLength: number = MAX_CHUNK_NAME_LENGTH): string {
  return raw
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, maxLength)
    .replace(/-+$/, '');
}

type VizField = 'xVar' | 'yVar' | 'stackVar' | 'groupVar' | 'valueVar';

/** Bound fields worth naming a chart after, most telling first. */
const VIZ_NAME_FIELDS: Record<VizType, readonly VizField[]> = {
  bar: ['xVar', 'stackVar', 'groupVar'],
  stackedbar: ['xVar', 'stackVar', 'groupVar'],
  stackedbars: [],
  timeline: ['yVar', 'groupVar'],
  histogram: ['xVar'],
  heatmap: ['xVar', 'yVar', 'valueVar'],
  density: ['xVar', 'groupVar'],
  boxplot: ['yVar', 'xVar'],
  scatter: ['xVar', 'yVar'],
  pie: ['xVar'],
  treemap: ['groupVar', 'valueVar'],
  map: ['valueVar'],
};

const MAX_NAME_VARIABLES = 2;

function vizVariables(item: VizItem): string[] {
  if (item.vizType === 'stackedbars') {
    return item.xVars !== null && item.xVars.length > 0 ? [item.xVars[0]] : [];
  }
  const variables: string[] = [];
  for (const field of VIZ_NAME_FIELDS[item.vizType]) {
    const value = item[field];
    if (value !== null && value.length > 0) variables.push(value);
  }
  return variables.slice(0, MAX_NAME_VARIABLES);
}

function fromVariables(item: ContentBlock): string | null {
  if (item.kind === 'viz') {
    const variables = vizVariables(item);
    return variables.length > 0 ? [item.vizType, ...variables].join('-') : null;
  }
  if (item.kind === 'input') {
    return item.inputId;
  }
  return null;
}

/**
 * Derive the sanitized base name for an item.
 *
 * @param position - 1-based position of the item within its page
 */
export function deriveBaseName(
  item: ContentBlock,
  position: number,
  maxLength: number = MAX_CHUNK_NAME_LENGTH,
): string {
  const candidates = [
    item.groupPath !== null ? item.groupPath.join('-') : null,
    fromVariables(item),
    item.title,
  ];

  for (const candidate of candidates) {
    if (candidate === null) continue;
    const name = sanitizeChunkName(candidate, maxLength);
    if (name.length > 0) return name;
  }

  const prefix = item.kind === 'viz' ? item.vizType : item.kind;
  return sanitizeChunkName(`${prefix}-${position}`, maxLength);
}

/**
 * Assigns unique names within one page.
 *
 * Names are compared case-insensitively. A suffixed name is never one
 * already handed out, whether that name was a base or itself suffixed.
 */
export class ChunkNameRegistry {
  private readonly used = new Set<string>();
  private readonly nextSuffix = new Map<string, number>();

  /** Return `base`, or the first free `base-N` for N = 2, 3, ... */
  assign(base: string): string {
    const key = base.toLowerCase();
    if (!this.used.has(key)) {
      this.used.add(key);
      return base;
    }

    let suffix = this.nextSuffix.get(key) ?? 2;
    while (this.used.has(`${key}-${suffix}`)) {
      suffix++;
    }
    this.nextSuffix.set(key, suffix + 1);
    this.used.add(`${key}-${suffix}`);
    return `${base}-${suffix}`;
  }

  has(name: string): boolean {
    return this.used.has(name.toLowerCase());
  }

  get size(): number {
    return this.used.size;
  }
}
