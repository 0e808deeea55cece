/**
 * Collection compiler.
 *
 * validate -> paginate -> per page: visibility, data references, chunk
 * names, tabs, content hash. Pure: nothing is read or written.
 */

import { resolveBuildOptions } from '../config/reader.js';
import type { BuildOptions, BuildOptionsInput } from '../config/schema.js';
import { FilterCache, type DataReference, type FilteredView } from '../dedup/filter-cache.js';
import { computeUnitHash } from '../incremental/unit-hash.js';
import { splitPages, type PageSegment } from '../pagination/splitter.js';
import { ChunkNameRegistry, deriveBaseName } from '../tabs/chunk-namer.js';
import { assembleTabs } from '../tabs/group-tree.js';
import {
  isContentBlock,
  isPaginationBreak,
  type Collection,
  type ContentBlock,
  type ContentItem,
} from '../types/content.js';
import type {
  CompileDiagnostic,
  CompiledPages,
  CompiledUnit,
  FailedPage,
  NamedItem,
  ResolvedItem,
} from '../types/compiled.js';
import { itemContext } from '../validation/errors.js';
import { checkDatasetReferences, validateItems } from '../validation/item-validation.js';
import { compileVisibility, type CompiledVisibility } from '../visibility/compiler.js';
import { ExpressionSyntaxError, UnsupportedOperatorError } from '../visibility/errors.js';

// ============================================================================
// Visibility
// ============================================================================

interface VisibleItem {
  item: ContentBlock;
  visibility: CompiledVisibility | null;
  children: VisibleItem[];
}

/** Top-level item a nested child belongs to, and the path leading to it. */
interface ItemOwner {
  insertionIndex: number;
  /** Message prefix, e.g. `Item 3 (layout) > `. */
  path: string;
}

function itemVisibility(item: ContentBlock, owner: ItemOwner | null): CompiledVisibility | null {
  if (item.visibility === null || item.visibility.trim().length === 0) {
    return null;
  }
  try {
    return compileVisibility(item.visibility);
  } catch (err) {
    const insertionIndex = owner?.insertionIndex ?? item.insertionIndex;
    const context = `${owner?.path ?? ''}${itemContext(item.insertionIndex)}`;
    if (err instanceof UnsupportedOperatorError) {
      throw err.forItem(insertionIndex, context);
    }
    if (err instanceof ExpressionSyntaxError) {
      throw err.forItem(insertionIndex, context, owner !== null ? 'children.visibility' : 'visibility');
    }
    throw err;
  }
}

function childBlocks(item: ContentBlock): ContentBlock[] {
  return item.kind === 'layout' || item.kind === 'sidebar' ? item.children.filter(isContentBlock) : [];
}

/**
 * Compile visibility conditions of a page's items.
 *
 * In `item` mode an unsupported operator drops the item (and its
 * children) with a warning; in `page` mode it propagates. Errors in
 * nested children are attributed to their top-level item.
 */
function prepareItems(
  items: readonly ContentBlock[],
  options: BuildOptions,
  unitId: string,
  diagnostics: CompileDiagnostic[],
  owner: ItemOwner | null = null,
): VisibleItem[] {
  const kept: VisibleItem[] = [];
  for (const item of items) {
    let visibility: CompiledVisibility | null;
    try {
      visibility = itemVisibility(item, owner);
    } catch (err) {
      if (err instanceof UnsupportedOperatorError && options.visibilityErrors === 'item') {
        diagnostics.push({
          level: 'warning',
          unitId,
          insertionIndex: err.insertionIndex ?? item.insertionIndex,
          message: `${err.message}; item dropped`,
        });
        continue;
      }
      throw err;
    }
    const childOwner: ItemOwner = {
      insertionIndex: owner?.insertionIndex ?? item.insertionIndex,
      path: `${owner?.path ?? ''}${itemContext(item.insertionIndex, item.kind)} > `,
    };
    kept.push({ item, visibility, children: prepareItems(childBlocks(item), options, unitId, diagnostics, childOwner) });
  }
  return kept;
}

// ============================================================================
// Naming and data references
// ============================================================================

interface PageContext {
  collection: Collection;
  options: BuildOptions;
  cache: FilterCache;
  registry: ChunkNameRegistry;
  /** Items named so far on the page. */
  position: number;
  /** reference -> view, in first-use order */
  views: Map<string, FilteredView>;
  datasets: Record<string, string>;
}

function withoutChildren(item: ContentBlock): ResolvedItem {
  if (item.kind === 'layout') {
    const { children: _children, ...rest } = item;
    return rest;
  }
  if (item.kind === 'sidebar') {
    const { children: _children, ...rest } = item;
    return rest;
  }
  return item;
}

/** Viz items always read data; other items only when they name a dataset or filter. */
function readsData(item: ContentBlock): boolean {
  if (item.kind === 'layout' || item.kind === 'sidebar') return false;
  return item.kind === 'viz' || item.dataset !== null || item.filter !== null;
}

function resolveData(item: ContentBlock, ctx: PageContext): DataReference | null {
  if (!readsData(item)) return null;

  const dataset = item.dataset ?? ctx.collection.primaryDataset ?? ctx.options.defaultDataset;
  const identity = ctx.collection.datasets[dataset]?.fingerprint ?? dataset;
  ctx.datasets[dataset] = identity;

  const reference = ctx.cache.resolve(dataset, identity, item.filter);
  if (reference.type === 'filtered' && !ctx.views.has(reference.reference)) {
    const view = ctx.cache.view(reference.key);
    if (view !== undefined) ctx.views.set(reference.reference, view);
  }
  return reference;
}

function nameItems(items: readonly VisibleItem[], ctx: PageContext): NamedItem[] {
  return items.map((visible) => {
    ctx.position++;
    const chunkName = ctx.registry.assign(
      deriveBaseName(visible.item, ctx.position, ctx.options.maxChunkNameLength),
    );
    return {
      chunkName,
      item: withoutChildren(visible.item),
      data: resolveData(visible.item, ctx),
      visibility: visible.visibility,
      children: nameItems(visible.children, ctx),
    };
  });
}

function usedLabels(items: readonly NamedItem[], groupLabels: Readonly<Record<string, string>>): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const { item } of items) {
    for (const segment of item.groupPath ?? []) {
      const label = groupLabels[segment];
      if (label !== undefined) labels[segment] = label;
    }
  }
  return labels;
}

// ============================================================================
// Pages
// ============================================================================

function compilePage(
  segment: PageSegment<ContentItem>,
  collection: Collection,
  options: BuildOptions,
  cache: FilterCache,
  diagnostics: CompileDiagnostic[],
): CompiledUnit {
  const visible = prepareItems(segment.items.filter(isContentBlock), options, segment.unitId, diagnostics);

  const ctx: PageContext = {
    collection,
    options,
    cache,
    registry: new ChunkNameRegistry(),
    position: 0,
    views: new Map(),
    datasets: {},
  };
  const items = nameItems(visible, ctx);
  const views = [...ctx.views.values()];
  const labels = usedLabels(items, collection.groupLabels);

  return {
    unitId: segment.unitId,
    pageIndex: segment.pageIndex,
    pageCount: segment.pageCount,
    navigation: segment.navigation,
    items,
    tabs: assembleTabs(items, (named) => named.item.groupPath, collection.groupLabels),
    views,
    datasets: ctx.datasets,
    contentHash: computeUnitHash({
      items,
      views,
      datasets: ctx.datasets,
      labels,
      navigation: segment.navigation,
      pageConfig: options.pageConfig,
    }),
  };
}

/**
 * Compile a collection into one unit per page.
 *
 * @throws {ValidationError} when any item is invalid; nothing is compiled
 * @throws {BuildConfigError} when the options are invalid
 */
export function compile(collection: Collection, input: BuildOptionsInput = {}): CompiledPages {
  const options = resolveBuildOptions(input);

  const items = validateItems(collection.items);
  checkDatasetReferences(items, collection.datasets);

  const segments = splitPages(items, isPaginationBreak, {
    baseUnitName: options.baseUnitName,
    separator: options.paginationSeparator,
  });

  const cache = new FilterCache({ prefixLength: options.hashPrefixLength });
  const units: CompiledUnit[] = [];
  const failedPages: FailedPage[] = [];
  const diagnostics: CompileDiagnostic[] = [];

  for (const segment of segments) {
    try {
      units.push(compilePage(segment, collection, options, cache, diagnostics));
    } catch (err) {
      if (!(err instanceof UnsupportedOperatorError) || options.visibilityErrors !== 'page') {
        throw err;
      }
      const insertionIndex = err.insertionIndex ?? 0;
      failedPages.push({ pageIndex: segment.pageIndex, unitId: segment.unitId, insertionIndex, message: err.message });
      diagnostics.push({ level: 'error', unitId: segment.unitId, insertionIndex, message: `${err.message}; page not emitted` });
    }
  }

  return {
    baseUnitName: options.baseUnitName,
    options,
    units,
    failedPages,
    diagnostics,
    views: cache.views,
  };
}
