/**
 * Compiled output: one unit per page, ready for a renderer.
 */

import type { BuildOptions } from '../config/schema.js';
import type { DataReference, FilteredView } from '../dedup/filter-cache.js';
import type { PageNavigation } from '../pagination/splitter.js';
import type { TabTree } from '../tabs/group-tree.js';
import type { CompiledVisibility } from '../visibility/compiler.js';
import type { ContentBlock, VizItem, VizType } from './content.js';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** A validated item with its nested children split off into `NamedItem.children`. */
export type ResolvedItem = DistributiveOmit<ContentBlock, 'children'>;

export interface NamedItem {
  /** Page-unique readable identifier. */
  chunkName: string;
  item: ResolvedItem;
  /** Data the item reads; null for items that read none. */
  data: DataReference | null;
  visibility: CompiledVisibility | null;
  /** Children of layout and sidebar blocks, in order. */
  children: NamedItem[];
}

export interface CompiledUnit {
  unitId: string;
  pageIndex: number;
  pageCount: number;
  navigation: PageNavigation | null;
  /** Top-level items in page order. */
  items: NamedItem[];
  tabs: TabTree<NamedItem>;
  /** Filtered views the unit reads, in first-use order. */
  views: FilteredView[];
  /** Dataset name -> identity (fingerprint, or the name when unbound) for datasets the unit reads. */
  datasets: Record<string, string>;
  contentHash: string;
}

/** A page not emitted because an item's visibility condition is unsupported. */
export interface FailedPage {
  pageIndex: number;
  unitId: string;
  insertionIndex: number;
  message: string;
}

export interface CompileDiagnostic {
  level: 'warning' | 'error';
  unitId: string;
  insertionIndex: number;
  message: string;
}

export interface CompiledPages {
  baseUnitName: string;
  options: BuildOptions;
  units: CompiledUnit[];
  failedPages: FailedPage[];
  diagnostics: CompileDiagnostic[];
  /** Every filtered view created, across all pages. */
  views: FilteredView[];
}

/** A viz item with everything a charting backend needs. */
export interface ResolvedVizItem {
  chunkName: string;
  item: VizItem;
  data: DataReference;
  visibility: CompiledVisibility | null;
}

/**
 * Charting backend. Turns a resolved viz item into whatever the document
 * renderer embeds for it.
 */
export interface ChartBackend<Output = unknown> {
  readonly name: string;
  supports(vizType: VizType): boolean;
  renderChart(viz: ResolvedVizItem): Output;
}
