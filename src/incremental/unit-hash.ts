import type { FilteredView } from '../dedup/filter-cache.js';
import type { PageNavigation } from '../pagination/splitter.js';
import { hashValue } from './hashing.js';

/** Bumped when the compiled unit layout changes, so every unit rebuilds. */
export const UNIT_FORMAT_VERSION = 1;

/** Everything a generated unit depends on. */
export interface UnitHashInput {
  items: unknown;
  views: readonly FilteredView[];
  /** Dataset name -> fingerprint (or name when unbound) for datasets the unit reads. */
  datasets: Readonly<Record<string, string>>;
  /** Display labels of the group segments the unit shows. */
  labels: Readonly<Record<string, string>>;
  navigation: PageNavigation | null;
  pageConfig: Readonly<Record<string, unknown>>;
}

/**
 * Content hash of one output unit.
 *
 * Insertion indices are left out: they shift when items are added to an
 * earlier page, which changes nothing this unit renders.
 */
export function computeUnitHash(input: UnitHashInput): string {
  return hashValue(
    { formatVersion: UNIT_FORMAT_VERSION, ...input },
    { omitKeys: ['insertionIndex'] },
  );
}
