/**
 * Content-addressed cache of filtered dataset views.
 *
 * Every (dataset, filter) pair maps to one generated reference such as
 * `survey_filtered_3fa81c0d`. Items sharing a pair share the reference,
 * so the filtered view is computed once. The full SHA-256 key is kept
 * next to the readable prefix; a prefix already taken by another key is
 * lengthened until unique, so two different filters never share a view.
 */

import { computeHash } from '../incremental/hashing.js';
import { DuplicateReferenceError } from '../validation/errors.js';
import { normalizeFilterText } from './filter-normalizer.js';

/** Default number of hash characters in a generated reference. */
export const DEFAULT_PREFIX_LENGTH = 8;

const FULL_HASH_LENGTH = 64;
const PREFIX_STEP = 4;

/** A filtered view of one dataset, computed once and shared. */
export interface FilteredView {
  /** Generated reference items use in place of the dataset. */
  reference: string;
  dataset: string;
  /** Normalized filter text. */
  filter: string;
  /** Full SHA-256 of (dataset identity, normalized filter). */
  key: string;
}

export type DataReference =
  | { type: 'raw'; dataset: string }
  | { type: 'filtered'; dataset: string; reference: string; key: string };

export interface FilterCacheOptions {
  /** Hash characters used in references (default: 8). */
  prefixLength?: number;
}

export class FilterCache {
  private readonly prefixLength: number;
  private readonly byKey = new Map<string, FilteredView>();
  private readonly keyByReference = new Map<string, string>();

  constructor(options: FilterCacheOptions = {}) {
    this.prefixLength = Math.min(options.prefixLength ?? DEFAULT_PREFIX_LENGTH, FULL_HASH_LENGTH);
  }

  /**
   * Compute the dedup key for a dataset and filter.
   *
   * @param identity - Dataset identity: its fingerprint when bound, else its name
   */
  static keyFor(identity: string, filter: string): string {
    return computeHash(`${identity}\u0000${normalizeFilterText(filter)}`);
  }

  /**
   * Resolve the data an item should reference.
   *
   * Items without a filter (or with a blank one) reference the raw dataset
   * and bypass the cache.
   *
   * @param dataset  - Dataset name
   * @param identity - Dataset identity used in the key
   * @param filter   - Row-filter expression, or null
   */
  resolve(dataset: string, identity: string, filter: string | null): DataReference {
    if (filter === null || normalizeFilterText(filter).length === 0) {
      return { type: 'raw', dataset };
    }

    const key = FilterCache.keyFor(identity, filter);
    const existing = this.byKey.get(key);
    if (existing) {
      return { type: 'filtered', dataset, reference: existing.reference, key };
    }

    const reference = this.allocateReference(dataset, key);
    const view: FilteredView = { reference, dataset, filter: normalizeFilterText(filter), key };
    this.byKey.set(key, view);
    this.keyByReference.set(reference, key);
    return { type: 'filtered', dataset, reference, key };
  }

  /** View for a dedup key, if one was created. */
  view(key: string): FilteredView | undefined {
    return this.byKey.get(key);
  }

  /** Views created so far, in first-seen order. */
  get views(): FilteredView[] {
    return [...this.byKey.values()];
  }

  get size(): number {
    return this.byKey.size;
  }

  private allocateReference(dataset: string, key: string): string {
    for (let length = this.prefixLength; ; length += PREFIX_STEP) {
      const clamped = Math.min(length, FULL_HASH_LENGTH);
      const reference = `${dataset}_filtered_${key.slice(0, clamped)}`;
      const owner = this.keyByReference.get(reference);
      if (owner === undefined) {
        return reference;
      }
      if (clamped === FULL_HASH_LENGTH) {
        throw new DuplicateReferenceError(reference, owner, key);
      }
    }
  }
}
