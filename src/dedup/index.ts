// Barrel exports for the filter/dataset dedup cache

export type { FilteredView, DataReference, FilterCacheOptions } from './filter-cache.js';
export { FilterCache, DEFAULT_PREFIX_LENGTH } from './filter-cache.js';
export { normalizeFilterText } from './filter-normalizer.js';
