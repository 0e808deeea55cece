// Barrel exports for pagination

export type { PageNavigation, PageSegment, SplitOptions } from './splitter.js';
export {
  splitPages,
  joinSegments,
  unitIdFor,
  DEFAULT_BASE_UNIT_NAME,
  DEFAULT_PAGINATION_SEPARATOR,
} from './splitter.js';
