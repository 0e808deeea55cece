// Content model
export type {
  ItemKind,
  VizType,
  InputType,
  DatasetBinding,
  FieldMap,
  ItemInput,
  PendingItem,
  Collection,
  ContentItem,
  ContentBlock,
  VizItem,
  TextItem,
  ImageItem,
  CalloutItem,
  DividerItem,
  CodeItem,
  HtmlItem,
  MetricItem,
  LayoutItem,
  PaginationItem,
  InputItem,
  SidebarItem,
} from './types/content.js';
export {
  ITEM_KINDS,
  VIZ_TYPES,
  INPUT_TYPES,
  ITEM_SCHEMAS,
  isItemKind,
  isCollection,
  isContentBlock,
  isPaginationBreak,
} from './types/content.js';

// Compiled output
export type {
  ResolvedItem,
  NamedItem,
  CompiledUnit,
  CompiledPages,
  FailedPage,
  CompileDiagnostic,
  ResolvedVizItem,
  ChartBackend,
} from './types/compiled.js';

// Collection builder
export * from './collection/index.js';

// Validation
export { ValidationError, DuplicateReferenceError } from './validation/errors.js';
export { validateItem, validateItems, checkDatasetReferences } from './validation/item-validation.js';

// Compile pipeline
export * from './compiler/index.js';
export * from './dedup/index.js';
export * from './visibility/index.js';
export * from './tabs/index.js';
export * from './pagination/index.js';
export * from './incremental/index.js';

// Configuration
export * from './config/index.js';

// Builds and reports
export * from './build/index.js';
export * from './report/index.js';
