// Barrel exports for the collection builder

export type {
  NewCollectionOptions,
  DatasetSource,
  RowsSource,
  FingerprintSource,
} from './collection.js';
export {
  newCollection,
  withDefaults,
  add,
  addPaginationBreak,
  override,
  setGroupLabels,
  bindDataset,
  fingerprintDataset,
} from './collection.js';
export type { AddManyOptions } from './add-many.js';
export { addMany, fillTemplate, EXPANDABLE_FIELDS } from './add-many.js';
export { merge } from './merge.js';
export { resolveFields, recognizedFields, builtinDefaults, mergeDefaults } from './defaults-resolver.js';
export type {
  CommonInput,
  VizInput,
  ImageInput,
  CalloutInput,
  CodeInput,
  MetricInput,
  InputControlInput,
} from './helpers.js';
export {
  addViz,
  addText,
  addImage,
  addCallout,
  addDivider,
  addCode,
  addHtml,
  addMetric,
  addInput,
  addLayout,
  addSidebar,
} from './helpers.js';
