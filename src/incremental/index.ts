// Barrel exports for the incremental build engine

export { computeHash, canonicalJson, hashValue } from './hashing.js';
export type { CanonicalJsonOptions } from './hashing.js';
export {
  ManifestStore,
  MANIFEST_FILENAME,
  MANIFEST_VERSION,
  BuildRecordSchema,
  BuildManifestSchema,
  emptyManifest,
} from './manifest-store.js';
export type {
  BuildRecord,
  BuildManifest,
  BuildManifestStore,
  ManifestLoadStatus,
  ManifestLoadResult,
} from './manifest-store.js';
export {
  planBuild,
  nextManifest,
  classifyUnit,
  recordFor,
  needsRegeneration,
  countStatuses,
  UNIT_STATUSES,
} from './build-planner.js';
export type { UnitStatus, PlannedUnit, UnitDecision, BuildPlan, PlanOptions } from './build-planner.js';
export { computeUnitHash, UNIT_FORMAT_VERSION } from './unit-hash.js';
export type { UnitHashInput } from './unit-hash.js';
