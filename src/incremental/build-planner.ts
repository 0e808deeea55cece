/**
 * Incremental build planning.
 *
 * Compares the current units' content hashes with the manifest and
 * decides, per unit, whether it is regenerated. Pure: reading and writing
 * the manifest is left to the caller.
 */

import { ValidationError } from '../validation/errors.js';
import { MANIFEST_VERSION, type BuildManifest, type BuildRecord } from './manifest-store.js';

export type UnitStatus = 'new' | 'changed' | 'unchanged' | 'removed' | 'failed';

export const UNIT_STATUSES: readonly UnitStatus[] = ['new', 'changed', 'unchanged', 'removed', 'failed'];

export interface PlannedUnit {
  unitId: string;
  contentHash: string;
}

export interface UnitDecision {
  unitId: string;
  status: UnitStatus;
  /** Current hash; null for removed and failed units. */
  contentHash: string | null;
  /** Hash in the manifest; null when there was no record. */
  previousHash: string | null;
}

export interface BuildPlan {
  decisions: UnitDecision[];
  counts: Record<UnitStatus, number>;
}

export interface PlanOptions {
  /** Regenerate every current unit. */
  force?: boolean;
  /** Units whose page failed to compile; their records are kept. */
  failedUnitIds?: readonly string[];
}

/** Own record of a unit; inherited object keys are not records. */
export function recordFor(manifest: BuildManifest, unitId: string): BuildRecord | undefined {
  return Object.hasOwn(manifest.units, unitId) ? manifest.units[unitId] : undefined;
}

/**
 * Classify one current unit against the manifest.
 *
 * `force` bypasses the comparison: every current unit is `changed`.
 */
export function classifyUnit(
  unitId: string,
  contentHash: string,
  manifest: BuildManifest,
  force: boolean = false,
): 'new' | 'changed' | 'unchanged' {
  if (force) return 'changed';
  const record = recordFor(manifest, unitId);
  if (record === undefined) return 'new';
  return record.contentHash !== contentHash ? 'changed' : 'unchanged';
}

/** Whether a unit with this status is handed to the renderer. */
export function needsRegeneration(status: UnitStatus): boolean {
  return status === 'new' || status === 'changed';
}

export function countStatuses(decisions: readonly UnitDecision[]): Record<UnitStatus, number> {
  const counts: Record<UnitStatus, number> = { new: 0, changed: 0, unchanged: 0, removed: 0, failed: 0 };
  for (const decision of decisions) {
    counts[decision.status]++;
  }
  return counts;
}

/**
 * Decide what happens to every unit.
 *
 * Decisions list current units in order, then failed units, then units
 * the manifest records that no longer exist (`removed`).
 *
 * @throws {ValidationError} when two units share an id
 */
export function planBuild(
  units: readonly PlannedUnit[],
  manifest: BuildManifest,
  options: PlanOptions = {},
): BuildPlan {
  const seen = new Set<string>();
  const decisions: UnitDecision[] = [];

  for (const unit of units) {
    if (seen.has(unit.unitId)) {
      throw new ValidationError(`Duplicate output unit "${unit.unitId}"`, undefined, 'unitId');
    }
    seen.add(unit.unitId);
    decisions.push({
      unitId: unit.unitId,
      status: classifyUnit(unit.unitId, unit.contentHash, manifest, options.force ?? false),
      contentHash: unit.contentHash,
      previousHash: recordFor(manifest, unit.unitId)?.contentHash ?? null,
    });
  }

  for (const unitId of options.failedUnitIds ?? []) {
    if (seen.has(unitId)) continue;
    seen.add(unitId);
    decisions.push({
      unitId,
      status: 'failed',
      contentHash: null,
      previousHash: recordFor(manifest, unitId)?.contentHash ?? null,
    });
  }

  for (const [unitId, record] of Object.entries(manifest.units)) {
    if (seen.has(unitId)) continue;
    decisions.push({ unitId, status: 'removed', contentHash: null, previousHash: record.contentHash });
  }

  return { decisions, counts: countStatuses(decisions) };
}

/**
 * Manifest to write after a build.
 *
 * Regenerated units get a fresh record; unchanged and failed units keep
 * their previous one; removed units are dropped.
 */
export function nextManifest(plan: BuildPlan, previous: BuildManifest, now: Date): BuildManifest {
  const units: Record<string, BuildRecord> = {};
  const generatedAt = now.toISOString();

  for (const decision of plan.decisions) {
    const prior = recordFor(previous, decision.unitId);
    switch (decision.status) {
      case 'new':
      case 'changed':
        if (decision.contentHash !== null) {
          units[decision.unitId] = { unitId: decision.unitId, contentHash: decision.contentHash, generatedAt };
        }
        break;
      case 'unchanged':
      case 'failed':
        if (prior !== undefined) units[decision.unitId] = prior;
        break;
      case 'removed':
        break;
    }
  }

  return { version: MANIFEST_VERSION, units };
}
