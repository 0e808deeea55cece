/**
 * Build runner: plan -> render -> write manifest.
 *
 * Units are rendered one at a time. The manifest is written once, after
 * every render and removal succeeded; a failure or an abort leaves it as
 * it was, so the next build retries the same units.
 */

import {
  nextManifest,
  planBuild,
  type BuildPlan,
} from '../incremental/build-planner.js';
import type {
  BuildManifest,
  BuildManifestStore,
  ManifestLoadStatus,
} from '../incremental/manifest-store.js';
import type { CompileDiagnostic, CompiledPages, CompiledUnit, FailedPage } from '../types/compiled.js';
import { BuildAbortedError } from './errors.js';

/** A unit handed to the renderer. */
export interface RenderUnit extends CompiledUnit {
  status: 'new' | 'changed';
}

/**
 * Produces the final artifacts. Called only for units that need it.
 */
export interface DocumentRenderer {
  render(unit: RenderUnit): Promise<void>;
  /** Delete the artifacts of a unit that no longer exists. */
  remove(unitId: string): Promise<void>;
}

export interface BuildRunOptions {
  store: BuildManifestStore;
  renderer: DocumentRenderer;
  /** Regenerate every unit; defaults to the compile options' `force`. */
  force?: boolean;
  signal?: AbortSignal;
  /** Clock for `generatedAt` timestamps. */
  now?: () => Date;
}

export interface BuildResult {
  plan: BuildPlan;
  /** Manifest as written. */
  manifest: BuildManifest;
  manifestStatus: ManifestLoadStatus;
  rendered: string[];
  removed: string[];
  failedPages: FailedPage[];
  diagnostics: CompileDiagnostic[];
}

/**
 * Run an incremental build of one or more compiled collections.
 *
 * @throws {BuildAbortedError} when the signal fires before the manifest is written
 * @throws {ValidationError} when two collections produce the same unit id
 */
export async function runBuild(
  compiled: CompiledPages | readonly CompiledPages[],
  options: BuildRunOptions,
): Promise<BuildResult> {
  const collections: readonly CompiledPages[] = 'units' in compiled ? [compiled] : compiled;
  const units = collections.flatMap((c) => c.units);
  const failedPages = collections.flatMap((c) => c.failedPages);
  const diagnostics = collections.flatMap((c) => c.diagnostics);
  const force = options.force ?? collections.some((c) => c.options.force);
  const now = options.now ?? (() => new Date());

  const { manifest: previous, status: manifestStatus } = await options.store.load();
  const plan = planBuild(units, previous, {
    force,
    failedUnitIds: failedPages.map((page) => page.unitId),
  });

  const byId = new Map(units.map((unit) => [unit.unitId, unit]));
  const rendered: string[] = [];
  const removed: string[] = [];

  const checkAborted = (): void => {
    if (options.signal?.aborted) {
      throw new BuildAbortedError(rendered);
    }
  };

  for (const decision of plan.decisions) {
    if (decision.status === 'new' || decision.status === 'changed') {
      const unit = byId.get(decision.unitId);
      if (unit === undefined) continue;
      checkAborted();
      await options.renderer.render({ ...unit, status: decision.status });
      rendered.push(unit.unitId);
    } else if (decision.status === 'removed') {
      checkAborted();
      await options.renderer.remove(decision.unitId);
      removed.push(decision.unitId);
    }
  }

  checkAborted();
  const manifest = nextManifest(plan, previous, now());
  await options.store.save(manifest);

  return { plan, manifest, manifestStatus, rendered, removed, failedPages, diagnostics };
}
