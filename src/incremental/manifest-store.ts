/**
 * Persistent build manifest.
 *
 * Records, per output unit, the content hash it was last generated from.
 * Writes are atomic (temp file in the same directory, then rename). A
 * missing file is a first build; an unreadable or invalid one is
 * recovered as empty so every unit is rebuilt.
 *
 * Zod schemas use .passthrough() so fields written by later versions
 * survive a round-trip.
 */

import { z } from 'zod';
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

// ============================================================================
// Constants
// ============================================================================

/** Name of the manifest file written to the output directory. */
export const MANIFEST_FILENAME = '.panelwright-manifest.json';

/** Schema version; a manifest with another version is rebuilt from scratch. */
export const MANIFEST_VERSION = 1;

// ============================================================================
// Zod Schemas
// ============================================================================

export const BuildRecordSchema = z.object({
  unitId: z.string(),
  /** SHA-256 hex of the unit's inputs when it was generated. */
  contentHash: z.string(),
  /** ISO 8601 timestamp. */
  generatedAt: z.string(),
}).passthrough();

export const BuildManifestSchema = z.object({
  version: z.number(),
  /** unitId -> record */
  units: z.record(z.string(), BuildRecordSchema),
}).passthrough();

export type BuildRecord = z.infer<typeof BuildRecordSchema>;
export type BuildManifest = z.infer<typeof BuildManifestSchema>;

/** How `load()` obtained the manifest. */
export type ManifestLoadStatus = 'missing' | 'loaded' | 'recovered';

export interface ManifestLoadResult {
  manifest: BuildManifest;
  status: ManifestLoadStatus;
}

export function emptyManifest(): BuildManifest {
  return { version: MANIFEST_VERSION, units: {} };
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// ============================================================================
// ManifestStore
// ============================================================================

/** Where a build keeps its manifest. */
export interface BuildManifestStore {
  load(): Promise<ManifestLoadResult>;
  save(manifest: BuildManifest): Promise<void>;
}

export class ManifestStore implements BuildManifestStore {
  readonly manifestPath: string;

  constructor(manifestPath: string) {
    this.manifestPath = manifestPath;
  }

  /** Store for the manifest kept in an output directory. */
  static forOutputDir(outputDir: string): ManifestStore {
    return new ManifestStore(join(outputDir, MANIFEST_FILENAME));
  }

  /**
   * Load the manifest.
   *
   * Returns an empty manifest with status `missing` on a first build, and
   * with status `recovered` (after a warning) when the file cannot be
   * parsed, fails validation or has another schema version.
   */
  async load(): Promise<ManifestLoadResult> {
    let content: string;
    try {
      content = await readFile(this.manifestPath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return { manifest: emptyManifest(), status: 'missing' };
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      return this.recover(`invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }

    const result = BuildManifestSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      return this.recover(`invalid manifest (${issues.join('; ')})`);
    }

    if (result.data.version !== MANIFEST_VERSION) {
      return this.recover(`unsupported version ${result.data.version}`);
    }

    return { manifest: result.data, status: 'loaded' };
  }

  /**
   * Write the manifest atomically, creating the directory if needed.
   */
  async save(manifest: BuildManifest): Promise<void> {
    const dir = dirname(this.manifestPath);
    await mkdir(dir, { recursive: true });

    const tempPath = join(dir, `.manifest-${Date.now()}-${Math.random().toString(36).slice(2)}.json.tmp`);
    await writeFile(tempPath, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
    await rename(tempPath, this.manifestPath);
  }

  private recover(reason: string): ManifestLoadResult {
    console.warn(`Build manifest ${this.manifestPath}: ${reason}; rebuilding every unit`);
    return { manifest: emptyManifest(), status: 'recovered' };
  }
}
