import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MANIFEST_FILENAME, ManifestStore, type BuildManifest } from './manifest-store.js';

const manifest: BuildManifest = {
  version: 1,
  units: {
    index: { unitId: 'index', contentHash: 'aaa111', generatedAt: '2026-01-01T00:00:00.000Z' },
    index_p2: { unitId: 'index_p2', contentHash: 'bbb222', generatedAt: '2026-01-02T00:00:00.000Z' },
  },
};

describe('ManifestStore', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'manifest-store-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('reports a missing manifest as empty', async () => {
    const store = ManifestStore.forOutputDir(join(tmpDir, 'out'));

    expect(await store.load()).toEqual({ manifest: { version: 1, units: {} }, status: 'missing' });
  });

  it('round-trips a manifest exactly', async () => {
    const store = ManifestStore.forOutputDir(join(tmpDir, 'out'));

    await store.save(manifest);
    const { manifest: loaded, status } = await store.load();

    expect(status).toBe('loaded');
    expect(loaded).toEqual(manifest);
  });

  it('writes to the manifest file and leaves no temp files', async () => {
    const store = ManifestStore.forOutputDir(tmpDir);

    await store.save(manifest);

    expect(await readdir(tmpDir)).toEqual([MANIFEST_FILENAME]);
    const raw = await readFile(join(tmpDir, MANIFEST_FILENAME), 'utf-8');
    expect(JSON.parse(raw)).toEqual(manifest);
  });

  it('keeps unknown fields', async () => {
    const store = ManifestStore.forOutputDir(tmpDir);
    const extended = { ...manifest, producer: 'other-tool' };

    await store.save(extended);

    expect((await store.load()).manifest).toEqual(extended);
  });

  it('recovers from corrupt JSON with a warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(join(tmpDir, MANIFEST_FILENAME), '{ not json', 'utf-8');
    const store = ManifestStore.forOutputDir(tmpDir);

    const result = await store.load();

    expect(result).toEqual({ manifest: { version: 1, units: {} }, status: 'recovered' });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('recovers from a manifest that fails validation', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(join(tmpDir, MANIFEST_FILENAME), JSON.stringify({ version: 1, units: { a: { unitId: 3 } } }));

    const result = await ManifestStore.forOutputDir(tmpDir).load();

    expect(result.status).toBe('recovered');
    expect(result.manifest.units).toEqual({});
  });

  it('recovers from another schema version', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(join(tmpDir, MANIFEST_FILENAME), JSON.stringify({ version: 99, units: {} }));

    const result = await ManifestStore.forOutputDir(tmpDir).load();

    expect(result.status).toBe('recovered');
    expect(warn).toHaveBeenCalledWith(
      `Build manifest ${join(tmpDir, MANIFEST_FILENAME)}: unsupported version 99; rebuilding every unit`,
    );
  });
});
