import { describe, it, expect } from 'vitest';
import { classifyUnit, needsRegeneration, nextManifest, planBuild } from './build-planner.js';
import type { BuildManifest } from './manifest-store.js';

const previous: BuildManifest = {
  version: 1,
  units: {
    index: { unitId: 'index', contentHash: 'h-index', generatedAt: '2026-01-01T00:00:00.000Z' },
    index_p2: { unitId: 'index_p2', contentHash: 'h-p2', generatedAt: '2026-01-01T00:00:00.000Z' },
    index_p3: { unitId: 'index_p3', contentHash: 'h-p3', generatedAt: '2026-01-01T00:00:00.000Z' },
  },
};

const empty: BuildManifest = { version: 1, units: {} };

describe('classifyUnit', () => {
  it('classifies against the manifest', () => {
    expect(classifyUnit('index', 'h-index', previous)).toBe('unchanged');
    expect(classifyUnit('index', 'other', previous)).toBe('changed');
    expect(classifyUnit('extra', 'h', previous)).toBe('new');
  });

  it('treats every unit as changed when forced, recorded or not', () => {
    expect(classifyUnit('index', 'h-index', previous, true)).toBe('changed');
    expect(classifyUnit('extra', 'h', previous, true)).toBe('changed');
  });

  it('ignores object keys the manifest does not own', () => {
    expect(classifyUnit('constructor', 'h', empty)).toBe('new');
    expect(classifyUnit('toString', 'h', previous)).toBe('new');
  });
});

describe('needsRegeneration', () => {
  it('regenerates only new and changed units', () => {
    expect(needsRegeneration('new')).toBe(true);
    expect(needsRegeneration('changed')).toBe(true);
    expect(needsRegeneration('unchanged')).toBe(false);
    expect(needsRegeneration('removed')).toBe(false);
    expect(needsRegeneration('failed')).toBe(false);
  });
});

describe('planBuild', () => {
  it('marks every unit changed when forced without a manifest', () => {
    const plan = planBuild([{ unitId: 'index', contentHash: 'h' }], empty, { force: true });

    expect(plan.decisions).toEqual([{ unitId: 'index', status: 'changed', contentHash: 'h', previousHash: null }]);
  });

  it('gives a unit named like an object key no previous hash', () => {
    const plan = planBuild([{ unitId: 'constructor', contentHash: 'h' }], empty);

    expect(plan.decisions).toEqual([{ unitId: 'constructor', status: 'new', contentHash: 'h', previousHash: null }]);
  });

  it('marks every unit new without a manifest', () => {
    const plan = planBuild([{ unitId: 'index', contentHash: 'a' }, { unitId: 'index_p2', contentHash: 'b' }], empty);

    expect(plan.decisions.map((d) => d.status)).toEqual(['new', 'new']);
    expect(plan.counts).toEqual({ new: 2, changed: 0, unchanged: 0, removed: 0, failed: 0 });
  });

  it('classifies changed, unchanged, new and removed units', () => {
    const plan = planBuild(
      [
        { unitId: 'index', contentHash: 'h-index' },
        { unitId: 'index_p2', contentHash: 'h-p2-edited' },
        { unitId: 'about', contentHash: 'h-about' },
      ],
      previous,
    );

    expect(plan.decisions).toEqual([
      { unitId: 'index', status: 'unchanged', contentHash: 'h-index', previousHash: 'h-index' },
      { unitId: 'index_p2', status: 'changed', contentHash: 'h-p2-edited', previousHash: 'h-p2' },
      { unitId: 'about', status: 'new', contentHash: 'h-about', previousHash: null },
      { unitId: 'index_p3', status: 'removed', contentHash: null, previousHash: 'h-p3' },
    ]);
  });

  it('keeps failed units out of removed', () => {
    const plan = planBuild([{ unitId: 'index', contentHash: 'h-index' }], previous, {
      failedUnitIds: ['index_p2'],
    });

    expect(plan.decisions.map((d) => [d.unitId, d.status])).toEqual([
      ['index', 'unchanged'],
      ['index_p2', 'failed'],
      ['index_p3', 'removed'],
    ]);
  });

  it('rejects duplicate unit ids', () => {
    expect(() =>
      planBuild([{ unitId: 'index', contentHash: 'a' }, { unitId: 'index', contentHash: 'b' }], empty),
    ).toThrow('Duplicate output unit "index"');
  });
});

describe('nextManifest', () => {
  it('refreshes regenerated units and keeps the rest', () => {
    const plan = planBuild(
      [
        { unitId: 'index', contentHash: 'h-index' },
        { unitId: 'index_p2', contentHash: 'h-p2-edited' },
        { unitId: 'about', contentHash: 'h-about' },
      ],
      previous,
      { failedUnitIds: ['index_p3'] },
    );

    const next = nextManifest(plan, previous, new Date('2026-03-01T12:00:00.000Z'));

    expect(next).toEqual({
      version: 1,
      units: {
        index: { unitId: 'index', contentHash: 'h-index', generatedAt: '2026-01-01T00:00:00.000Z' },
        index_p2: { unitId: 'index_p2', contentHash: 'h-p2-edited', generatedAt: '2026-03-01T12:00:00.000Z' },
        about: { unitId: 'about', contentHash: 'h-about', generatedAt: '2026-03-01T12:00:00.000Z' },
        index_p3: { unitId: 'index_p3', contentHash: 'h-p3', generatedAt: '2026-01-01T00:00:00.000Z' },
      },
    });
  });

  it('drops removed units', () => {
    const plan = planBuild([{ unitId: 'index', contentHash: 'h-index' }], previous);

    expect(Object.keys(nextManifest(plan, previous, new Date()).units)).toEqual(['index']);
  });

  it('classifies every unit unchanged on a second identical build', () => {
    const units = [
      { unitId: 'index', contentHash: 'x' },
      { unitId: 'index_p2', contentHash: 'y' },
    ];
    const first = nextManifest(planBuild(units, empty), empty, new Date('2026-01-01T00:00:00.000Z'));

    const second = planBuild(units, first);

    expect(second.decisions.map((d) => d.status)).toEqual(['unchanged', 'unchanged']);
  });
});
