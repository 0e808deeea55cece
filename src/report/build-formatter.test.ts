import { describe, it, expect } from 'vitest';
import { BuildReportFormatter } from './build-formatter.js';
import type { BuildResult } from '../build/build-runner.js';
import { nextManifest, planBuild } from '../incremental/build-planner.js';
import { MANIFEST_VERSION, type BuildManifest } from '../incremental/manifest-store.js';

const HASH_A = 'a'.repeat(64);
const HASH_B = 'b'.repeat(64);
const HASH_C = 'c'.repeat(64);

function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}

function sampleResult(manifestStatus: BuildResult['manifestStatus'] = 'loaded'): BuildResult {
  const previous: BuildManifest = {
    version: MANIFEST_VERSION,
    units: {
      index: { unitId: 'index', contentHash: HASH_A, generatedAt: '2026-01-01T00:00:00.000Z' },
      old: { unitId: 'old', contentHash: HASH_C, generatedAt: '2026-01-01T00:00:00.000Z' },
    },
  };
  const plan = planBuild(
    [
      { unitId: 'index', contentHash: HASH_A },
      { unitId: 'index_p2', contentHash: HASH_B },
    ],
    previous,
  );
  return {
    plan,
    manifest: nextManifest(plan, previous, new Date('2026-01-02T00:00:00.000Z')),
    manifestStatus,
    rendered: ['index_p2'],
    removed: ['old'],
    failedPages: [],
    diagnostics: [
      { level: 'warning', unitId: 'index_p2', insertionIndex: 3, message: 'Item 3: chart hidden; item dropped' },
    ],
  };
}

describe('BuildReportFormatter', () => {
  const formatter = new BuildReportFormatter();

  describe('formatTerminal', () => {
    it('lists regenerated and removed units with a summary', () => {
      const lines = stripAnsi(formatter.formatTerminal(sampleResult())).split('\n');

      expect(lines).toEqual([
        '',
        'Build',
        '═'.repeat(60),
        'NEW'.padEnd(12) + 'index_p2'.padEnd(32) + 'b'.repeat(12),
        'REMOVED'.padEnd(12) + 'old'.padEnd(32) + 'c'.repeat(12),
        '─'.repeat(60),
        '⚠ index_p2: Item 3: chart hidden; item dropped',
        '─'.repeat(60),
        '1 new, 0 changed, 1 unchanged, 1 removed, 0 failed',
        '',
      ]);
    });

    it('lists unchanged units when verbose', () => {
      const output = stripAnsi(formatter.formatTerminal(sampleResult(), { verbose: true }));

      expect(output).toContain('UNCHANGED'.padEnd(12) + 'index'.padEnd(32) + 'a'.repeat(12));
    });

    it('notes a recovered manifest', () => {
      const output = stripAnsi(formatter.formatTerminal(sampleResult('recovered')));

      expect(output).toContain('Build manifest was unreadable; every unit was rebuilt');
    });
  });

  describe('formatJSON', () => {
    it('returns counts, decisions and diagnostics', () => {
      const parsed: unknown = JSON.parse(formatter.formatJSON(sampleResult()));

      expect(parsed).toEqual({
        summary: { new: 1, changed: 0, unchanged: 1, removed: 1, failed: 0 },
        manifestStatus: 'loaded',
        units: [
          { unitId: 'index', status: 'unchanged', contentHash: HASH_A, previousHash: HASH_A },
          { unitId: 'index_p2', status: 'new', contentHash: HASH_B, previousHash: null },
          { unitId: 'old', status: 'removed', contentHash: null, previousHash: HASH_C },
        ],
        rendered: ['index_p2'],
        removed: ['old'],
        failedPages: [],
        diagnostics: [
          { level: 'warning', unitId: 'index_p2', insertionIndex: 3, message: 'Item 3: chart hidden; item dropped' },
        ],
      });
    });
  });
});
