import { describe, it, expect } from 'vitest';
import { ChunkNameRegistry, deriveBaseName, sanitizeChunkName } from './chunk-namer.js';
import { addInput, addText, addViz } from '../collection/helpers.js';
import { newCollection } from '../collection/collection.js';
import { validateItems } from '../validation/item-validation.js';
import type { Collection, ContentBlock } from '../types/content.js';

function blocks(collection: Collection): ContentBlock[] {
  return validateItems(collection.items).filter((item): item is ContentBlock => item.kind !== 'pagination');
}

function baseNames(collection: Collection): string[] {
  return blocks(collection).map((item, i) => deriveBaseName(item, i + 1));
}

describe('sanitizeChunkName', () => {
  it('lowercases and dashes non-alphanumeric runs', () => {
    expect(sanitizeChunkName('section_A/sub.section/item#1')).toBe('section-a-sub-section-item-1');
  });

  it('trims leading and trailing dashes', () => {
    expect(sanitizeChunkName('  --Hello, World!--  ')).toBe('hello-world');
  });

  it('truncates to 50 characters and drops a trailing dash', () => {
    const raw = Array.from({ length: 10 }, () => 'verylongsectionname').join('/');
    const name = sanitizeChunkName(raw);

    // 2 full segments (19 + 1 + 19 + 1 = 40) then 10 characters of the third
    expect(name).toBe('verylongsectionname-verylongsectionname-verylongse');
    expect(name).toHaveLength(50);
  });

  it('does not end in a dash after truncation', () => {
    expect(sanitizeChunkName('abcd efgh', 5)).toBe('abcd');
  });

  it('is idempotent', () => {
    for (const raw of ['Trend Over Time', 'a__b', '--x--', 'Ünïcode label', 'q1_trust']) {
      const once = sanitizeChunkName(raw);
      expect(sanitizeChunkName(once)).toBe(once);
    }
  });

  it('returns empty for text without alphanumerics', () => {
    expect(sanitizeChunkName('!!!')).toBe('');
  });
});

describe('deriveBaseName', () => {
  it('prefers the group path', () => {
    const c = addViz(newCollection(), {
      vizType: 'timeline',
      yVar: 'value',
      title: 'Trend Over Time',
      groupPath: 'demographics/age/trend',
    });

    expect(baseNames(c)).toEqual(['demographics-age-trend']);
  });

  it('names charts after their bound variables', () => {
    let c = newCollection();
    c = addViz(c, { vizType: 'stackedbar', xVar: 'satisfaction', stackVar: 'department', title: 'Satisfaction' });
    c = addViz(c, { vizType: 'stackedbars', xVars: ['q1_trust', 'q2_safety'], title: 'Survey' });
    c = addViz(c, { vizType: 'timeline', xVar: 'year', yVar: 'metric', title: 'Timeline' });
    c = addViz(c, { vizType: 'histogram', xVar: 'score', title: 'Distribution' });
    c = addViz(c, { vizType: 'heatmap', xVar: 'country', yVar: 'year', valueVar: 'population' });

    expect(baseNames(c)).toEqual([
      'stackedbar-satisfaction-department',
      'stackedbars-q1-trust',
      'timeline-metric',
      'histogram-score',
      'heatmap-country-year',
    ]);
  });

  it('uses the id of an input control', () => {
    const c = addInput(newCollection(), { inputId: 'region_select', choices: ['north', 'south'] });
    expect(baseNames(c)).toEqual(['region-select']);
  });

  it('falls back to the title', () => {
    const c = addText(newCollection(), 'Body', { title: 'Key Findings' });
    expect(baseNames(c)).toEqual(['key-findings']);
  });

  it('falls back to kind and page position', () => {
    let c = addText(newCollection(), 'first');
    c = addViz(c, { vizType: 'pie' });
    c = addText(c, 'third', { title: '???' });

    expect(baseNames(c)).toEqual(['text-1', 'pie-2', 'text-3']);
  });
});

describe('ChunkNameRegistry', () => {
  it('keeps the first use and suffixes repeats', () => {
    const registry = new ChunkNameRegistry();

    expect(registry.assign('analysis-main')).toBe('analysis-main');
    expect(registry.assign('analysis-main')).toBe('analysis-main-2');
    expect(registry.assign('histogram-value')).toBe('histogram-value');
    expect(registry.assign('histogram-value')).toBe('histogram-value-2');
    expect(registry.assign('histogram-value')).toBe('histogram-value-3');
  });

  it('never reuses a name already assigned', () => {
    const registry = new ChunkNameRegistry();

    expect(registry.assign('chart-2')).toBe('chart-2');
    expect(registry.assign('chart')).toBe('chart');
    expect(registry.assign('chart')).toBe('chart-3');
    expect(registry.assign('chart-2')).toBe('chart-2-2');
  });

  it('compares names case-insensitively', () => {
    const registry = new ChunkNameRegistry();

    registry.assign('Summary');
    expect(registry.has('summary')).toBe(true);
    expect(registry.assign('summary')).toBe('summary-2');
  });

  it('is deterministic for the same input order', () => {
    const bases = ['a', 'b', 'a', 'a-2', 'a', 'b'];
    const run = () => {
      const registry = new ChunkNameRegistry();
      return bases.map((base) => registry.assign(base));
    };

    expect(run()).toEqual(['a', 'b', 'a-2', 'a-2-2', 'a-3', 'b-2']);
    expect(run()).toEqual(run());
    expect(new Set(run()).size).toBe(bases.length);
  });
});
