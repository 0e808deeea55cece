import { describe, it, expect } from 'vitest';
import { normalizeFilterText } from './filter-normalizer.js';

describe('normalizeFilterText', () => {
  it('collapses whitespace runs and trims the ends', () => {
    expect(normalizeFilterText('  age  >\t30\n&  wave == 2 ')).toBe('age > 30 & wave == 2');
  });

  it('keeps whitespace inside quoted strings', () => {
    expect(normalizeFilterText("region   ==  'North  East'")).toBe("region == 'North  East'");
    expect(normalizeFilterText('name == "a   b"')).toBe('name == "a   b"');
  });

  it('keeps escaped quotes inside strings', () => {
    expect(normalizeFilterText('label == "say \\"hi  there\\""   ')).toBe('label == "say \\"hi  there\\""');
  });

  it('returns empty for blank text', () => {
    expect(normalizeFilterText(' \n\t ')).toBe('');
  });
});
