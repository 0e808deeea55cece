import { describe, it, expect } from 'vitest';
import { joinSegments, splitPages, unitIdFor } from './splitter.js';

const BREAK = '|';
const isBreak = (item: string): boolean => item === BREAK;

describe('splitPages', () => {
  it('returns one page without navigation when there are no breaks', () => {
    const pages = splitPages(['a', 'b'], isBreak);

    expect(pages).toEqual([
      {
        pageIndex: 1,
        pageCount: 1,
        unitId: 'index',
        items: ['a', 'b'],
        paginationAfter: false,
        navigation: null,
      },
    ]);
  });

  it('splits three items at two breaks into three pages', () => {
    const pages = splitPages(['a', BREAK, 'b', BREAK, 'c'], isBreak);

    expect(pages.map((p) => p.items)).toEqual([['a'], ['b'], ['c']]);
    expect(pages.map((p) => p.paginationAfter)).toEqual([true, true, false]);
    expect(pages.map((p) => p.unitId)).toEqual(['index', 'index_p2', 'index_p3']);

    expect(pages[0].navigation).toEqual({
      pageIndex: 1,
      pageCount: 3,
      baseUnitName: 'index',
      unitId: 'index',
      previous: null,
      next: 'index_p2',
      separator: 'of',
    });
    expect(pages[1].navigation).toMatchObject({ previous: 'index', next: 'index_p3' });
    expect(pages[2].navigation).toMatchObject({ pageIndex: 3, previous: 'index_p2', next: null });
  });

  it('keeps an empty page between consecutive breaks', () => {
    const pages = splitPages(['a', BREAK, BREAK, 'b'], isBreak);

    expect(pages.map((p) => p.items)).toEqual([['a'], [], ['b']]);
    expect(pages[1].pageCount).toBe(3);
  });

  it('ends with an empty page after a trailing break', () => {
    const pages = splitPages(['a', BREAK], isBreak);

    expect(pages.map((p) => p.items)).toEqual([['a'], []]);
  });

  it('yields k + 1 pages for k breaks and joins back to the input', () => {
    const input = ['a', 'b', BREAK, 'c', BREAK, BREAK, 'd', 'e', BREAK];
    const pages = splitPages(input, isBreak);

    expect(pages).toHaveLength(5);
    expect(joinSegments(pages)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('uses the configured base name and separator', () => {
    const pages = splitPages(['a', BREAK, 'b'], isBreak, { baseUnitName: 'report', separator: '/' });

    expect(pages[1].unitId).toBe('report_p2');
    expect(pages[1].navigation).toMatchObject({ baseUnitName: 'report', previous: 'report', separator: '/' });
  });

  it('handles an empty sequence', () => {
    const pages = splitPages([], isBreak);
    expect(pages).toHaveLength(1);
    expect(pages[0].items).toEqual([]);
  });
});

describe('unitIdFor', () => {
  it('names page 1 after the base and later pages with a suffix', () => {
    expect(unitIdFor('index', 1)).toBe('index');
    expect(unitIdFor('index', 12)).toBe('index_p12');
  });
});
