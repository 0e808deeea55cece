/**
 * Pagination splitter.
 *
 * Cuts an ordered item sequence at pagination breaks. Every break closes
 * the current page; two breaks in a row leave an empty page between
 * them. A sequence without breaks is one page with no navigation.
 */

export const DEFAULT_BASE_UNIT_NAME = 'index';
export const DEFAULT_PAGINATION_SEPARATOR = 'of';

export interface PageNavigation {
  /** 1-based. */
  pageIndex: number;
  pageCount: number;
  baseUnitName: string;
  unitId: string;
  /** Unit id of the previous page; null on the first page. */
  previous: string | null;
  /** Unit id of the next page; null on the last page. */
  next: string | null;
  /** Text between page index and count, as in "2 of 3". */
  separator: string;
}

export interface PageSegment<T> {
  pageIndex: number;
  pageCount: number;
  unitId: string;
  items: T[];
  /** Whether a break closed this page. */
  paginationAfter: boolean;
  navigation: PageNavigation | null;
}

export interface SplitOptions {
  baseUnitName?: string;
  separator?: string;
}

/**
 * Unit id of a page: the base name for page 1, `<base>_p<n>` after that.
 */
export function unitIdFor(baseUnitName: string, pageIndex: number): string {
  return pageIndex === 1 ? baseUnitName : `${baseUnitName}_p${pageIndex}`;
}

export function splitPages<T>(
  items: readonly T[],
  isBreak: (item: T) => boolean,
  options: SplitOptions = {},
): PageSegment<T>[] {
  const baseUnitName = options.baseUnitName ?? DEFAULT_BASE_UNIT_NAME;
  const separator = options.separator ?? DEFAULT_PAGINATION_SEPARATOR;

  const groups: { items: T[]; paginationAfter: boolean }[] = [];
  let current: T[] = [];
  for (const item of items) {
    if (isBreak(item)) {
      groups.push({ items: current, paginationAfter: true });
      current = [];
    } else {
      current.push(item);
    }
  }
  groups.push({ items: current, paginationAfter: false });

  const pageCount = groups.length;
  const paginated = pageCount > 1;

  return groups.map((group, i) => {
    const pageIndex = i + 1;
    const unitId = unitIdFor(baseUnitName, pageIndex);
    return {
      pageIndex,
      pageCount,
      unitId,
      items: group.items,
      paginationAfter: group.paginationAfter,
      navigation: paginated
        ? {
            pageIndex,
            pageCount,
            baseUnitName,
            unitId,
            previous: pageIndex > 1 ? unitIdFor(baseUnitName, pageIndex - 1) : null,
            next: pageIndex < pageCount ? unitIdFor(baseUnitName, pageIndex + 1) : null,
            separator,
          }
        : null,
    };
  });
}

/**
 * Concatenate page items back into one sequence, without the breaks.
 */
export function joinSegments<T>(segments: readonly PageSegment<T>[]): T[] {
  return segments.flatMap((segment) => segment.items);
}
