import { ValidationError, itemContext } from '../validation/errors.js';

/** Separator for group paths given as one string, e.g. "demographics/age". */
export const GROUP_PATH_SEPARATOR = '/';

/**
 * Normalize a group path given as a slash-delimited string or a segment array.
 *
 * Segments are trimmed and empty ones dropped. A string that leaves no
 * segments, or an array with a blank segment, is a malformed group path.
 * `null` means the item is ungrouped.
 *
 * @throws {ValidationError} naming the item and the `groupPath` field
 */
export function parseGroupPath(
  raw: string | readonly string[] | null,
  insertionIndex: number,
): string[] | null {
  if (raw === null) return null;

  if (typeof raw === 'string') {
    const segments = raw
      .split(GROUP_PATH_SEPARATOR)
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0);

    if (segments.length === 0) {
      throw new ValidationError(
        `${itemContext(insertionIndex)}: groupPath "${raw}" has no segments`,
        insertionIndex,
        'groupPath',
      );
    }
    return segments;
  }

  if (raw.length === 0) {
    throw new ValidationError(
      `${itemContext(insertionIndex)}: groupPath must not be an empty array (use null for ungrouped items)`,
      insertionIndex,
      'groupPath',
    );
  }

  return raw.map((segment, position) => {
    const trimmed = segment.trim();
    if (trimmed.length === 0) {
      throw new ValidationError(
        `${itemContext(insertionIndex)}: groupPath segment ${position + 1} is blank`,
        insertionIndex,
        'groupPath',
      );
    }
    return trimmed;
  });
}

/** Stable map key for a path prefix. */
export function groupPathKey(segments: readonly string[]): string {
  return segments.join('\u0000');
}
