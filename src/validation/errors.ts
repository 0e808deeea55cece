// ============================================================================
// Compile errors
// ============================================================================
// Errors raised while building or compiling a collection. Messages name the
// offending item's insertion index and field so they can be shown as-is.

/**
 * A collection, item or build option failed validation.
 *
 * Aborts compilation of the whole collection.
 */
export class ValidationError extends Error {
  override name: string = 'ValidationError';

  constructor(
    message: string,
    public readonly insertionIndex?: number,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/**
 * Two different (dataset, filter) keys were given the same generated
 * reference. The dedup cache rules this out, so seeing it is a bug.
 */
export class DuplicateReferenceError extends Error {
  override name = 'DuplicateReferenceError' as const;

  constructor(
    public readonly reference: string,
    public readonly existingKey: string,
    public readonly conflictingKey: string,
  ) {
    super(
      `Internal error: reference "${reference}" is already assigned to key ${existingKey.slice(0, 12)}, ` +
      `cannot reuse it for key ${conflictingKey.slice(0, 12)}`,
    );
  }
}

/**
 * Prefix a message with the item position, e.g. `Item 3 (viz): ...`.
 */
export function itemContext(insertionIndex: number, kind?: string): string {
  return kind ? `Item ${insertionIndex} (${kind})` : `Item ${insertionIndex}`;
}
