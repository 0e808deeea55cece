import { ValidationError } from '../validation/errors.js';

/**
 * Where in a collection a condition came from.
 *
 * `insertionIndex` is the top-level item's; `context` names the item in
 * messages, e.g. `Item 3 (layout) > Item 1` for a nested child.
 */
export interface ConditionSource {
  insertionIndex: number;
  context?: string;
  field?: string;
}

function prefix(source: ConditionSource | undefined): string {
  if (source === undefined) return '';
  return `${source.context ?? `Item ${source.insertionIndex}`}: `;
}

/**
 * A visibility condition uses an operator outside the supported set.
 */
export class UnsupportedOperatorError extends Error {
  override name = 'UnsupportedOperatorError' as const;

  constructor(
    public readonly operator: string,
    public readonly position?: number,
    public readonly source?: ConditionSource,
  ) {
    super(
      prefix(source) +
      `Unsupported operator in visibility condition: ${operator}` +
      (position !== undefined ? ` (at position ${position + 1})` : ''),
    );
  }

  get insertionIndex(): number | undefined {
    return this.source?.insertionIndex;
  }

  /** Same error, attributed to an item. */
  forItem(insertionIndex: number, context?: string): UnsupportedOperatorError {
    return new UnsupportedOperatorError(this.operator, this.position, { insertionIndex, context });
  }
}

/**
 * A visibility condition could not be parsed, or has a comparison whose
 * sides are not a variable and a value.
 */
export class ExpressionSyntaxError extends ValidationError {
  override name = 'ExpressionSyntaxError';

  constructor(
    public readonly detail: string,
    public readonly position: number,
    source?: ConditionSource,
  ) {
    super(
      (source !== undefined ? `${prefix(source)}visibility: ` : '') +
      `${detail} (at position ${position + 1})`,
      source?.insertionIndex,
      source !== undefined ? source.field ?? 'visibility' : undefined,
    );
  }

  /** Same error, attributed to an item. */
  forItem(insertionIndex: number, context?: string, field?: string): ExpressionSyntaxError {
    return new ExpressionSyntaxError(this.detail, this.position, { insertionIndex, context, field });
  }
}
