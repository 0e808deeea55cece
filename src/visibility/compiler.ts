/**
 * Visibility condition compiler.
 *
 * Turns a parsed condition into the normalized tree the runtime evaluator
 * consumes:
 *
 *   leaf:      { var, op, val }                 op: eq | neq | in | lt | lte | gt | gte
 *   composite: { op: "and" | "or", conditions }
 *
 * Chains of the same logical operator flatten into one node; mixed
 * chains nest. Any other operator is an UnsupportedOperatorError.
 */

import { ExpressionSyntaxError, UnsupportedOperatorError } from './errors.js';
import { parseExpression, type Expr, type LiteralValue } from './parser.js';

export type ComparisonOperator = 'eq' | 'neq' | 'in' | 'lt' | 'lte' | 'gt' | 'gte';

export type LogicalOperator = 'and' | 'or';

export interface LeafCondition {
  var: string;
  op: ComparisonOperator;
  val: LiteralValue | LiteralValue[];
}

export interface CompositeCondition {
  op: LogicalOperator;
  conditions: Condition[];
}

export type Condition = LeafCondition | CompositeCondition;

export interface CompiledVisibility {
  condition: Condition;
  /** Serialized condition, as handed to the runtime evaluator. */
  json: string;
  /** Variable names the condition reads, sorted. */
  variables: string[];
}

const COMPARISON_OPERATORS: Record<string, ComparisonOperator> = {
  '==': 'eq',
  '!=': 'neq',
  'in': 'in',
  '<': 'lt',
  '<=': 'lte',
  '>': 'gt',
  '>=': 'gte',
};

const LOGICAL_OPERATORS: Record<string, LogicalOperator> = {
  '&': 'and',
  '&&': 'and',
  '|': 'or',
  '||': 'or',
};

export function isCompositeCondition(condition: Condition): condition is CompositeCondition {
  return condition.op === 'and' || condition.op === 'or';
}

/** `-<number>` is a negative literal, not a use of the minus operator. */
function isNegativeNumber(expr: Expr): boolean {
  return expr.type === 'unary'
    && expr.operator === '-'
    && expr.operand.type === 'literal'
    && typeof expr.operand.value === 'number';
}

/**
 * Throw for the first unsupported operator, walking the tree top-down.
 */
function assertSupportedOperators(expr: Expr): void {
  switch (expr.type) {
    case 'binary':
      if (!(expr.operator in COMPARISON_OPERATORS) && !(expr.operator in LOGICAL_OPERATORS)) {
        throw new UnsupportedOperatorError(expr.operator, expr.position);
      }
      assertSupportedOperators(expr.left);
      assertSupportedOperators(expr.right);
      return;
    case 'unary':
      if (!isNegativeNumber(expr)) {
        throw new UnsupportedOperatorError(expr.operator, expr.position);
      }
      return;
    case 'list':
      expr.items.forEach(assertSupportedOperators);
      return;
    case 'variable':
    case 'literal':
      return;
  }
}

function literalValue(expr: Expr, operator: string): LiteralValue {
  if (expr.type === 'literal') {
    return expr.value;
  }
  if (expr.type === 'unary' && expr.operand.type === 'literal' && typeof expr.operand.value === 'number') {
    return -expr.operand.value;
  }
  throw new ExpressionSyntaxError(`Right side of "${operator}" must be a literal value`, expr.position);
}

function compileComparison(expr: Extract<Expr, { type: 'binary' }>, op: ComparisonOperator): LeafCondition {
  if (expr.left.type !== 'variable') {
    throw new ExpressionSyntaxError(`Left side of "${expr.operator}" must be a variable name`, expr.left.position);
  }

  if (op === 'in') {
    const values = expr.right.type === 'list'
      ? expr.right.items.map((item) => literalValue(item, 'in'))
      : [literalValue(expr.right, 'in')];
    return { var: expr.left.name, op, val: values };
  }

  if (expr.right.type === 'list') {
    throw new ExpressionSyntaxError(
      `A list is only allowed after "in", not "${expr.operator}"`,
      expr.right.position,
    );
  }
  return { var: expr.left.name, op, val: literalValue(expr.right, expr.operator) };
}

function collectOperands(expr: Expr, op: LogicalOperator, out: Condition[]): void {
  if (expr.type === 'binary' && LOGICAL_OPERATORS[expr.operator] === op) {
    collectOperands(expr.left, op, out);
    collectOperands(expr.right, op, out);
    return;
  }
  out.push(toCondition(expr));
}

function toCondition(expr: Expr): Condition {
  if (expr.type !== 'binary') {
    throw new ExpressionSyntaxError('Expected a comparison such as `name == "value"`', expr.position);
  }

  const logical = LOGICAL_OPERATORS[expr.operator];
  if (logical !== undefined) {
    const conditions: Condition[] = [];
    collectOperands(expr, logical, conditions);
    return { op: logical, conditions };
  }

  return compileComparison(expr, COMPARISON_OPERATORS[expr.operator]);
}

/**
 * Compile a parsed expression to a normalized condition tree.
 *
 * @throws {UnsupportedOperatorError} naming the first operator outside the supported set
 * @throws {ExpressionSyntaxError} when a comparison is not `variable op value`
 */
export function compileCondition(expr: Expr): Condition {
  assertSupportedOperators(expr);
  return toCondition(expr);
}

/** Sorted, de-duplicated variable names a condition reads. */
export function conditionVariables(condition: Condition): string[] {
  const names = new Set<string>();
  const visit = (node: Condition): void => {
    if (isCompositeCondition(node)) {
      node.conditions.forEach(visit);
    } else {
      names.add(node.var);
    }
  };
  visit(condition);
  return [...names].sort();
}

export function serializeCondition(condition: Condition): string {
  return JSON.stringify(condition);
}

/**
 * Parse and compile a visibility condition.
 */
export function compileVisibility(source: string): CompiledVisibility {
  const condition = compileCondition(parseExpression(source));
  return {
    condition,
    json: serializeCondition(condition),
    variables: conditionVariables(condition),
  };
}
