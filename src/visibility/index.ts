// Barrel exports for the visibility condition compiler

export type { Token, TokenType } from './tokenizer.js';
export { tokenize } from './tokenizer.js';
export type { Expr, LiteralValue } from './parser.js';
export { parseExpression } from './parser.js';
export type {
  ComparisonOperator,
  LogicalOperator,
  LeafCondition,
  CompositeCondition,
  Condition,
  CompiledVisibility,
} from './compiler.js';
export {
  compileCondition,
  compileVisibility,
  conditionVariables,
  serializeCondition,
  isCompositeCondition,
} from './compiler.js';
export { UnsupportedOperatorError, ExpressionSyntaxError } from './errors.js';
export type { ConditionSource } from './errors.js';
