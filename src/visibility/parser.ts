/**
 * Recursive-descent parser for visibility conditions.
 *
 * Parses a general expression grammar (logical, comparison, arithmetic
 * and unary operators) into an explicit AST. Deciding which operators a
 * condition may use is left to the compiler.
 *
 * Precedence, loosest first:
 *   `|` `||`  <  `&` `&&`  <  comparisons and `in`  <  `+` `-`  <  `*` `/` `%`  <  `^` `**`
 */

import { ExpressionSyntaxError } from './errors.js';
import { tokenize, type Token } from './tokenizer.js';

export type LiteralValue = string | number | boolean;

export type Expr =
  | { type: 'binary'; operator: string; left: Expr; right: Expr; position: number }
  | { type: 'unary'; operator: string; operand: Expr; position: number }
  | { type: 'variable'; name: string; position: number }
  | { type: 'literal'; value: LiteralValue; position: number }
  | { type: 'list'; items: Expr[]; position: number };

const BINARY_PRECEDENCE: Record<string, number> = {
  '||': 1,
  '|': 1,
  '&&': 2,
  '&': 2,
  '==': 3,
  '!=': 3,
  '<': 3,
  '<=': 3,
  '>': 3,
  '>=': 3,
  'in': 3,
  '=': 3,
  '=~': 3,
  '!~': 3,
  '~': 3,
  '+': 4,
  '-': 4,
  '*': 5,
  '/': 5,
  '%': 5,
  '^': 6,
  '**': 6,
};

const PREFIX_OPERATORS = new Set(['!', '-', '+', '~']);

class Parser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): Expr {
    if (this.peek().type === 'eof') {
      throw new ExpressionSyntaxError('Empty condition', 0);
    }
    const expr = this.parseBinary(1);
    const trailing = this.peek();
    if (trailing.type !== 'eof') {
      throw new ExpressionSyntaxError(`Unexpected "${trailing.value}"`, trailing.position);
    }
    return expr;
  }

  private peek(): Token {
    return this.tokens[this.index];
  }

  private next(): Token {
    const token = this.tokens[this.index];
    if (token.type !== 'eof') this.index++;
    return token;
  }

  private expect(type: Token['type'], description: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      const found = token.type === 'eof' ? 'end of condition' : `"${token.value}"`;
      throw new ExpressionSyntaxError(`Expected ${description}, found ${found}`, token.position);
    }
    return this.next();
  }

  /** Precedence climbing over left-associative binary operators. */
  private parseBinary(minPrecedence: number): Expr {
    let left = this.parseUnary();

    for (;;) {
      const token = this.peek();
      const precedence = token.type === 'operator' ? BINARY_PRECEDENCE[token.value] : undefined;
      if (precedence === undefined || precedence < minPrecedence) {
        return left;
      }
      this.next();
      const right = this.parseBinary(precedence + 1);
      left = { type: 'binary', operator: token.value, left, right, position: token.position };
    }
  }

  private parseUnary(): Expr {
    const token = this.peek();
    if (token.type === 'operator' && PREFIX_OPERATORS.has(token.value)) {
      this.next();
      const operand = this.parseUnary();
      return { type: 'unary', operator: token.value, operand, position: token.position };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): Expr {
    const token = this.next();

    switch (token.type) {
      case 'identifier':
        return { type: 'variable', name: token.value, position: token.position };
      case 'string':
        return { type: 'literal', value: token.value, position: token.position };
      case 'number':
        return { type: 'literal', value: Number(token.value), position: token.position };
      case 'boolean':
        return { type: 'literal', value: token.value === 'true', position: token.position };
      case 'lparen': {
        const inner = this.parseBinary(1);
        this.expect('rparen', '")"');
        return inner;
      }
      case 'lbracket':
        return this.parseList(token);
      case 'eof':
        throw new ExpressionSyntaxError('Unexpected end of condition', token.position);
      default:
        throw new ExpressionSyntaxError(`Unexpected "${token.value}"`, token.position);
    }
  }

  private parseList(open: Token): Expr {
    const items: Expr[] = [];
    if (this.peek().type !== 'rbracket') {
      items.push(this.parseBinary(1));
      while (this.peek().type === 'comma') {
        this.next();
        items.push(this.parseBinary(1));
      }
    }
    this.expect('rbracket', '"]"');
    return { type: 'list', items, position: open.position };
  }
}

/**
 * Parse a condition into an expression tree.
 *
 * @throws {ExpressionSyntaxError} on malformed input
 */
export function parseExpression(source: string): Expr {
  return new Parser(tokenize(source)).parse();
}
