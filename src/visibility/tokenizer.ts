/**
 * Tokenizer for the visibility condition language.
 *
 * Recognizes every operator symbol, supported or not, so the compiler can
 * name an unsupported one instead of failing on an unknown character.
 */

import { ExpressionSyntaxError } from './errors.js';

export type TokenType =
  | 'identifier'
  | 'string'
  | 'number'
  | 'boolean'
  | 'operator'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'comma'
  | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  /** 0-based offset into the source. */
  position: number;
}

/** Operator symbols, longest first so `==` wins over `=`. */
const OPERATOR_SYMBOLS = [
  '&&', '||', '==', '!=', '<=', '>=', '=~', '!~', '**',
  '<', '>', '&', '|', '!', '=', '+', '-', '*', '/', '%', '^', '~',
];

/** Words that lex as operators. */
const OPERATOR_WORDS = new Set(['in']);

const BOOLEAN_WORDS = new Set(['true', 'false']);

const SINGLE_CHAR_TOKENS: Record<string, TokenType> = {
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  ',': 'comma',
};

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
};

function readString(source: string, start: number): { value: string; end: number } {
  const quote = source[start];
  let value = '';
  let i = start + 1;

  while (i < source.length) {
    const ch = source[i];
    if (ch === '\\' && i + 1 < source.length) {
      const next = source[i + 1];
      value += ESCAPES[next] ?? next;
      i += 2;
      continue;
    }
    if (ch === quote) {
      return { value, end: i + 1 };
    }
    value += ch;
    i++;
  }

  throw new ExpressionSyntaxError('Unterminated string literal', start);
}

/**
 * Split a condition into tokens. The last token is always `eof`.
 *
 * @throws {ExpressionSyntaxError} on an unterminated string or a character
 *   that starts no token
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const single = SINGLE_CHAR_TOKENS[ch];
    if (single) {
      tokens.push({ type: single, value: ch, position: i });
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      const { value, end } = readString(source, i);
      tokens.push({ type: 'string', value, position: i });
      i = end;
      continue;
    }

    const number = /^\d+(?:\.\d+)?/.exec(source.slice(i));
    if (number) {
      tokens.push({ type: 'number', value: number[0], position: i });
      i += number[0].length;
      continue;
    }

    const word = /^[A-Za-z_][A-Za-z0-9_.]*/.exec(source.slice(i));
    if (word) {
      const text = word[0];
      const type: TokenType = OPERATOR_WORDS.has(text)
        ? 'operator'
        : BOOLEAN_WORDS.has(text) ? 'boolean' : 'identifier';
      tokens.push({ type, value: text, position: i });
      i += text.length;
      continue;
    }

    const symbol = OPERATOR_SYMBOLS.find((op) => source.startsWith(op, i));
    if (symbol) {
      tokens.push({ type: 'operator', value: symbol, position: i });
      i += symbol.length;
      continue;
    }

    throw new ExpressionSyntaxError(`Unexpected character "${ch}"`, i);
  }

  tokens.push({ type: 'eof', value: '', position: source.length });
  return tokens;
}
