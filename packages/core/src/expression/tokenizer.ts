/**
 * Expression Tokenizer
 */

import { ExpressionError } from '../errors.js';

import type { Token } from './types.js';

const KEYWORDS = new Map<string, Token['type']>([
  ['and', 'and'],
  ['or', 'or'],
  ['not', 'not'],
]);

const BOOLEANS = new Set(['true', 'false', 'True', 'False']);

const TWO_CHAR_OPERATORS = new Set(['==', '!=', '<=', '>=']);

const IDENTIFIER_START = /[A-Za-z_]/;
const IDENTIFIER_PART = /[A-Za-z0-9_.]/;
const DIGIT = /[0-9]/;

/**
 * Split an expression into tokens. Always ends with an `eof` token.
 */
export function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < expression.length) {
    const ch = expression[pos];

    if (/\s/.test(ch)) {
      pos++;
      continue;
    }

    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen', text: ch, position: pos });
      pos++;
      continue;
    }

    const pair = expression.slice(pos, pos + 2);
    if (TWO_CHAR_OPERATORS.has(pair)) {
      tokens.push({ type: 'operator', text: pair, position: pos });
      pos += 2;
      continue;
    }

    if (ch === '<' || ch === '>') {
      tokens.push({ type: 'operator', text: ch, position: pos });
      pos++;
      continue;
    }

    if (ch === '-') {
      tokens.push({ type: 'minus', text: ch, position: pos });
      pos++;
      continue;
    }

    if (DIGIT.test(ch)) {
      const start = pos;
      while (pos < expression.length && DIGIT.test(expression[pos])) pos++;
      if (expression[pos] === '.' && DIGIT.test(expression[pos + 1] ?? '')) {
        pos++;
        while (pos < expression.length && DIGIT.test(expression[pos])) pos++;
      }
      tokens.push({ type: 'number', text: expression.slice(start, pos), position: start });
      continue;
    }

    if (ch === '"' || ch === "'") {
      const start = pos;
      let text = '';
      pos++;
      while (pos < expression.length && expression[pos] !== ch) {
        if (expression[pos] === '\\' && pos + 1 < expression.length) {
          pos++;
        }
        text += expression[pos];
        pos++;
      }
      if (pos >= expression.length) {
        throw new ExpressionError('Unterminated string literal', expression, start);
      }
      pos++;
      tokens.push({ type: 'string', text, position: start });
      continue;
    }

    if (IDENTIFIER_START.test(ch)) {
      const start = pos;
      while (pos < expression.length && IDENTIFIER_PART.test(expression[pos])) pos++;
      const word = expression.slice(start, pos);
      if (BOOLEANS.has(word)) {
        tokens.push({ type: 'boolean', text: word.toLowerCase(), position: start });
      } else {
        tokens.push({ type: KEYWORDS.get(word) ?? 'identifier', text: word, position: start });
      }
      continue;
    }

    throw new ExpressionError(`Unexpected character '${ch}'`, expression, pos);
  }

  tokens.push({ type: 'eof', text: '', position: expression.length });
  return tokens;
}
