/**
 * Expression Parser
 *
 * Recursive-descent parser for entry-criteria expressions.
 *
 * Grammar (lowest precedence first):
 *   or         := and ('or' and)*
 *   and        := not ('and' not)*
 *   not        := 'not' not | comparison
 *   comparison := primary (op primary)?
 *   primary    := number | '-' number | string | boolean | identifier | '(' or ')'
 */

import { ExpressionError } from '../errors.js';

import { tokenize } from './tokenizer.js';
import type { CompareOperator, ExpressionNode, Token } from './types.js';

class Parser {
  private pos = 0;

  constructor(
    private readonly expression: string,
    private readonly tokens: Token[]
  ) {}

  parse(): ExpressionNode {
    if (this.peek().type === 'eof') {
      throw new ExpressionError('Empty expression', this.expression, 0);
    }
    const node = this.parseOr();
    const rest = this.peek();
    if (rest.type !== 'eof') {
      throw this.unexpected(rest);
    }
    return node;
  }

  private parseOr(): ExpressionNode {
    let left = this.parseAnd();
    while (this.peek().type === 'or') {
      this.next();
      left = { type: 'logical', operator: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExpressionNode {
    let left = this.parseNot();
    while (this.peek().type === 'and') {
      this.next();
      left = { type: 'logical', operator: 'and', left, right: this.parseNot() };
    }
    return left;
  }

  private parseNot(): ExpressionNode {
    if (this.peek().type === 'not') {
      this.next();
      return { type: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const left = this.parsePrimary();
    const token = this.peek();
    if (token.type !== 'operator') {
      return left;
    }
    this.next();
    const right = this.parsePrimary();
    const following = this.peek();
    if (following.type === 'operator') {
      throw new ExpressionError('Chained comparisons are not supported', this.expression, following.position);
    }
    return { type: 'compare', operator: toCompareOperator(token.text), left, right };
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();

    switch (token.type) {
      case 'number':
        return { type: 'literal', value: Number(token.text) };
      case 'minus': {
        const operand = this.next();
        if (operand.type !== 'number') {
          throw this.unexpected(operand);
        }
        return { type: 'literal', value: -Number(operand.text) };
      }
      case 'string':
        return { type: 'literal', value: token.text };
      case 'boolean':
        return { type: 'literal', value: token.text === 'true' };
      case 'identifier':
        return { type: 'reference', name: token.text };
      case 'lparen': {
        const inner = this.parseOr();
        const close = this.next();
        if (close.type !== 'rparen') {
          throw new ExpressionError("Expected ')'", this.expression, close.position);
        }
        return inner;
      }
      default:
        throw this.unexpected(token);
    }
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== 'eof') this.pos++;
    return token;
  }

  private unexpected(token: Token): ExpressionError {
    return token.type === 'eof'
      ? new ExpressionError('Unexpected end of expression', this.expression, token.position)
      : new ExpressionError(`Unexpected token '${token.text}'`, this.expression, token.position);
  }
}

function toCompareOperator(text: string): CompareOperator {
  switch (text) {
    case '==':
    case '!=':
    case '<':
    case '<=':
    case '>':
    case '>=':
      return text;
    default:
      throw new Error(`Unknown comparison operator: ${text}`);
  }
}

/**
 * Parse an expression into an AST.
 *
 * @throws ExpressionError on malformed syntax
 */
export function parseExpression(expression: string): ExpressionNode {
  return new Parser(expression, tokenize(expression)).parse();
}
