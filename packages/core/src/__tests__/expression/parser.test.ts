/**
 * Expression Parser Tests
 */

import { describe, it, expect } from 'vitest';

import { ExpressionError } from '../../errors.js';
import { parseExpression } from '../../expression/parser.js';

describe('parseExpression', () => {
  it('should parse a comparison', () => {
    expect(parseExpression('temp > 80')).toEqual({
      type: 'compare',
      operator: '>',
      left: { type: 'reference', name: 'temp' },
      right: { type: 'literal', value: 80 },
    });
  });

  it('should bind and tighter than or', () => {
    const node = parseExpression('a or b and c');

    expect(node).toEqual({
      type: 'logical',
      operator: 'or',
      left: { type: 'reference', name: 'a' },
      right: {
        type: 'logical',
        operator: 'and',
        left: { type: 'reference', name: 'b' },
        right: { type: 'reference', name: 'c' },
      },
    });
  });

  it('should honor parentheses', () => {
    const node = parseExpression('(a or b) and c');

    expect(node.type).toBe('logical');
    if (node.type === 'logical') {
      expect(node.operator).toBe('and');
      expect(node.left).toEqual({
        type: 'logical',
        operator: 'or',
        left: { type: 'reference', name: 'a' },
        right: { type: 'reference', name: 'b' },
      });
    }
  });

  it('should parse not and negative numbers', () => {
    expect(parseExpression('not offset < -5')).toEqual({
      type: 'not',
      operand: {
        type: 'compare',
        operator: '<',
        left: { type: 'reference', name: 'offset' },
        right: { type: 'literal', value: -5 },
      },
    });
  });

  it('should reject an empty expression', () => {
    expect(() => parseExpression('   ')).toThrow(ExpressionError);
    expect(() => parseExpression('')).toThrow('Empty expression');
  });

  it('should reject a dangling operator', () => {
    expect(() => parseExpression('temp >')).toThrow('Unexpected end of expression at position 6');
  });

  it('should reject an unclosed parenthesis', () => {
    expect(() => parseExpression('(a and b')).toThrow("Expected ')'");
  });

  it('should reject chained comparisons', () => {
    expect(() => parseExpression('1 < x < 3')).toThrow('Chained comparisons are not supported');
  });

  it('should reject trailing tokens', () => {
    expect(() => parseExpression('a b')).toThrow("Unexpected token 'b' at position 2");
  });
});
