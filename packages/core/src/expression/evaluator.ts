/**
 * Expression Evaluator
 *
 * Evaluates entry-criteria expressions against the parameters of an execution context.
 */

import { ExpressionError } from '../errors.js';

import { parseExpression } from './parser.js';
import {
  UNDEFINED,
  type ExpressionNode,
  type GateResult,
  type Operand,
  type ParameterSource,
  type Value,
} from './types.js';
import { compareOrder, isTruthy, looseEquals } from './values.js';

/** Parsed expressions by source text */
const parseCache = new Map<string, ExpressionNode>();

/**
 * Parse an expression, reusing earlier parses of the same text.
 */
export function compileExpression(expression: string): ExpressionNode {
  const cached = parseCache.get(expression);
  if (cached) return cached;
  const node = parseExpression(expression);
  parseCache.set(expression, node);
  return node;
}

/**
 * Evaluate an expression to a boolean.
 *
 * Unknown parameters evaluate to UNDEFINED rather than failing.
 *
 * @throws ExpressionError on malformed syntax
 */
export function evaluate(expression: string, parameters: ParameterSource): boolean {
  return isTruthy(evaluateNode(compileExpression(expression), parameters));
}

/**
 * Evaluate a parsed node.
 */
export function evaluateNode(node: ExpressionNode, parameters: ParameterSource): Operand {
  switch (node.type) {
    case 'literal':
      return node.value;
    case 'reference':
      return parameters.get(node.name) ?? UNDEFINED;
    case 'not':
      return !isTruthy(evaluateNode(node.operand, parameters));
    case 'logical': {
      const left = isTruthy(evaluateNode(node.left, parameters));
      if (node.operator === 'and' && !left) return false;
      if (node.operator === 'or' && left) return true;
      return isTruthy(evaluateNode(node.right, parameters));
    }
    case 'compare': {
      const left = evaluateNode(node.left, parameters);
      const right = evaluateNode(node.right, parameters);
      switch (node.operator) {
        case '==':
          return looseEquals(left, right);
        case '!=':
          return !looseEquals(left, right);
        default:
          return compareOrder(left, right, node.operator);
      }
    }
  }
}

/**
 * Gate on a list of expressions. All must be true; evaluation stops at the
 * first false or malformed one.
 */
export function evaluateCriteria(expressions: readonly string[], parameters: ParameterSource): GateResult {
  for (const expression of expressions) {
    try {
      if (!evaluate(expression, parameters)) {
        return { passed: false, blockedBy: expression };
      }
    } catch (error) {
      if (error instanceof ExpressionError) {
        return { passed: false, blockedBy: expression, error };
      }
      throw error;
    }
  }
  return { passed: true };
}

/**
 * Wrap a plain record as a parameter source.
 */
export function parametersFrom(record: Record<string, Value>): ParameterSource {
  return {
    get: (name) => (Object.prototype.hasOwnProperty.call(record, name) ? record[name] : undefined),
  };
}
