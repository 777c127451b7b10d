/**
 * Expression Types
 *
 * Values, parameter sources and the AST of entry-criteria expressions.
 */

/**
 * A parameter value. Parameters extracted from output are coerced into this closed set.
 */
export type Value = string | number | boolean;

/**
 * Result of resolving a parameter that is not set.
 * Equal only to itself, and only under `==`.
 */
export const UNDEFINED: unique symbol = Symbol('undefined');

export type Undefined = typeof UNDEFINED;

/**
 * Anything an expression node can evaluate to.
 */
export type Operand = Value | Undefined;

/**
 * Where references are resolved from.
 */
export interface ParameterSource {
  get(name: string): Value | undefined;
}

export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type LogicalOperator = 'and' | 'or';

/**
 * Parsed expression.
 */
export type ExpressionNode =
  | { type: 'literal'; value: Value }
  | { type: 'reference'; name: string }
  | { type: 'not'; operand: ExpressionNode }
  | { type: 'logical'; operator: LogicalOperator; left: ExpressionNode; right: ExpressionNode }
  | { type: 'compare'; operator: CompareOperator; left: ExpressionNode; right: ExpressionNode };

export type TokenType =
  | 'number'
  | 'string'
  | 'boolean'
  | 'identifier'
  | 'and'
  | 'or'
  | 'not'
  | 'operator'
  | 'minus'
  | 'lparen'
  | 'rparen'
  | 'eof';

export interface Token {
  type: TokenType;
  text: string;
  position: number;
}

/**
 * Outcome of gating a step on its entry criteria.
 */
export interface GateResult {
  /** All expressions evaluated true */
  passed: boolean;
  /** First expression that was false or failed to evaluate */
  blockedBy?: string;
  /** Set when an expression could not be parsed */
  error?: Error;
}
