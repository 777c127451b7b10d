/**
 * Expression Module
 *
 * Entry-criteria expression language.
 */

export * from './types.js';
export { tokenize } from './tokenizer.js';
export { parseExpression } from './parser.js';
export { coerceValue, isTruthy, looseEquals, compareOrder, toNumber } from './values.js';
export {
  compileExpression,
  evaluate,
  evaluateNode,
  evaluateCriteria,
  parametersFrom,
} from './evaluator.js';
