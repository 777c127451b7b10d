/**
 * Value Coercion
 *
 * Rules used when comparing parameters and when storing extracted text.
 */

import { UNDEFINED, type Operand, type Value } from './types.js';

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerce extracted text into a Value: numeric text becomes a number,
 * `true`/`false` (any case) becomes a boolean, anything else stays a string.
 */
export function coerceValue(raw: string): Value {
  const text = raw.trim();
  if (NUMERIC.test(text)) return Number(text);
  const lower = text.toLowerCase();
  if (lower === 'true') return true;
  if (lower === 'false') return false;
  return raw;
}

/**
 * Numeric view of an operand, if it has one.
 */
export function toNumber(value: Operand): number | undefined {
  if (typeof value === 'number') return Number.isNaN(value) ? undefined : value;
  if (typeof value === 'string' && NUMERIC.test(value.trim())) return Number(value.trim());
  return undefined;
}

/**
 * Truthiness of an operand. Undefined, false, 0 and the empty string are false.
 */
export function isTruthy(value: Operand): boolean {
  if (value === UNDEFINED) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  return value.length > 0;
}

/**
 * Equality with numeric coercion. Undefined equals only undefined.
 */
export function looseEquals(a: Operand, b: Operand): boolean {
  if (a === UNDEFINED || b === UNDEFINED) return a === b;

  const na = toNumber(a);
  const nb = toNumber(b);
  if (na !== undefined && nb !== undefined) return na === nb;

  if (typeof a === 'boolean' || typeof b === 'boolean') {
    return String(a).toLowerCase() === String(b).toLowerCase();
  }

  return a === b;
}

/**
 * Ordering comparison. Numbers (and numeric strings) compare numerically,
 * other strings lexically; any other pairing, or undefined, is false.
 */
export function compareOrder(a: Operand, b: Operand, operator: '<' | '<=' | '>' | '>='): boolean {
  if (a === UNDEFINED || b === UNDEFINED) return false;

  let left: number | string;
  let right: number | string;
  const na = toNumber(a);
  const nb = toNumber(b);
  if (na !== undefined && nb !== undefined) {
    left = na;
    right = nb;
  } else if (typeof a === 'string' && typeof b === 'string') {
    left = a;
    right = b;
  } else {
    return false;
  }

  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}
