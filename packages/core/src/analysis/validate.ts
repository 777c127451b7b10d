/**
 * Output Validation
 *
 * Compares command output with a step's expected output.
 */

import type { JsonValue, ValidationResult, ValidatorType } from './types.js';

/**
 * Structural equality. Object key order is ignored, array order is not.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a !== typeof b || a === null || b === null) return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isRecord(a) && isRecord(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
  }

  return false;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asText(expected: JsonValue): string {
  return typeof expected === 'string' ? expected : JSON.stringify(expected);
}

function validateExact(output: string, expected: string): ValidationResult {
  const actual = output.trimEnd();
  const wanted = expected.trimEnd();
  return actual === wanted
    ? { matched: true, reason: 'Exact match' }
    : { matched: false, reason: `Expected exactly ${JSON.stringify(wanted)}, got ${JSON.stringify(actual)}` };
}

function validateRegex(output: string, pattern: string): ValidationResult {
  let regex: RegExp;
  try {
    regex = new RegExp(`^(?:${pattern})$`, 's');
  } catch (error) {
    return { matched: false, reason: `Invalid regex: ${error instanceof Error ? error.message : String(error)}` };
  }
  return regex.test(output.trimEnd())
    ? { matched: true, reason: `Regex matched: ${pattern}` }
    : { matched: false, reason: `Output does not fully match /${pattern}/` };
}

function validateText(output: string, expected: string): ValidationResult {
  const wanted = expected.trim();
  const actual = output.trim();

  if (actual.includes(wanted)) {
    return { matched: true, reason: 'Substring matched' };
  }

  const actualTokens = new Set(actual.toLowerCase().split(/\s+/));
  const wantedTokens = wanted.toLowerCase().split(/\s+/).filter(Boolean);
  if (wantedTokens.length > 0 && wantedTokens.every((token) => actualTokens.has(token))) {
    return { matched: true, reason: 'Token match' };
  }

  return { matched: false, reason: `Expected text ${JSON.stringify(wanted)} not found in output` };
}

function validateJson(output: string, expected: JsonValue): ValidationResult {
  let actual: unknown;
  try {
    actual = JSON.parse(output);
  } catch {
    return { matched: false, reason: 'Output is not valid JSON' };
  }

  let wanted: unknown = expected;
  if (typeof expected === 'string') {
    try {
      wanted = JSON.parse(expected);
    } catch {
      return { matched: false, reason: 'Expected output is not valid JSON' };
    }
  }

  return deepEqual(actual, wanted)
    ? { matched: true, reason: 'JSON structures are equal' }
    : { matched: false, reason: 'JSON structures differ' };
}

/**
 * Validate output against an expectation. No expectation always matches.
 *
 * @example
 * validateOutput('OK\n', 'exact', 'OK').matched; // true
 * validateOutput('{"b":2,"a":1}', 'json', '{"a":1,"b":2}').matched; // true
 */
export function validateOutput(
  output: string,
  validatorType: ValidatorType,
  expected: JsonValue | undefined
): ValidationResult {
  if (expected === undefined || expected === null || expected === '') {
    return { matched: true, reason: 'No expected output' };
  }

  switch (validatorType) {
    case 'exact':
      return validateExact(output, asText(expected));
    case 'regex':
    case 'text_regex':
      return validateRegex(output, asText(expected));
    case 'text':
      return validateText(output, asText(expected));
    case 'json':
      return validateJson(output, expected);
  }
}
