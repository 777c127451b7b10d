/**
 * Output Analysis
 *
 * Extracts parameters from command output.
 */

import { coerceValue } from '../expression/values.js';
import type { Value } from '../expression/types.js';

import type { OutputAnalysisRule } from './types.js';

/**
 * Apply each rule's regex to the output. On a match the rule's parameter is
 * bound to the first capture group, or to the whole match when the pattern
 * has no groups. Rules that do not match bind nothing.
 *
 * @example
 * analyzeOutput('temp=85', [{ regex: 'temp=(\\d+)', parameterToSet: 'temp' }]);
 * // { temp: 85 }
 */
export function analyzeOutput(output: string, rules: readonly OutputAnalysisRule[]): Record<string, Value> {
  const parameters: Record<string, Value> = {};

  for (const rule of rules) {
    const match = new RegExp(rule.regex, 'm').exec(output);
    if (!match) continue;

    const captured = match.length > 1 ? match[1] : match[0];
    parameters[rule.parameterToSet] = coerceValue(captured ?? match[0]);
  }

  return parameters;
}
