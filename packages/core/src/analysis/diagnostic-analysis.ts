/**
 * Diagnostic Analysis
 *
 * Finds diagnostic result codes in log text. Rules run in declaration order
 * and every matching rule applies, unless a matching rule is terminal.
 */

import type { DiagnosticMatch, DiagnosticOutcome, DiagnosticRule } from './types.js';

interface RuleHit {
  code?: string;
  captures: string[];
}

function literalHits(logText: string, rule: DiagnosticRule, searchString: string): RuleHit[] {
  const lines = logText.split('\n').filter((line) => line.includes(searchString));
  if (lines.length === 0) return [];
  return [{ code: rule.diagnosticResultCode, captures: lines.map((line) => line.trim()) }];
}

function codeFromMatch(match: RegExpMatchArray, rule: DiagnosticRule): string | undefined {
  const groups = match.groups ?? {};
  const named = rule.diagnosticResultCode;

  if (named !== undefined) {
    return Object.hasOwn(groups, named) ? groups[named] : named;
  }

  const firstNamed = Object.values(groups).find((value) => value !== undefined);
  if (firstNamed !== undefined) return firstNamed;
  return match.length > 1 ? match[1] : undefined;
}

function regexHits(logText: string, rule: DiagnosticRule, pattern: string): RuleHit[] {
  const hits: RuleHit[] = [];

  for (const match of logText.matchAll(new RegExp(pattern, 'gms'))) {
    const groups = match.slice(1).filter((group): group is string => group !== undefined && group !== '');
    hits.push({
      code: codeFromMatch(match, rule),
      captures: groups.length > 0 ? groups : [match[0]],
    });
  }

  return hits;
}

/**
 * Run diagnostic rules over log text.
 *
 * The result code is the code of the last matching rule that produced one.
 * The outcome is failed when any matching rule produced an error-severity code.
 */
export function analyzeDiagnostics(logText: string, rules: readonly DiagnosticRule[]): DiagnosticOutcome {
  const outcome: DiagnosticOutcome = { codes: {}, parameters: {}, matches: [], failed: false };

  for (const [index, rule] of rules.entries()) {
    let hits: RuleHit[] = [];
    if (rule.searchString !== undefined) {
      hits = literalHits(logText, rule, rule.searchString);
    } else if (rule.diagnosticSearchString !== undefined) {
      hits = regexHits(logText, rule, rule.diagnosticSearchString);
    }

    if (rule.parameterToSet) {
      outcome.parameters[rule.parameterToSet] = hits.length > 0;
    }
    if (hits.length === 0) continue;

    const severity = rule.severity ?? 'error';
    for (const hit of hits) {
      const match: DiagnosticMatch = { rule: index, code: hit.code, severity, captures: hit.captures };
      outcome.matches.push(match);

      if (hit.code === undefined) continue;
      const seen = (outcome.codes[hit.code] ??= []);
      for (const capture of hit.captures) {
        if (!seen.includes(capture)) seen.push(capture);
      }
      outcome.resultCode = hit.code;
      if (severity === 'error') outcome.failed = true;
    }

    if (rule.terminal) {
      outcome.terminatedAt = index;
      break;
    }
  }

  return outcome;
}
