/**
 * Analysis Types
 */

import type { Value } from '../expression/types.js';

/**
 * How a step's output is compared with its expected output.
 */
export type ValidatorType = 'json' | 'text' | 'regex' | 'text_regex' | 'exact';

/**
 * JSON value as parsed from scenario documents and command output.
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Outcome of validating output. A mismatch is a value, never an exception.
 */
export interface ValidationResult {
  matched: boolean;
  reason: string;
}

/**
 * Binds a parameter from a regex match on command output.
 */
export interface OutputAnalysisRule {
  regex: string;
  parameterToSet: string;
}

export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A diagnostic rule. Either a literal `searchString` paired with a result
 * code, or a regex `diagnosticSearchString` paired with a parameter.
 */
export interface DiagnosticRule {
  /** Literal substring to look for */
  searchString?: string;
  /** Regex to look for (multiline, dot matches newline) */
  diagnosticSearchString?: string;
  /** Result code, or the name of a capture group holding it */
  diagnosticResultCode?: string;
  /** Parameter set to whether the rule matched */
  parameterToSet?: string;
  /** Stop evaluating later rules once this one matches */
  terminal?: boolean;
  /** Severity of the result code; defaults to error */
  severity?: DiagnosticSeverity;
}

/**
 * One rule that matched.
 */
export interface DiagnosticMatch {
  /** Index of the rule in declaration order */
  rule: number;
  code?: string;
  severity: DiagnosticSeverity;
  /** Matched text or captured groups */
  captures: string[];
}

/**
 * Outcome of diagnostic analysis.
 */
export interface DiagnosticOutcome {
  /** Code of the last matching rule that produced one */
  resultCode?: string;
  /** Every code found, with what was captured for it */
  codes: Record<string, string[]>;
  parameters: Record<string, Value>;
  matches: DiagnosticMatch[];
  /** A matching rule carried an error-severity code */
  failed: boolean;
  /** Index of the terminal rule that stopped evaluation */
  terminatedAt?: number;
}
