/**
 * Runner Types
 *
 * Types for scenario execution and reporting.
 */

import type { ConnectionProtocol } from '../connections/types.js';
import type { ErrorKind } from '../errors.js';
import type { Value } from '../expression/types.js';
import type { StepType } from '../scenario/types.js';

// =============================================================================
// Step Results
// =============================================================================

/**
 * Result status for a step.
 */
export type StepStatus = 'passed' | 'failed' | 'skipped' | 'error';

/**
 * Why a step was skipped.
 * - `entry-criteria`: a gate expression was false or could not be evaluated
 * - `aborted`: an earlier step failed without `continue`
 * - `cancelled`: the run was cancelled before the step started
 */
export type SkipReason = 'entry-criteria' | 'aborted' | 'cancelled';

/**
 * Outcome of one step.
 */
export interface StepResult {
  scenarioId: string;
  stepId: string;
  stepName: string;
  stepType: StepType;
  status: StepStatus;
  /** Duration in milliseconds */
  durationMs: number;
  /** Number of executions (loop iterations) that ran */
  iterations: number;
  /** Connection used, when one was touched */
  connection?: { target: string; protocol: ConnectionProtocol };
  /** Final captured output */
  output?: string;
  /** Expected output, when the step was validated */
  expected?: string;
  /** Human-readable outcome */
  message?: string;
  /** Error message if failed or errored */
  error?: string;
  errorKind?: ErrorKind;
  skipReason?: SkipReason;
  /** Entry criterion that blocked the step */
  blockedBy?: string;
  /** Failed, but `continue` let the scenario go on */
  tolerated: boolean;
  /** Parameters this step set */
  parameters: Record<string, Value>;
  /** Diagnostic codes found, with what was captured for each */
  diagnosticCodes?: Record<string, string[]>;
  /** Last diagnostic result code */
  resultCode?: string;
  /** Result of the invoked scenario */
  invoked?: ScenarioResult;
}

// =============================================================================
// Scenario Results
// =============================================================================

/**
 * Aggregated status for a scenario. `error` means it could not start.
 */
export type ScenarioStatus = 'passed' | 'failed' | 'error';

/**
 * Outcome of one scenario invocation.
 */
export interface ScenarioResult {
  scenarioId: string;
  scenarioName: string;
  testGroup?: string;
  /** File the scenario was loaded from */
  file: string;
  status: ScenarioStatus;
  durationMs: number;
  /** Step results in declaration order */
  steps: StepResult[];
  /** Results of scenarios invoked by this one */
  nested: ScenarioResult[];
  /** Parameters set during this invocation (own layer only) */
  parameters: Record<string, Value>;
  /** Set when the scenario could not start */
  error?: string;
  errorKind?: ErrorKind;
}

// =============================================================================
// Summary
// =============================================================================

/**
 * Enough context to report a failure without re-running.
 */
export interface FailureDetail {
  scenarioId: string;
  /** Invoking scenario, for failures inside invoked scenarios */
  parentScenarioId?: string;
  stepId?: string;
  stepName?: string;
  status: StepStatus | ScenarioStatus;
  errorKind?: ErrorKind;
  message: string;
  expected?: string;
  actual?: string;
  connection?: string;
  tolerated: boolean;
}

/**
 * Step counts across recorded scenarios, plus failure details.
 */
export interface RunSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  errors: number;
  scenarios: { total: number; passed: number; failed: number; errors: number };
  failureDetails: FailureDetail[];
}
