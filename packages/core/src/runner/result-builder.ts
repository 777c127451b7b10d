/**
 * Result Builder
 *
 * Accumulates step and scenario results of a run into a summary with
 * failure details.
 */

import { DIAGNOSTICS_FILE_NAME, RESULTS_FILE_NAME } from '../constants.js';

import type { OutputStore } from './output-store.js';
import type { FailureDetail, RunSummary, ScenarioResult, StepResult } from './types.js';

/**
 * Diagnostic codes found per scenario and step: scenario id -> step id -> code -> captures.
 */
export type DiagnosticsReport = Record<string, Record<string, Record<string, string[]>>>;

/**
 * Serialized form of a run.
 */
export interface RunReport {
  summary: RunSummary;
  scenarios: ScenarioResult[];
}

function stepFailure(step: StepResult, parentScenarioId?: string): FailureDetail {
  return {
    scenarioId: step.scenarioId,
    parentScenarioId,
    stepId: step.stepId,
    stepName: step.stepName,
    status: step.status,
    errorKind: step.errorKind,
    message: step.error ?? step.message ?? step.status,
    expected: step.expected,
    actual: step.output,
    connection: step.connection ? `${step.connection.target}/${step.connection.protocol}` : undefined,
    tolerated: step.tolerated,
  };
}

function isFailure(step: StepResult): boolean {
  return step.status === 'failed' || step.status === 'error';
}

/**
 * Failure details for a step list, descending into invoked scenarios.
 */
function collectFailures(steps: readonly StepResult[], parentScenarioId?: string): FailureDetail[] {
  const details: FailureDetail[] = [];
  for (const step of steps) {
    if (isFailure(step)) {
      details.push(stepFailure(step, parentScenarioId));
    }
    if (step.invoked) {
      details.push(...collectFailures(step.invoked.steps, step.scenarioId));
    }
  }
  return details;
}

function collectDiagnostics(steps: readonly StepResult[], into: DiagnosticsReport): void {
  for (const step of steps) {
    if (step.diagnosticCodes && Object.keys(step.diagnosticCodes).length > 0) {
      const byStep = (into[step.scenarioId] ??= {});
      byStep[step.stepId] = step.diagnosticCodes;
    }
    if (step.invoked) {
      collectDiagnostics(step.invoked.steps, into);
    }
  }
}

export class ResultBuilder {
  private readonly steps: StepResult[] = [];
  private readonly scenarios: ScenarioResult[] = [];

  /**
   * Record the result of a top-level step.
   */
  record(step: StepResult): void {
    this.steps.push(step);
  }

  /**
   * Record the result of a top-level scenario.
   */
  recordScenario(result: ScenarioResult): void {
    this.scenarios.push(result);
  }

  getScenarios(): ScenarioResult[] {
    return [...this.scenarios];
  }

  /**
   * Step counts, scenario counts and failure details.
   *
   * Steps of invoked scenarios are not counted: they roll up into the invoking
   * step. Their failures are still listed, with the invoking scenario as parent.
   */
  summary(): RunSummary {
    const count = (status: StepResult['status']): number =>
      this.steps.filter((step) => step.status === status).length;

    const failureDetails: FailureDetail[] = [];
    for (const scenario of this.scenarios) {
      if (scenario.status === 'error') {
        failureDetails.push({
          scenarioId: scenario.scenarioId,
          status: 'error',
          errorKind: scenario.errorKind,
          message: scenario.error ?? 'Scenario could not start',
          tolerated: false,
        });
      }
    }
    failureDetails.push(...collectFailures(this.steps));

    return {
      total: this.steps.length,
      passed: count('passed'),
      failed: count('failed'),
      skipped: count('skipped'),
      errors: count('error'),
      scenarios: {
        total: this.scenarios.length,
        passed: this.scenarios.filter((s) => s.status === 'passed').length,
        failed: this.scenarios.filter((s) => s.status === 'failed').length,
        errors: this.scenarios.filter((s) => s.status === 'error').length,
      },
      failureDetails,
    };
  }

  /**
   * Diagnostic codes found, including inside invoked scenarios.
   */
  diagnostics(): DiagnosticsReport {
    const report: DiagnosticsReport = {};
    collectDiagnostics(this.steps, report);
    return report;
  }

  toJSON(): RunReport {
    return { summary: this.summary(), scenarios: this.getScenarios() };
  }

  /**
   * Write the results and diagnostics files into the run's log directory.
   *
   * @returns Paths written
   */
  write(outputs: OutputStore): { results: string; diagnostics: string } {
    return {
      results: outputs.writeJson(RESULTS_FILE_NAME, this.toJSON()),
      diagnostics: outputs.writeJson(DIAGNOSTICS_FILE_NAME, this.diagnostics()),
    };
  }
}
