/**
 * Reporter Types
 *
 * Interfaces for run result reporters.
 */

import type { RunSummary, ScenarioResult, StepResult } from '../runner/types.js';
import type { ScenarioDefinition, StepDefinition } from '../scenario/types.js';

/**
 * Reporter interface for run output.
 *
 * All methods are optional - implement only what you need. Hooks fire for
 * top-level scenarios only; invoked scenarios show up inside their
 * invoke_scenario step result.
 */
export interface Reporter {
  /** Called once the scenarios to run are known */
  onRunStart?(scenarios: readonly ScenarioDefinition[]): void | Promise<void>;

  /** Called when a scenario starts */
  onScenarioStart?(scenario: ScenarioDefinition): void | Promise<void>;

  /** Called when a step completes (including skipped steps) */
  onStepComplete?(step: StepDefinition, result: StepResult): void | Promise<void>;

  /** Called when a scenario completes */
  onScenarioComplete?(scenario: ScenarioDefinition, result: ScenarioResult): void | Promise<void>;

  /** Called when the run completes */
  onRunComplete?(summary: RunSummary, durationMs: number): void | Promise<void>;

  /** Called to finalize the reporter (flush output, close files, etc.) */
  finalize?(): void | Promise<void>;
}

/**
 * Reporter options.
 */
export interface ReporterOptions {
  /** Verbose output */
  verbose?: boolean;
  /** Show parameters captured by each step */
  showParameters?: boolean;
}

/**
 * Console reporter options.
 */
export interface ConsoleReporterOptions extends ReporterOptions {
  /** Use colors */
  colors?: boolean;
  /** Output stream */
  stream?: NodeJS.WritableStream;
  /** Max lines of step output shown for failures (default: 20) */
  maxOutputLines?: number;
}
