/**
 * Runner Module
 *
 * Scenario orchestration, step execution and result aggregation.
 */

export type {
  StepStatus,
  SkipReason,
  StepResult,
  ScenarioStatus,
  ScenarioResult,
  FailureDetail,
  RunSummary,
} from './types.js';

export { ExecutionContext, type ExecutionContextOptions } from './context.js';
export { InvocationStack } from './invocation-stack.js';
export { OutputStore } from './output-store.js';
export { StepExecutor, statusForErrorKind, type StepExecutionOptions } from './step-executor.js';
export {
  ScenarioRunner,
  type ScenarioRunnerOptions,
  type RunAllOptions,
  type RunOutcome,
} from './orchestrator.js';
export { ResultBuilder, type DiagnosticsReport, type RunReport } from './result-builder.js';

export * from './steps/index.js';
