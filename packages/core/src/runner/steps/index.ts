/**
 * Step Executors
 */

export { executeCommandStep, buildCommand, type ExecuteCommandStepOptions } from './command.js';
export { executeLogAnalysisStep, isCurrentLogPath, type ExecuteLogAnalysisStepOptions } from './log-analysis.js';
export { executeInvokeStep, type ExecuteInvokeStepOptions } from './invoke.js';
export type { ExecuteStepOptions, StepOutcome, StepServices } from './types.js';
