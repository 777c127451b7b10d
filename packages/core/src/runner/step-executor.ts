/**
 * Step Executor
 *
 * Gates a step on its entry criteria, dispatches it by type and turns
 * whatever happened into a StepResult. Never throws.
 */

import { CancelledError, CommandError, errorKindOf, errorMessage, RigcheckError, type ErrorKind } from '../errors.js';
import { evaluateCriteria } from '../expression/evaluator.js';
import { createAbortScope, raceAbort } from '../helpers/utils.js';
import type { ScenarioDefinition, StepDefinition } from '../scenario/types.js';

import type { ExecutionContext } from './context.js';
import type { InvocationStack } from './invocation-stack.js';
import { executeCommandStep, executeInvokeStep, executeLogAnalysisStep } from './steps/index.js';
import type { StepOutcome, StepServices } from './steps/types.js';
import type { StepResult, StepStatus } from './types.js';

/**
 * Options for executing one step.
 */
export interface StepExecutionOptions {
  step: StepDefinition;
  scenario: ScenarioDefinition;
  context: ExecutionContext;
  stack: InvocationStack;
  /** Run or scenario cancellation */
  signal?: AbortSignal;
}

/**
 * Error kinds that fail a step rather than error it.
 */
const FAILURE_KINDS: ReadonlySet<ErrorKind> = new Set(['command', 'validation', 'cycle']);

/**
 * Status a step ends with when it throws an error of this kind.
 */
export function statusForErrorKind(kind: ErrorKind): StepStatus {
  return FAILURE_KINDS.has(kind) ? 'failed' : 'error';
}

export class StepExecutor {
  constructor(private readonly services: StepServices) {}

  async execute(options: StepExecutionOptions): Promise<StepResult> {
    const { step, scenario, context, signal } = options;
    const startTime = Date.now();

    const base: StepResult = {
      scenarioId: scenario.testId,
      stepId: step.stepId,
      stepName: step.stepName,
      stepType: step.stepType,
      status: 'passed',
      durationMs: 0,
      iterations: 0,
      connection:
        step.stepType === 'invoke_scenario' ? undefined : { target: step.connection, protocol: step.connectionType },
      tolerated: false,
      parameters: {},
    };

    const gate = evaluateCriteria(step.entryCriteria, context);
    if (!gate.passed) {
      this.services.logger.debug(
        gate.error
          ? `  [${step.stepId}] skipped: malformed entry criterion: ${gate.error.message}`
          : `  [${step.stepId}] skipped: entry criterion not met: ${gate.blockedBy ?? ''}`
      );
      return {
        ...base,
        status: 'skipped',
        durationMs: Date.now() - startTime,
        skipReason: 'entry-criteria',
        blockedBy: gate.blockedBy,
        message: gate.error ? gate.error.message : `Entry criterion not met: ${gate.blockedBy ?? ''}`,
        error: gate.error?.message,
        errorKind: gate.error ? 'expression' : undefined,
      };
    }

    const scope = createAbortScope(
      signal,
      step.duration !== undefined ? step.duration * 1000 : undefined,
      `Step ${step.stepId}`
    );

    try {
      const outcome = await raceAbort(this.dispatch(options, scope.signal), scope.signal);
      return this.fromOutcome(base, outcome, step, Date.now() - startTime);
    } catch (error) {
      const cause = signal?.aborted && !(error instanceof RigcheckError) ? new CancelledError() : error;
      const kind = errorKindOf(cause);
      const status = statusForErrorKind(kind);
      this.services.logger.debug(`  [${step.stepId}] ${status} (${kind}): ${errorMessage(cause)}`);

      return {
        ...base,
        status,
        durationMs: Date.now() - startTime,
        message: errorMessage(cause),
        error: errorMessage(cause),
        errorKind: kind,
        output: cause instanceof CommandError ? cause.output : undefined,
        tolerated: step.continueOnFailure,
      };
    } finally {
      scope.dispose();
    }
  }

  private dispatch(options: StepExecutionOptions, signal: AbortSignal): Promise<StepOutcome> {
    const { step, scenario, context, stack } = options;
    const common = { scenario, context, stack, signal, services: this.services };

    switch (step.stepType) {
      case 'command_execution':
        return executeCommandStep({ ...common, step });
      case 'log_analysis':
        return executeLogAnalysisStep({ ...common, step });
      case 'invoke_scenario':
        return executeInvokeStep({ ...common, step });
    }
  }

  private fromOutcome(base: StepResult, outcome: StepOutcome, step: StepDefinition, durationMs: number): StepResult {
    const failed = outcome.status === 'failed';
    return {
      ...base,
      status: outcome.status,
      durationMs,
      iterations: outcome.iterations,
      output: outcome.output,
      expected: outcome.expected,
      message: outcome.message,
      error: failed ? outcome.message : undefined,
      errorKind: outcome.errorKind,
      tolerated: failed && step.continueOnFailure,
      parameters: outcome.parameters,
      diagnosticCodes: outcome.diagnosticCodes,
      resultCode: outcome.resultCode,
      invoked: outcome.invoked,
    };
  }
}
