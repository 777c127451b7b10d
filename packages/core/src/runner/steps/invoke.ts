/**
 * Invoke Scenario Step Executor
 */

import { dirname, resolve } from 'node:path';

import type { InvokeScenarioStep } from '../../scenario/types.js';

import type { ExecuteStepOptions, StepOutcome } from './types.js';

/**
 * Options for executing an invoke_scenario step.
 */
export type ExecuteInvokeStepOptions = ExecuteStepOptions<InvokeScenarioStep>;

/**
 * Run another scenario inside the current one.
 *
 * The invoked scenario reads the caller's parameters but its own writes stay
 * in its layer. Cycles surface as a CycleError from the invocation stack.
 */
export async function executeInvokeStep(options: ExecuteInvokeStepOptions): Promise<StepOutcome> {
  const { step, scenario, context, stack, signal, services } = options;

  const path = resolve(dirname(scenario.source.file), step.scenarioPath);
  const invoked = services.loadScenario(path);
  services.logger.debug(`  [${step.stepId}] invoking ${invoked.testId} (${path})`);

  const result = await services.runScenario(invoked, context, stack, signal);
  const failure = result.steps.find((stepResult) => stepResult.status === 'failed' || stepResult.status === 'error');

  return {
    status: result.status === 'passed' ? 'passed' : 'failed',
    iterations: 1,
    message: failure
      ? `Invoked scenario ${invoked.testId} ${result.status} at step ${failure.stepId}`
      : `Invoked scenario ${invoked.testId} ${result.status}`,
    errorKind: result.status === 'passed' ? undefined : (failure?.errorKind ?? result.errorKind ?? 'validation'),
    parameters: {},
    invoked: result,
  };
}
