/**
 * Step Executor Types
 */

import type { ConnectionRegistry } from '../../connections/registry.js';
import type { ErrorKind } from '../../errors.js';
import type { Value } from '../../expression/types.js';
import type { Logger } from '../../logger.js';
import type { ScenarioDefinition, StepDefinition } from '../../scenario/types.js';
import type { ExecutionContext } from '../context.js';
import type { InvocationStack } from '../invocation-stack.js';
import type { OutputStore } from '../output-store.js';
import type { ScenarioResult } from '../types.js';

/**
 * What step executors need from the outside.
 */
export interface StepServices {
  registry: ConnectionRegistry;
  logger: Logger;
  /** Present when the run has a log directory */
  outputs?: OutputStore;
  /** Load a scenario through the schema gate */
  loadScenario(path: string): ScenarioDefinition;
  /** Run an invoked scenario */
  runScenario(
    scenario: ScenarioDefinition,
    parent: ExecutionContext,
    stack: InvocationStack,
    signal: AbortSignal
  ): Promise<ScenarioResult>;
}

/**
 * Options for executing a step.
 */
export interface ExecuteStepOptions<S extends StepDefinition = StepDefinition> {
  /** Step to execute */
  step: S;
  /** Scenario the step belongs to */
  scenario: ScenarioDefinition;
  /** Execution context */
  context: ExecutionContext;
  /** Current invocation chain */
  stack: InvocationStack;
  /** Aborts when the step's duration passes or the run is cancelled */
  signal: AbortSignal;
  services: StepServices;
}

/**
 * What a step produced when it ran to completion.
 */
export interface StepOutcome {
  status: 'passed' | 'failed';
  iterations: number;
  message: string;
  /** Kind of a failure that was not thrown */
  errorKind?: ErrorKind;
  output?: string;
  expected?: string;
  parameters: Record<string, Value>;
  diagnosticCodes?: Record<string, string[]>;
  resultCode?: string;
  invoked?: ScenarioResult;
}
