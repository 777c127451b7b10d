/**
 * Scenario Runner
 *
 * Walks a scenario's steps in declaration order through the step executor,
 * owns the execution context and invocation stack, and aggregates results.
 */

import { dirname, resolve } from 'node:path';

import pLimit from 'p-limit';

import type { ConnectionReference, ConnectionRegistry } from '../connections/registry.js';
import { DEFAULT_CONCURRENCY } from '../constants.js';
import { ConfigError, errorKindOf, errorMessage } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { Reporter } from '../reporters/types.js';
import { ScenarioCache } from '../scenario/cache.js';
import { scenarioConnections } from '../scenario/discovery.js';
import type { ScenarioDefinition, StepDefinition } from '../scenario/types.js';

import { ExecutionContext } from './context.js';
import { InvocationStack } from './invocation-stack.js';
import type { OutputStore } from './output-store.js';
import { ResultBuilder } from './result-builder.js';
import { StepExecutor } from './step-executor.js';
import type { StepServices } from './steps/types.js';
import type { RunSummary, ScenarioResult, SkipReason, StepResult } from './types.js';

/**
 * Options for creating a scenario runner.
 */
export interface ScenarioRunnerOptions {
  /** Connection registry, initialized for the scenarios to run */
  registry: ConnectionRegistry;
  /** Schema-gated scenario cache used for invoked scenarios */
  cache?: ScenarioCache;
  /** Log directory store; without it outputs are not saved */
  outputs?: OutputStore;
  logger?: Logger;
  reporter?: Reporter;
  /** Top-level scenarios run at once (default: 1) */
  concurrency?: number;
  /** Result accumulator (default: a new one) */
  results?: ResultBuilder;
}

/**
 * Options for a run of several scenarios.
 */
export interface RunAllOptions {
  /** Aborting cancels running steps and skips the rest */
  signal?: AbortSignal;
}

/**
 * Outcome of a run.
 */
export interface RunOutcome {
  scenarios: ScenarioResult[];
  summary: RunSummary;
  durationMs: number;
}

export class ScenarioRunner {
  private readonly registry: ConnectionRegistry;
  private readonly cache: ScenarioCache;
  private readonly outputs?: OutputStore;
  private readonly logger: Logger;
  private readonly reporter?: Reporter;
  private readonly concurrency: number;
  private readonly executor: StepExecutor;
  readonly results: ResultBuilder;

  constructor(options: ScenarioRunnerOptions) {
    this.registry = options.registry;
    this.cache = options.cache ?? new ScenarioCache();
    this.outputs = options.outputs;
    this.logger = options.logger ?? silentLogger;
    this.reporter = options.reporter;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.results = options.results ?? new ResultBuilder();

    const services: StepServices = {
      registry: this.registry,
      logger: this.logger,
      outputs: this.outputs,
      loadScenario: (path) => this.cache.load(path),
      runScenario: (scenario, parent, stack, signal) => this.run(scenario, parent, stack, signal),
    };
    this.executor = new StepExecutor(services);
  }

  /**
   * Connections used by the scenarios and everything they invoke.
   *
   * Invoked scenario files are loaded through the cache, so schema errors in
   * them surface here, before anything runs.
   *
   * @throws ParseError or SchemaError for an invalid invoked scenario
   */
  collectReferences(scenarios: readonly ScenarioDefinition[]): ConnectionReference[] {
    const references = new Map<string, ConnectionReference>();
    const visited = new Set<string>();

    const visit = (scenario: ScenarioDefinition): void => {
      if (visited.has(scenario.source.file)) return;
      visited.add(scenario.source.file);

      for (const reference of scenarioConnections(scenario)) {
        references.set(`${reference.target}/${reference.protocol}`, reference);
      }
      for (const step of scenario.steps) {
        if (step.stepType === 'invoke_scenario') {
          visit(this.cache.load(resolve(dirname(scenario.source.file), step.scenarioPath)));
        }
      }
    };

    scenarios.forEach(visit);
    return [...references.values()];
  }

  /**
   * Run one scenario.
   *
   * @param parent - Context of the invoking scenario; its parameters are readable, never written
   * @param stack - Invocation chain; a fresh one for top-level runs
   * @throws CycleError when the scenario is already on the chain
   */
  async run(
    scenario: ScenarioDefinition,
    parent?: ExecutionContext,
    stack: InvocationStack = new InvocationStack(),
    signal?: AbortSignal
  ): Promise<ScenarioResult> {
    return stack.enter(scenario.testId, async () => {
      const topLevel = stack.depth === 1;
      const startTime = Date.now();
      const context = parent ? parent.child(scenario.testId) : new ExecutionContext({ scenarioId: scenario.testId });

      this.logger.debug(`${'  '.repeat(stack.depth - 1)}Scenario ${scenario.testId}: ${scenario.testName}`);
      if (topLevel) {
        await this.reporter?.onScenarioStart?.(scenario);
      }

      const steps: StepResult[] = [];
      let abortedBy: StepResult | undefined;

      for (const step of scenario.steps) {
        let result: StepResult;
        if (signal?.aborted) {
          result = skipped(step, scenario, 'cancelled', 'Run was cancelled');
        } else if (abortedBy) {
          result = skipped(step, scenario, 'aborted', `Not run: step ${abortedBy.stepId} failed`);
        } else {
          result = await this.executor.execute({ step, scenario, context, stack, signal });
          if ((result.status === 'failed' || result.status === 'error') && !step.continueOnFailure) {
            abortedBy = result;
          }
        }

        steps.push(result);
        if (topLevel) {
          this.results.record(result);
          await this.reporter?.onStepComplete?.(step, result);
        }
      }

      const failed = steps.some(
        (step) => step.status === 'failed' || step.status === 'error' || step.skipReason === 'cancelled'
      );
      const result: ScenarioResult = {
        scenarioId: scenario.testId,
        scenarioName: scenario.testName,
        testGroup: scenario.testGroup,
        file: scenario.source.file,
        status: failed ? 'failed' : 'passed',
        durationMs: Date.now() - startTime,
        steps,
        nested: steps.flatMap((step) => (step.invoked ? [step.invoked] : [])),
        parameters: context.ownEntries(),
      };

      if (topLevel) {
        this.results.recordScenario(result);
        await this.reporter?.onScenarioComplete?.(scenario, result);
      }
      return result;
    });
  }

  /**
   * Run scenarios, up to `concurrency` at a time, and release every
   * connection afterwards.
   *
   * @throws ConfigError when two scenarios share a test_id
   */
  async runAll(scenarios: readonly ScenarioDefinition[], options: RunAllOptions = {}): Promise<RunOutcome> {
    assertUniqueIds(scenarios);

    const startTime = Date.now();
    const limit = pLimit(Math.max(1, this.concurrency));

    await this.reporter?.onRunStart?.(scenarios);

    let results: ScenarioResult[];
    try {
      results = await Promise.all(scenarios.map((scenario) => limit(() => this.runTopLevel(scenario, options.signal))));
    } finally {
      await this.registry.releaseAll();
    }

    const durationMs = Date.now() - startTime;
    const summary = this.results.summary();
    await this.reporter?.onRunComplete?.(summary, durationMs);
    await this.reporter?.finalize?.();

    return { scenarios: results, summary, durationMs };
  }

  /**
   * Run a top-level scenario; anything that stops it from running becomes an `error` result.
   */
  private async runTopLevel(scenario: ScenarioDefinition, signal?: AbortSignal): Promise<ScenarioResult> {
    try {
      return await this.run(scenario, undefined, new InvocationStack(), signal);
    } catch (error) {
      this.logger.error(`Scenario ${scenario.testId} could not run: ${errorMessage(error)}`);
      const result: ScenarioResult = {
        scenarioId: scenario.testId,
        scenarioName: scenario.testName,
        testGroup: scenario.testGroup,
        file: scenario.source.file,
        status: 'error',
        durationMs: 0,
        steps: [],
        nested: [],
        parameters: {},
        error: errorMessage(error),
        errorKind: errorKindOf(error),
      };
      this.results.recordScenario(result);
      await this.reporter?.onScenarioComplete?.(scenario, result);
      return result;
    }
  }
}

function skipped(step: StepDefinition, scenario: ScenarioDefinition, reason: SkipReason, message: string): StepResult {
  return {
    scenarioId: scenario.testId,
    stepId: step.stepId,
    stepName: step.stepName,
    stepType: step.stepType,
    status: 'skipped',
    durationMs: 0,
    iterations: 0,
    skipReason: reason,
    message,
    tolerated: false,
    parameters: {},
  };
}

function assertUniqueIds(scenarios: readonly ScenarioDefinition[]): void {
  const files = new Map<string, string>();
  for (const scenario of scenarios) {
    const existing = files.get(scenario.testId);
    if (existing !== undefined) {
      throw new ConfigError(`Duplicate test_id in ${existing} and ${scenario.source.file}`, scenario.testId);
    }
    files.set(scenario.testId, scenario.source.file);
  }
}
