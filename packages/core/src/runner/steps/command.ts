/**
 * Command Step Executor
 *
 * Runs a command (or Redfish request), validates the final output and
 * extracts parameters into the context.
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import { analyzeDiagnostics } from '../../analysis/diagnostic-analysis.js';
import { analyzeOutput } from '../../analysis/output-analysis.js';
import type { JsonValue } from '../../analysis/types.js';
import { validateOutput } from '../../analysis/validate.js';
import type { CommandOutput } from '../../connections/types.js';
import type { Value } from '../../expression/types.js';
import { evaluateCriteria } from '../../expression/evaluator.js';
import { escapeShellArg } from '../../helpers/utils.js';
import type { CommandStep, ScenarioDefinition } from '../../scenario/types.js';

import type { ExecuteStepOptions, StepOutcome } from './types.js';

/**
 * Options for executing a command step.
 */
export type ExecuteCommandStepOptions = ExecuteStepOptions<CommandStep>;

/**
 * The command actually sent: wrapped in `docker exec` when the step names a container.
 */
export function buildCommand(step: CommandStep): string {
  if (!step.containerName || step.connectionType === 'redfish') {
    return step.command;
  }
  return `docker exec ${step.containerName} sh -c ${escapeShellArg(step.command)}`;
}

async function loadExpected(step: CommandStep, scenario: ScenarioDefinition): Promise<JsonValue | undefined> {
  if (step.expectedOutputPath) {
    return readFile(resolve(dirname(scenario.source.file), step.expectedOutputPath), 'utf-8');
  }
  return step.expectedOutput;
}

function describeExpected(expected: JsonValue | undefined): string | undefined {
  if (expected === undefined || expected === null) return undefined;
  return typeof expected === 'string' ? expected : JSON.stringify(expected);
}

/**
 * Execute a command step.
 *
 * Runs up to `loop` times. Every iteration after the first re-checks the entry
 * criteria and stops the loop when they no longer hold. Output analysis runs
 * on every iteration; validation runs on the final output.
 */
export async function executeCommandStep(options: ExecuteCommandStepOptions): Promise<StepOutcome> {
  const { step, scenario, context, signal, services } = options;
  const { registry, logger, outputs } = services;

  const handle = await registry.acquire(step.connection, step.connectionType);
  const command = buildCommand(step);
  const parameters: Record<string, Value> = {};

  const runOnce = async (iteration: number): Promise<CommandOutput> => {
    logger.debug(`  [${step.stepId}] #${iteration} ${step.connection}/${step.connectionType}: ${command}`);
    const output = await registry.execute(handle, {
      command,
      useSudo: step.useSudo,
      timeoutMs: step.duration !== undefined ? step.duration * 1000 : undefined,
      signal,
    });

    const extracted = analyzeOutput(output.stdout, step.outputAnalysis);
    context.merge(extracted);
    Object.assign(parameters, extracted);

    if (outputs) {
      const path = outputs.saveCommandOutput(scenario.testId, step.stepId, step.stepName, output.stdout);
      logger.debug(`  [${step.stepId}] output saved to ${path}`);
    }
    return output;
  };

  let output = await runOnce(1);
  let iterations = 1;
  while (iterations < step.loop) {
    const gate = evaluateCriteria(step.entryCriteria, context);
    if (!gate.passed) {
      logger.debug(`  [${step.stepId}] loop stopped after ${iterations} iteration(s): ${gate.blockedBy ?? ''}`);
      break;
    }
    iterations++;
    output = await runOnce(iterations);
  }

  const expected = await loadExpected(step, scenario);
  const validation = validateOutput(output.stdout, step.validatorType, expected);

  const diagnostics =
    step.diagnosticAnalysis.length > 0 ? analyzeDiagnostics(output.stdout, step.diagnosticAnalysis) : undefined;
  if (diagnostics) {
    context.merge(diagnostics.parameters);
    Object.assign(parameters, diagnostics.parameters);
  }

  let status: StepOutcome['status'] = 'passed';
  let message = validation.reason;
  if (!validation.matched) {
    status = 'failed';
  } else if (diagnostics?.failed) {
    status = 'failed';
    message = `Diagnostic code ${diagnostics.resultCode ?? '?'} found in output`;
  }

  return {
    status,
    iterations,
    message,
    errorKind: status === 'failed' ? 'validation' : undefined,
    output: output.stdout,
    expected: describeExpected(expected),
    parameters,
    diagnosticCodes: diagnostics?.codes,
    resultCode: diagnostics?.resultCode,
  };
}
