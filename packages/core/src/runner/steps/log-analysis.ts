/**
 * Log Analysis Step Executor
 */

import { readFile } from 'node:fs/promises';

import { analyzeDiagnostics } from '../../analysis/diagnostic-analysis.js';
import { CURRENT_LOG_DIR_PREFIX } from '../../constants.js';
import { ConfigError } from '../../errors.js';
import type { LogAnalysisStep } from '../../scenario/types.js';

import type { ExecuteStepOptions, StepOutcome } from './types.js';

/**
 * Options for executing a log analysis step.
 */
export type ExecuteLogAnalysisStepOptions = ExecuteStepOptions<LogAnalysisStep>;

/**
 * Whether a path points into the run's command output directory.
 */
export function isCurrentLogPath(path: string): boolean {
  return path === CURRENT_LOG_DIR_PREFIX || path.startsWith(`${CURRENT_LOG_DIR_PREFIX}/`);
}

async function readLog(options: ExecuteLogAnalysisStepOptions): Promise<string> {
  const { step, services } = options;
  const path = step.logAnalysisPath;

  if (isCurrentLogPath(path)) {
    const localPath = services.outputs?.resolveLogPath(path);
    if (!localPath) {
      throw new ConfigError(`${CURRENT_LOG_DIR_PREFIX} requires --log-path`, step.stepId);
    }
    return readFile(localPath, 'utf-8');
  }

  const handle = await services.registry.acquire(step.connection, step.connectionType);
  return services.registry.readFile(handle, path);
}

/**
 * Execute a log analysis step: read the log and run the diagnostic rules over it.
 */
export async function executeLogAnalysisStep(options: ExecuteLogAnalysisStepOptions): Promise<StepOutcome> {
  const { step, context, services } = options;

  const log = await readLog(options);
  services.logger.debug(`  [${step.stepId}] read ${log.length} chars from ${step.logAnalysisPath}`);

  const diagnostics = analyzeDiagnostics(log, step.diagnosticAnalysis);
  context.merge(diagnostics.parameters);

  const codes = Object.keys(diagnostics.codes);
  let message: string;
  if (diagnostics.failed) {
    message = `Diagnostic code ${diagnostics.resultCode ?? '?'} found in ${step.logAnalysisPath}`;
  } else if (codes.length > 0) {
    message = `Diagnostic codes found: ${codes.join(', ')}`;
  } else {
    message = 'No diagnostic codes found';
  }

  return {
    status: diagnostics.failed ? 'failed' : 'passed',
    iterations: 1,
    message,
    errorKind: diagnostics.failed ? 'validation' : undefined,
    parameters: diagnostics.parameters,
    diagnosticCodes: diagnostics.codes,
    resultCode: diagnostics.resultCode,
  };
}
