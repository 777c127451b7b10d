/**
 * Run Command
 *
 * Discover, select and execute scenarios.
 */

import { createConsoleReporter } from '../../reporters/index.js';
import { OutputStore } from '../../runner/output-store.js';
import { ScenarioRunner } from '../../runner/orchestrator.js';
import { ScenarioCache } from '../../scenario/cache.js';
import type { CliOptions } from '../options.js';
import * as output from '../utils/output.js';
import { createCliLogger, createCliRegistry, loadCliConfig, loadCliScenarios, resolveLogDir } from '../utils/session.js';

/**
 * Execute the selected scenarios.
 *
 * Invalid scenario documents and configuration errors stop the run before any
 * step executes.
 *
 * @returns Exit code; 0 only when every selected scenario passed
 */
export async function runCommand(options: CliOptions, signal?: AbortSignal): Promise<number> {
  const logger = createCliLogger(options);
  const cache = new ScenarioCache();

  const { scenarios, errors } = loadCliScenarios(options, cache, logger);
  if (errors.length > 0) {
    output.error(`${errors.length} invalid scenario document(s); nothing was run`);
    return 1;
  }
  if (scenarios.length === 0) {
    output.warning('No matching scenarios found');
    return 1;
  }

  const config = loadCliConfig(options);
  const registry = createCliRegistry(config, logger);
  const logDir = resolveLogDir(options);
  const outputs = logDir ? new OutputStore(logDir) : undefined;

  const runner = new ScenarioRunner({
    registry,
    cache,
    outputs,
    logger,
    reporter: createConsoleReporter({ verbose: options.verbose, colors: !process.env['NO_COLOR'] }),
    concurrency: options.concurrency,
  });

  registry.initialize(config.targets, runner.collectReferences(scenarios));

  try {
    const { summary } = await runner.runAll(scenarios, { signal });
    return signal?.aborted || summary.scenarios.passed !== summary.scenarios.total ? 1 : 0;
  } finally {
    if (outputs) {
      const written = runner.results.write(outputs);
      output.dim(`Results: ${written.results}`);
      output.dim(`Diagnostics: ${written.diagnostics}`);
    }
  }
}
