/**
 * CLI Module
 *
 * Command-line interface for rigcheck. Modes are selected by root flags:
 * schema check, listings, connection discovery, or (default) a run,
 * optionally preceded by a schema check or a discovery pass.
 */

import { Command } from 'commander';

import { CancelledError, errorMessage } from '../errors.js';

import {
  discoverCommand,
  listScenariosCommand,
  listTargetsCommand,
  runCommand,
  runSchemaCheck,
  schemaCheckCommand,
} from './commands/index.js';
import { addRootOptions, normalizeArgv, type CliOptions } from './options.js';
import * as output from './utils/output.js';

// Re-export for convenience
export * from './commands/index.js';
export { normalizeArgv, type CliOptions } from './options.js';
export * as output from './utils/output.js';

/**
 * Run the mode the options select.
 *
 * @returns Exit code
 */
export async function dispatch(options: CliOptions, signal?: AbortSignal): Promise<number> {
  if (options.schema_check) {
    return schemaCheckCommand(options.schema_check);
  }
  if (options.list) {
    return listTargetsCommand(options);
  }
  if (options.list_scenarios || options.list_scenarios_with_connections) {
    return listScenariosCommand(options, options.list_scenarios_with_connections ?? false);
  }
  if (options.run_with_schema_check) {
    const code = runSchemaCheck(options.run_with_schema_check, options.test_dir);
    if (code !== 0) return code;
  }
  if (options.discover_connections || options.run_with_discover_connections) {
    const code = await discoverCommand(options);
    if (!options.run_with_discover_connections) return code;
  }
  return runCommand(options, signal);
}

/**
 * Create the CLI program.
 *
 * @param onExit - Receives the exit code once the selected mode finishes
 */
export function createCli(onExit: (code: number) => void, signal?: AbortSignal): Command {
  const program = new Command();

  addRootOptions(program)
    .name('rigcheck')
    .description('Run hardware and firmware compliance test scenarios')
    .version('0.1.0')
    .action(async (options: CliOptions) => {
      try {
        onExit(await dispatch(options, signal));
      } catch (error) {
        output.error(errorMessage(error));
        onExit(1);
      }
    });

  return program;
}

/**
 * Run the CLI. SIGINT cancels a running scenario run; its steps end as
 * cancelled errors and the connections are released before exit.
 */
export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    output.warning('Cancelling...');
    controller.abort(new CancelledError('Run cancelled by SIGINT'));
  });

  let exitCode = 0;
  const program = createCli((code) => {
    exitCode = code;
  }, controller.signal);

  await program.parseAsync(normalizeArgv(argv));
  process.exitCode = exitCode;
}
