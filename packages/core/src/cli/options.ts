/**
 * CLI Options
 *
 * Root flags of the rigcheck command and the argv normalization that lets
 * the multi-letter short aliases through commander.
 */

import type { Command } from 'commander';

import { DEFAULT_CONCURRENCY, DEFAULT_TEST_DIR } from '../constants.js';

/**
 * Parsed root options. Keys follow the flag names.
 */
export interface CliOptions {
  test_id?: string;
  test_name?: string;
  test_group?: string;
  tags?: string[];
  test_dir: string;
  workspace?: string;
  conn_config?: string;
  list?: boolean;
  discover_connections?: boolean;
  run_with_discover_connections?: boolean;
  list_scenarios?: boolean;
  list_scenarios_with_connections?: boolean;
  schema_check?: string[];
  /** Scenario schema every document under test_dir must satisfy before a run */
  run_with_schema_check?: string;
  logPath?: string;
  verbose?: boolean;
  concurrency: number;
}

/**
 * Short aliases commander cannot declare (it takes single-letter short flags only).
 */
const ARG_ALIASES: Readonly<Record<string, string>> = {
  '-dc': '--discover_connections',
  '-rdc': '--run_with_discover_connections',
  '-lsc': '--list_scenarios_with_connections',
  '-ls': '--list_scenarios',
  '-cc': '--conn_config',
  '-rsc': '--run_with_schema_check',
};

/**
 * Rewrite multi-letter short aliases to their long flags.
 *
 * @example
 * normalizeArgv(['node', 'rigcheck', '-dc']);
 * // ['node', 'rigcheck', '--discover_connections']
 */
export function normalizeArgv(argv: readonly string[]): string[] {
  return argv.map((arg) => ARG_ALIASES[arg] ?? arg);
}

function parseConcurrency(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--concurrency must be a positive integer. Got: ${value}`);
  }
  return parsed;
}

/**
 * Declare the root flags on a program.
 */
export function addRootOptions(program: Command): Command {
  return program
    .option('--test_id <id>', 'Run the scenario with this test_id')
    .option('--test_name <name>', 'Filter by test_name (case-insensitive substring)')
    .option('--test_group <group>', 'Filter by test_group')
    .option('--tags <tags...>', 'Filter by tags (any of)')
    .option('--test_dir <dir>', 'Root directory of scenario files', DEFAULT_TEST_DIR)
    .option('--workspace <dir>', 'Directory for logs and results (logs go to <dir>/logs)')
    .option('--conn_config <path>', 'Connection configuration file')
    .option('-l, --list', 'List configured connection targets')
    .option('--discover_connections', 'Probe every configured connection (-dc)')
    .option('--run_with_discover_connections', 'Probe connections, then run the scenarios (-rdc)')
    .option('--list_scenarios', 'List discovered scenarios (-ls)')
    .option('--list_scenarios_with_connections', 'List scenarios with the connections they use (-lsc)')
    .option('--schema_check <args...>', 'Validate documents: <config|scenario> <schema.json> <file-or-dir>')
    .option(
      '--run_with_schema_check <schema.json>',
      'Validate the scenarios against a schema, then run them (-rsc)'
    )
    .option('--log-path <dir>', 'Directory for the run log, command outputs and results')
    .option('-v, --verbose', 'Verbose output')
    .option('--concurrency <n>', 'Scenarios run at once', parseConcurrency, DEFAULT_CONCURRENCY);
}
