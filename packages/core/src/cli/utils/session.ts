/**
 * CLI Session Helpers
 *
 * Logger, configuration and scenario loading shared by the commands.
 */

import { join, resolve } from 'node:path';

import { emptyConnectionConfig, findConfigFile, loadConnectionConfig } from '../../config/loader.js';
import type { ConnectionConfig } from '../../config/types.js';
import { ConnectionRegistry } from '../../connections/registry.js';
import { RUN_LOG_FILE_NAME } from '../../constants.js';
import { combineLoggers, createFileLogger, createLogger, type Logger } from '../../logger.js';
import type { ScenarioCache } from '../../scenario/cache.js';
import { discoverScenarios, filterScenarios } from '../../scenario/discovery.js';
import type { ScenarioDefinition } from '../../scenario/types.js';
import type { CliOptions } from '../options.js';
import * as output from './output.js';

/**
 * Log directory for the run: `--log-path`, else `<workspace>/logs`.
 */
export function resolveLogDir(options: CliOptions): string | undefined {
  if (options.logPath) return resolve(options.logPath);
  if (options.workspace) return resolve(options.workspace, 'logs');
  return undefined;
}

/**
 * Console logger (debug with --verbose), plus a run log file when there is a log directory.
 */
export function createCliLogger(options: CliOptions): Logger {
  const terminal = createLogger((level, message) => {
    switch (level) {
      case 'error':
        output.error(message);
        break;
      case 'warn':
        output.warning(message);
        break;
      case 'debug':
        output.dim(message);
        break;
      default:
        output.info(message);
    }
  }, options.verbose ?? false);

  const logDir = resolveLogDir(options);
  return logDir ? combineLoggers(terminal, createFileLogger(join(logDir, RUN_LOG_FILE_NAME))) : terminal;
}

/**
 * Connection configuration: the --conn_config file, else one found from the
 * working directory, else an empty configuration (local connections only).
 *
 * @param required - Fail instead of falling back to an empty configuration
 */
export function loadCliConfig(options: CliOptions, required = false): ConnectionConfig {
  if (options.conn_config) {
    return loadConnectionConfig(options.conn_config);
  }
  if (required || findConfigFile()) {
    return loadConnectionConfig();
  }
  return emptyConnectionConfig();
}

/**
 * Registry configured from the connection settings.
 */
export function createCliRegistry(config: ConnectionConfig, logger: Logger): ConnectionRegistry {
  return new ConnectionRegistry({
    connectTimeoutMs: config.settings.timeoutMs,
    defaultTimeoutMs: config.settings.timeoutMs,
    logger,
  });
}

/**
 * Discover and filter scenarios. Invalid documents are reported and
 * returned as errors.
 */
export function loadCliScenarios(
  options: CliOptions,
  cache: ScenarioCache,
  logger: Logger
): { scenarios: ScenarioDefinition[]; errors: Error[] } {
  const testDir = resolve(options.test_dir);
  logger.debug(`Discovering scenarios in ${testDir}`);

  const { scenarios, errors } = discoverScenarios(testDir, cache);
  for (const error of errors) {
    logger.error(error.message);
  }

  const selected = filterScenarios(scenarios, {
    testId: options.test_id,
    testName: options.test_name,
    testGroup: options.test_group,
    tags: options.tags,
  });
  logger.debug(`Found ${scenarios.length} scenario(s), ${selected.length} selected`);

  return { scenarios: selected, errors };
}
