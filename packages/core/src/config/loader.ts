/**
 * Config Loader
 *
 * Discovers and loads the connection configuration file.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { ConfigError } from '../errors.js';

import { isTargetSection, resolveSettings, resolveTarget } from './resolver.js';
import { connectionConfigSchema, type ConnectionConfig } from './types.js';

/**
 * Config file names to search for (in order of priority).
 */
const CONFIG_FILE_NAMES = ['rigcheck.connections.json', 'connection_config.json'];

/**
 * Find the config file by searching from cwd up to root.
 */
export function findConfigFile(startDir?: string): string | null {
  let currentDir = startDir ?? process.cwd();

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Validate a parsed document and resolve it into targets.
 *
 * @throws ConfigError on shape errors or unset environment references
 */
export function parseConnectionConfig(raw: unknown, path?: string): ConnectionConfig {
  const parsed = connectionConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(`Invalid connection configuration${where}: ${issue?.message ?? 'unknown issue'}`);
  }

  const config = parsed.data;
  const settings = resolveSettings(config);
  const targets = Object.keys(config)
    .filter(isTargetSection)
    .map((name) => resolveTarget(config, name, settings));

  return { path, settings, targets };
}

/**
 * Load the connection configuration.
 *
 * @param configPath - Optional path to config file. If not provided, searches from cwd.
 */
export function loadConnectionConfig(configPath?: string): ConnectionConfig {
  const path = configPath ? resolve(configPath) : findConfigFile();

  if (!path) {
    throw new ConfigError(
      `No ${CONFIG_FILE_NAMES.join(' or ')} found. Create one in your project root or pass --conn_config.`
    );
  }
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseConnectionConfig(raw, path);
}

/**
 * An empty configuration: only local steps can run.
 */
export function emptyConnectionConfig(): ConnectionConfig {
  return parseConnectionConfig({});
}
