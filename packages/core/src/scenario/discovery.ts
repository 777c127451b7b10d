/**
 * Scenario Discovery
 *
 * Find, load and filter scenarios under a test directory.
 */

import { readdirSync, readFileSync, statSync } from 'node:fs';
import { extname, join, resolve } from 'node:path';

import type { ConnectionReference } from '../connections/registry.js';
import { SCENARIO_EXTENSIONS } from '../constants.js';
import { RigcheckError } from '../errors.js';

import type { ScenarioCache } from './cache.js';
import { isScenarioDocument, ParseError, parseDocument } from './parser.js';
import type { FilterOptions, ScenarioDefinition } from './types.js';

/**
 * Outcome of loading a directory of scenarios.
 */
export interface DiscoveryResult {
  scenarios: ScenarioDefinition[];
  /** Scenario documents that failed the schema gate */
  errors: RigcheckError[];
}

function isScenarioFile(name: string): boolean {
  const extension = extname(name).toLowerCase();
  return SCENARIO_EXTENSIONS.some((candidate) => candidate === extension);
}

/**
 * List scenario candidate files under a directory, recursively, sorted.
 *
 * @throws ParseError if the directory cannot be read
 */
export function findScenarioFiles(testDir: string): string[] {
  const root = resolve(testDir);
  try {
    if (!statSync(root).isDirectory()) {
      throw new ParseError(`Not a directory: ${root}`);
    }
  } catch (error) {
    if (error instanceof ParseError) throw error;
    throw new ParseError(`Scenario directory not found: ${root}`);
  }

  const files: string[] = [];
  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir, { withFileTypes: true })) {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(path);
      } else if (entry.isFile() && isScenarioFile(entry.name)) {
        files.push(path);
      }
    }
  };
  walk(root);

  return files.sort();
}

/**
 * Load every scenario document under a directory. Files that are not
 * scenario documents (no `test_scenario`) are ignored.
 */
export function discoverScenarios(testDir: string, cache: ScenarioCache): DiscoveryResult {
  const result: DiscoveryResult = { scenarios: [], errors: [] };

  for (const file of findScenarioFiles(testDir)) {
    try {
      const content = readFileSync(file, 'utf-8');
      if (!isScenarioDocument(parseDocument(content, file))) continue;
      result.scenarios.push(cache.parse(content, file));
    } catch (error) {
      if (error instanceof RigcheckError) {
        result.errors.push(error);
        continue;
      }
      throw error;
    }
  }

  return result;
}

/**
 * Filter scenarios: test_id exact, test_name case-insensitive substring,
 * test_group exact, and any of the given tags.
 */
export function filterScenarios(
  scenarios: ScenarioDefinition[],
  options: FilterOptions
): ScenarioDefinition[] {
  let filtered = [...scenarios];

  if (options.testId) {
    filtered = filtered.filter((s) => s.testId === options.testId);
  }

  if (options.testName) {
    const needle = options.testName.toLowerCase();
    filtered = filtered.filter((s) => s.testName.toLowerCase().includes(needle));
  }

  if (options.testGroup) {
    filtered = filtered.filter((s) => s.testGroup === options.testGroup);
  }

  const tags = options.tags ?? [];
  if (tags.length > 0) {
    filtered = filtered.filter((s) => s.tags.some((tag) => tags.includes(tag)));
  }

  return filtered;
}

/**
 * Connections a scenario's steps use, as `target/protocol` pairs, in first-use order.
 */
export function scenarioConnections(scenario: ScenarioDefinition): ConnectionReference[] {
  const seen = new Map<string, ConnectionReference>();
  for (const step of scenario.steps) {
    if (step.stepType === 'invoke_scenario') continue;
    const key = `${step.connection}/${step.connectionType}`;
    if (!seen.has(key)) {
      seen.set(key, { target: step.connection, protocol: step.connectionType });
    }
  }
  return [...seen.values()];
}

/**
 * Get all unique tags from scenarios.
 */
export function getAllTags(scenarios: ScenarioDefinition[]): string[] {
  const tags = new Set<string>();
  for (const scenario of scenarios) {
    for (const tag of scenario.tags) {
      tags.add(tag);
    }
  }
  return [...tags].sort();
}
