/**
 * Scenario Cache
 *
 * Parsed scenarios keyed by content fingerprint. An entry is reused while the
 * file's content is unchanged; nothing is evicted during a run.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { contentFingerprint, ParseError, parseScenario } from './parser.js';
import type { ScenarioDefinition } from './types.js';

export interface ScenarioCacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Loads scenario files through the schema gate, caching by fingerprint.
 */
export class ScenarioCache {
  private readonly byFingerprint = new Map<string, ScenarioDefinition>();
  private hits = 0;
  private misses = 0;

  /**
   * Load and validate a scenario file.
   *
   * @throws ParseError or SchemaError from the schema gate
   */
  load(filePath: string): ScenarioDefinition {
    const file = resolve(filePath);
    let content: string;
    try {
      content = readFileSync(file, 'utf-8');
    } catch (error) {
      throw new ParseError(
        `Failed to read scenario file: ${error instanceof Error ? error.message : String(error)}`,
        { file }
      );
    }
    return this.parse(content, file);
  }

  /**
   * Validate scenario text, reusing an earlier parse of identical content from the same file.
   */
  parse(content: string, file: string): ScenarioDefinition {
    const key = `${contentFingerprint(content)}:${file}`;
    const cached = this.byFingerprint.get(key);
    if (cached) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const scenario = parseScenario(content, file);
    this.byFingerprint.set(key, scenario);
    return scenario;
  }

  stats(): ScenarioCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.byFingerprint.size };
  }
}
