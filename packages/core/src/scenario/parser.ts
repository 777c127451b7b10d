/**
 * Scenario Parser
 *
 * Parses YAML or JSON scenario documents into ScenarioDefinition objects.
 */

import { createHash } from 'node:crypto';
import { readFileSync } from 'node:fs';

import { parse as parseYaml, YAMLError } from 'yaml';

import { RigcheckError } from '../errors.js';

import { formatIssues, scenarioDocumentSchema } from './schema.js';
import type { ScenarioDefinition, SourceLocation } from './types.js';

/**
 * Error thrown when a document cannot be read or parsed.
 */
export class ParseError extends RigcheckError {
  constructor(
    message: string,
    public readonly source?: SourceLocation
  ) {
    super('schema', source ? `${message} at ${source.file}:${source.line ?? '?'}` : message);
    this.name = 'ParseError';
  }
}

/**
 * Error thrown when a document does not satisfy the scenario schema.
 */
export class SchemaError extends RigcheckError {
  constructor(
    public readonly file: string,
    public readonly issues: string[]
  ) {
    super('schema', `Invalid scenario ${file}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'SchemaError';
  }
}

/**
 * SHA-256 of a document's text.
 */
export function contentFingerprint(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Parse YAML (or JSON) text without validating it.
 */
export function parseDocument(content: string, filePath?: string): unknown {
  try {
    return parseYaml(content);
  } catch (error) {
    const line = error instanceof YAMLError ? error.linePos?.[0].line : undefined;
    throw new ParseError(
      `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
      { file: filePath ?? '<inline>', line }
    );
  }
}

/**
 * Whether a parsed document is a scenario document.
 */
export function isScenarioDocument(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'test_scenario' in raw;
}

/**
 * Parse and validate scenario text.
 *
 * @throws ParseError on unreadable YAML/JSON
 * @throws SchemaError when the document does not satisfy the schema
 */
export function parseScenario(content: string, filePath?: string): ScenarioDefinition {
  const file = filePath ?? '<inline>';
  const raw = parseDocument(content, file);

  if (!isScenarioDocument(raw)) {
    throw new ParseError('Document must have a "test_scenario" object', { file });
  }

  const parsed = scenarioDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaError(file, formatIssues(parsed.error));
  }

  const scenario = parsed.data.test_scenario;
  return {
    testId: scenario.test_id,
    testName: scenario.test_name,
    testGroup: scenario.test_group,
    description: scenario.description,
    tags: scenario.tags,
    schemaVersion: scenario.schema_version,
    docker: scenario.docker,
    steps: scenario.test_steps,
    source: { file },
    fingerprint: contentFingerprint(content),
  };
}

/**
 * Parse a scenario file.
 */
export function parseScenarioFile(filePath: string): ScenarioDefinition {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ParseError(
      `Failed to read scenario file: ${error instanceof Error ? error.message : String(error)}`,
      { file: filePath }
    );
  }
  return parseScenario(content, filePath);
}
