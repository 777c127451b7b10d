/**
 * Schema Check Command
 *
 * Validate scenario or connection configuration documents against a JSON
 * Schema, alone (`--schema_check`) or ahead of a run (`--run_with_schema_check`).
 */

import { resolve } from 'node:path';

import { checkSchemaPath, isSchemaKind, SCHEMA_KINDS, type SchemaKind } from '../../scenario/schema-check.js';
import * as output from '../utils/output.js';

/**
 * Execute `--schema_check <kind> <schema> <file-or-dir>`.
 *
 * @returns Exit code
 */
export function schemaCheckCommand(args: readonly string[]): number {
  const [kind, schemaPath, target] = args;
  if (args.length !== 3 || kind === undefined || schemaPath === undefined || target === undefined) {
    output.error(
      `--schema_check takes exactly three arguments: <${SCHEMA_KINDS.join('|')}> <schema.json> <file-or-dir>`
    );
    return 1;
  }
  if (!isSchemaKind(kind)) {
    output.error(`Unsupported schema kind "${kind}" (supported: ${SCHEMA_KINDS.join(', ')})`);
    return 1;
  }

  return checkAndReport(kind, schemaPath, target);
}

/**
 * Check every scenario document under the test directory before a run.
 *
 * @returns Exit code; the run goes ahead only on 0
 */
export function runSchemaCheck(schemaPath: string, testDir: string): number {
  const code = checkAndReport('scenario', schemaPath, testDir);
  if (code !== 0) {
    output.error('Schema check failed; nothing was run');
  }
  return code;
}

function checkAndReport(kind: SchemaKind, schemaPath: string, target: string): number {
  const results = checkSchemaPath(kind, resolve(schemaPath), resolve(target));

  let invalid = 0;
  for (const { file, result } of results) {
    if (result.valid) {
      output.success(`${file} is a valid ${kind} document`);
      continue;
    }

    invalid++;
    output.error(`${file} is not valid against ${schemaPath}`);
    for (const duplicate of result.duplicateKeys) {
      console.log(`  ✗ Duplicate key: ${duplicate}`);
    }
    for (const violation of result.violations) {
      console.log(`  ✗ ${violation.path || '/'}: ${violation.message}`);
    }
  }

  if (results.length > 1) {
    output.dim(`${results.length - invalid}/${results.length} ${kind} document(s) valid`);
  }
  return invalid === 0 ? 0 : 1;
}
