/**
 * JSON Schema Check
 *
 * Validates scenario documents (YAML, with a duplicate-key scan) and
 * connection configuration documents (JSON) against a JSON Schema (draft-07).
 */

import { readFileSync, statSync } from 'node:fs';

import { Ajv, type ErrorObject, type SchemaObject } from 'ajv';
import { parseDocument as parseYamlDocument } from 'yaml';

import { findScenarioFiles } from './discovery.js';
import { ParseError } from './parser.js';

/**
 * Document kinds a schema check accepts.
 */
export const SCHEMA_KINDS = ['config', 'scenario'] as const;

export type SchemaKind = (typeof SCHEMA_KINDS)[number];

export function isSchemaKind(value: string): value is SchemaKind {
  return SCHEMA_KINDS.some((kind) => kind === value);
}

export interface SchemaViolation {
  /** JSON pointer into the document; empty for the root */
  path: string;
  message: string;
}

export interface SchemaCheckResult {
  valid: boolean;
  duplicateKeys: string[];
  violations: SchemaViolation[];
}

/**
 * Result for one checked file.
 */
export interface SchemaFileResult {
  file: string;
  result: SchemaCheckResult;
}

function readText(file: string, what: string): string {
  try {
    return readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ParseError(
      `Failed to read ${what}: ${error instanceof Error ? error.message : String(error)}`,
      { file }
    );
  }
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toViolation(error: ErrorObject): SchemaViolation {
  return { path: error.instancePath, message: error.message ?? error.keyword };
}

function validateData(schema: SchemaObject, data: unknown): SchemaViolation[] {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile(schema);
  return validate(data) ? [] : (validate.errors ?? []).map(toViolation);
}

/**
 * Check scenario document text against a parsed schema.
 */
export function checkDocument(schema: SchemaObject, content: string, file = '<inline>'): SchemaCheckResult {
  const strict = parseYamlDocument(content);
  const duplicateKeys = strict.errors
    .filter((error) => error.code === 'DUPLICATE_KEY')
    .map((error) => `${error.message.split('\n')[0]}${error.linePos ? ` (line ${error.linePos[0].line})` : ''}`);

  const lenient = parseYamlDocument(content, { uniqueKeys: false });
  const otherError = lenient.errors[0];
  if (otherError) {
    throw new ParseError(`Invalid YAML: ${otherError.message}`, { file, line: otherError.linePos?.[0].line });
  }

  const violations = validateData(schema, lenient.toJS());
  return { valid: violations.length === 0 && duplicateKeys.length === 0, duplicateKeys, violations };
}

/**
 * Check connection configuration text (JSON) against a parsed schema.
 */
export function checkConfigDocument(schema: SchemaObject, content: string, file = '<inline>'): SchemaCheckResult {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ParseError(`Invalid JSON: ${error instanceof Error ? error.message : String(error)}`, { file });
  }

  const violations = validateData(schema, data);
  return { valid: violations.length === 0, duplicateKeys: [], violations };
}

function loadSchema(schemaPath: string): SchemaObject {
  const schemaText = readText(schemaPath, 'schema');
  let schema: unknown;
  try {
    schema = JSON.parse(schemaText);
  } catch (error) {
    throw new ParseError(
      `Schema is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { file: schemaPath }
    );
  }
  if (!isSchemaObject(schema)) {
    throw new ParseError('Schema must be a JSON object', { file: schemaPath });
  }
  return schema;
}

function checkLoaded(kind: SchemaKind, schema: SchemaObject, documentPath: string): SchemaCheckResult {
  const content = readText(documentPath, 'document');
  return kind === 'config'
    ? checkConfigDocument(schema, content, documentPath)
    : checkDocument(schema, content, documentPath);
}

/**
 * Check a document file against a JSON Schema file.
 *
 * @throws ParseError if either file cannot be read or parsed
 */
export function checkSchemaFile(
  schemaPath: string,
  documentPath: string,
  kind: SchemaKind = 'scenario'
): SchemaCheckResult {
  return checkLoaded(kind, loadSchema(schemaPath), documentPath);
}

/**
 * Check a document file, or every document under a directory, against a
 * JSON Schema file. Directories are walked the way scenario discovery walks them.
 *
 * @throws ParseError if the schema or a document cannot be read or parsed,
 *   or a directory holds no documents
 */
export function checkSchemaPath(kind: SchemaKind, schemaPath: string, fileOrDir: string): SchemaFileResult[] {
  const schema = loadSchema(schemaPath);

  let isDirectory: boolean;
  try {
    isDirectory = statSync(fileOrDir).isDirectory();
  } catch {
    throw new ParseError('File or directory not found', { file: fileOrDir });
  }

  const files = isDirectory ? findScenarioFiles(fileOrDir) : [fileOrDir];
  if (files.length === 0) {
    throw new ParseError('No documents found', { file: fileOrDir });
  }
  return files.map((file) => ({ file, result: checkLoaded(kind, schema, file) }));
}
