/**
 * Scenario Module
 *
 * Scenario documents: schema gate, cache, discovery and filtering.
 */

export type {
  SourceLocation,
  StepType,
  CommandStep,
  LogAnalysisStep,
  InvokeScenarioStep,
  StepDefinition,
  DockerSpec,
  ScenarioDefinition,
  FilterOptions,
} from './types.js';

export { scenarioDocumentSchema, formatIssues, type ScenarioDocument } from './schema.js';

export {
  ParseError,
  SchemaError,
  contentFingerprint,
  isScenarioDocument,
  parseDocument,
  parseScenario,
  parseScenarioFile,
} from './parser.js';

export { ScenarioCache, type ScenarioCacheStats } from './cache.js';

export {
  discoverScenarios,
  filterScenarios,
  findScenarioFiles,
  getAllTags,
  scenarioConnections,
  type DiscoveryResult,
} from './discovery.js';

export {
  SCHEMA_KINDS,
  checkConfigDocument,
  checkDocument,
  checkSchemaFile,
  checkSchemaPath,
  isSchemaKind,
  type SchemaCheckResult,
  type SchemaFileResult,
  type SchemaKind,
  type SchemaViolation,
} from './schema-check.js';
