/**
 * @rigcheck/core
 *
 * Scenario execution engine for hardware and firmware compliance tests.
 *
 * @example
 * ```typescript
 * import { ConnectionRegistry, ScenarioCache, ScenarioRunner, loadConnectionConfig } from '@rigcheck/core';
 *
 * const config = loadConnectionConfig('./connection_config.json');
 * const cache = new ScenarioCache();
 * const scenario = cache.load('./scenarios/bmc/power.yaml');
 *
 * const registry = new ConnectionRegistry({ defaultTimeoutMs: config.settings.timeoutMs });
 * const runner = new ScenarioRunner({ registry, cache });
 * registry.initialize(config.targets, runner.collectReferences([scenario]));
 *
 * const { summary } = await runner.runAll([scenario]);
 * ```
 *
 * Or from the command line:
 * ```bash
 * rigcheck --test_dir ./scenarios --tags power --conn_config ./connection_config.json
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Errors and Logging
// =============================================================================

export {
  RigcheckError,
  ConfigError,
  ConnectionError,
  CommandError,
  TimeoutError,
  ExpressionError,
  CycleError,
  CancelledError,
  errorKindOf,
  errorMessage,
} from './errors.js';

export type { ErrorKind, ConnectionFailureReason } from './errors.js';

export { silentLogger, createLogger, createFileLogger, combineLoggers } from './logger.js';
export type { Logger, LogLevel, LineWriter } from './logger.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  connectionConfigSchema,
  emptyConnectionConfig,
  findConfigFile,
  loadConnectionConfig,
  parseConnectionConfig,
  resolveEnvVar,
} from './config/index.js';

export type { ConnectionConfig, ConnectionSettings, RawConnectionConfig } from './config/index.js';

// =============================================================================
// Expressions
// =============================================================================

export { compileExpression, evaluate, evaluateCriteria, parametersFrom, UNDEFINED } from './expression/index.js';
export type { Value, ParameterSource, GateResult, ExpressionNode } from './expression/index.js';

// =============================================================================
// Connections
// =============================================================================

export {
  ConnectionRegistry,
  LocalConnection,
  SshConnection,
  RedfishConnection,
  TunnelConnection,
  SshPortForward,
  createSshPortForward,
  parseRedfishCommand,
} from './connections/index.js';

export type {
  ConnectionProtocol,
  ConnectionTarget,
  ConnectionHandle,
  ConnectionHealth,
  ConnectionReference,
  ConnectionRegistryOptions,
  CommandRequest,
  CommandOutput,
  HandleFactory,
  HandleFactoryOptions,
  PortForward,
  PortForwardFactory,
  TunnelSpec,
} from './connections/index.js';

// =============================================================================
// Analysis
// =============================================================================

export { validateOutput, analyzeOutput, analyzeDiagnostics, deepEqual } from './analysis/index.js';
export type {
  ValidatorType,
  ValidationResult,
  OutputAnalysisRule,
  DiagnosticRule,
  DiagnosticOutcome,
} from './analysis/index.js';

// =============================================================================
// Scenario
// =============================================================================

export {
  ScenarioCache,
  ParseError,
  SchemaError,
  parseScenario,
  parseScenarioFile,
  discoverScenarios,
  filterScenarios,
  scenarioConnections,
  checkConfigDocument,
  checkDocument,
  checkSchemaFile,
  checkSchemaPath,
} from './scenario/index.js';

export type {
  ScenarioDefinition,
  StepDefinition,
  FilterOptions,
  SchemaCheckResult,
  SchemaKind,
} from './scenario/index.js';

// =============================================================================
// Runner
// =============================================================================

export {
  ScenarioRunner,
  StepExecutor,
  ResultBuilder,
  ExecutionContext,
  InvocationStack,
  OutputStore,
} from './runner/index.js';

export type {
  ScenarioRunnerOptions,
  RunAllOptions,
  RunOutcome,
  StepResult,
  StepStatus,
  ScenarioResult,
  RunSummary,
  FailureDetail,
} from './runner/index.js';

// =============================================================================
// Reporters
// =============================================================================

export { ConsoleReporter, createConsoleReporter } from './reporters/index.js';
export type { Reporter, ReporterOptions, ConsoleReporterOptions } from './reporters/index.js';

// =============================================================================
// CLI
// =============================================================================

export { createCli, runCli } from './cli/index.js';
