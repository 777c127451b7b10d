/**
 * Scenario Types
 *
 * Parsed, validated form of scenario documents.
 */

import type {
  DiagnosticRule,
  JsonValue,
  OutputAnalysisRule,
  ValidatorType,
} from '../analysis/types.js';
import type { ConnectionProtocol } from '../connections/types.js';

// =============================================================================
// Source Location
// =============================================================================

/**
 * Source location for error reporting.
 */
export interface SourceLocation {
  file: string;
  line?: number;
}

// =============================================================================
// Steps
// =============================================================================

export type StepType = 'command_execution' | 'log_analysis' | 'invoke_scenario';

/**
 * Fields shared by every step type.
 */
interface BaseStep {
  /** Unique within the scenario */
  stepId: string;
  stepName: string;
  description?: string;
  /** Connection target name */
  connection: string;
  connectionType: ConnectionProtocol;
  /** AND-combined gate expressions */
  entryCriteria: string[];
  /** Maximum number of executions */
  loop: number;
  /** Time budget for the whole step, in seconds */
  duration?: number;
  /** Keep running later steps when this one fails */
  continueOnFailure: boolean;
  useSudo: boolean;
}

/**
 * Run a command (SSH/local) or a request (Redfish) and check its output.
 */
export interface CommandStep extends BaseStep {
  stepType: 'command_execution';
  command: string;
  /** Run the command inside this container with `docker exec` */
  containerName?: string;
  validatorType: ValidatorType;
  expectedOutput?: JsonValue;
  /** File holding the expected output; overrides expectedOutput */
  expectedOutputPath?: string;
  outputAnalysis: OutputAnalysisRule[];
  diagnosticAnalysis: DiagnosticRule[];
}

/**
 * Read a log and run diagnostic rules over it.
 */
export interface LogAnalysisStep extends BaseStep {
  stepType: 'log_analysis';
  /** Log path; a `current_log_dir/` prefix points at this run's command outputs */
  logAnalysisPath: string;
  diagnosticAnalysis: DiagnosticRule[];
}

/**
 * Run another scenario with an inherited context.
 */
export interface InvokeScenarioStep extends BaseStep {
  stepType: 'invoke_scenario';
  /** Scenario file, relative to the invoking scenario's file */
  scenarioPath: string;
}

export type StepDefinition = CommandStep | LogAnalysisStep | InvokeScenarioStep;

// =============================================================================
// Scenario
// =============================================================================

/**
 * Container a scenario expects to exist.
 */
export interface DockerSpec {
  containerName: string;
  image?: string;
  connection?: string;
}

/**
 * A validated scenario. Immutable during execution.
 */
export interface ScenarioDefinition {
  /** Unique within a run */
  testId: string;
  testName: string;
  testGroup?: string;
  description?: string;
  tags: string[];
  schemaVersion?: string;
  docker: DockerSpec[];
  steps: StepDefinition[];
  source: SourceLocation;
  /** Content fingerprint of the document it was parsed from */
  fingerprint: string;
}

/**
 * Options for filtering scenarios.
 */
export interface FilterOptions {
  /** Exact test_id */
  testId?: string;
  /** Case-insensitive substring of test_name */
  testName?: string;
  /** Exact test_group */
  testGroup?: string;
  /** Any of these tags */
  tags?: string[];
}
