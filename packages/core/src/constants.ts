/**
 * Constants
 *
 * Centralized defaults for rigcheck.
 */

// =============================================================================
// Connection Defaults
// =============================================================================

/** Default SSH port */
export const DEFAULT_SSH_PORT = 22;

/** Default Redfish (HTTPS) port */
export const DEFAULT_REDFISH_PORT = 443;

/** Default timeout for establishing a connection in milliseconds */
export const DEFAULT_CONNECT_TIMEOUT_MS = 30000;

/** Default timeout for a single command when the step sets no duration */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30000;

/** Redfish service root used as the liveness probe */
export const REDFISH_SERVICE_ROOT = '/redfish/v1/';

// =============================================================================
// Tunnel Defaults
// =============================================================================

/** Default local bind host for tunnels */
export const DEFAULT_TUNNEL_LOCAL_HOST = 'localhost';

/** Default local port forwarded to the target's SSH port */
export const DEFAULT_TUNNEL_SSH_LOCAL_PORT = 2222;

/** Default local port forwarded to the target's Redfish port */
export const DEFAULT_TUNNEL_REDFISH_LOCAL_PORT = 8443;

/** Default keepalive interval for the tunnel agent session */
export const DEFAULT_TUNNEL_KEEPALIVE_MS = 30000;

// =============================================================================
// Error Signatures
// =============================================================================

/**
 * Output fragments that mark a command as failed even when the transport
 * reported success.
 */
export const DEFAULT_ERROR_SIGNATURES = [
  'command not found',
  'Permission denied',
  'No such file or directory',
  'Segmentation fault',
  'Operation not permitted',
  'Connection refused',
  'Input/output error',
  'Killed',
] as const;

// =============================================================================
// Scenario Defaults
// =============================================================================

/** Schema versions this runner understands */
export const SUPPORTED_SCHEMA_VERSIONS = ['scenario_recipe_schema_0.7'] as const;

/** Default scenario directory */
export const DEFAULT_TEST_DIR = './scenarios';

/** File extensions picked up by scenario discovery */
export const SCENARIO_EXTENSIONS = ['.yaml', '.yml', '.json'] as const;

/** Prefix in log_analysis_path that points into this run's command output directory */
export const CURRENT_LOG_DIR_PREFIX = 'current_log_dir';

/** Default number of scenarios run at once */
export const DEFAULT_CONCURRENCY = 1;

// =============================================================================
// Output Files
// =============================================================================

/** Directory (under the log path) holding saved command outputs */
export const COMMAND_OUTPUT_DIR = 'command_outputs';

/** Results file written under the log path */
export const RESULTS_FILE_NAME = 'test_results.json';

/** Diagnostic code file written under the log path */
export const DIAGNOSTICS_FILE_NAME = 'diagnostics_codes.json';

/** Run log file written under the log path */
export const RUN_LOG_FILE_NAME = 'rigcheck.log';
