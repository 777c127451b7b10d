/**
 * CLI Commands
 */

export { runCommand } from './run.js';
export { listTargetsCommand, listScenariosCommand } from './list.js';
export {
  discoverCommand,
  discoverConnections,
  discoveryReferences,
  probeStatus,
  summarizeDiscovery,
  type DiscoveryStatistics,
  type ProbeCounts,
  type ProbeResult,
  type ProbeStatus,
} from './discover.js';
export { runSchemaCheck, schemaCheckCommand } from './schema-check.js';
