/**
 * Config Module
 *
 * Connection configuration for rigcheck.
 */

export type {
  ConfigSection,
  ConfigValue,
  ConnectionConfig,
  ConnectionSettings,
  RawConnectionConfig,
} from './types.js';

export { connectionConfigSchema } from './types.js';

export {
  SETTINGS_SECTION,
  TUNNEL_SECTION_SUFFIX,
  isTargetSection,
  resolveEnvVar,
  resolveSettings,
  resolveTarget,
} from './resolver.js';

export {
  emptyConnectionConfig,
  findConfigFile,
  loadConnectionConfig,
  parseConnectionConfig,
} from './loader.js';
