/**
 * Connections Module
 */

export * from './types.js';
export { LocalConnection } from './local.js';
export { SshConnection, classifySshError, openSshClient } from './ssh.js';
export { RedfishConnection, parseRedfishCommand, type RedfishMethod, type RedfishRequest } from './redfish.js';
export {
  SshPortForward,
  TunnelConnection,
  createSshPortForward,
  type SshPortForwardOptions,
  type TunnelLease,
} from './tunnel.js';
export {
  ConnectionRegistry,
  type ConnectionReference,
  type ConnectionRegistryOptions,
  type RegistryStats,
} from './registry.js';
