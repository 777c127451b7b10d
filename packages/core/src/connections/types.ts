/**
 * Connection Types
 *
 * Targets, handles and requests shared by the connection registry and its handle variants.
 */

import type { ErrorKind } from '../errors.js';
import type { Logger } from '../logger.js';

/**
 * Protocol a step asks for.
 */
export type ConnectionProtocol = 'local' | 'ssh' | 'redfish';

/**
 * Handle variants.
 */
export type HandleKind = 'local' | 'ssh' | 'redfish' | 'tunnel';

/**
 * Port-forward through an intermediate agent.
 */
export interface TunnelSpec {
  /** Agent host the forward is opened through; unset when the tunnel section is incomplete */
  agentHost?: string;
  /** Agent SSH port */
  agentPort: number;
  /** Agent credentials */
  username?: string;
  password?: string;
  /** Local bind address */
  localHost: string;
  /** Local port forwarded to the target's SSH port */
  sshLocalPort: number;
  /** Local port forwarded to the target's Redfish port */
  redfishLocalPort: number;
}

/**
 * A named remote system, as loaded from the connection configuration. Immutable.
 */
export interface ConnectionTarget {
  readonly name: string;
  readonly host?: string;
  readonly sshPort: number;
  readonly redfishPort: number;
  readonly username?: string;
  readonly password?: string;
  /** Redfish over HTTPS */
  readonly useSsl: boolean;
  /** Reached through a port-forward */
  readonly tunnel?: TunnelSpec;
  /** Credentials are present */
  readonly auth: boolean;
}

/**
 * A command (SSH/local) or request (Redfish) to run on a handle.
 */
export interface CommandRequest {
  command: string;
  useSudo?: boolean;
  /** Hard cutoff in milliseconds */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * What a command produced.
 */
export interface CommandOutput {
  stdout: string;
  stderr: string;
  /** Process exit code, when the transport reports one */
  exitCode?: number;
  /** HTTP status for Redfish requests */
  statusCode?: number;
  durationMs: number;
}

/**
 * A live connection. Owned by the registry; steps borrow it for one call.
 */
export interface ConnectionHandle {
  readonly kind: HandleKind;
  /** Cache key the registry stores this handle under */
  readonly key: string;
  /** Logical target name */
  readonly target: string;
  readonly protocol: ConnectionProtocol;

  connect(): Promise<void>;
  execute(request: CommandRequest): Promise<CommandOutput>;
  /** Read a file on the far side (used by log analysis) */
  readFile(path: string): Promise<string>;
  /** Cheap probe; must not throw */
  isAlive(): Promise<boolean>;
  disconnect(): Promise<void>;
}

/**
 * Options passed to a handle factory.
 */
export interface HandleFactoryOptions {
  key: string;
  target: ConnectionTarget;
  protocol: ConnectionProtocol;
  /** Host/port to dial instead of the target's (set when tunnelled) */
  via?: { host: string; port: number };
  connectTimeoutMs: number;
}

/**
 * Builds an unconnected handle for a protocol.
 */
export type HandleFactory = (options: HandleFactoryOptions) => ConnectionHandle;

/**
 * A local port-forward, shared by every handle of one tunnel topology.
 */
export interface PortForward {
  readonly id: string;
  readonly localHost: string;
  readonly localPort: number;
  readonly remoteHost: string;
  readonly remotePort: number;
  start(): Promise<void>;
  isRunning(): boolean;
  stop(): Promise<void>;
}

export type PortForwardFactory = (options: {
  id: string;
  spec: TunnelSpec;
  localPort: number;
  remoteHost: string;
  remotePort: number;
  connectTimeoutMs: number;
  logger?: Logger;
}) => PortForward;

/**
 * Health of one target/protocol pair.
 */
export interface ConnectionHealth {
  target: string;
  protocol: ConnectionProtocol;
  kind: HandleKind;
  healthy: boolean;
  latencyMs: number;
  error?: string;
  /** Kind of the error that stopped the probe */
  errorKind?: ErrorKind;
}
