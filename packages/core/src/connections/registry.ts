/**
 * Connection Registry
 *
 * Owns every live connection handle. Handles are cached per
 * (target, protocol, tunnel topology) key, operations on one key run one at
 * a time, and tunnel port-forwards are shared and reference-counted.
 */

import pLimit, { type LimitFunction } from 'p-limit';

import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_ERROR_SIGNATURES,
  DEFAULT_REDFISH_PORT,
  DEFAULT_SSH_PORT,
} from '../constants.js';
import { CommandError, ConfigError, ConnectionError, errorKindOf, errorMessage } from '../errors.js';
import { createAbortScope, raceAbort } from '../helpers/utils.js';
import { silentLogger, type Logger } from '../logger.js';

import { LocalConnection } from './local.js';
import { RedfishConnection } from './redfish.js';
import { SshConnection } from './ssh.js';
import { createSshPortForward, TunnelConnection, type TunnelLease } from './tunnel.js';
import type {
  CommandOutput,
  CommandRequest,
  ConnectionHandle,
  ConnectionHealth,
  ConnectionProtocol,
  ConnectionTarget,
  HandleFactory,
  PortForward,
  PortForwardFactory,
  TunnelSpec,
} from './types.js';

/**
 * A (target, protocol) pair a scenario refers to.
 */
export interface ConnectionReference {
  target: string;
  protocol: ConnectionProtocol;
}

/**
 * Registry options.
 */
export interface ConnectionRegistryOptions {
  /** Handle factories by protocol; defaults cover local, ssh and redfish */
  factories?: Partial<Record<ConnectionProtocol, HandleFactory>>;
  /** Builds tunnel port-forwards */
  forwardFactory?: PortForwardFactory;
  /** Output fragments that fail a command */
  errorSignatures?: readonly string[];
  connectTimeoutMs?: number;
  /** Command timeout when the request sets none */
  defaultTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Snapshot of registry state.
 */
export interface RegistryStats {
  handles: string[];
  forwards: Array<{ id: string; refs: number; running: boolean }>;
}

interface ForwardEntry {
  forward: PortForward;
  refs: number;
}

const DEFAULT_FACTORIES: Record<ConnectionProtocol, HandleFactory> = {
  local: (options) => new LocalConnection(options),
  ssh: (options) => new SshConnection(options),
  redfish: (options) => new RedfishConnection(options),
};

/**
 * Connection registry.
 */
export class ConnectionRegistry {
  private readonly factories = new Map<ConnectionProtocol, HandleFactory>();
  private readonly forwardFactory: PortForwardFactory;
  private readonly errorSignatures: readonly string[];
  private readonly connectTimeoutMs: number;
  private readonly defaultTimeoutMs: number;
  private readonly logger: Logger;

  private readonly targets = new Map<string, ConnectionTarget>();
  private readonly handles = new Map<string, ConnectionHandle>();
  private readonly forwards = new Map<string, ForwardEntry>();
  private readonly locks = new Map<string, LimitFunction>();

  constructor(options: ConnectionRegistryOptions = {}) {
    for (const protocol of ['local', 'ssh', 'redfish'] as const) {
      this.factories.set(protocol, options.factories?.[protocol] ?? DEFAULT_FACTORIES[protocol]);
    }
    this.forwardFactory = options.forwardFactory ?? createSshPortForward;
    this.errorSignatures = options.errorSignatures ?? DEFAULT_ERROR_SIGNATURES;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Load targets and check the ones the scenarios reference.
   *
   * @throws ConfigError if a referenced target is missing or incomplete
   */
  initialize(targets: readonly ConnectionTarget[], references: readonly ConnectionReference[] = []): void {
    this.targets.clear();
    for (const target of targets) {
      this.targets.set(target.name, target);
    }

    for (const reference of references) {
      if (reference.protocol === 'local') continue;
      const target = this.targets.get(reference.target);
      if (!target) {
        throw new ConfigError('Connection target is not configured', reference.target);
      }
      if (!target.host) {
        throw new ConfigError('Missing host', target.name);
      }
      if (!target.auth) {
        throw new ConfigError('Missing credentials (username/password)', target.name);
      }
      if (target.tunnel && !target.tunnel.agentHost) {
        throw new ConfigError('Missing tunnel agent host', target.name);
      }
    }

    this.logger.debug(`Connection registry initialized with ${this.targets.size} target(s)`);
  }

  /**
   * Configured targets.
   */
  getTargets(): ConnectionTarget[] {
    return [...this.targets.values()];
  }

  /**
   * Whether a reference can be resolved against the loaded targets.
   */
  isConfigured(reference: ConnectionReference): boolean {
    if (reference.protocol === 'local') return true;
    const target = this.targets.get(reference.target);
    return (
      target !== undefined &&
      target.host !== undefined &&
      target.auth &&
      (target.tunnel === undefined || target.tunnel.agentHost !== undefined)
    );
  }

  /**
   * Get a live handle, reusing the cached one when it is still alive.
   * A stale handle is evicted and re-established once.
   *
   * @throws ConfigError for an unknown target
   * @throws ConnectionError if the handle cannot be established
   */
  acquire(name: string, protocol: ConnectionProtocol): Promise<ConnectionHandle> {
    const target = this.resolveTarget(name, protocol);
    const key = this.cacheKey(target, protocol);

    return this.lock(key)(async () => {
      const cached = this.handles.get(key);
      if (cached) {
        if (await cached.isAlive()) {
          return cached;
        }
        this.logger.debug(`Evicting stale connection ${key}`);
        this.handles.delete(key);
        await this.disconnectQuietly(cached);
      }

      const handle = await this.open(key, target, protocol);
      this.handles.set(key, handle);
      this.logger.debug(`Connected ${key} (${handle.kind})`);
      return handle;
    });
  }

  /**
   * Run a command on a handle with a hard timeout, then check its output
   * for failure signatures.
   *
   * @throws TimeoutError when the timeout passes
   * @throws CommandError when the output marks the command as failed
   */
  execute(handle: ConnectionHandle, request: CommandRequest): Promise<CommandOutput> {
    return this.lock(handle.key)(async () => {
      const scope = createAbortScope(request.signal, request.timeoutMs ?? this.defaultTimeoutMs, 'Command');
      let output: CommandOutput;
      try {
        output = await raceAbort(handle.execute({ ...request, signal: scope.signal }), scope.signal);
      } finally {
        scope.dispose();
      }
      this.checkOutput(output);
      return output;
    });
  }

  /**
   * Read a file through a handle.
   */
  readFile(handle: ConnectionHandle, path: string): Promise<string> {
    return this.lock(handle.key)(() => handle.readFile(path));
  }

  /**
   * Probe each target/protocol pair on a transient handle. Nothing is cached.
   *
   * @returns Health keyed by `target/protocol`
   */
  async checkAll(references: readonly ConnectionReference[]): Promise<Map<string, ConnectionHealth>> {
    const results = await Promise.all(references.map((reference) => this.probe(reference)));
    return new Map(results.map((health) => [`${health.target}/${health.protocol}`, health]));
  }

  /**
   * Disconnect a cached handle and evict it. Idempotent.
   */
  release(handle: ConnectionHandle): Promise<void> {
    return this.lock(handle.key)(async () => {
      if (this.handles.get(handle.key) !== handle) return;
      this.handles.delete(handle.key);
      await this.disconnectQuietly(handle);
    });
  }

  /**
   * Release every cached handle and stop any forwards left over.
   */
  async releaseAll(): Promise<void> {
    await Promise.all([...this.handles.values()].map((handle) => this.release(handle)));

    for (const [id, entry] of this.forwards) {
      this.forwards.delete(id);
      await this.stopForward(entry.forward);
    }
  }

  stats(): RegistryStats {
    return {
      handles: [...this.handles.keys()],
      forwards: [...this.forwards.values()].map((entry) => ({
        id: entry.forward.id,
        refs: entry.refs,
        running: entry.forward.isRunning(),
      })),
    };
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private resolveTarget(name: string, protocol: ConnectionProtocol): ConnectionTarget {
    const target = this.targets.get(name);
    if (target) return target;
    if (protocol === 'local') {
      return { name, sshPort: DEFAULT_SSH_PORT, redfishPort: DEFAULT_REDFISH_PORT, useSsl: false, auth: false };
    }
    throw new ConfigError('Connection target is not configured', name);
  }

  private cacheKey(target: ConnectionTarget, protocol: ConnectionProtocol): string {
    const topology = protocol !== 'local' && target.tunnel ? this.forwardId(target, protocol) : 'direct';
    return `${target.name}|${protocol}|${topology}`;
  }

  private forwardId(target: ConnectionTarget, protocol: ConnectionProtocol): string {
    const tunnel = target.tunnel;
    if (!tunnel) return 'direct';
    const [localPort, remotePort] =
      protocol === 'redfish'
        ? [tunnel.redfishLocalPort, target.redfishPort]
        : [tunnel.sshLocalPort, target.sshPort];
    return `${tunnel.localHost}:${localPort}=>${tunnel.agentHost ?? ''}:${tunnel.agentPort}=>${target.host ?? ''}:${remotePort}`;
  }

  private lock(key: string): LimitFunction {
    let limit = this.locks.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.locks.set(key, limit);
    }
    return limit;
  }

  private factoryFor(protocol: ConnectionProtocol): HandleFactory {
    const factory = this.factories.get(protocol);
    if (!factory) {
      throw new ConfigError(`No connection factory registered for protocol "${protocol}"`);
    }
    return factory;
  }

  /**
   * Build and connect a handle. Never returns a half-initialized one.
   */
  private async open(key: string, target: ConnectionTarget, protocol: ConnectionProtocol): Promise<ConnectionHandle> {
    const factory = this.factoryFor(protocol);

    let handle: ConnectionHandle;
    if (protocol !== 'local' && target.tunnel) {
      const lease = await this.leaseForward(target, protocol);
      const { localHost, localPort } = lease.forward;
      const inner = factory({
        key,
        target,
        protocol,
        via: { host: localHost, port: localPort },
        connectTimeoutMs: this.connectTimeoutMs,
      });
      handle = new TunnelConnection(inner, lease);
    } else {
      handle = factory({ key, target, protocol, connectTimeoutMs: this.connectTimeoutMs });
    }

    try {
      await handle.connect();
    } catch (error) {
      await this.disconnectQuietly(handle);
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError('unreachable', target.name, errorMessage(error), { cause: error });
    }
    return handle;
  }

  /**
   * Take a reference on the forward for a tunnelled target, starting it if needed.
   */
  private leaseForward(target: ConnectionTarget, protocol: ConnectionProtocol): Promise<TunnelLease> {
    const id = this.forwardId(target, protocol);

    return this.lock(`forward:${id}`)(async () => {
      const tunnel = target.tunnel;
      if (!tunnel?.agentHost || !target.host) {
        throw new ConnectionError('tunnel-setup-failure', target.name, 'Tunnel requires a target host and agent');
      }

      let entry = this.forwards.get(id);
      if (entry && !entry.forward.isRunning()) {
        this.logger.debug(`Replacing stopped forward ${id}`);
        this.forwards.delete(id);
        await this.stopForward(entry.forward);
        entry = undefined;
      }

      if (!entry) {
        const forward = await this.startForward(id, target, tunnel, target.host, protocol);
        entry = { forward, refs: 0 };
        this.forwards.set(id, entry);
        this.logger.debug(`Started forward ${id}`);
      }

      entry.refs += 1;
      return this.createLease(id, entry);
    });
  }

  /**
   * Build and start a forward; any failure, including a bad port, is a tunnel setup failure.
   */
  private async startForward(
    id: string,
    target: ConnectionTarget,
    tunnel: TunnelSpec,
    remoteHost: string,
    protocol: ConnectionProtocol
  ): Promise<PortForward> {
    let forward: PortForward | undefined;
    try {
      forward = this.forwardFactory({
        id,
        spec: tunnel,
        localPort: protocol === 'redfish' ? tunnel.redfishLocalPort : tunnel.sshLocalPort,
        remoteHost,
        remotePort: protocol === 'redfish' ? target.redfishPort : target.sshPort,
        connectTimeoutMs: this.connectTimeoutMs,
        logger: this.logger,
      });
      await forward.start();
      return forward;
    } catch (error) {
      if (forward) await this.stopForward(forward);
      throw new ConnectionError('tunnel-setup-failure', target.name, errorMessage(error), { cause: error });
    }
  }

  private createLease(id: string, entry: ForwardEntry): TunnelLease {
    let released = false;
    return {
      forward: entry.forward,
      release: () =>
        this.lock(`forward:${id}`)(async () => {
          if (released) return;
          released = true;
          entry.refs -= 1;
          if (entry.refs > 0) return;
          if (this.forwards.get(id) === entry) {
            this.forwards.delete(id);
          }
          await this.stopForward(entry.forward);
          this.logger.debug(`Stopped forward ${id}`);
        }),
    };
  }

  private async probe(reference: ConnectionReference): Promise<ConnectionHealth> {
    const startTime = Date.now();
    let kind: ConnectionHealth['kind'] = reference.protocol;

    try {
      const target = this.resolveTarget(reference.target, reference.protocol);
      const key = `probe:${this.cacheKey(target, reference.protocol)}`;
      const handle = await this.open(key, target, reference.protocol);
      kind = handle.kind;
      try {
        const healthy = await handle.isAlive();
        return { ...reference, kind, healthy, latencyMs: Date.now() - startTime };
      } finally {
        await this.disconnectQuietly(handle);
      }
    } catch (error) {
      return {
        ...reference,
        kind,
        healthy: false,
        latencyMs: Date.now() - startTime,
        error: errorMessage(error),
        errorKind: errorKindOf(error),
      };
    }
  }

  private checkOutput(output: CommandOutput): void {
    if (output.statusCode !== undefined && output.statusCode >= 400) {
      throw new CommandError(`Request returned HTTP ${output.statusCode}`, output.stdout);
    }

    const combined = output.stderr ? `${output.stdout}\n${output.stderr}` : output.stdout;
    const signature = this.errorSignatures.find((candidate) => combined.includes(candidate));
    if (signature !== undefined) {
      throw new CommandError(`Output matched error signature "${signature}"`, combined, signature);
    }

    if (output.exitCode !== undefined && output.exitCode !== 0 && output.stdout.trim() === '') {
      const detail = output.stderr.trim();
      throw new CommandError(
        `Command exited with code ${output.exitCode}${detail ? `: ${detail}` : ''}`,
        output.stderr
      );
    }
  }

  private async disconnectQuietly(handle: ConnectionHandle): Promise<void> {
    try {
      await handle.disconnect();
    } catch (error) {
      this.logger.warn(`Failed to disconnect ${handle.key}: ${errorMessage(error)}`);
    }
  }

  private async stopForward(forward: PortForward): Promise<void> {
    try {
      await forward.stop();
    } catch (error) {
      this.logger.warn(`Failed to stop forward ${forward.id}: ${errorMessage(error)}`);
    }
  }
}
