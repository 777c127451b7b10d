/**
 * Tunnel Connections
 *
 * Local port-forwards through an intermediate agent, and the handle
 * variant that layers SSH or Redfish over one.
 */

import net from 'node:net';
import type { Duplex } from 'node:stream';

import type { ConnectConfig } from 'ssh2';

import { DEFAULT_TUNNEL_KEEPALIVE_MS } from '../constants.js';
import { ConnectionError } from '../errors.js';
import { validatePort } from '../helpers/utils.js';
import { silentLogger, type Logger } from '../logger.js';

import { openSshClient } from './ssh.js';
import type {
  CommandOutput,
  CommandRequest,
  ConnectionHandle,
  ConnectionProtocol,
  HandleKind,
  PortForward,
  PortForwardFactory,
  TunnelSpec,
} from './types.js';

/**
 * The part of an SSH client a port-forward uses.
 */
export interface ForwardingClient {
  forwardOut(
    srcIP: string,
    srcPort: number,
    dstIP: string,
    dstPort: number,
    callback: (error: Error | undefined, channel: Duplex) => void
  ): void;
  on(event: 'error' | 'close', listener: () => void): void;
  end(): void;
}

/**
 * Options for an SSH port-forward.
 */
export interface SshPortForwardOptions {
  id: string;
  spec: TunnelSpec;
  localPort: number;
  remoteHost: string;
  remotePort: number;
  connectTimeoutMs: number;
  logger?: Logger;
  /** Opens the session to the agent; defaults to an ssh2 client */
  openClient?: (config: ConnectConfig, target: string) => Promise<ForwardingClient>;
}

/**
 * Forwards a local port to a remote host:port through an SSH session on the agent.
 *
 * A failed channel closes only the local socket that asked for it; the
 * listener and the session stay up for the next connection.
 */
export class SshPortForward implements PortForward {
  readonly id: string;
  readonly localHost: string;
  readonly localPort: number;
  readonly remoteHost: string;
  readonly remotePort: number;
  private readonly logger: Logger;
  private client?: ForwardingClient;
  private server?: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private running = false;

  constructor(private readonly options: SshPortForwardOptions) {
    validatePort(options.localPort, 'tunnel local port');
    validatePort(options.remotePort, 'tunnel remote port');
    this.id = options.id;
    this.localHost = options.spec.localHost;
    this.localPort = options.localPort;
    this.remoteHost = options.remoteHost;
    this.remotePort = options.remotePort;
    this.logger = options.logger ?? silentLogger;
  }

  async start(): Promise<void> {
    if (this.running) return;
    const { spec, connectTimeoutMs, openClient = openSshClient } = this.options;

    const client = await openClient(
      {
        host: spec.agentHost,
        port: spec.agentPort,
        username: spec.username,
        password: spec.password,
        readyTimeout: connectTimeoutMs,
        keepaliveInterval: DEFAULT_TUNNEL_KEEPALIVE_MS,
      },
      this.id
    );
    client.on('error', () => {
      this.running = false;
    });
    client.on('close', () => {
      this.running = false;
    });

    const server = net.createServer((socket) => this.forward(client, socket));
    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.localPort, this.localHost, () => {
          server.removeListener('error', reject);
          resolve();
        });
      });
    } catch (error) {
      client.end();
      throw error;
    }

    this.client = client;
    this.server = server;
    this.running = true;
  }

  isRunning(): boolean {
    return this.running;
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();

    const server = this.server;
    this.server = undefined;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }

    this.client?.end();
    this.client = undefined;
  }

  private forward(client: ForwardingClient, socket: net.Socket): void {
    const remote = `${this.remoteHost}:${this.remotePort}`;
    let channel: Duplex | undefined;

    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', (error) => {
      this.logger.debug(`Forward ${this.id}: local socket error: ${error.message}`);
      channel?.destroy();
    });

    client.forwardOut(
      socket.remoteAddress ?? '127.0.0.1',
      socket.remotePort ?? 0,
      this.remoteHost,
      this.remotePort,
      (error, opened) => {
        if (error) {
          this.logger.warn(`Forward ${this.id}: cannot open channel to ${remote}: ${error.message}`);
          socket.destroy();
          return;
        }
        channel = opened;
        opened.on('error', (channelError: Error) => {
          this.logger.debug(`Forward ${this.id}: channel error: ${channelError.message}`);
          socket.destroy();
        });
        socket.pipe(opened).pipe(socket);
      }
    );
  }
}

/**
 * Default port-forward factory.
 */
export const createSshPortForward: PortForwardFactory = (options) => new SshPortForward(options);

/**
 * A counted reference to a running port-forward.
 */
export interface TunnelLease {
  readonly forward: PortForward;
  /** Drop this reference; idempotent */
  release(): Promise<void>;
}

/**
 * Handle that runs an inner SSH or Redfish handle over a port-forward.
 */
export class TunnelConnection implements ConnectionHandle {
  readonly kind: HandleKind = 'tunnel';
  readonly key: string;
  readonly target: string;
  readonly protocol: ConnectionProtocol;

  constructor(
    readonly inner: ConnectionHandle,
    private readonly lease: TunnelLease
  ) {
    this.key = inner.key;
    this.target = inner.target;
    this.protocol = inner.protocol;
  }

  async connect(): Promise<void> {
    if (!this.lease.forward.isRunning()) {
      throw new ConnectionError('tunnel-setup-failure', this.target, `Port-forward ${this.lease.forward.id} is not running`);
    }
    await this.inner.connect();
  }

  execute(request: CommandRequest): Promise<CommandOutput> {
    return this.inner.execute(request);
  }

  readFile(path: string): Promise<string> {
    return this.inner.readFile(path);
  }

  async isAlive(): Promise<boolean> {
    return this.lease.forward.isRunning() && (await this.inner.isAlive());
  }

  async disconnect(): Promise<void> {
    try {
      await this.inner.disconnect();
    } finally {
      await this.lease.release();
    }
  }
}
