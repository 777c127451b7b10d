/**
 * SSH Connection
 *
 * Command execution and file reads over an ssh2 session.
 */

import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';

import { CancelledError, ConnectionError, type ConnectionFailureReason } from '../errors.js';
import { wrapSudo } from '../helpers/utils.js';

import type {
  CommandOutput,
  CommandRequest,
  ConnectionHandle,
  HandleFactoryOptions,
  HandleKind,
} from './types.js';

/**
 * Classify an ssh2 connection error.
 */
export function classifySshError(error: Error): ConnectionFailureReason {
  if ('level' in error && error.level === 'client-authentication') {
    return 'auth-failure';
  }
  return 'unreachable';
}

/**
 * Open an ssh2 client and wait for it to become ready.
 */
export function openSshClient(config: ConnectConfig, target: string): Promise<Client> {
  const client = new Client();

  return new Promise<Client>((resolve, reject) => {
    const onError = (error: Error): void => {
      client.removeListener('ready', onReady);
      reject(new ConnectionError(classifySshError(error), target, error.message, { cause: error }));
    };
    const onReady = (): void => {
      client.removeListener('error', onError);
      resolve(client);
    };

    client.once('ready', onReady);
    client.once('error', onError);
    client.connect(config);
  });
}

/**
 * SSH handle.
 */
export class SshConnection implements ConnectionHandle {
  readonly kind: HandleKind = 'ssh';
  readonly protocol = 'ssh';
  readonly key: string;
  readonly target: string;
  private client?: Client;
  private ready = false;

  constructor(private readonly options: HandleFactoryOptions) {
    this.key = options.key;
    this.target = options.target.name;
  }

  async connect(): Promise<void> {
    const { target, via, connectTimeoutMs } = this.options;
    const host = via?.host ?? target.host;
    if (!host) {
      throw new ConnectionError('unreachable', target.name, 'No host configured');
    }

    const client = await openSshClient(
      {
        host,
        port: via?.port ?? target.sshPort,
        username: target.username,
        password: target.password,
        readyTimeout: connectTimeoutMs,
        tryKeyboard: false,
      },
      target.name
    );

    client.on('error', () => {
      this.ready = false;
    });
    client.on('close', () => {
      this.ready = false;
    });

    this.client = client;
    this.ready = true;
  }

  execute(request: CommandRequest): Promise<CommandOutput> {
    const client = this.requireClient();
    const sendsPassword = request.useSudo === true && this.options.target.password !== undefined;
    const command = request.useSudo ? wrapSudo(request.command, sendsPassword) : request.command;
    const startTime = Date.now();

    return new Promise<CommandOutput>((resolve, reject) => {
      client.exec(command, (error, channel) => {
        if (error) {
          reject(error);
          return;
        }

        let stdout = '';
        let stderr = '';

        const onAbort = (): void => {
          channel.close();
          reject(request.signal?.reason ?? new CancelledError());
        };
        if (request.signal?.aborted) {
          onAbort();
          return;
        }
        request.signal?.addEventListener('abort', onAbort, { once: true });

        channel.on('data', (chunk: Buffer) => {
          stdout += chunk.toString('utf-8');
        });
        channel.stderr.on('data', (chunk: Buffer) => {
          stderr += chunk.toString('utf-8');
        });
        channel.on('close', (code: number | null) => {
          request.signal?.removeEventListener('abort', onAbort);
          resolve({
            stdout,
            stderr,
            exitCode: code ?? -1,
            durationMs: Date.now() - startTime,
          });
        });

        if (sendsPassword) {
          writePassword(channel, this.options.target.password ?? '');
        }
      });
    });
  }

  readFile(path: string): Promise<string> {
    const client = this.requireClient();

    return new Promise<string>((resolve, reject) => {
      client.sftp((error, sftp) => {
        if (error) {
          reject(error);
          return;
        }
        sftp.readFile(path, (readError, data) => {
          sftp.end();
          if (readError) {
            reject(readError);
            return;
          }
          resolve(data.toString('utf-8'));
        });
      });
    });
  }

  async isAlive(): Promise<boolean> {
    return this.ready && this.client !== undefined;
  }

  async disconnect(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = undefined;
    this.ready = false;
    client.end();
  }

  private requireClient(): Client {
    if (!this.client || !this.ready) {
      throw new ConnectionError('unreachable', this.target, 'SSH session is not connected');
    }
    return this.client;
  }
}

function writePassword(channel: ClientChannel, password: string): void {
  channel.write(`${password}\n`);
}
