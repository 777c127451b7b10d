/**
 * Local Connection
 *
 * Runs commands in a shell on the machine rigcheck runs on.
 */

import { spawn } from 'node:child_process';
import { readFile } from 'node:fs/promises';

import { CancelledError } from '../errors.js';
import { wrapSudo } from '../helpers/utils.js';

import type {
  CommandOutput,
  CommandRequest,
  ConnectionHandle,
  HandleFactoryOptions,
  HandleKind,
} from './types.js';

/**
 * Local shell handle.
 */
export class LocalConnection implements ConnectionHandle {
  readonly kind: HandleKind = 'local';
  readonly protocol = 'local';
  readonly key: string;
  readonly target: string;
  private connected = false;

  constructor(options: HandleFactoryOptions) {
    this.key = options.key;
    this.target = options.target.name;
  }

  async connect(): Promise<void> {
    this.connected = true;
  }

  execute(request: CommandRequest): Promise<CommandOutput> {
    const command = request.useSudo ? wrapSudo(request.command, false) : request.command;
    const startTime = Date.now();

    return new Promise<CommandOutput>((resolve, reject) => {
      const child = spawn(command, { shell: true, stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';

      const onAbort = (): void => {
        child.kill('SIGKILL');
        reject(request.signal?.reason ?? new CancelledError());
      };
      request.signal?.addEventListener('abort', onAbort, { once: true });

      child.stdout.setEncoding('utf-8');
      child.stderr.setEncoding('utf-8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        request.signal?.removeEventListener('abort', onAbort);
        reject(error);
      });

      child.on('close', (code) => {
        request.signal?.removeEventListener('abort', onAbort);
        resolve({
          stdout,
          stderr,
          exitCode: code ?? -1,
          durationMs: Date.now() - startTime,
        });
      });
    });
  }

  readFile(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  async isAlive(): Promise<boolean> {
    return this.connected;
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }
}
