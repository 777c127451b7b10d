/**
 * Redfish Connection
 *
 * Issues Redfish REST requests through an undici dispatcher.
 */

import { Agent, request, type Dispatcher } from 'undici';
import { z } from 'zod';

import { REDFISH_SERVICE_ROOT } from '../constants.js';
import { CommandError, ConnectionError, errorMessage } from '../errors.js';

import type {
  CommandOutput,
  CommandRequest,
  ConnectionHandle,
  HandleFactoryOptions,
  HandleKind,
} from './types.js';

const REDFISH_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export type RedfishMethod = (typeof REDFISH_METHODS)[number];

/**
 * A parsed Redfish request.
 */
export interface RedfishRequest {
  method: RedfishMethod;
  path: string;
  headers: Record<string, string>;
  body?: unknown;
}

const redfishRequestSchema = z.object({
  method: z
    .string()
    .transform((m) => m.toUpperCase())
    .pipe(z.enum(REDFISH_METHODS))
    .default('GET'),
  path: z.string().startsWith('/'),
  headers: z.record(z.string()).default({}),
  body: z.unknown().optional(),
});

const METHOD_LINE = /^([A-Za-z]+)\s+(\S+)(?:\s+([\s\S]+))?$/;

function isRedfishMethod(value: string): value is RedfishMethod {
  return REDFISH_METHODS.some((m) => m === value);
}

/**
 * Parse the step command of a Redfish step.
 *
 * Accepts `/path` (GET), `METHOD /path [json-body]`, or a JSON object
 * `{ "method", "path", "headers", "body" }`.
 *
 * @throws CommandError if the command is not a recognizable request
 */
export function parseRedfishCommand(command: string): RedfishRequest {
  const text = command.trim();

  if (text.startsWith('{')) {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new CommandError(`Invalid Redfish request JSON: ${errorMessage(error)}`, '');
    }
    const parsed = redfishRequestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CommandError(`Invalid Redfish request: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, '');
    }
    return parsed.data;
  }

  if (text.startsWith('/')) {
    return { method: 'GET', path: text, headers: {} };
  }

  const match = METHOD_LINE.exec(text);
  const method = match?.[1].toUpperCase();
  if (!match || !method || !isRedfishMethod(method)) {
    throw new CommandError(`Unrecognized Redfish request: ${text}`, '');
  }

  const request: RedfishRequest = { method, path: match[2], headers: {} };
  if (match[3] !== undefined) {
    try {
      request.body = JSON.parse(match[3]);
    } catch (error) {
      throw new CommandError(`Invalid Redfish request body: ${errorMessage(error)}`, '');
    }
  }
  return request;
}

/**
 * Redfish handle.
 */
export class RedfishConnection implements ConnectionHandle {
  readonly kind: HandleKind = 'redfish';
  readonly protocol = 'redfish';
  readonly key: string;
  readonly target: string;
  private dispatcher?: Agent;
  private baseUrl = '';

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

    const scheme = target.useSsl ? 'https' : 'http';
    this.baseUrl = `${scheme}://${host}:${via?.port ?? target.redfishPort}`;
    const dispatcher = new Agent({
      connect: { rejectUnauthorized: false, timeout: connectTimeoutMs },
    });

    let status: number;
    try {
      const response = await this.send(dispatcher, { method: 'GET', path: REDFISH_SERVICE_ROOT, headers: {} });
      status = response.statusCode;
    } catch (error) {
      await dispatcher.close();
      throw new ConnectionError('unreachable', target.name, errorMessage(error), { cause: error });
    }

    if (status === 401 || status === 403) {
      await dispatcher.close();
      throw new ConnectionError('auth-failure', target.name, `Service root returned HTTP ${status}`);
    }
    if (status >= 400) {
      await dispatcher.close();
      throw new ConnectionError('unreachable', target.name, `Service root returned HTTP ${status}`);
    }

    this.dispatcher = dispatcher;
  }

  async execute(command: CommandRequest): Promise<CommandOutput> {
    const dispatcher = this.requireDispatcher();
    const startTime = Date.now();
    const response = await this.send(dispatcher, parseRedfishCommand(command.command), command.signal);

    return {
      stdout: response.body,
      stderr: '',
      statusCode: response.statusCode,
      durationMs: Date.now() - startTime,
    };
  }

  async readFile(path: string): Promise<string> {
    const response = await this.send(this.requireDispatcher(), { method: 'GET', path, headers: {} });
    if (response.statusCode >= 400) {
      throw new CommandError(`GET ${path} returned HTTP ${response.statusCode}`, response.body);
    }
    return response.body;
  }

  async isAlive(): Promise<boolean> {
    return this.dispatcher !== undefined;
  }

  async disconnect(): Promise<void> {
    if (!this.dispatcher) return;
    const dispatcher = this.dispatcher;
    this.dispatcher = undefined;
    await dispatcher.close();
  }

  private async send(
    dispatcher: Dispatcher,
    req: RedfishRequest,
    signal?: AbortSignal
  ): Promise<{ statusCode: number; body: string }> {
    const { target } = this.options;
    const headers: Record<string, string> = { accept: 'application/json', ...req.headers };
    if (target.username !== undefined && target.password !== undefined) {
      headers['authorization'] = `Basic ${Buffer.from(`${target.username}:${target.password}`).toString('base64')}`;
    }

    let body: string | undefined;
    if (req.body !== undefined) {
      body = JSON.stringify(req.body);
      headers['content-type'] = 'application/json';
    }

    const response = await request(`${this.baseUrl}${req.path}`, {
      method: req.method,
      headers,
      body,
      dispatcher,
      signal,
    });

    return { statusCode: response.statusCode, body: await response.body.text() };
  }

  private requireDispatcher(): Dispatcher {
    if (!this.dispatcher) {
      throw new ConnectionError('unreachable', this.target, 'Redfish session is not connected');
    }
    return this.dispatcher;
  }
}
