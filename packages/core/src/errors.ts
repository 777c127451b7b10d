/**
 * Errors
 *
 * Error taxonomy shared by the registry, analyzers and runner.
 */

/**
 * Kinds of engine errors. Step results carry the kind of the error that ended them.
 */
export type ErrorKind =
  | 'config'
  | 'connection'
  | 'command'
  | 'timeout'
  | 'expression'
  | 'cycle'
  | 'cancelled'
  | 'schema'
  | 'validation'
  | 'internal';

/**
 * Base class for all engine errors.
 */
export class RigcheckError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.kind = kind;
    this.name = 'RigcheckError';
  }
}

/**
 * Bad or missing connection or scenario configuration. Aborts the run before execution.
 */
export class ConfigError extends RigcheckError {
  constructor(
    message: string,
    public readonly target?: string
  ) {
    super('config', target ? `${target}: ${message}` : message);
    this.name = 'ConfigError';
  }
}

export type ConnectionFailureReason = 'unreachable' | 'auth-failure' | 'tunnel-setup-failure';

/**
 * A connection could not be established.
 */
export class ConnectionError extends RigcheckError {
  constructor(
    public readonly reason: ConnectionFailureReason,
    public readonly target: string,
    message: string,
    options?: ErrorOptions
  ) {
    super('connection', `${target} (${reason}): ${message}`, options);
    this.name = 'ConnectionError';
  }
}

/**
 * The command ran but its output (or HTTP status) marks it as failed.
 */
export class CommandError extends RigcheckError {
  constructor(
    message: string,
    public readonly output: string,
    public readonly signature?: string
  ) {
    super('command', message);
    this.name = 'CommandError';
  }
}

/**
 * An operation exceeded its time budget.
 */
export class TimeoutError extends RigcheckError {
  constructor(public readonly timeoutMs: number, what = 'Operation') {
    super('timeout', `${what} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Malformed entry-criteria expression.
 */
export class ExpressionError extends RigcheckError {
  constructor(
    message: string,
    public readonly expression: string,
    public readonly position?: number
  ) {
    super(
      'expression',
      position === undefined
        ? `${message} in "${expression}"`
        : `${message} at position ${position} in "${expression}"`
    );
    this.name = 'ExpressionError';
  }
}

/**
 * invoke_scenario reached a scenario that is already on the call chain.
 */
export class CycleError extends RigcheckError {
  constructor(public readonly chain: readonly string[]) {
    super('cycle', `Scenario invocation cycle: ${chain.join(' -> ')}`);
    this.name = 'CycleError';
  }
}

/**
 * The run was aborted from outside.
 */
export class CancelledError extends RigcheckError {
  constructor(message = 'Execution cancelled') {
    super('cancelled', message);
    this.name = 'CancelledError';
  }
}

/**
 * Get the kind of any thrown value.
 */
export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof RigcheckError ? error.kind : 'internal';
}

/**
 * Get the message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
