/**
 * Shared Utility Functions
 *
 * Common utilities used across rigcheck.
 */

import { TimeoutError } from '../errors.js';

// =============================================================================
// Abort Handling
// =============================================================================

/**
 * Settle with `work`, or reject with the signal's reason as soon as it aborts.
 * The work itself is not cancelled; callers pass the same signal into it.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * An abort scope linked to an optional parent signal, with an optional deadline.
 * Aborts with a TimeoutError when the deadline passes.
 */
export interface AbortScope {
  readonly signal: AbortSignal;
  abort(reason: unknown): void;
  /** Clear the timer and unlink from the parent */
  dispose(): void;
}

/**
 * Create an abort scope.
 *
 * @param parent - Signal whose abort propagates into the scope
 * @param timeoutMs - Deadline; omitted or non-positive means none
 * @param what - Label used in the timeout message
 */
export function createAbortScope(parent?: AbortSignal, timeoutMs?: number, what = 'Operation'): AbortScope {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => controller.abort(new TimeoutError(timeoutMs, what)), timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    abort: (reason) => controller.abort(reason),
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

// =============================================================================
// Input Validation
// =============================================================================

/**
 * Validate that a port number is valid.
 *
 * @throws Error if the port is invalid
 */
export function validatePort(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`${name} must be a valid port number (1-65535). Got: ${value}`);
  }
}

// =============================================================================
// Shell Escaping
// =============================================================================

/**
 * Escape a string for safe use in shell commands.
 *
 * Uses single quotes to prevent all shell interpretation.
 *
 * @example
 * escapeShellArg("it's fine"); // "'it'\\''s fine'"
 */
export function escapeShellArg(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/**
 * Wrap a command so it runs under sudo in a shell.
 *
 * @param readsPassword - sudo reads the password from stdin (`-S`) instead of failing (`-n`)
 */
export function wrapSudo(command: string, readsPassword: boolean): string {
  const flags = readsPassword ? "-S -p ''" : '-n';
  return `sudo ${flags} sh -c ${escapeShellArg(command)}`;
}

/**
 * Replace runs of non-word characters with a single underscore.
 *
 * @example
 * sanitizeFileName('Read CPU temp (BMC)'); // 'Read_CPU_temp_BMC_'
 */
export function sanitizeFileName(name: string): string {
  return name.replace(/\W+/g, '_');
}
