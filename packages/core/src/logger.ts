/**
 * Logger
 *
 * Minimal leveled logger used by the engine. The CLI wires it to the
 * terminal and, with --log-path, to a run log file.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Write function for console logging, keyed by level.
 */
export type LineWriter = (level: LogLevel, message: string) => void;

/**
 * Create a logger that forwards to a line writer.
 * Debug lines are only written when verbose.
 */
export function createLogger(write: LineWriter, verbose = false): Logger {
  return {
    debug: (message) => {
      if (verbose) write('debug', message);
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

/**
 * Create a logger that appends timestamped lines to a file.
 */
export function createFileLogger(filePath: string): Logger {
  mkdirSync(dirname(filePath), { recursive: true });
  return createLogger((level, message) => {
    appendFileSync(filePath, `${new Date().toISOString()} [${level.toUpperCase()}] ${message}\n`);
  }, true);
}

/**
 * Fan a log line out to several loggers.
 */
export function combineLoggers(...loggers: Logger[]): Logger {
  return {
    debug: (message) => loggers.forEach((l) => l.debug(message)),
    info: (message) => loggers.forEach((l) => l.info(message)),
    warn: (message) => loggers.forEach((l) => l.warn(message)),
    error: (message) => loggers.forEach((l) => l.error(message)),
  };
}
