/**
 * Reporters Module
 *
 * Run result output formatters.
 */

// Types
export type { Reporter, ReporterOptions, ConsoleReporterOptions } from './types.js';

// Console Reporter
export { ConsoleReporter, createConsoleReporter } from './console.js';
