/**
 * Connection Configuration Types
 *
 * Shape of the connection configuration JSON file.
 */

import { z } from 'zod';

import type { ConnectionTarget } from '../connections/types.js';

/**
 * A scalar config value. Strings starting with `$` are environment references.
 */
export const configValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type ConfigValue = z.infer<typeof configValueSchema>;

/**
 * One flat section of key/value pairs.
 */
export const configSectionSchema = z.record(configValueSchema);

export type ConfigSection = z.infer<typeof configSectionSchema>;

/**
 * The whole document: named sections.
 */
export const connectionConfigSchema = z.record(
  z.string().min(1, 'Section names must be non-empty'),
  configSectionSchema
);

export type RawConnectionConfig = z.infer<typeof connectionConfigSchema>;

/**
 * Settings from the `Connection` section.
 */
export interface ConnectionSettings {
  useSsl: boolean;
  sshPort: number;
  redfishPort: number;
  /** Connect and default command timeout */
  timeoutMs: number;
}

/**
 * Loaded connection configuration.
 */
export interface ConnectionConfig {
  /** File it was read from, when loaded from disk */
  path?: string;
  settings: ConnectionSettings;
  targets: ConnectionTarget[];
}
