/**
 * Config Resolver
 *
 * Resolves environment variables ($VAR or ${VAR}) and turns raw sections into
 * connection targets.
 */

import {
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_REDFISH_PORT,
  DEFAULT_SSH_PORT,
  DEFAULT_TUNNEL_LOCAL_HOST,
  DEFAULT_TUNNEL_REDFISH_LOCAL_PORT,
  DEFAULT_TUNNEL_SSH_LOCAL_PORT,
} from '../constants.js';
import type { ConnectionTarget, TunnelSpec } from '../connections/types.js';
import { ConfigError } from '../errors.js';

import type { ConfigSection, ConfigValue, ConnectionSettings, RawConnectionConfig } from './types.js';

/** Section holding the shared connection settings */
export const SETTINGS_SECTION = 'Connection';

/** Suffix of the section describing a target's tunnel */
export const TUNNEL_SECTION_SUFFIX = 'Tunnel';

/**
 * Resolve a string value that is a $ENV_VAR or ${ENV_VAR} reference.
 *
 * @example
 * resolveEnvVar('$BMC_PASSWORD')  // Returns process.env.BMC_PASSWORD
 * resolveEnvVar('${BMC_PASSWORD}')  // Same
 * resolveEnvVar('10.0.0.5')  // Returns as-is
 */
export function resolveEnvVar(value: string): string {
  if (!value.startsWith('$')) {
    return value;
  }

  const braced = /^\$\{([^}]+)\}$/.exec(value);
  const envName = braced?.[1] ?? value.slice(1);
  const envValue = process.env[envName];

  if (envValue === undefined) {
    throw new Error(`Environment variable ${envName} is not set (referenced as ${value})`);
  }

  return envValue;
}

/**
 * Reads prefixed (`nodemanager_host`) or plain (`host`) keys from one section.
 */
class SectionReader {
  constructor(
    private readonly name: string,
    private readonly section: ConfigSection,
    private readonly prefix: string
  ) {}

  private raw(field: string): ConfigValue | undefined {
    const value = this.section[`${this.prefix}_${field}`] ?? this.section[field];
    return value === null ? undefined : value;
  }

  string(field: string): string | undefined {
    const value = this.raw(field);
    if (value === undefined) return undefined;
    if (typeof value !== 'string') return String(value);
    try {
      const resolved = resolveEnvVar(value);
      return resolved === '' ? undefined : resolved;
    } catch (error) {
      throw new ConfigError(error instanceof Error ? error.message : String(error), this.name);
    }
  }

  port(field: string, fallback: number): number {
    const value = this.raw(field);
    const text = typeof value === 'number' ? String(value) : this.string(field);
    if (text === undefined) return fallback;

    const port = Number(text);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`${field} must be a valid port number (1-65535). Got: ${text}`, this.name);
    }
    return port;
  }

  number(field: string, fallback: number): number {
    const value = this.raw(field);
    const text = typeof value === 'number' ? String(value) : this.string(field);
    if (text === undefined) return fallback;

    const parsed = Number(text);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new ConfigError(`${field} must be a positive number. Got: ${text}`, this.name);
    }
    return parsed;
  }

  boolean(field: string, fallback: boolean): boolean {
    const value = this.raw(field);
    if (typeof value === 'boolean') return value;
    const text = this.string(field);
    if (text === undefined) return fallback;
    return ['true', 'yes', '1', 'on'].includes(text.toLowerCase());
  }
}

/**
 * Resolve the `Connection` settings section.
 */
export function resolveSettings(config: RawConnectionConfig): ConnectionSettings {
  const reader = new SectionReader(SETTINGS_SECTION, config[SETTINGS_SECTION] ?? {}, 'connection');
  return {
    useSsl: reader.boolean('use_ssl', true),
    sshPort: reader.port('ssh_port', DEFAULT_SSH_PORT),
    redfishPort: reader.port('redfish_port', DEFAULT_REDFISH_PORT),
    timeoutMs: reader.number('timeout_seconds', DEFAULT_CONNECT_TIMEOUT_MS / 1000) * 1000,
  };
}

function resolveTunnel(
  config: RawConnectionConfig,
  name: string,
  prefix: string,
  credentials: { username?: string; password?: string }
): TunnelSpec {
  const sectionName = `${name}${TUNNEL_SECTION_SUFFIX}`;
  const reader = new SectionReader(sectionName, config[sectionName] ?? {}, prefix);

  return {
    agentHost: reader.string('tunnel_agent'),
    agentPort: reader.port('tunnel_agent_port', DEFAULT_SSH_PORT),
    username: reader.string('tunnel_username') ?? credentials.username,
    password: reader.string('tunnel_password') ?? credentials.password,
    localHost: reader.string('tunnel_local_host') ?? DEFAULT_TUNNEL_LOCAL_HOST,
    sshLocalPort: reader.port('tunnel_ssh_local_port', DEFAULT_TUNNEL_SSH_LOCAL_PORT),
    redfishLocalPort: reader.port('tunnel_redfish_local_port', DEFAULT_TUNNEL_REDFISH_LOCAL_PORT),
  };
}

/**
 * Resolve one target section.
 */
export function resolveTarget(
  config: RawConnectionConfig,
  name: string,
  settings: ConnectionSettings
): ConnectionTarget {
  const prefix = name.toLowerCase();
  const reader = new SectionReader(name, config[name] ?? {}, prefix);
  const username = reader.string('username');
  const password = reader.string('password');
  const tunnelled = reader.boolean('tunnel', false);

  return {
    name,
    host: reader.string('host'),
    sshPort: reader.port('ssh_port', settings.sshPort),
    redfishPort: reader.port('redfish_port', settings.redfishPort),
    username,
    password,
    useSsl: reader.boolean('use_ssl', settings.useSsl),
    tunnel: tunnelled ? resolveTunnel(config, name, prefix, { username, password }) : undefined,
    auth: username !== undefined && password !== undefined,
  };
}

/**
 * Whether a section describes a target (not settings, not a tunnel).
 */
export function isTargetSection(name: string): boolean {
  return name !== SETTINGS_SECTION && !(name.endsWith(TUNNEL_SECTION_SUFFIX) && name !== TUNNEL_SECTION_SUFFIX);
}
