/**
 * Tests for connection configuration loading
 */
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from 'vitest';

import {
  emptyConnectionConfig,
  findConfigFile,
  loadConnectionConfig,
  parseConnectionConfig,
} from '../../config/loader.js';
import { isTargetSection, resolveEnvVar } from '../../config/resolver.js';
import { ConfigError } from '../../errors.js';

let TEST_DIR = '';

beforeAll(() => {
  TEST_DIR = mkdtempSync(join(tmpdir(), 'rigcheck-config-tests-'));
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('resolveEnvVar', () => {
  it('should return plain values as-is', () => {
    expect(resolveEnvVar('10.0.0.5')).toBe('10.0.0.5');
  });

  it('should resolve $VAR references', () => {
    vi.stubEnv('RIGCHECK_TEST_HOST', 'bmc.lab');
    expect(resolveEnvVar('$RIGCHECK_TEST_HOST')).toBe('bmc.lab');
  });

  it('should resolve ${VAR} references', () => {
    vi.stubEnv('RIGCHECK_TEST_HOST', 'bmc.lab');
    expect(resolveEnvVar('${RIGCHECK_TEST_HOST}')).toBe('bmc.lab');
    expect(() => resolveEnvVar('${RIGCHECK_TEST_NEVER_SET}')).toThrow(
      'Environment variable RIGCHECK_TEST_NEVER_SET is not set (referenced as ${RIGCHECK_TEST_NEVER_SET})'
    );
  });

  it('should throw for unset variables', () => {
    expect(() => resolveEnvVar('$RIGCHECK_TEST_NEVER_SET')).toThrow(
      'Environment variable RIGCHECK_TEST_NEVER_SET is not set (referenced as $RIGCHECK_TEST_NEVER_SET)'
    );
  });
});

describe('isTargetSection', () => {
  it('should skip settings and tunnel sections', () => {
    expect(isTargetSection('Connection')).toBe(false);
    expect(isTargetSection('NodeManagerTunnel')).toBe(false);
    expect(isTargetSection('NodeManager')).toBe(true);
    expect(isTargetSection('Tunnel')).toBe(true);
  });
});

describe('parseConnectionConfig', () => {
  it('should resolve settings and prefixed target keys', () => {
    vi.stubEnv('RIGCHECK_TEST_PASSWORD', 'test-secret');

    const config = parseConnectionConfig({
      Connection: { connection_ssh_port: 2200, timeout_seconds: 10 },
      Inband: {
        inband_host: '10.0.0.5',
        inband_username: 'admin',
        inband_password: '$RIGCHECK_TEST_PASSWORD',
      },
    });

    expect(config.settings).toEqual({ useSsl: true, sshPort: 2200, redfishPort: 443, timeoutMs: 10000 });
    expect(config.targets).toEqual([
      {
        name: 'Inband',
        host: '10.0.0.5',
        sshPort: 2200,
        redfishPort: 443,
        username: 'admin',
        password: 'test-secret',
        useSsl: true,
        tunnel: undefined,
        auth: true,
      },
    ]);
  });

  it('should accept unprefixed keys and per-target overrides', () => {
    const [target] = parseConnectionConfig({
      Bmc: { host: 'bmc.lab', redfish_port: '8443', use_ssl: 'no', username: 'root' },
    }).targets;

    expect(target).toMatchObject({
      name: 'Bmc',
      host: 'bmc.lab',
      redfishPort: 8443,
      useSsl: false,
      auth: false,
    });
  });

  it('should resolve the tunnel section of a tunnelled target', () => {
    const config = parseConnectionConfig({
      NodeManager: {
        nodemanager_host: '192.168.1.20',
        nodemanager_username: 'admin',
        nodemanager_password: 'test-secret',
        nodemanager_tunnel: true,
      },
      NodeManagerTunnel: {
        nodemanager_tunnel_agent: 'agent.local',
        nodemanager_tunnel_ssh_local_port: 2022,
      },
    });

    expect(config.targets).toHaveLength(1);
    expect(config.targets[0]?.tunnel).toEqual({
      agentHost: 'agent.local',
      agentPort: 22,
      username: 'admin',
      password: 'test-secret',
      localHost: 'localhost',
      sshLocalPort: 2022,
      redfishLocalPort: 8443,
    });
  });

  it('should name the target of an unset environment reference', () => {
    expect(() =>
      parseConnectionConfig({ Inband: { inband_host: '$RIGCHECK_TEST_NEVER_SET' } })
    ).toThrow('Inband: Environment variable RIGCHECK_TEST_NEVER_SET is not set');
  });

  it('should reject invalid ports', () => {
    expect(() => parseConnectionConfig({ Inband: { inband_ssh_port: 70000 } })).toThrow(
      'Inband: ssh_port must be a valid port number (1-65535). Got: 70000'
    );
  });

  it('should reject sections that are not objects', () => {
    expect(() => parseConnectionConfig({ Inband: 'nope' })).toThrow(
      'Invalid connection configuration at Inband: Expected object, received string'
    );
  });

  it('should build an empty configuration', () => {
    const config = emptyConnectionConfig();

    expect(config.targets).toEqual([]);
    expect(config.settings.timeoutMs).toBe(30000);
  });
});

describe('findConfigFile', () => {
  it('should search parent directories', () => {
    const root = join(TEST_DIR, 'search');
    const nested = join(root, 'a', 'b');
    mkdirSync(nested, { recursive: true });
    writeFileSync(join(root, 'connection_config.json'), '{}');

    expect(findConfigFile(nested)).toBe(join(root, 'connection_config.json'));
  });

  it('should prefer rigcheck.connections.json', () => {
    const root = join(TEST_DIR, 'priority');
    mkdirSync(root, { recursive: true });
    writeFileSync(join(root, 'connection_config.json'), '{}');
    writeFileSync(join(root, 'rigcheck.connections.json'), '{}');

    expect(findConfigFile(root)).toBe(join(root, 'rigcheck.connections.json'));
  });
});

describe('loadConnectionConfig', () => {
  it('should load a file and record its path', () => {
    const path = join(TEST_DIR, 'lab.json');
    writeFileSync(path, JSON.stringify({ Lab: { lab_host: 'lab.local' } }));

    const config = loadConnectionConfig(path);

    expect(config.path).toBe(path);
    expect(config.targets.map((target) => target.host)).toEqual(['lab.local']);
  });

  it('should fail for a missing file', () => {
    const path = join(TEST_DIR, 'missing.json');

    expect(() => loadConnectionConfig(path)).toThrow(`Config file not found: ${path}`);
  });

  it('should fail for malformed JSON', () => {
    const path = join(TEST_DIR, 'broken.json');
    writeFileSync(path, '{ not json');

    expect(() => loadConnectionConfig(path)).toThrow(ConfigError);
    expect(() => loadConnectionConfig(path)).toThrow(`Failed to read config file ${path}`);
  });
});
