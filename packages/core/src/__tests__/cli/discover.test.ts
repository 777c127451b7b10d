/**
 * Connection Discovery Tests
 */

import { describe, it, expect } from 'vitest';

import {
  discoveryReferences,
  probeStatus,
  summarizeDiscovery,
  type ProbeResult,
} from '../../cli/commands/discover.js';
import type { ConnectionHealth } from '../../connections/types.js';
import { createMockTarget, createTunnelTarget } from '../fixtures/fake-connections.js';

function createHealth(overrides: Partial<ConnectionHealth> = {}): ConnectionHealth {
  return {
    target: 'Inband',
    protocol: 'ssh',
    kind: 'ssh',
    healthy: true,
    latencyMs: 10,
    ...overrides,
  };
}

function createProbe(overrides: Partial<ConnectionHealth> = {}): ProbeResult {
  const health = createHealth(overrides);
  return { ...health, status: probeStatus(health) };
}

describe('probeStatus', () => {
  it('should classify probes', () => {
    expect(probeStatus(createHealth())).toBe('SUCCESS');
    expect(probeStatus(createHealth({ healthy: false }))).toBe('PARTIAL');
    expect(probeStatus(createHealth({ healthy: false, error: 'refused', errorKind: 'connection' }))).toBe('FAILED');
    expect(probeStatus(createHealth({ healthy: false, error: 'slow', errorKind: 'timeout' }))).toBe('FAILED');
    expect(probeStatus(createHealth({ healthy: false, error: 'Missing host', errorKind: 'config' }))).toBe('ERROR');
  });
});

describe('summarizeDiscovery', () => {
  it('should succeed when every probe succeeded', () => {
    const statistics = summarizeDiscovery([
      createProbe({ target: 'local', protocol: 'local', kind: 'local', latencyMs: 2 }),
      createProbe({ latencyMs: 10 }),
      createProbe({ protocol: 'redfish', kind: 'redfish', latencyMs: 30 }),
    ]);

    expect(statistics.status).toBe('SUCCESS');
    expect(statistics.counts).toEqual({ total: 3, success: 3, partial: 0, failed: 0, error: 0 });
    expect(statistics.byTarget['Inband']).toEqual({ total: 2, success: 2, partial: 0, failed: 0, error: 0 });
    expect(statistics.latency).toEqual({ avgMs: 14, minMs: 2, maxMs: 30 });
  });

  it('should be partial when some probes connected', () => {
    const statistics = summarizeDiscovery([
      createProbe({ latencyMs: 10 }),
      createProbe({ protocol: 'redfish', kind: 'redfish', healthy: false, error: 'refused', errorKind: 'connection' }),
    ]);

    expect(statistics.status).toBe('PARTIAL');
    expect(statistics.byKind['redfish']).toEqual({ total: 1, success: 0, partial: 0, failed: 1, error: 0 });
    expect(statistics.latency).toEqual({ avgMs: 10, minMs: 10, maxMs: 10 });
  });

  it('should prefer ERROR over FAILED when nothing connected', () => {
    const failed = createProbe({ healthy: false, error: 'refused', errorKind: 'connection' });
    const errored = createProbe({ healthy: false, error: 'Missing host', errorKind: 'config' });

    expect(summarizeDiscovery([failed]).status).toBe('FAILED');
    expect(summarizeDiscovery([failed, errored]).status).toBe('ERROR');
    expect(summarizeDiscovery([failed]).latency).toBeUndefined();
  });

  it('should report ERROR for no probes', () => {
    expect(summarizeDiscovery([]).status).toBe('ERROR');
  });
});

describe('discoveryReferences', () => {
  it('should probe local plus ssh and redfish per target with a host', () => {
    const references = discoveryReferences([
      createMockTarget(),
      createTunnelTarget(),
      createMockTarget({ name: 'Spare', host: undefined }),
    ]);

    expect(references).toEqual([
      { target: 'local', protocol: 'local' },
      { target: 'Inband', protocol: 'ssh' },
      { target: 'Inband', protocol: 'redfish' },
      { target: 'NodeManager', protocol: 'ssh' },
      { target: 'NodeManager', protocol: 'redfish' },
    ]);
  });
});
