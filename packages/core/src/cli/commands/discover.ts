/**
 * Discover Command
 *
 * Probe every configured connection and report its health.
 */

import type { ConnectionReference } from '../../connections/registry.js';
import type { ConnectionHealth, ConnectionTarget } from '../../connections/types.js';
import type { Logger } from '../../logger.js';
import type { CliOptions } from '../options.js';
import * as output from '../utils/output.js';
import { createCliLogger, createCliRegistry, loadCliConfig } from '../utils/session.js';

/**
 * Outcome of probing one connection.
 * - SUCCESS: connected and the liveness probe passed
 * - PARTIAL: connected but the liveness probe failed
 * - FAILED: the connection could not be established
 * - ERROR: the probe could not be attempted (configuration or internal error)
 */
export type ProbeStatus = 'SUCCESS' | 'PARTIAL' | 'FAILED' | 'ERROR';

export interface ProbeResult extends ConnectionHealth {
  status: ProbeStatus;
}

/**
 * Counts for one group of probes.
 */
export interface ProbeCounts {
  total: number;
  success: number;
  partial: number;
  failed: number;
  error: number;
}

export interface DiscoveryStatistics {
  status: ProbeStatus;
  counts: ProbeCounts;
  byKind: Record<string, ProbeCounts>;
  byTarget: Record<string, ProbeCounts>;
  latency?: { avgMs: number; minMs: number; maxMs: number };
}

/**
 * Classify one probe.
 */
export function probeStatus(health: ConnectionHealth): ProbeStatus {
  if (health.healthy) return 'SUCCESS';
  if (health.error === undefined) return 'PARTIAL';
  return health.errorKind === 'connection' || health.errorKind === 'timeout' ? 'FAILED' : 'ERROR';
}

function emptyCounts(): ProbeCounts {
  return { total: 0, success: 0, partial: 0, failed: 0, error: 0 };
}

function count(counts: ProbeCounts, status: ProbeStatus): void {
  counts.total++;
  switch (status) {
    case 'SUCCESS':
      counts.success++;
      break;
    case 'PARTIAL':
      counts.partial++;
      break;
    case 'FAILED':
      counts.failed++;
      break;
    case 'ERROR':
      counts.error++;
      break;
  }
}

/**
 * Aggregate probe results.
 *
 * Overall status is SUCCESS when every probe succeeded, PARTIAL when some
 * connected, and otherwise ERROR if any probe errored, else FAILED. Latency
 * covers the probes that connected.
 */
export function summarizeDiscovery(results: readonly ProbeResult[]): DiscoveryStatistics {
  const counts = emptyCounts();
  const byKind: Record<string, ProbeCounts> = {};
  const byTarget: Record<string, ProbeCounts> = {};

  for (const result of results) {
    count(counts, result.status);
    count((byKind[result.kind] ??= emptyCounts()), result.status);
    count((byTarget[result.target] ??= emptyCounts()), result.status);
  }

  let status: ProbeStatus;
  if (counts.total > 0 && counts.success === counts.total) {
    status = 'SUCCESS';
  } else if (counts.success + counts.partial > 0) {
    status = 'PARTIAL';
  } else if (counts.error > 0 || counts.total === 0) {
    status = 'ERROR';
  } else {
    status = 'FAILED';
  }

  const latencies = results
    .filter((result) => result.status === 'SUCCESS' || result.status === 'PARTIAL')
    .map((result) => result.latencyMs);
  const latency =
    latencies.length > 0
      ? {
          avgMs: Math.round(latencies.reduce((sum, ms) => sum + ms, 0) / latencies.length),
          minMs: Math.min(...latencies),
          maxMs: Math.max(...latencies),
        }
      : undefined;

  return { status, counts, byKind, byTarget, latency };
}

/**
 * Target/protocol pairs worth probing: local, and SSH and Redfish for every
 * target with a host.
 */
export function discoveryReferences(targets: readonly ConnectionTarget[]): ConnectionReference[] {
  const references: ConnectionReference[] = [{ target: 'local', protocol: 'local' }];
  for (const target of targets) {
    if (!target.host) continue;
    references.push({ target: target.name, protocol: 'ssh' }, { target: target.name, protocol: 'redfish' });
  }
  return references;
}

function printResults(results: readonly ProbeResult[], statistics: DiscoveryStatistics): void {
  output.header('Connection discovery');
  output.table(
    results.map((result) => ({
      Connection: result.target,
      Protocol: result.protocol,
      Kind: result.kind,
      Status: output.statusCell(result.status),
      Latency: output.formatDuration(result.latencyMs),
      Details: output.truncate(result.error ?? '', 60),
    }))
  );

  const { counts, latency } = statistics;
  const status = output.color(output.statusStyle(statistics.status), statistics.status);
  console.log('');
  console.log(
    `Status: ${status} (${counts.success} success, ${counts.partial} partial, ` +
      `${counts.failed} failed, ${counts.error} error of ${counts.total})`
  );
  for (const [kind, kindCounts] of Object.entries(statistics.byKind)) {
    output.dim(`  ${kind}: ${kindCounts.success}/${kindCounts.total} successful`);
  }
  for (const [target, targetCounts] of Object.entries(statistics.byTarget)) {
    output.dim(`  ${target}: ${targetCounts.success}/${targetCounts.total} successful`);
  }
  if (latency) {
    output.dim(`  Latency: avg ${latency.avgMs}ms, min ${latency.minMs}ms, max ${latency.maxMs}ms`);
  }
}

/**
 * Probe every configured connection.
 */
export async function discoverConnections(
  options: CliOptions,
  logger: Logger
): Promise<{ results: ProbeResult[]; statistics: DiscoveryStatistics }> {
  const config = loadCliConfig(options, true);
  const registry = createCliRegistry(config, logger);
  registry.initialize(config.targets);

  try {
    const health = await registry.checkAll(discoveryReferences(config.targets));
    const results = [...health.values()].map((entry) => ({ ...entry, status: probeStatus(entry) }));
    return { results, statistics: summarizeDiscovery(results) };
  } finally {
    await registry.releaseAll();
  }
}

/**
 * Execute `--discover_connections`.
 *
 * @returns Exit code; 0 only when every connection succeeded
 */
export async function discoverCommand(options: CliOptions): Promise<number> {
  const logger = createCliLogger(options);
  const { results, statistics } = await discoverConnections(options, logger);
  printResults(results, statistics);
  return statistics.status === 'SUCCESS' ? 0 : 1;
}
