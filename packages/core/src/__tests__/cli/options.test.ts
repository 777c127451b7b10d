/**
 * CLI Option Tests
 */
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';

import { Command } from 'commander';
import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';

import { schemaCheckCommand } from '../../cli/commands/schema-check.js';
import { dispatch } from '../../cli/index.js';
import { addRootOptions, normalizeArgv, type CliOptions } from '../../cli/options.js';
import { formatDuration, formatTable, statusStyle, truncate } from '../../cli/utils/output.js';
import { resolveLogDir } from '../../cli/utils/session.js';

function parse(args: string[]): CliOptions {
  let parsed: CliOptions | undefined;
  addRootOptions(new Command())
    .exitOverride()
    .action((options: CliOptions) => {
      parsed = options;
    })
    .parse(normalizeArgv(args), { from: 'user' });
  if (!parsed) throw new Error('No options parsed');
  return parsed;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('normalizeArgv', () => {
  it('should expand multi-letter short aliases', () => {
    expect(normalizeArgv(['node', 'rigcheck', '-dc'])).toEqual(['node', 'rigcheck', '--discover_connections']);
    expect(normalizeArgv(['-rdc', '-rsc', 'schema.json', '-lsc', '-ls', '-cc', 'conn.json'])).toEqual([
      '--run_with_discover_connections',
      '--run_with_schema_check',
      'schema.json',
      '--list_scenarios_with_connections',
      '--list_scenarios',
      '--conn_config',
      'conn.json',
    ]);
  });

  it('should leave other arguments alone', () => {
    expect(normalizeArgv(['-v', '-l', '--test_id', '-dc1'])).toEqual(['-v', '-l', '--test_id', '-dc1']);
  });
});

describe('addRootOptions', () => {
  it('should apply defaults', () => {
    const options = parse([]);

    expect(options.test_dir).toBe('./scenarios');
    expect(options.concurrency).toBe(1);
    expect(options.verbose).toBeUndefined();
  });

  it('should parse filters and paths', () => {
    const options = parse([
      '--test_id',
      'TC-1',
      '--test_dir',
      'suites',
      '--log-path',
      'out/logs',
      '-cc',
      'conn.json',
      '--concurrency',
      '4',
      '--tags',
      'power',
      'bmc',
    ]);

    expect(options).toMatchObject({
      test_id: 'TC-1',
      test_dir: 'suites',
      logPath: 'out/logs',
      conn_config: 'conn.json',
      concurrency: 4,
      tags: ['power', 'bmc'],
    });
  });

  it('should parse mode flags from their aliases', () => {
    expect(parse(['-rdc'])).toMatchObject({ run_with_discover_connections: true });
    expect(parse(['-lsc'])).toMatchObject({ list_scenarios_with_connections: true });
    expect(parse(['-l', '-v'])).toMatchObject({ list: true, verbose: true });
    expect(parse(['-rsc', 'scenario.schema.json'])).toMatchObject({ run_with_schema_check: 'scenario.schema.json' });
    expect(parse(['--schema_check', 'config', 'config.schema.json', 'conn.json'])).toMatchObject({
      schema_check: ['config', 'config.schema.json', 'conn.json'],
    });
  });

  it('should reject a non-positive concurrency', () => {
    expect(() => parse(['--concurrency', '0'])).toThrow('--concurrency must be a positive integer. Got: 0');
  });
});

describe('resolveLogDir', () => {
  it('should prefer --log-path over the workspace', () => {
    expect(resolveLogDir({ test_dir: '.', concurrency: 1, logPath: 'out', workspace: 'ws' })).toBe(resolve('out'));
    expect(resolveLogDir({ test_dir: '.', concurrency: 1, workspace: 'ws' })).toBe(resolve('ws', 'logs'));
    expect(resolveLogDir({ test_dir: '.', concurrency: 1 })).toBeUndefined();
  });
});

describe('schemaCheckCommand', () => {
  const CONFIG_SCHEMA = {
    type: 'object',
    properties: {
      Inband: { type: 'object', required: ['host'], properties: { host: { type: 'string' } } },
    },
  };
  const SCENARIO_SCHEMA = {
    type: 'object',
    required: ['test_scenario'],
    properties: { test_scenario: { type: 'object', required: ['test_id'] } },
  };

  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rigcheck-cli-schema-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeJson(name: string, value: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(value));
    return path;
  }

  it('should reject the wrong number of arguments', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(schemaCheckCommand(['scenario', 'schema.json'])).toBe(1);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0]?.[0]).toContain(
      '--schema_check takes exactly three arguments: <config|scenario> <schema.json> <file-or-dir>'
    );
  });

  it('should reject an unknown document kind', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(schemaCheckCommand(['playbook', 'schema.json', 'doc.yaml'])).toBe(1);
    expect(errorSpy.mock.calls[0]?.[0]).toContain('Unsupported schema kind "playbook" (supported: config, scenario)');
  });

  it('should accept a conforming connection config', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const schemaPath = writeJson('config.schema.json', CONFIG_SCHEMA);
    const configPath = writeJson('conn.json', { Inband: { host: '10.0.0.5' } });

    expect(schemaCheckCommand(['config', schemaPath, configPath])).toBe(0);
    expect(logSpy.mock.calls[0]?.[0]).toContain(`${configPath} is a valid config document`);
  });

  it('should list the violations of a connection config', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const schemaPath = writeJson('config.schema.json', CONFIG_SCHEMA);
    const configPath = writeJson('conn.json', { Inband: { host: 5 } });

    expect(schemaCheckCommand(['config', schemaPath, configPath])).toBe(1);
    expect(errorSpy.mock.calls[0]?.[0]).toContain(`${configPath} is not valid against ${schemaPath}`);
    expect(logSpy.mock.calls.map((call) => call[0])).toEqual(['  ✗ /Inband/host: must be string']);
  });

  it('should stop a run when a scenario fails the schema', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const schemaPath = writeJson('scenario.schema.json', SCENARIO_SCHEMA);
    const testDir = join(dir, 'scenarios');
    mkdirSync(testDir);
    writeFileSync(join(testDir, 'broken.yaml'), 'steps: []\n');

    const code = await dispatch({ test_dir: testDir, concurrency: 1, run_with_schema_check: schemaPath });

    expect(code).toBe(1);
    expect(errorSpy.mock.calls.map((call) => String(call[0]))).toEqual([
      expect.stringContaining(`${join(testDir, 'broken.yaml')} is not valid against ${schemaPath}`),
      expect.stringContaining('Schema check failed; nothing was run'),
    ]);
  });
});

describe('output helpers', () => {
  it('should truncate long text', () => {
    expect(truncate('short', 10)).toBe('short');
    expect(truncate('a long connection error', 10)).toBe('a long ...');
  });

  it('should format durations', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });

  it('should pad table columns to the widest cell', () => {
    const lines = formatTable([
      { Target: 'Inband', Port: 22 },
      { Target: 'NM', Port: 2222 },
    ]);

    expect(lines).toHaveLength(4);
    expect(lines.slice(2)).toEqual(['Inband  22  ', 'NM      2222']);
    expect(formatTable([])).toEqual([]);
  });

  it('should style status words', () => {
    expect(statusStyle('SUCCESS')).toBe('green');
    expect(statusStyle('PARTIAL')).toBe('yellow');
    expect(statusStyle('skipped')).toBe('yellow');
    expect(statusStyle('ERROR')).toBe('red');
    expect(statusStyle('no')).toBe('red');
    expect(statusStyle('pending')).toBe('dim');
  });
});
