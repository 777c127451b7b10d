/**
 * Result Builder Tests
 */
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect } from 'vitest';

import { OutputStore } from '../../runner/output-store.js';
import { ResultBuilder } from '../../runner/result-builder.js';
import type { ScenarioResult, StepResult } from '../../runner/types.js';

function createStepResult(stepId: string, overrides: Partial<StepResult> = {}): StepResult {
  return {
    scenarioId: 'A',
    stepId,
    stepName: `Step ${stepId}`,
    stepType: 'command_execution',
    status: 'passed',
    durationMs: 5,
    iterations: 1,
    connection: { target: 'local', protocol: 'local' },
    tolerated: false,
    parameters: {},
    ...overrides,
  };
}

function createScenarioResult(scenarioId: string, overrides: Partial<ScenarioResult> = {}): ScenarioResult {
  return {
    scenarioId,
    scenarioName: `Scenario ${scenarioId}`,
    file: `/scenarios/${scenarioId}.yaml`,
    status: 'passed',
    durationMs: 10,
    steps: [],
    nested: [],
    parameters: {},
    ...overrides,
  };
}

describe('ResultBuilder', () => {
  it('should count steps by status', () => {
    const results = new ResultBuilder();
    results.record(createStepResult('s1'));
    results.record(createStepResult('s2', { status: 'failed', error: 'Expected text "OK" not found in output' }));
    results.record(createStepResult('s3', { status: 'skipped', skipReason: 'aborted' }));
    results.record(createStepResult('s4', { status: 'error', errorKind: 'timeout', error: 'Command timed out' }));

    const summary = results.summary();

    expect(summary).toMatchObject({ total: 4, passed: 1, failed: 1, skipped: 1, errors: 1 });
    expect(summary.failureDetails.map((detail) => detail.stepId)).toEqual(['s2', 's4']);
  });

  it('should describe a failed step', () => {
    const results = new ResultBuilder();
    results.record(
      createStepResult('s1', {
        status: 'failed',
        errorKind: 'validation',
        message: 'Expected exactly "OK", got "FAIL"',
        error: 'Expected exactly "OK", got "FAIL"',
        expected: 'OK',
        output: 'FAIL',
        connection: { target: 'Inband', protocol: 'ssh' },
        tolerated: true,
      })
    );

    expect(results.summary().failureDetails).toEqual([
      {
        scenarioId: 'A',
        parentScenarioId: undefined,
        stepId: 's1',
        stepName: 'Step s1',
        status: 'failed',
        errorKind: 'validation',
        message: 'Expected exactly "OK", got "FAIL"',
        expected: 'OK',
        actual: 'FAIL',
        connection: 'Inband/ssh',
        tolerated: true,
      },
    ]);
  });

  it('should list scenarios that could not start', () => {
    const results = new ResultBuilder();
    results.recordScenario(createScenarioResult('A'));
    results.recordScenario(
      createScenarioResult('B', { status: 'error', errorKind: 'config', error: 'B: Duplicate test_id' })
    );

    const summary = results.summary();

    expect(summary.scenarios).toEqual({ total: 2, passed: 1, failed: 0, errors: 1 });
    expect(summary.failureDetails).toEqual([
      { scenarioId: 'B', status: 'error', errorKind: 'config', message: 'B: Duplicate test_id', tolerated: false },
    ]);
  });

  it('should report failures inside invoked scenarios without counting their steps', () => {
    const child = createScenarioResult('C', {
      status: 'failed',
      steps: [
        createStepResult('c1', { scenarioId: 'C', status: 'failed', error: 'Command exited with code 1' }),
      ],
    });
    const results = new ResultBuilder();
    results.record(
      createStepResult('invoke', {
        stepType: 'invoke_scenario',
        status: 'failed',
        error: 'Invoked scenario C failed at step c1',
        connection: undefined,
        invoked: child,
      })
    );

    const summary = results.summary();

    expect(summary.total).toBe(1);
    expect(summary.failureDetails.map((detail) => [detail.scenarioId, detail.stepId, detail.parentScenarioId])).toEqual([
      ['A', 'invoke', undefined],
      ['C', 'c1', 'A'],
    ]);
  });

  it('should collect diagnostic codes including invoked scenarios', () => {
    const results = new ResultBuilder();
    results.record(createStepResult('scan', { diagnosticCodes: { E7: ['bus fault'] } }));
    results.record(createStepResult('clean', { diagnosticCodes: {} }));
    results.record(
      createStepResult('invoke', {
        stepType: 'invoke_scenario',
        invoked: createScenarioResult('C', {
          steps: [createStepResult('c1', { scenarioId: 'C', diagnosticCodes: { W2: ['fan slow'] } })],
        }),
      })
    );

    expect(results.diagnostics()).toEqual({
      A: { scan: { E7: ['bus fault'] } },
      C: { c1: { W2: ['fan slow'] } },
    });
  });

  it('should write results and diagnostics files', () => {
    const dir = mkdtempSync(join(tmpdir(), 'rigcheck-results-'));
    try {
      const results = new ResultBuilder();
      results.record(createStepResult('s1'));
      results.recordScenario(createScenarioResult('A'));

      const written = results.write(new OutputStore(dir));

      expect(written).toEqual({
        results: join(dir, 'test_results.json'),
        diagnostics: join(dir, 'diagnostics_codes.json'),
      });
      expect(JSON.parse(readFileSync(written.results, 'utf-8')).summary).toMatchObject({ total: 1, passed: 1 });
      expect(readFileSync(written.diagnostics, 'utf-8')).toBe('{}\n');
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
