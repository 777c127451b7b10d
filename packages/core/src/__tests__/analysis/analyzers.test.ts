/**
 * Output and Diagnostic Analysis Tests
 */

import { describe, it, expect } from 'vitest';

import { analyzeDiagnostics } from '../../analysis/diagnostic-analysis.js';
import { analyzeOutput } from '../../analysis/output-analysis.js';

describe('analyzeOutput', () => {
  const output = 'temp=85\nfan=ok\nenabled: TRUE\nready\n';

  it('should bind the first capture group, coerced', () => {
    expect(
      analyzeOutput(output, [
        { regex: 'temp=(\\d+)', parameterToSet: 'temp' },
        { regex: 'fan=(\\w+)', parameterToSet: 'fan' },
        { regex: 'enabled: (\\w+)', parameterToSet: 'enabled' },
      ])
    ).toEqual({ temp: 85, fan: 'ok', enabled: true });
  });

  it('should bind the whole match when the pattern has no groups', () => {
    expect(analyzeOutput(output, [{ regex: '^ready$', parameterToSet: 'state' }])).toEqual({ state: 'ready' });
  });

  it('should bind nothing for a rule that does not match', () => {
    expect(analyzeOutput(output, [{ regex: 'voltage=(\\d+)', parameterToSet: 'voltage' }])).toEqual({});
  });
});

describe('analyzeDiagnostics', () => {
  const log = ['[BOOT] POST complete', '[ERR] code=E102 memory training failed', '[WARN] code=W7 fan slow'].join('\n');

  it('should apply every matching rule in order', () => {
    const outcome = analyzeDiagnostics(log, [
      { searchString: 'POST complete', diagnosticResultCode: 'BOOT_OK', severity: 'info' },
      { diagnosticSearchString: 'code=(?<code>E\\d+)', diagnosticResultCode: 'code', parameterToSet: 'memory_error' },
      { diagnosticSearchString: 'code=(W\\d+)', severity: 'warning' },
    ]);

    expect(outcome.codes).toEqual({ BOOT_OK: ['[BOOT] POST complete'], E102: ['E102'], W7: ['W7'] });
    expect(outcome.resultCode).toBe('W7');
    expect(outcome.failed).toBe(true);
    expect(outcome.parameters).toEqual({ memory_error: true });
    expect(outcome.matches.map((match) => [match.rule, match.code, match.severity])).toEqual([
      [0, 'BOOT_OK', 'info'],
      [1, 'E102', 'error'],
      [2, 'W7', 'warning'],
    ]);
    expect(outcome.terminatedAt).toBeUndefined();
  });

  it('should stop at a terminal rule that matches', () => {
    const outcome = analyzeDiagnostics(log, [
      { searchString: 'POST complete', diagnosticResultCode: 'BOOT_OK', severity: 'info', terminal: true },
      { searchString: '[ERR]', diagnosticResultCode: 'MEMFAIL' },
    ]);

    expect(outcome.codes).toEqual({ BOOT_OK: ['[BOOT] POST complete'] });
    expect(outcome.failed).toBe(false);
    expect(outcome.terminatedAt).toBe(0);
  });

  it('should not stop at a terminal rule that does not match', () => {
    const outcome = analyzeDiagnostics(log, [
      { searchString: 'kernel panic', diagnosticResultCode: 'PANIC', terminal: true },
      { searchString: '[ERR]', diagnosticResultCode: 'MEMFAIL' },
    ]);

    expect(outcome.resultCode).toBe('MEMFAIL');
    expect(outcome.codes['MEMFAIL']).toEqual(['[ERR] code=E102 memory training failed']);
  });

  it('should use a literal code when it names no capture group', () => {
    const outcome = analyzeDiagnostics(log, [
      { diagnosticSearchString: 'memory training (failed)', diagnosticResultCode: 'MEMFAIL' },
    ]);

    expect(outcome.codes).toEqual({ MEMFAIL: ['failed'] });
  });

  it('should set a parameter to false when its rule does not match', () => {
    const outcome = analyzeDiagnostics(log, [{ diagnosticSearchString: 'PANIC', parameterToSet: 'panicked' }]);

    expect(outcome).toEqual({ codes: {}, parameters: { panicked: false }, matches: [], failed: false });
  });

  it('should collect every line a literal rule finds', () => {
    const outcome = analyzeDiagnostics(log, [{ searchString: 'code=', diagnosticResultCode: 'ANY', severity: 'info' }]);

    expect(outcome.codes['ANY']).toEqual(['[ERR] code=E102 memory training failed', '[WARN] code=W7 fan slow']);
  });
});
