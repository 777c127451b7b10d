/**
 * Console Reporter
 *
 * Terminal output for a run: one mark per step (or one line per step when
 * verbose), a line per scenario, then failure details and totals.
 */

import type { FailureDetail, RunSummary, ScenarioResult, StepResult, StepStatus } from '../runner/types.js';
import type { ScenarioDefinition, StepDefinition } from '../scenario/types.js';

import type { Reporter, ConsoleReporterOptions } from './types.js';

type Style = 'bold' | 'dim' | 'red' | 'green' | 'yellow' | 'cyan';

const SGR: Record<Style, number> = { bold: 1, dim: 2, red: 31, green: 32, yellow: 33, cyan: 36 };

/**
 * How each status is drawn: its symbol in verbose lines, its mark in compact mode.
 */
const STATUS_GLYPHS: Record<StepStatus, { symbol: string; mark: string; style: Style }> = {
  passed: { symbol: '✓', mark: '.', style: 'green' },
  failed: { symbol: '✗', mark: 'F', style: 'red' },
  skipped: { symbol: '○', mark: 'S', style: 'yellow' },
  error: { symbol: '✗', mark: 'E', style: 'red' },
};

const RULE = '─'.repeat(60);

export class ConsoleReporter implements Reporter {
  private readonly options: ConsoleReporterOptions;
  private readonly useColors: boolean;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: ConsoleReporterOptions = {}) {
    this.options = options;
    this.useColors = options.colors ?? true;
    this.stream = options.stream ?? process.stdout;
  }

  onRunStart(scenarios: readonly ScenarioDefinition[]): void {
    this.emit('', this.paint('bold', `Running ${scenarios.length} scenario(s)`), this.paint('dim', RULE));
  }

  onScenarioStart(scenario: ScenarioDefinition): void {
    this.emit('', this.paint('cyan', `${scenario.testId}: ${scenario.testName}`));
  }

  onStepComplete(_step: StepDefinition, result: StepResult): void {
    if (!this.options.verbose) {
      const glyph = STATUS_GLYPHS[result.status];
      this.stream.write(this.paint(glyph.style, glyph.mark));
      return;
    }
    this.emit(...this.stepLines(result));
  }

  onScenarioComplete(_scenario: ScenarioDefinition, result: ScenarioResult): void {
    const lines: string[] = [];
    // Ends the line of compact step marks
    if (!this.options.verbose) lines.push('');

    lines.push(
      `  ${this.symbol(result.status)} ${result.status.toUpperCase()} ` +
        `${this.paint('dim', `(${result.durationMs}ms)`)} ${this.paint('dim', `${result.steps.length} steps`)}`
    );
    if (result.error) {
      lines.push(this.paint('red', `    Error: ${result.error}`));
    }
    this.emit(...lines);
  }

  onRunComplete(summary: RunSummary, durationMs: number): void {
    const lines = ['', this.paint('dim', RULE)];

    if (summary.failureDetails.length > 0) {
      lines.push('', this.paint('bold', 'Failures:'));
      for (const failure of summary.failureDetails) {
        lines.push(...this.failureLines(failure));
      }
    }

    lines.push('', 'Summary:');
    lines.push(this.paint(summary.passed > 0 ? 'green' : 'dim', `  ✓ ${summary.passed} passed`));
    const counts: Array<[number, string, StepStatus]> = [
      [summary.failed, 'failed', 'failed'],
      [summary.skipped, 'skipped', 'skipped'],
      [summary.errors, 'errors', 'error'],
    ];
    for (const [count, label, status] of counts) {
      if (count > 0) {
        const glyph = STATUS_GLYPHS[status];
        lines.push(this.paint(glyph.style, `  ${glyph.symbol} ${count} ${label}`));
      }
    }

    const { scenarios } = summary;
    lines.push(
      '',
      this.paint(
        'dim',
        `Total: ${summary.total} steps in ${scenarios.total} scenarios ` +
          `(${scenarios.passed} passed, ${scenarios.failed} failed, ${scenarios.errors} errors) in ${durationMs}ms`
      ),
      ''
    );
    this.emit(...lines);
  }

  private stepLines(result: StepResult): string[] {
    const loop = result.iterations > 1 ? this.paint('dim', ` x${result.iterations}`) : '';
    const tolerated = result.tolerated ? this.paint('yellow', ' [continue]') : '';
    const lines = [
      `  ${this.symbol(result.status)} ${result.stepId} ${result.stepName}${loop} ` +
        `${this.paint('dim', `(${result.durationMs}ms)`)}${tolerated}`,
    ];

    if (result.status === 'skipped' && result.message) {
      lines.push(this.paint('dim', `    ${result.message}`));
    }
    if (result.error) {
      lines.push(this.paint('red', `    Error: ${result.error}`));
      if (result.output) lines.push(...this.outputLines(result.output));
    }
    if (this.options.showParameters) {
      for (const [name, value] of Object.entries(result.parameters)) {
        lines.push(this.paint('dim', `    ${name} = ${String(value)}`));
      }
    }
    return lines;
  }

  private failureLines(failure: FailureDetail): string[] {
    const where = failure.stepId ? `${failure.scenarioId} / ${failure.stepId}` : failure.scenarioId;
    const via = failure.parentScenarioId ? this.paint('dim', ` (invoked by ${failure.parentScenarioId})`) : '';
    const kind = failure.errorKind ? ` [${failure.errorKind}]` : '';
    const tolerated = failure.tolerated ? this.paint('yellow', ' [continue]') : '';

    const lines = [`  ${this.symbol(failure.status)} ${where}${via}${kind}${tolerated}`];
    if (failure.connection) {
      lines.push(this.paint('dim', `    Connection: ${failure.connection}`));
    }
    lines.push(this.paint('red', `    ${failure.message}`));
    if (failure.expected !== undefined) {
      lines.push(this.paint('dim', `    Expected: ${truncate(failure.expected, 200)}`));
    }
    if (failure.actual !== undefined && this.options.verbose) {
      lines.push(...this.outputLines(failure.actual));
    }
    return lines;
  }

  /**
   * Command output as indented lines, cut at `maxOutputLines`.
   */
  private outputLines(output: string): string[] {
    const lines = output.split('\n');
    const maxLines = this.options.maxOutputLines ?? 20;
    const shown = lines.slice(0, maxLines).map((line) => this.paint('dim', `    | ${line}`));
    if (lines.length > maxLines) {
      shown.push(this.paint('dim', `    ... (${lines.length - maxLines} more lines)`));
    }
    return shown;
  }

  private symbol(status: StepStatus): string {
    const glyph = STATUS_GLYPHS[status];
    return this.paint(glyph.style, glyph.symbol);
  }

  private paint(style: Style, text: string): string {
    return this.useColors ? `\x1b[${SGR[style]}m${text}\x1b[0m` : text;
  }

  private emit(...lines: string[]): void {
    for (const line of lines) {
      this.stream.write(line + '\n');
    }
  }
}

export function createConsoleReporter(options?: ConsoleReporterOptions): ConsoleReporter {
  return new ConsoleReporter(options);
}

function truncate(text: string, maxLength: number): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength - 3)}...`;
}
