/**
 * CLI Output Utilities
 *
 * Terminal formatting for the listing, discovery and run commands.
 * Set NO_COLOR to print plain text.
 */

/**
 * ANSI SGR codes by style name.
 */
const SGR = {
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
} as const;

export type Style = keyof typeof SGR;

const plain = Boolean(process.env['NO_COLOR']);

/**
 * Apply a style to text.
 */
export function color(style: Style, text: string): string {
  return plain ? text : `\x1b[${SGR[style]}m${text}\x1b[0m`;
}

/**
 * Style for a status word: probe statuses (SUCCESS, PARTIAL, ...) and
 * step or scenario statuses (passed, failed, ...), in any case.
 */
export function statusStyle(status: string): Style {
  switch (status.toLowerCase()) {
    case 'success':
    case 'passed':
    case 'yes':
      return 'green';
    case 'partial':
    case 'skipped':
      return 'yellow';
    case 'failed':
    case 'error':
    case 'no':
      return 'red';
    default:
      return 'dim';
  }
}

// =============================================================================
// Messages
// =============================================================================

export function success(message: string): void {
  console.log(color('green', `✓ ${message}`));
}

export function error(message: string): void {
  console.error(color('red', `✗ ${message}`));
}

export function warning(message: string): void {
  console.log(color('yellow', `⚠ ${message}`));
}

export function info(message: string): void {
  console.log(color('cyan', `ℹ ${message}`));
}

export function dim(message: string): void {
  console.log(color('dim', message));
}

/**
 * Print a section header, underlined to the header's width (at most 60).
 */
export function header(text: string): void {
  console.log('');
  console.log(color('bold', text));
  console.log(color('dim', '─'.repeat(Math.min(text.length + 4, 60))));
}

// =============================================================================
// Tables
// =============================================================================

/**
 * A table cell. A styled cell is padded on its plain text, then colored,
 * so escape codes do not skew the column widths.
 */
export type Cell = string | number | undefined | { text: string; style: Style };

export type Row = Record<string, Cell>;

function cellText(cell: Cell): string {
  if (cell === undefined) return '';
  return typeof cell === 'object' ? cell.text : String(cell);
}

function renderCell(cell: Cell, width: number): string {
  const padded = cellText(cell).padEnd(width);
  return typeof cell === 'object' ? color(cell.style, padded) : padded;
}

/**
 * Format rows as table lines: header, rule, one line per row. Columns come
 * from the first row's keys.
 */
export function formatTable(rows: readonly Row[]): string[] {
  const first = rows[0];
  if (!first) return [];

  const columns = Object.keys(first).map((name) => ({
    name,
    width: Math.max(name.length, ...rows.map((row) => cellText(row[name]).length)),
  }));

  return [
    color('bold', columns.map((column) => column.name.padEnd(column.width)).join('  ')),
    color('dim', columns.map((column) => '─'.repeat(column.width)).join('──')),
    ...rows.map((row) => columns.map((column) => renderCell(row[column.name], column.width)).join('  ')),
  ];
}

export function table(rows: readonly Row[]): void {
  for (const line of formatTable(rows)) {
    console.log(line);
  }
}

/**
 * A cell colored by its status word.
 */
export function statusCell(status: string): Cell {
  return { text: status, style: statusStyle(status) };
}

// =============================================================================
// Values
// =============================================================================

/**
 * Truncate text to `maxLength`, marking the cut with an ellipsis.
 */
export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return text.slice(0, maxLength - 3) + '...';
}

/**
 * Format a duration: `250ms`, `1.5s`, `2m 5s`.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${Math.floor(ms / 60000)}m ${Math.round((ms % 60000) / 1000)}s`;
}
