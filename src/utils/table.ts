/**
 * Box-drawing tables for CLI output.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  header: string;
  /** Row key to display */
  key: string;
  align?: Alignment;
  /** Values longer than this are cut with an ellipsis */
  maxWidth?: number;
}

export type Row = Record<string, string | number | null | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(value: string): number {
  return value.replace(ANSI_PATTERN, '').length;
}

function cell(row: Row, column: Column): string {
  const raw = row[column.key];
  const text = raw === null || raw === undefined ? '' : String(raw);
  if (column.maxWidth !== undefined && text.length > column.maxWidth) {
    return text.slice(0, Math.max(0, column.maxWidth - 1)) + '…';
  }
  return text;
}

function pad(value: string, width: number, align: Alignment): string {
  const fill = ' '.repeat(Math.max(0, width - visibleLength(value)));
  return align === 'right' ? fill + value : value + fill;
}

/**
 * Render rows as a table. Headers are bold; an empty row list renders the
 * header only.
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  const cells = rows.map((row) => columns.map((column) => cell(row, column)));
  const widths = columns.map((column, i) =>
    Math.max(visibleLength(column.header), ...cells.map((line) => visibleLength(line[i] ?? '')))
  );

  const border = (left: string, mid: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(mid) + right;
  const line = (values: string[]): string =>
    '│' +
    values
      .map((value, i) => ` ${pad(value, widths[i] ?? 0, columns[i]?.align ?? 'left')} `)
      .join('│') +
    '│';

  return [
    border('┌', '┬', '┐'),
    line(columns.map((column) => chalk.bold(column.header))),
    border('├', '┼', '┤'),
    ...cells.map(line),
    border('└', '┴', '┘'),
  ].join('\n');
}
