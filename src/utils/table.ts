/**
 * Table Formatting Utility
 *
 * Two renderers share one padding routine:
 * - formatTable: box-drawn tables for CLI output
 * - renderTextTable: plain, uncoloured column text embedded in chunk bodies
 */

import chalk from 'chalk';

/**
 * Column alignment options
 */
export type Alignment = 'left' | 'right' | 'center';

/**
 * Column definition for table
 */
export interface Column {
  /** Header text */
  header: string;
  /** Data key to look up in rows */
  key: string;
  /** Alignment (default: left) */
  align?: Alignment;
  /** Minimum width */
  minWidth?: number;
}

/**
 * Table row data - key-value pairs
 */
export type Row = Record<string, string | number | null | undefined>;

function padString(str: string, width: number, align: Alignment = 'left'): string {
  const padding = width - stripAnsi(str).length;

  if (padding <= 0) return str;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + str;
    case 'center': {
      const left = Math.floor(padding / 2);
      return ' '.repeat(left) + str + ' '.repeat(padding - left);
    }
    case 'left':
    default:
      return str + ' '.repeat(padding);
  }
}

function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function columnWidths(headers: string[], rows: string[][], minWidths: number[] = []): number[] {
  return headers.map((header, i) => {
    let maxWidth = stripAnsi(header).length;
    for (const row of rows) {
      const len = stripAnsi(row[i] ?? '').length;
      if (len > maxWidth) maxWidth = len;
    }
    return Math.max(maxWidth, minWidths[i] ?? 0);
  });
}

/**
 * Format data as a box-drawn table for terminal output.
 *
 * @example
 * ```ts
 * formatTable(
 *   [{ header: 'Extension', key: 'ext' }, { header: 'Processor', key: 'processor' }],
 *   [{ ext: '.py', processor: 'code_processor' }],
 * );
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const headers = columns.map((c) => c.header);
  const cells = rows.map((row) =>
    columns.map((col) => {
      const value = row[col.key];
      return value != null ? String(value) : '';
    })
  );
  const widths = columnWidths(
    headers,
    cells,
    columns.map((c) => c.minWidth ?? 0)
  );

  const hLine = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], isHeader = false): string => {
    const padded = columns.map((col, i) => {
      const text = padString(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
      return isHeader ? chalk.bold(text) : text;
    });
    return '│' + padded.map((c) => ` ${c} `).join('│') + '│';
  };

  return [
    hLine('┌', '┬', '┐'),
    line(headers, true),
    hLine('├', '┼', '┤'),
    ...cells.map((values) => line(values)),
    hLine('└', '┴', '┘'),
  ].join('\n');
}

/**
 * Render rows as plain aligned columns (no colour, no borders).
 *
 * Numbers are right-aligned, everything else left-aligned. Trailing
 * whitespace is trimmed from every line.
 *
 * ```
 * name   qty
 * apple    3
 * pear    12
 * ```
 */
export function renderTextTable(headers: string[], rows: Array<Array<string | number>>): string {
  const cells = rows.map((row) => headers.map((_, i) => formatCell(row[i])));
  const widths = columnWidths(headers, cells);
  const numeric = headers.map(
    (_, i) => rows.length > 0 && rows.every((row) => typeof row[i] === 'number' || row[i] === '')
  );

  const line = (values: string[]): string =>
    values
      .map((v, i) => padString(v, widths[i] ?? 0, numeric[i] ? 'right' : 'left'))
      .join('  ')
      .trimEnd();

  return [line(headers), ...cells.map(line)].join('\n');
}

function formatCell(value: string | number | undefined): string {
  if (value === undefined) return '';
  return typeof value === 'number' ? String(value) : value;
}
