/**
 * Table Formatting Utility
 *
 * Creates ASCII tables for CLI output with Unicode box-drawing characters.
 * Widths are measured in terminal columns: CJK and full-width characters
 * take two.
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
  /** Cells wider than this are cut with an ellipsis */
  maxWidth?: number;
}

/**
 * Table row data - key-value pairs
 */
export type Row = Record<string, string | number | null | undefined>;

/**
 * Strip ANSI escape codes from string (for width calculation)
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function isWide(codePoint: number): boolean {
  return (
    (codePoint >= 0x1100 && codePoint <= 0x115f) ||
    (codePoint >= 0x2e80 && codePoint <= 0xa4cf) ||
    (codePoint >= 0xac00 && codePoint <= 0xd7a3) ||
    (codePoint >= 0xf900 && codePoint <= 0xfaff) ||
    (codePoint >= 0xfe30 && codePoint <= 0xfe4f) ||
    (codePoint >= 0xff00 && codePoint <= 0xff60) ||
    (codePoint >= 0xffe0 && codePoint <= 0xffe6) ||
    (codePoint >= 0x20000 && codePoint <= 0x3fffd)
  );
}

/**
 * Width of a string in terminal columns, ignoring ANSI codes.
 */
export function displayWidth(str: string): number {
  let width = 0;
  for (const char of stripAnsi(str)) {
    width += isWide(char.codePointAt(0) ?? 0) ? 2 : 1;
  }
  return width;
}

/**
 * Cut a plain string to at most `max` columns, ending in '…' when cut.
 */
export function truncate(str: string, max: number): string {
  if (displayWidth(str) <= max) return str;

  let width = 0;
  let result = '';
  for (const char of str) {
    const w = isWide(char.codePointAt(0) ?? 0) ? 2 : 1;
    if (width + w > max - 1) break;
    result += char;
    width += w;
  }
  return result + '…';
}

/**
 * Pad a string to a given width with specified alignment
 */
function padString(str: string, width: number, align: Alignment = 'left'): string {
  const padding = width - displayWidth(str);

  if (padding <= 0) return str;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + str;
    case 'center': {
      const left = Math.floor(padding / 2);
      const right = padding - left;
      return ' '.repeat(left) + str + ' '.repeat(right);
    }
    case 'left':
    default:
      return str + ' '.repeat(padding);
  }
}

function cellText(col: Column, value: Row[string]): string {
  const text = value != null ? String(value).replace(/\s+/g, ' ') : '';
  return col.maxWidth ? truncate(text, col.maxWidth) : text;
}

/**
 * Calculate column widths based on data
 */
function calculateWidths(columns: Column[], rows: Row[]): number[] {
  return columns.map((col) => {
    let maxWidth = displayWidth(col.header);

    for (const row of rows) {
      const len = displayWidth(cellText(col, row[col.key]));
      if (len > maxWidth) maxWidth = len;
    }

    if (col.minWidth && maxWidth < col.minWidth) {
      maxWidth = col.minWidth;
    }

    return maxWidth;
  });
}

/**
 * Format data as an ASCII table
 *
 * @example
 * ```ts
 * const columns: Column[] = [
 *   { header: 'Namespace', key: 'id' },
 *   { header: 'Chunks', key: 'chunks', align: 'right' },
 * ];
 * console.log(formatTable(columns, [{ id: 'default', chunks: 42 }]));
 * ```
 *
 * Output:
 * ```
 * ┌───────────┬────────┐
 * │ Namespace │ Chunks │
 * ├───────────┼────────┤
 * │ default   │     42 │
 * └───────────┴────────┘
 * ```
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const widths = calculateWidths(columns, rows);
  const lines: string[] = [];

  const HORIZONTAL = '─';
  const VERTICAL = '│';

  const buildHLine = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => HORIZONTAL.repeat(w + 2)).join(middle) + right;

  const buildRow = (values: string[], isHeader = false): string => {
    const cells = columns.map((col, i) => {
      const padded = padString(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
      return isHeader ? chalk.bold(padded) : padded;
    });
    return VERTICAL + cells.map((c) => ` ${c} `).join(VERTICAL) + VERTICAL;
  };

  lines.push(buildHLine('┌', '┬', '┐'));
  lines.push(buildRow(columns.map((c) => c.header), true));
  lines.push(buildHLine('├', '┼', '┤'));

  for (const row of rows) {
    lines.push(buildRow(columns.map((col) => cellText(col, row[col.key]))));
  }

  lines.push(buildHLine('└', '┴', '┘'));

  return lines.join('\n');
}
