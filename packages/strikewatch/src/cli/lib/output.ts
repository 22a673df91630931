/**
 * Output Formatting for CLI Commands
 *
 * Plain-text tables for terminals, pretty JSON for `--json`.
 *
 * @module cli/lib/output
 */

/**
 * Column definition for table output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: T[keyof T & string]) => string;
}

function cellText<T>(row: T, col: TableColumn<T>): string {
  const value = row[col.key];
  return col.formatter ? col.formatter(value) : String(value ?? '');
}

/**
 * Format rows as a fixed-width table
 */
export function formatTable<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cellText(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns
    .map((col, i) => padCell(col.header, widths[i] ?? col.header.length, col.align ?? 'left'))
    .join(' | ');

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  const dataRows = data.map((row) =>
    columns
      .map((col, i) => {
        const text = cellText(row, col);
        return padCell(text, widths[i] ?? text.length, col.align ?? 'left');
      })
      .join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * `1234` → `1.2s`, `95000` → `1m 35s`
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.round(seconds - minutes * 60);
  return `${minutes}m ${rest}s`;
}

/**
 * Common column formatters
 */
export const formatters = {
  /** Nullable number with fixed decimals, `-` when absent */
  fixed:
    (digits: number) =>
    (value: unknown): string =>
      typeof value === 'number' ? value.toFixed(digits) : '-',

  nullable: (value: unknown): string =>
    value === null || value === undefined ? '-' : String(value),
};

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
