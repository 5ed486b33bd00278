/**
 * Report rendering for CLI commands
 *
 * Every report is a list of flat rows plus column definitions; the same rows
 * render as an aligned table, JSON, NDJSON or CSV.
 *
 * @module cli/lib/output
 */

import { ConfigurationError } from '../../core/errors.js';

export const OUTPUT_FORMATS = ['table', 'json', 'ndjson', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/**
 * Validate a --format option
 *
 * @throws ConfigurationError for anything outside OUTPUT_FORMATS
 */
export function parseOutputFormat(value: string): OutputFormat {
  const normalized = value.trim().toLowerCase();
  if (!isOutputFormat(normalized)) {
    throw new ConfigurationError(
      `Unknown output format: ${value}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
    );
  }
  return normalized;
}

export type ReportRow = Readonly<Record<string, unknown>>;

export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
  /** Longer cells are cut and end in "~" */
  readonly maxWidth?: number;
  readonly format?: (value: unknown) => string;
}

function renderCell(row: ReportRow, column: TableColumn): string {
  const value = row[column.key];
  if (column.format) {
    return column.format(value);
  }
  return value === null || value === undefined ? '' : String(value);
}

function fit(text: string, width: number, align: 'left' | 'right'): string {
  const clipped = text.length > width ? `${text.slice(0, Math.max(width - 1, 0))}~` : text;
  return align === 'right' ? clipped.padStart(width) : clipped.padEnd(width);
}

/**
 * Aligned plain-text table with a header and a rule line
 */
export function formatTable(rows: readonly ReportRow[], columns: readonly TableColumn[]): string {
  if (rows.length === 0) {
    return 'No entries found.';
  }

  const cells = rows.map((row) => columns.map((column) => renderCell(row, column)));
  const widths = columns.map((column, i) => {
    const natural = cells.reduce(
      (widest, line) => Math.max(widest, (line[i] ?? '').length),
      column.header.length
    );
    return column.maxWidth === undefined ? natural : Math.min(natural, column.maxWidth);
  });

  const renderLine = (texts: readonly string[]): string =>
    texts.map((text, i) => fit(text, widths[i] ?? text.length, columns[i]?.align ?? 'left')).join(' | ');

  return [
    renderLine(columns.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(renderLine),
  ].join('\n');
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatNdjson(rows: readonly unknown[]): string {
  return rows.map((row) => JSON.stringify(row)).join('\n');
}

function csvField(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * CSV with a header row, even when there are no rows
 */
export function formatCsv(rows: readonly ReportRow[], columns: readonly TableColumn[]): string {
  const lines = [columns.map((column) => csvField(column.header)).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => csvField(renderCell(row, column))).join(','));
  }
  return lines.join('\n');
}

export function formatOutput(
  rows: readonly ReportRow[],
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(rows);
    case 'ndjson':
      return formatNdjson(rows);
    case 'csv':
      return formatCsv(rows, columns);
    case 'table':
      return formatTable(rows, columns);
  }
}

const WEEKDAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Column formatters shared by the report commands
 */
export const formatters = {
  /** Whole residents with en-US separators, independent of the host locale */
  population: (value: unknown): string => {
    const num = asNumber(value);
    return num === null ? '-' : num.toLocaleString('en-US', { maximumFractionDigits: 0 });
  },

  decimal:
    (digits: number) =>
    (value: unknown): string => {
      const num = asNumber(value);
      return num === null ? '-' : num.toFixed(digits);
    },

  /** Fraction of the total as a percentage */
  share: (value: unknown): string => {
    const num = asNumber(value);
    return num === null ? '-' : `${(num * 100).toFixed(1)}%`;
  },

  weekday: (value: unknown): string => {
    const num = asNumber(value);
    return (num === null ? undefined : WEEKDAY_NAMES[num]) ?? String(value ?? '-');
  },

  nullable: (value: unknown): string =>
    value === null || value === undefined ? '(not recorded)' : String(value),
};

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
