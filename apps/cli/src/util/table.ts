/**
 * Plain-text table and value formatting for CLI output.
 */

export const MAX_COLUMN_WIDTH = 60;

export function truncateText(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'bigint') return val.toString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}

export function formatTable(
  columns: string[],
  rows: Record<string, unknown>[],
  maxWidth: number = MAX_COLUMN_WIDTH,
): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, maxWidth));
  for (const row of rows) {
    columns.forEach((col, i) => {
      widths[i] = Math.min(Math.max(widths[i], formatValue(row[col]).length), maxWidth);
    });
  }

  const lines = [
    columns.map((col, i) => truncateText(col, widths[i]).padEnd(widths[i])).join(' | '),
    widths.map((w) => '-'.repeat(w)).join('-+-'),
  ];
  for (const row of rows) {
    lines.push(columns.map((col, i) => truncateText(formatValue(row[col]), widths[i]).padEnd(widths[i])).join(' | '));
  }

  // Drop padding after the last column
  return lines.map((line) => line.trimEnd()).join('\n');
}
