/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and positional rows.
 */

const MAX_WIDTH = 60;

export function formatTable(columns: readonly string[], rows: ReadonlyArray<readonly unknown[]>): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const cells = rows.map((row) => columns.map((_, i) => formatValue(row[i])));

  const widths = columns.map((col) => col.length);
  for (const row of cells) {
    row.forEach((val, i) => {
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    });
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of cells) {
    const line = row
      .map((val, i) => (val.length > widths[i] ? `${val.slice(0, widths[i] - 1)}…` : val.padEnd(widths[i])))
      .join(' | ');
    lines.push(line);
  }

  return lines.join('\n');
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Uint8Array) return `<${val.byteLength} bytes>`;
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'object') return JSON.stringify(val);
  return String(val);
}
