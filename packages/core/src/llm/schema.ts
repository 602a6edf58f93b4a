/**
 * Schema rendering for the generation prompt.
 *
 * By default every table is rendered. Given a question and `maxTables`,
 * tables are ranked by token overlap with the question and only the top
 * ones are kept.
 */

import type { ColumnSpec, Scalar, SchemaDescription, TableSchema } from '../db/types.js';

export interface RenderSchemaOptions {
  question?: string;
  maxTables?: number;
  maxColumnsPerTable?: number;
  /** Sample rows shown per table, when the description carries them. Default: 3 */
  maxSampleRows?: number;
}

const SAMPLE_TEXT_WIDTH = 40;

interface ScoredTable {
  table: TableSchema;
  score: number;
  scoredColumns: Array<{ col: ColumnSpec; score: number }>;
}

/**
 * Tokenize a string: lowercase, split on non-alphanumeric (keeping underscores).
 */
function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_]+/)
    .filter((t) => t.length > 1);
}

/**
 * Score how well a name matches the question tokens.
 * Supports matching against underscore-separated parts too.
 */
export function scoreMatch(name: string, tokens: string[]): number {
  const lower = name.toLowerCase();
  const parts = lower.split('_').filter((p) => p.length > 0);
  let score = 0;
  for (const token of tokens) {
    if (lower === token) {
      score += 10;
    } else if (lower.includes(token)) {
      score += 5;
    } else if (parts.some((p) => p === token)) {
      score += 7;
    } else if (parts.some((p) => p.includes(token) || token.includes(p))) {
      score += 3;
    }
  }
  return score;
}

const DEFAULT_NAMESPACES = new Set(['main', 'public']);

function displayName(table: TableSchema): string {
  return table.schema && !DEFAULT_NAMESPACES.has(table.schema) ? `${table.schema}.${table.name}` : table.name;
}

export function renderSchema(schema: SchemaDescription, opts: RenderSchemaOptions = {}): string {
  const maxCols = opts.maxColumnsPerTable ?? Infinity;
  const maxSamples = opts.maxSampleRows ?? 3;
  const tokens = tokenize(opts.question ?? '');

  const scored: ScoredTable[] = schema.tables.map((table) => {
    const scoredColumns = table.columns.map((col) => ({ col, score: scoreMatch(col.name, tokens) }));
    const colBoost = scoredColumns
      .map((sc) => sc.score)
      .sort((a, b) => b - a)
      .slice(0, 3)
      .reduce((sum, s) => sum + s, 0);
    return { table, score: scoreMatch(table.name, tokens) + colBoost, scoredColumns };
  });

  let selected = scored;
  const ranked = opts.maxTables !== undefined && scored.length > opts.maxTables;
  if (ranked) {
    // Array.prototype.sort is stable: equal scores keep catalog order
    selected = [...scored].sort((a, b) => b.score - a.score).slice(0, opts.maxTables);
  }

  const header = ranked
    ? `-- ${schema.dialect} schema (${selected.length} of ${scored.length} tables)`
    : `-- ${schema.dialect} schema`;
  const lines: string[] = [header, ''];

  for (const entry of selected) {
    const t = entry.table;
    lines.push(`TABLE ${displayName(t)}`);

    // PK first, then catalog order
    const cols = entry.scoredColumns
      .map((sc, position) => ({ ...sc, position }))
      .sort((a, b) => Number(b.col.isPrimaryKey) - Number(a.col.isPrimaryKey))
      .slice(0, maxCols);

    for (const { col } of cols) {
      const pk = col.isPrimaryKey ? ' PK' : '';
      const nullable = col.nullable ? ' NULL' : ' NOT NULL';
      lines.push(`  ${col.name} ${col.dataType}${nullable}${pk}`);
    }

    if (t.rowCount !== undefined) {
      lines.push(`  -- ~${t.rowCount} rows`);
    }

    const samples = (t.sampleRows ?? []).slice(0, maxSamples);
    if (samples.length > 0) {
      lines.push('  -- sample rows:');
      for (const row of samples) {
        lines.push(`  --   (${cols.map((c) => sampleValue(row[c.position])).join(', ')})`);
      }
    }

    lines.push('');
  }

  return lines.join('\n');
}

function sampleValue(value: Scalar | undefined): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value !== 'string') return String(value);
  const text = value.length > SAMPLE_TEXT_WIDTH ? `${value.slice(0, SAMPLE_TEXT_WIDTH)}...` : value;
  return `'${text.replace(/'/g, "''").replace(/\s+/g, ' ')}'`;
}
