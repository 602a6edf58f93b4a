/**
 * AST-based SQL parser for the safety validator.
 * Uses node-sql-parser with the grammar of the target dialect.
 *
 * Classification is made on the AST. The lexical scan in sql-text.ts only
 * covers what a parser normalizes away (comments, terminators).
 */

import pkg from 'node-sql-parser';
import type { SqlDialect } from '../db/types.js';

const { Parser } = pkg;

const parser = new Parser();

const PARSER_DATABASE: Record<SqlDialect, string> = {
  sqlite: 'Sqlite',
  postgres: 'PostgresQL',
};

export type SqlKind =
  | 'select'
  | 'insert'
  | 'replace'
  | 'update'
  | 'delete'
  | 'create'
  | 'alter'
  | 'drop'
  | 'truncate'
  | 'unknown';

const KNOWN_KINDS: readonly SqlKind[] = [
  'select',
  'insert',
  'replace',
  'update',
  'delete',
  'create',
  'alter',
  'drop',
  'truncate',
];

/** A table reference taken from the parser's table list. */
export interface TableRef {
  /** Statement operation the table appears under (`select`, `insert`, ...) */
  operation: string;
  schema: string | null;
  name: string;
}

export interface ParseResult {
  /** The parsed AST (first statement) */
  ast: unknown;
  /** Number of statements found */
  statementCount: number;
  /** Classified statement type */
  kind: SqlKind;
  tables: TableRef[];
  /** Names bound by WITH clauses anywhere in the statement, lowercased */
  cteNames: string[];
  /** Functions used as row sources in FROM or JOIN, lowercased */
  tableFunctions: string[];
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

/** Loose view of a parser AST node. */
export type AstNode = Record<string, unknown>;

export function isAstNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseSql(sql: string, dialect: SqlDialect = 'postgres'): ParseOutcome {
  const body = sql.trim();
  if (!body) {
    return { ok: false, error: 'Empty SQL statement' };
  }

  try {
    const result = parser.parse(body, { database: PARSER_DATABASE[dialect] });
    const statements: unknown[] = Array.isArray(result.ast) ? result.ast : [result.ast];

    if (statements.length === 0) {
      return { ok: false, error: 'No statements found' };
    }

    const first = statements[0];
    const rawKind = isAstNode(first) && typeof first.type === 'string' ? first.type.toLowerCase() : '';

    return {
      ok: true,
      ast: first,
      statementCount: statements.length,
      kind: toKind(rawKind),
      tables: result.tableList.map(toTableRef),
      cteNames: collectCteNames(statements),
      tableFunctions: collectTableFunctions(statements),
    };
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    return { ok: false, error: `SQL parse error: ${msg}` };
  }
}

function toKind(raw: string): SqlKind {
  return KNOWN_KINDS.find((k) => k === raw) ?? 'unknown';
}

// tableList entries look like "select::null::customers"
function toTableRef(entry: string): TableRef {
  const [operation = '', schema = 'null', name = ''] = entry.split('::');
  return {
    operation: operation.toLowerCase(),
    schema: schema === 'null' || schema === '' ? null : schema,
    name,
  };
}

function collectCteNames(statements: unknown[]): string[] {
  const names = new Set<string>();
  walkAst(statements, (node) => {
    if (!Array.isArray(node.with)) return;
    for (const cte of node.with) {
      if (!isAstNode(cte)) continue;
      const name = identifierText(cte.name);
      if (name) names.add(name.toLowerCase());
    }
  });
  return [...names];
}

// FROM items without a `table` whose expression is a call, e.g. generate_series(1, 3)
function collectTableFunctions(statements: unknown[]): string[] {
  const names = new Set<string>();
  walkAst(statements, (node) => {
    if (!Array.isArray(node.from)) return;
    for (const item of node.from) {
      if (!isAstNode(item) || item.table !== undefined || !isAstNode(item.expr)) continue;
      if (item.expr.type !== 'function') continue;
      const name = functionNameOf(item.expr.name);
      if (name) names.add(name.toLowerCase());
    }
  });
  return [...names];
}

/** Unqualified function name from the shapes node-sql-parser emits. */
export function functionNameOf(value: unknown): string | null {
  const direct = identifierText(value);
  if (direct) return direct.split('.').pop() ?? direct;

  // { name: [{ type: 'default', value: 'pg_sleep' }] }, schema parts first
  if (isAstNode(value) && Array.isArray(value.name)) {
    const parts = value.name.map(identifierText).filter((p): p is string => p !== null);
    return parts.length > 0 ? parts[parts.length - 1] : null;
  }
  return null;
}

/** Identifier text from either a bare string or a `{ value }` node. */
export function identifierText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (isAstNode(value) && typeof value.value === 'string') return value.value;
  return null;
}

/** Visit every object node in an AST, depth first. */
export function walkAst(node: unknown, visitor: (n: AstNode) => void): void {
  if (node === null || typeof node !== 'object') return;

  if (Array.isArray(node)) {
    for (const item of node) walkAst(item, visitor);
    return;
  }

  if (!isAstNode(node)) return;
  visitor(node);
  for (const child of Object.values(node)) {
    walkAst(child, visitor);
  }
}
