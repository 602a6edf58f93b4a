/**
 * LIMIT normalization for accepted statements.
 *
 * - No LIMIT: appends ` LIMIT <defaultLimit>` to the statement text
 * - LIMIT <= maxLimit: statement unchanged
 * - LIMIT > maxLimit: the trailing literal is replaced with maxLimit
 * - LIMIT that cannot be rewritten in place (parameter, expression, LIMIT ALL,
 *   a limit on one branch of a compound query): the statement is wrapped in
 *   an outer SELECT bounded by maxLimit
 *
 * Detection reads the AST when one is given. Rewriting edits the original
 * text so the statement keeps its formatting.
 */

import type { SqlDialect } from '../db/types.js';
import { isAstNode, parseSql } from './parse.js';

export interface LimitOptions {
  defaultLimit: number;
  maxLimit: number;
  dialect?: SqlDialect;
  /** AST of `sql`, when the caller already parsed it */
  ast?: unknown;
}

export interface LimitRewrite {
  rewrittenSql: string;
  /** The statement text changed */
  limitApplied: boolean;
  /** An explicit LIMIT above maxLimit was reduced */
  clamped: boolean;
  /** The statement was wrapped in an outer bounded SELECT */
  wrapped: boolean;
  originalLimit: number | null;
}

type AstLimit = { kind: 'none' } | { kind: 'literal'; value: number } | { kind: 'dynamic' };

const TRAILING_LIMIT_RE = /\bLIMIT\s+(\d+)(\s+OFFSET\s+\d+)?\s*$/i;
const TRAILING_LIMIT_COMMA_RE = /\bLIMIT\s+(\d+)\s*,\s*(\d+)\s*$/i;

export function ensureLimit(sql: string, opts: LimitOptions): LimitRewrite {
  const trimmed = sql.trim().replace(/;+\s*$/, '').trimEnd();
  const appendLimit = Math.min(opts.defaultLimit, opts.maxLimit);

  let astLimit: AstLimit | null;
  if (opts.ast !== undefined) {
    astLimit = readLimit(opts.ast);
  } else {
    const parsed = parseSql(trimmed, opts.dialect);
    astLimit = parsed.ok ? readLimit(parsed.ast) : null;
  }

  // LIMIT n [OFFSET m]
  const trailing = TRAILING_LIMIT_RE.exec(trimmed);
  if (trailing) {
    const value = Number(trailing[1]);
    if (value <= opts.maxLimit) {
      return unchanged(trimmed, value);
    }
    const offset = trailing[2] ?? '';
    return {
      rewrittenSql: `${trimmed.slice(0, trailing.index)}LIMIT ${opts.maxLimit}${offset}`,
      limitApplied: true,
      clamped: true,
      wrapped: false,
      originalLimit: value,
    };
  }

  // LIMIT offset, count
  const comma = TRAILING_LIMIT_COMMA_RE.exec(trimmed);
  if (comma) {
    const value = Number(comma[2]);
    if (value <= opts.maxLimit) {
      return unchanged(trimmed, value);
    }
    return {
      rewrittenSql: `${trimmed.slice(0, comma.index)}LIMIT ${comma[1]}, ${opts.maxLimit}`,
      limitApplied: true,
      clamped: true,
      wrapped: false,
      originalLimit: value,
    };
  }

  if (astLimit === null) {
    // No AST to consult: plain text check
    if (/\bLIMIT\b/i.test(trimmed)) {
      return wrap(trimmed, opts.maxLimit, null);
    }
    return append(trimmed, appendLimit);
  }

  switch (astLimit.kind) {
    case 'none':
      return append(trimmed, appendLimit);
    case 'literal':
      // not at the end of the text, so it may bound only part of the query
      return wrap(trimmed, opts.maxLimit, astLimit.value > opts.maxLimit ? astLimit.value : null);
    case 'dynamic':
      return wrap(trimmed, opts.maxLimit, null);
  }
}

/**
 * Row limit of a parsed SELECT, looking at the head of a compound query and
 * its last branch.
 */
export function readLimit(ast: unknown): AstLimit {
  if (!isAstNode(ast)) return { kind: 'none' };

  let tail = ast;
  let next = ast._next;
  while (isAstNode(next)) {
    tail = next;
    next = next._next;
  }

  for (const candidate of [ast._limit, ast.limit, tail === ast ? undefined : tail.limit]) {
    const limit = limitOf(candidate);
    if (limit.kind !== 'none') return limit;
  }
  return { kind: 'none' };
}

// node-sql-parser: { seperator: '' | ',' | 'offset', value: [{ type: 'number', value: N }, ...] }
// With ',' the count is the second value (LIMIT offset, count); otherwise the first.
function limitOf(node: unknown): AstLimit {
  if (!isAstNode(node) || !Array.isArray(node.value) || node.value.length === 0) {
    return { kind: 'none' };
  }
  const index = node.seperator === ',' && node.value.length > 1 ? 1 : 0;
  const count: unknown = node.value[index];
  if (isAstNode(count) && count.type === 'number' && typeof count.value === 'number') {
    return { kind: 'literal', value: count.value };
  }
  return { kind: 'dynamic' };
}

function unchanged(sql: string, value: number | null): LimitRewrite {
  return { rewrittenSql: sql, limitApplied: false, clamped: false, wrapped: false, originalLimit: value };
}

function append(sql: string, limit: number): LimitRewrite {
  return {
    rewrittenSql: `${sql} LIMIT ${limit}`,
    limitApplied: true,
    clamped: false,
    wrapped: false,
    originalLimit: null,
  };
}

function wrap(sql: string, limit: number, original: number | null): LimitRewrite {
  return {
    rewrittenSql: `SELECT * FROM (${sql}) AS bounded LIMIT ${limit}`,
    limitApplied: true,
    clamped: original !== null,
    wrapped: true,
    originalLimit: original,
  };
}
