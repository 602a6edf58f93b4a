/**
 * Validation rules for candidate SQL.
 *
 * Each rule returns a violation or null. The validator runs them in a fixed
 * order and stops at the first violation.
 */

import type { SchemaDescription } from '../db/types.js';
import { findTable } from '../db/inspect.js';
import type { RejectionReason } from './types.js';
import type { ParseResult, TableRef } from './parse.js';
import { functionNameOf, walkAst } from './parse.js';
import type { SqlScan } from './sql-text.js';
import { findFunctionCalls, leadingKeyword, statementsOf } from './sql-text.js';

export interface RuleViolation {
  reason: RejectionReason;
  message: string;
}

const READ_KEYWORDS = new Set(['SELECT', 'WITH']);

/** Functions that may stand in FROM as a row source. Anything else there is not a table. */
export const TABLE_FUNCTIONS: readonly string[] = [
  'generate_series',
  'unnest',
  'json_each',
  'json_tree',
  'json_array_elements',
  'json_array_elements_text',
  'jsonb_array_elements',
  'jsonb_array_elements_text',
  'json_each_text',
  'jsonb_each',
  'jsonb_each_text',
];

// SQLite exposes every PRAGMA as a pragma_* table-valued function.
const PRAGMA_FUNCTION_RE = /\b(pragma_\w+)\s*\(/i;

/** Rule 1: one statement per candidate. */
export function checkSingleStatement(scan: SqlScan): RuleViolation | null {
  const statements = statementsOf(scan);
  if (statements.length > 1) {
    return {
      reason: 'MULTIPLE_STATEMENTS',
      message: `Multiple statements detected (${statements.length}). Only a single statement is allowed.`,
    };
  }
  return null;
}

/** Rule 2, lexical half: the statement must open with SELECT or WITH. */
export function checkLeadingKeyword(statement: string): RuleViolation | null {
  const keyword = leadingKeyword(statement);
  if (READ_KEYWORDS.has(keyword)) return null;
  return {
    reason: 'WRITE_OR_DDL_FORBIDDEN',
    message: keyword
      ? `Statement type "${keyword}" is not allowed. Only SELECT queries may run.`
      : 'Statement does not start with SELECT or WITH.',
  };
}

/** Rules 1 and 2 on the AST: single statement, every operation a read. */
export function checkParsedStatement(parsed: ParseResult): RuleViolation | null {
  if (parsed.statementCount > 1) {
    return {
      reason: 'MULTIPLE_STATEMENTS',
      message: `Multiple statements detected (${parsed.statementCount}). Only a single statement is allowed.`,
    };
  }

  if (parsed.kind !== 'select') {
    return {
      reason: 'WRITE_OR_DDL_FORBIDDEN',
      message: `Statement type "${parsed.kind.toUpperCase()}" is not allowed. Only SELECT queries may run.`,
    };
  }

  const writeTarget = parsed.tables.find((t) => t.operation !== 'select');
  if (writeTarget) {
    return {
      reason: 'WRITE_OR_DDL_FORBIDDEN',
      message: `Statement performs "${writeTarget.operation.toUpperCase()}" on "${qualifiedName(writeTarget)}".`,
    };
  }

  return null;
}

/**
 * Rule 3: every referenced table exists in the described schema. Function
 * row sources count as tables unless they are plain generators.
 */
export function checkKnownTables(
  parsed: ParseResult,
  schema: SchemaDescription,
  scan: SqlScan,
): RuleViolation | null {
  const pragma = PRAGMA_FUNCTION_RE.exec(scan.masked);
  const source = pragma?.[1].toLowerCase() ?? parsed.tableFunctions.find((name) => !TABLE_FUNCTIONS.includes(name));
  if (source) {
    return {
      reason: 'UNKNOWN_TABLE',
      message: `Table function "${source}" is not a table in ${schema.sourceId}.`,
    };
  }

  const ctes = new Set(parsed.cteNames);
  for (const ref of parsed.tables) {
    if (ref.schema === null && ctes.has(ref.name.toLowerCase())) continue;
    if (!findTable(schema, qualifiedName(ref))) {
      return {
        reason: 'UNKNOWN_TABLE',
        message: `Table "${qualifiedName(ref)}" does not exist in ${schema.sourceId}.`,
      };
    }
  }
  return null;
}

/**
 * Rule 4: stacked terminators, truncating or unterminated comments and
 * literals, and calls to forbidden functions.
 */
export function checkForbiddenConstructs(
  scan: SqlScan,
  ast: unknown,
  forbiddenFunctions: readonly string[],
): RuleViolation | null {
  if (scan.semicolons > 1) {
    return { reason: 'FORBIDDEN_CONSTRUCT', message: 'Statement contains more than one semicolon.' };
  }

  if (scan.unterminated) {
    return {
      reason: 'FORBIDDEN_CONSTRUCT',
      message: `Statement contains an unterminated ${scan.unterminated}.`,
    };
  }

  if (scan.endsWithComment) {
    return {
      reason: 'FORBIDDEN_CONSTRUCT',
      message: 'Statement ends with a comment, which can hide a truncated query.',
    };
  }

  const called = new Set(findFunctionCalls(scan.masked, forbiddenFunctions));
  for (const name of functionNames(ast)) {
    if (forbiddenFunctions.includes(name)) called.add(name);
  }
  if (called.size > 0) {
    const first = [...called][0];
    return { reason: 'FORBIDDEN_CONSTRUCT', message: `Function "${first}" is not allowed.` };
  }

  return null;
}

export function qualifiedName(ref: TableRef): string {
  return ref.schema ? `${ref.schema}.${ref.name}` : ref.name;
}

// Function names called anywhere in the AST, lowercased, without schema prefix.
function functionNames(ast: unknown): string[] {
  const names: string[] = [];
  walkAst(ast, (node) => {
    if (node.type !== 'function' && node.type !== 'aggr_func') return;
    const name = functionNameOf(node.name);
    if (name) names.push(name.toLowerCase());
  });
  return names;
}
