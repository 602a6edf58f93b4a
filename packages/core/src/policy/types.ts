/**
 * Policy types for the SQL safety validator.
 *
 * The validator evaluates every candidate statement before execution. It
 * combines lexical checks with AST analysis and never touches a database.
 */

import type { RejectionReason } from '../errors.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';

export type { RejectionReason } from '../errors.js';

/** Validator configuration */
export interface SafetyPolicy {
  /** LIMIT to append when a statement has none */
  defaultLimit: number;
  /** Largest LIMIT a statement may keep; higher values are clamped */
  maxLimit: number;
  /** Function names (lowercase) that may not appear anywhere in a statement */
  forbiddenFunctions: string[];
}

export interface AcceptedVerdict {
  accepted: true;
  /** Statement as submitted */
  statement: string;
  /** Statement to execute: comments removed, terminator dropped, LIMIT ensured */
  normalizedStatement: string;
  /** Identity of the database whose schema the statement was checked against */
  sourceId: string;
  /** Tables the statement reads, as written */
  tables: string[];
  limitApplied: boolean;
  limitClamped: boolean;
  warnings: string[];
}

export interface RejectedVerdict {
  accepted: false;
  reason: RejectionReason;
  message: string;
}

export type ValidationVerdict = AcceptedVerdict | RejectedVerdict;

/** Functions that read or write files, load code, sleep, or reach other servers. */
export const DEFAULT_FORBIDDEN_FUNCTIONS: readonly string[] = [
  // SQLite
  'load_extension',
  'readfile',
  'writefile',
  'edit',
  'fts3_tokenizer',
  // Postgres
  'pg_sleep',
  'pg_sleep_for',
  'pg_sleep_until',
  'pg_terminate_backend',
  'pg_cancel_backend',
  'pg_reload_conf',
  'pg_read_file',
  'pg_read_binary_file',
  'pg_write_file',
  'pg_ls_dir',
  'pg_stat_file',
  'lo_import',
  'lo_export',
  'lo_unlink',
  'dblink',
  'dblink_exec',
  'set_config',
  'nextval',
  'setval',
  'query_to_xml',
];

export function defaultSafetyPolicy(): SafetyPolicy {
  return {
    defaultLimit: SAFE_DEFAULTS.defaultLimit,
    maxLimit: SAFE_DEFAULTS.maxLimit,
    forbiddenFunctions: [...DEFAULT_FORBIDDEN_FUNCTIONS],
  };
}
