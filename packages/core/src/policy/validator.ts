/**
 * SQL Safety Validator.
 *
 * Accepts or rejects one candidate statement against a schema description.
 * Rules run in order and the first violation decides the verdict:
 *
 *   1. single statement              MULTIPLE_STATEMENTS
 *   2. SELECT / WITH only            WRITE_OR_DDL_FORBIDDEN
 *   3. known tables only             UNKNOWN_TABLE
 *   4. no dangerous constructs       FORBIDDEN_CONSTRUCT
 *   5. LIMIT ensured (rewrite)
 *
 * Text the parser cannot read is rejected as UNPARSEABLE. Validation is pure:
 * no I/O, and the same input always yields the same verdict.
 */

import type { SchemaDescription } from '../db/types.js';
import type { CandidateSQL } from '../llm/types.js';
import type { ValidationVerdict, SafetyPolicy, RejectedVerdict } from './types.js';
import { defaultSafetyPolicy } from './types.js';
import { scanSql, statementsOf } from './sql-text.js';
import { parseSql } from './parse.js';
import {
  checkForbiddenConstructs,
  checkKnownTables,
  checkLeadingKeyword,
  checkParsedStatement,
  checkSingleStatement,
  qualifiedName,
  type RuleViolation,
} from './rules.js';
import { ensureLimit } from './rewrite.js';

export class SqlSafetyValidator {
  private readonly policy: SafetyPolicy;

  constructor(
    private readonly schema: SchemaDescription,
    policy: Partial<SafetyPolicy> = {},
  ) {
    const defaults = defaultSafetyPolicy();
    this.policy = {
      defaultLimit: policy.defaultLimit ?? defaults.defaultLimit,
      maxLimit: policy.maxLimit ?? defaults.maxLimit,
      forbiddenFunctions: (policy.forbiddenFunctions ?? defaults.forbiddenFunctions).map((f) =>
        f.toLowerCase(),
      ),
    };
  }

  validate(candidate: CandidateSQL | string): ValidationVerdict {
    const statement = typeof candidate === 'string' ? candidate : candidate.statement;
    const scan = scanSql(statement);

    const multiple = checkSingleStatement(scan);
    if (multiple) return reject(multiple);

    const [body] = statementsOf(scan);
    if (body === undefined) {
      return { accepted: false, reason: 'UNPARSEABLE', message: 'Statement is empty.' };
    }

    const leading = checkLeadingKeyword(body);
    if (leading) return reject(leading);

    const parsed = parseSql(body, this.schema.dialect);
    if (!parsed.ok) {
      if (scan.unterminated) {
        return reject({
          reason: 'FORBIDDEN_CONSTRUCT',
          message: `Statement contains an unterminated ${scan.unterminated}.`,
        });
      }
      return { accepted: false, reason: 'UNPARSEABLE', message: parsed.error };
    }

    const violation =
      checkParsedStatement(parsed) ??
      checkKnownTables(parsed, this.schema, scan) ??
      checkForbiddenConstructs(scan, parsed.ast, this.policy.forbiddenFunctions);
    if (violation) return reject(violation);

    const limit = ensureLimit(body, {
      defaultLimit: this.policy.defaultLimit,
      maxLimit: this.policy.maxLimit,
      ast: parsed.ast,
    });

    const warnings: string[] = [];
    if (limit.clamped) {
      warnings.push(`LIMIT ${limit.originalLimit ?? ''} reduced to ${this.policy.maxLimit}.`);
    } else if (limit.wrapped) {
      warnings.push(`Row limit could not be read; result bounded to ${this.policy.maxLimit} rows.`);
    } else if (limit.limitApplied) {
      warnings.push(`LIMIT ${Math.min(this.policy.defaultLimit, this.policy.maxLimit)} added.`);
    }

    return {
      accepted: true,
      statement,
      normalizedStatement: limit.rewrittenSql,
      sourceId: this.schema.sourceId,
      tables: unique(parsed.tables.map(qualifiedName)),
      limitApplied: limit.limitApplied,
      limitClamped: limit.clamped,
      warnings,
    };
  }
}

function reject(violation: RuleViolation): RejectedVerdict {
  return { accepted: false, reason: violation.reason, message: violation.message };
}

function unique(items: string[]): string[] {
  return [...new Set(items)];
}
