/**
 * SQL pipeline: schema → generation → validation → bounded execution.
 *
 * The retry policy lives here, not in the components: a rejected or
 * unparseable candidate is re-prompted with feedback up to `maxAttempts`
 * times. Every other failure ends the request.
 */

import type { Logger } from 'pino';
import type { DatabaseConnection, SchemaDescription } from './db/types.js';
import type { SchemaInspector } from './db/inspect.js';
import type { SchemaCache } from './db/schema-cache.js';
import type { BoundedExecutor } from './db/execute.js';
import type { SqlGenerator } from './llm/generator.js';
import type { CandidateSQL } from './llm/types.js';
import type { SafetyPolicy } from './policy/types.js';
import type { NLQuery } from './types.js';
import type { DatabaseHandler, HandlerOptions, SqlAnswer } from './router/types.js';
import { SqlSafetyValidator } from './policy/validator.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import {
  AskgateError,
  GenerationUnparseableError,
  RequestCancelledError,
  SafetyRejectionError,
} from './errors.js';
import { silentLogger } from './logger.js';

export interface SqlPipelineOptions {
  connection: DatabaseConnection;
  generator: SqlGenerator;
  executor: BoundedExecutor;
  /** Schema source; a cache takes precedence over a bare inspector */
  inspector: SchemaInspector;
  schemaCache?: SchemaCache;
  policy?: Partial<SafetyPolicy>;
  /** Generation attempts per request. Default: 3 */
  maxAttempts?: number;
  /** Overall budget per request in milliseconds. Default: none */
  deadlineMs?: number;
  logger?: Logger;
}

export class SqlPipeline implements DatabaseHandler {
  private readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(private readonly opts: SqlPipelineOptions) {
    this.maxAttempts = opts.maxAttempts ?? SAFE_DEFAULTS.maxAttempts;
    this.logger = opts.logger ?? silentLogger();
    if (!Number.isInteger(this.maxAttempts) || this.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.maxAttempts}`);
    }
  }

  /** Answer a question with generated SQL. */
  async answer(query: NLQuery, handlerOpts: HandlerOptions = {}): Promise<SqlAnswer> {
    return this.withDeadline(handlerOpts.signal, async (signal) => {
      const schema = await this.schema(signal);
      const validator = new SqlSafetyValidator(schema, this.opts.policy);

      let feedback: string | undefined;
      let lastError: AskgateError | undefined;

      for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
        let candidate: CandidateSQL;
        try {
          candidate = await this.opts.generator.generate(query, schema, { signal, feedback });
        } catch (err: unknown) {
          if (!(err instanceof GenerationUnparseableError)) throw err;
          this.logger.debug({ attempt }, 'generator output had no SQL statement');
          lastError = err;
          feedback = 'The response did not contain a SQL statement in a ```sql code block.';
          continue;
        }

        const verdict = validator.validate(candidate);
        if (!verdict.accepted) {
          this.logger.debug(
            { attempt, reason: verdict.reason, statement: candidate.statement },
            'candidate rejected',
          );
          lastError = new SafetyRejectionError(verdict.reason, verdict.message, candidate.statement);
          feedback = `${verdict.reason}: ${verdict.message}`;
          continue;
        }

        this.logger.debug({ attempt, sql: verdict.normalizedStatement }, 'candidate accepted');
        const result = await this.opts.executor.execute(verdict, this.opts.connection, { signal });
        return {
          sql: verdict.normalizedStatement,
          result,
          attempts: attempt,
          warnings: verdict.warnings,
        };
      }

      this.logger.warn({ attempts: this.maxAttempts, code: lastError?.code }, 'no acceptable candidate');
      throw lastError ?? new AskgateError('INTERNAL_ERROR', 'No generation attempt was made.');
    });
  }

  /** Validate and execute a caller-written statement; no generation. */
  async runStatement(statement: string, handlerOpts: HandlerOptions = {}): Promise<SqlAnswer> {
    return this.withDeadline(handlerOpts.signal, async (signal) => {
      const schema = await this.schema(signal);
      const verdict = new SqlSafetyValidator(schema, this.opts.policy).validate(statement);
      if (!verdict.accepted) {
        throw new SafetyRejectionError(verdict.reason, verdict.message, statement);
      }
      const result = await this.opts.executor.execute(verdict, this.opts.connection, { signal });
      return { sql: verdict.normalizedStatement, result, attempts: 0, warnings: verdict.warnings };
    });
  }

  private async schema(signal: AbortSignal | undefined): Promise<SchemaDescription> {
    const { schemaCache, inspector, connection } = this.opts;
    return schemaCache
      ? schemaCache.get(connection, { signal })
      : inspector.describe(connection, { signal });
  }

  private async withDeadline<T>(
    callerSignal: AbortSignal | undefined,
    run: (signal: AbortSignal | undefined) => Promise<T>,
  ): Promise<T> {
    const { deadlineMs } = this.opts;
    if (deadlineMs === undefined) {
      return run(callerSignal);
    }

    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(), deadlineMs);
    const signal = callerSignal ? AbortSignal.any([callerSignal, deadline.signal]) : deadline.signal;
    try {
      return await run(signal);
    } catch (err: unknown) {
      if (deadline.signal.aborted && !callerSignal?.aborted && err instanceof RequestCancelledError) {
        this.logger.warn({ deadlineMs }, 'request deadline exceeded');
        throw new AskgateError('REQUEST_CANCELLED', `Request exceeded its ${deadlineMs} ms deadline.`, {
          details: { deadlineMs },
          cause: err,
        });
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}
