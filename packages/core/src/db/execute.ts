/**
 * Bounded SQL Executor.
 *
 * Runs one accepted statement with a row cap and a wall-clock timeout.
 * A run either returns every row it fetched (up to the cap) or fails with a
 * typed error; partial results are never returned.
 */

import type { Logger } from 'pino';
import type { DatabaseConnection, ExecutionResult } from './types.js';
import type { AcceptedVerdict } from '../policy/types.js';
import { SAFE_DEFAULTS } from './defaults.js';
import {
  AskgateError,
  ExecutionError,
  ExecutionTimeoutError,
  RequestCancelledError,
} from '../errors.js';
import { silentLogger } from '../logger.js';

export interface ExecutorOptions {
  /** Most rows a result may carry. Default: 1000 */
  maxRows?: number;
  /** Wall-clock budget per statement in milliseconds. Default: 5000 */
  timeoutMs?: number;
  logger?: Logger;
}

export class BoundedExecutor {
  readonly maxRows: number;
  readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(opts: ExecutorOptions = {}) {
    this.maxRows = opts.maxRows ?? SAFE_DEFAULTS.maxRows;
    this.timeoutMs = opts.timeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
    this.logger = opts.logger ?? silentLogger();

    if (!Number.isInteger(this.maxRows) || this.maxRows < 1) {
      throw new RangeError(`maxRows must be a positive integer, got ${this.maxRows}`);
    }
    if (!(this.timeoutMs > 0)) {
      throw new RangeError(`timeoutMs must be positive, got ${this.timeoutMs}`);
    }
  }

  async execute(
    verdict: AcceptedVerdict,
    connection: DatabaseConnection,
    opts: { signal?: AbortSignal } = {},
  ): Promise<ExecutionResult> {
    if (verdict.sourceId !== connection.id) {
      throw new ExecutionError(
        `Statement was validated against ${verdict.sourceId} but the connection is ${connection.id}.`,
        { code: 'SCHEMA_MISMATCH' },
      );
    }
    if (opts.signal?.aborted) {
      throw new RequestCancelledError('execution');
    }

    const timer = new AbortController();
    const timeout = setTimeout(() => timer.abort(), this.timeoutMs);
    const signal = opts.signal ? AbortSignal.any([opts.signal, timer.signal]) : timer.signal;

    const start = performance.now();
    try {
      const { columns, rows, truncated } = await connection.query(verdict.normalizedStatement, {
        maxRows: this.maxRows,
        timeoutMs: this.timeoutMs,
        signal,
      });
      const elapsed = performance.now() - start;
      const elapsedMs = Math.round(elapsed);

      // An engine that blocks the event loop can finish after the timer was due.
      if (elapsed > this.timeoutMs) {
        this.logger.warn({ connection: connection.id, elapsedMs }, 'statement timed out');
        throw new ExecutionTimeoutError(this.timeoutMs);
      }

      this.logger.debug(
        { connection: connection.id, rows: rows.length, truncated, elapsedMs },
        'statement executed',
      );

      return Object.freeze({
        columns: Object.freeze(columns),
        rows: Object.freeze(rows.map((row) => Object.freeze(row))),
        rowCount: rows.length,
        truncated,
        elapsedMs,
      });
    } catch (err: unknown) {
      if (err instanceof ExecutionTimeoutError) throw err;
      const elapsed = performance.now() - start;
      const elapsedMs = Math.round(elapsed);

      if (timer.signal.aborted) {
        this.logger.warn({ connection: connection.id, elapsedMs }, 'statement timed out');
        throw new ExecutionTimeoutError(this.timeoutMs);
      }
      if (opts.signal?.aborted) {
        throw new RequestCancelledError('execution');
      }
      if (elapsed > this.timeoutMs) {
        this.logger.warn({ connection: connection.id, elapsedMs }, 'statement timed out');
        throw new ExecutionTimeoutError(this.timeoutMs);
      }
      if (err instanceof AskgateError) {
        throw err;
      }

      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ connection: connection.id, err: message }, 'statement failed');
      throw new ExecutionError(`Query failed: ${message}`, engineDetails(err), err);
    } finally {
      clearTimeout(timeout);
    }
  }
}

// pg errors carry a SQLSTATE `code`; better-sqlite3 errors a SQLITE_* `code`.
function engineDetails(err: unknown): Record<string, unknown> | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return { engineCode: err.code };
  }
  return undefined;
}
