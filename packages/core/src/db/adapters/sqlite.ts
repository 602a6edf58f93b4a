/**
 * SQLite adapter backed by better-sqlite3.
 *
 * Every operation opens its own read-only handle on the file and closes it
 * before resolving, so no statement outlives the call that ran it.
 */

import { resolve } from 'node:path';
import { setImmediate as nextTurn } from 'node:timers/promises';
import Database from 'better-sqlite3';
import type {
  DatabaseConnection,
  IntrospectOptions,
  QueryOptions,
  QueryRows,
  Scalar,
  SqliteConnectionConfig,
  TableSchema,
} from '../types.js';
import { abortErrorFor, deadlineError, quoteIdent, toScalarRow } from '../util.js';

/** Rows fetched between checks of the abort signal. */
const ROWS_PER_TURN = 128;

interface PragmaColumn {
  name: string;
  type: string;
  notnull: number;
  pk: number;
  dflt_value: string | null;
}

export class SqliteConnection implements DatabaseConnection {
  readonly dialect = 'sqlite' as const;
  readonly id: string;
  private readonly filepath: string;

  constructor(cfg: SqliteConnectionConfig) {
    if (!cfg.filepath?.trim()) {
      throw new Error('SQLite database path is required.');
    }
    this.filepath = resolve(cfg.filepath);
    this.id = `sqlite:${this.filepath}`;
  }

  private open(): Database.Database {
    return new Database(this.filepath, { readonly: true, fileMustExist: true });
  }

  async ping(): Promise<string> {
    const db = this.open();
    try {
      const row = db.prepare<[], { version: string }>('SELECT sqlite_version() AS version').get();
      return row?.version ?? 'sqlite';
    } finally {
      db.close();
    }
  }

  async introspect(opts: IntrospectOptions = {}): Promise<TableSchema[]> {
    const { includeRowCounts = true, sampleRows = 0, signal } = opts;
    signal?.throwIfAborted();
    const db = this.open();
    try {
      const tableRows = db
        .prepare<[], { name: string }>(`
          SELECT name
          FROM sqlite_master
          WHERE type = 'table'
            AND name NOT LIKE 'sqlite_%'
          ORDER BY name
        `)
        .all();

      const tables: TableSchema[] = [];
      for (const { name } of tableRows) {
        signal?.throwIfAborted();
        const columns = db.prepare<[], PragmaColumn>(`PRAGMA table_info(${quoteIdent(name)})`).all();

        const table: TableSchema = {
          name,
          schema: 'main',
          columns: columns.map((column) => ({
            name: column.name,
            dataType: column.type || 'TEXT',
            nullable: column.notnull === 0,
            isPrimaryKey: column.pk > 0,
            ...(column.dflt_value !== null ? { defaultValue: column.dflt_value } : {}),
          })),
        };

        if (includeRowCounts) {
          const countRow = db
            .prepare<[], { c: number }>(`SELECT COUNT(*) AS c FROM ${quoteIdent(name)}`)
            .get();
          table.rowCount = Number(countRow?.c ?? 0);
        }
        if (sampleRows > 0) {
          table.sampleRows = db
            .prepare<[number], unknown[]>(`SELECT * FROM ${quoteIdent(name)} LIMIT ?`)
            .raw(true)
            .all(sampleRows)
            .map(toScalarRow);
        }
        tables.push(table);
      }
      return tables;
    } finally {
      db.close();
    }
  }

  async query(sql: string, opts: QueryOptions): Promise<QueryRows> {
    const { signal, maxRows, timeoutMs } = opts;
    signal?.throwIfAborted();
    // Each step runs synchronously, so a pending timer cannot fire mid-statement.
    const deadline = performance.now() + timeoutMs;
    const db = this.open();
    try {
      const stmt = db.prepare(sql);
      if (!stmt.reader) {
        throw new Error('Statement does not return rows.');
      }
      const columns = stmt.columns().map((column) => column.name);
      stmt.raw(true);

      const rows: Scalar[][] = [];
      let truncated = false;
      // Breaking out of (or throwing inside) the loop resets the statement.
      for (const row of stmt.iterate()) {
        if (rows.length >= maxRows) {
          truncated = true;
          break;
        }
        rows.push(toScalarRow(row));
        if (performance.now() > deadline) throw deadlineError(timeoutMs);
        if (rows.length % ROWS_PER_TURN === 0) {
          await nextTurn();
          if (signal?.aborted) throw abortErrorFor(signal);
        }
      }
      if (signal?.aborted) throw abortErrorFor(signal);
      if (performance.now() > deadline) throw deadlineError(timeoutMs);
      return { columns, rows, truncated };
    } finally {
      db.close();
    }
  }

  async close(): Promise<void> {
    // Handles are per operation; nothing stays open between calls.
  }
}
