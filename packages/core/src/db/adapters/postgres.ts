/**
 * Postgres adapter for askgate.
 * Uses the `pg` driver with strict safety defaults.
 *
 * Safety measures on every query session:
 * - statement_timeout set from the caller's timeout
 * - default_transaction_read_only = on, so the implicit transaction cannot write
 * - an aborted signal cancels the backend through pg_cancel_backend, or ends
 *   the client when it aborts before a backend is known
 */

import pg from 'pg';
import type { Logger } from 'pino';
import type {
  DatabaseConnection,
  IntrospectOptions,
  PostgresConnectionConfig,
  QueryOptions,
  QueryRows,
  TableSchema,
} from '../types.js';
import { abortErrorFor, quoteIdent, toScalarRow } from '../util.js';
import { silentLogger } from '../../logger.js';

const { Client } = pg;

interface TableRow {
  table_schema: string;
  table_name: string;
  row_estimate: string | number | null;
}

interface AbortWatch {
  setBackend(pid: number): void;
  dispose(): void;
}

interface ColumnRow {
  table_schema: string;
  table_name: string;
  column_name: string;
  data_type: string;
  is_nullable: string;
  column_default: string | null;
  is_pk: boolean;
}

export class PostgresConnection implements DatabaseConnection {
  readonly dialect = 'postgres' as const;
  readonly id: string;
  private readonly logger: Logger;
  private readonly closing = new WeakMap<pg.Client, Promise<void>>();

  constructor(
    private readonly cfg: PostgresConnectionConfig,
    logger?: Logger,
  ) {
    this.id = `postgres://${cfg.user}@${cfg.host}:${cfg.port}/${cfg.database}`;
    this.logger = logger ?? silentLogger();
  }

  private newClient(): pg.Client {
    return new Client({
      host: this.cfg.host,
      port: this.cfg.port,
      database: this.cfg.database,
      user: this.cfg.user,
      password: this.cfg.password,
      ssl: this.cfg.ssl ? { rejectUnauthorized: false } : false,
      connectionTimeoutMillis: this.cfg.connectTimeoutMs ?? 10_000,
    });
  }

  /** End a client once; later calls wait for the same close. */
  private release(client: pg.Client): Promise<void> {
    let closing = this.closing.get(client);
    if (!closing) {
      closing = client.end().catch((err: unknown) => {
        this.logger.warn({ err, connection: this.id }, 'failed to close postgres client');
      });
      this.closing.set(client, closing);
    }
    return closing;
  }

  /**
   * Bind a signal to a client for the whole operation, connect included.
   * Before a backend pid is known an abort ends the client; afterwards it
   * cancels the running statement.
   */
  private watchAbort(client: pg.Client, signal: AbortSignal | undefined): AbortWatch {
    let pid: number | undefined;
    const onAbort = (): void => {
      if (pid === undefined) {
        void this.release(client);
        return;
      }
      this.cancelBackend(pid).catch((err: unknown) => {
        this.logger.warn({ err, pid, connection: this.id }, 'pg_cancel_backend failed');
      });
    };
    signal?.addEventListener('abort', onAbort, { once: true });
    return {
      setBackend: (backendPid) => {
        pid = backendPid;
      },
      dispose: () => signal?.removeEventListener('abort', onAbort),
    };
  }

  async ping(): Promise<string> {
    const client = this.newClient();
    try {
      await client.connect();
      const res = await client.query<{ version: string }>('SELECT version() AS version');
      return res.rows[0]?.version ?? 'postgres';
    } finally {
      await this.release(client);
    }
  }

  async introspect(opts: IntrospectOptions = {}): Promise<TableSchema[]> {
    const { includeRowCounts = true, sampleRows = 0, signal } = opts;
    signal?.throwIfAborted();
    const client = this.newClient();
    const watch = this.watchAbort(client, signal);

    try {
      await client.connect();
      await client.query('SET default_transaction_read_only = on');

      const tablesRes = await client.query<TableRow>(`
        SELECT t.table_schema, t.table_name,
               c.reltuples::bigint AS row_estimate
        FROM information_schema.tables t
        LEFT JOIN pg_namespace n ON n.nspname = t.table_schema
        LEFT JOIN pg_class c ON c.relname = t.table_name AND c.relnamespace = n.oid
        WHERE t.table_schema NOT IN ('pg_catalog', 'information_schema')
          AND t.table_type = 'BASE TABLE'
        ORDER BY t.table_schema, t.table_name
      `);
      signal?.throwIfAborted();

      const colsRes = await client.query<ColumnRow>(`
        SELECT c.table_schema, c.table_name, c.column_name, c.data_type,
               c.is_nullable, c.column_default,
               CASE WHEN pk.column_name IS NOT NULL THEN true ELSE false END AS is_pk
        FROM information_schema.columns c
        LEFT JOIN (
          SELECT ku.table_schema, ku.table_name, ku.column_name
          FROM information_schema.table_constraints tc
          JOIN information_schema.key_column_usage ku
            ON tc.constraint_name = ku.constraint_name
            AND tc.table_schema = ku.table_schema
          WHERE tc.constraint_type = 'PRIMARY KEY'
        ) pk ON pk.table_schema = c.table_schema
            AND pk.table_name = c.table_name
            AND pk.column_name = c.column_name
        WHERE c.table_schema NOT IN ('pg_catalog', 'information_schema')
        ORDER BY c.table_schema, c.table_name, c.ordinal_position
      `);

      const tableMap = new Map<string, TableSchema>();
      for (const row of tablesRes.rows) {
        const table: TableSchema = { name: row.table_name, schema: row.table_schema, columns: [] };
        if (includeRowCounts) {
          // reltuples is -1 for never-analyzed tables
          table.rowCount = Math.max(0, Number(row.row_estimate) || 0);
        }
        tableMap.set(`${row.table_schema}.${row.table_name}`, table);
      }

      for (const row of colsRes.rows) {
        const table = tableMap.get(`${row.table_schema}.${row.table_name}`);
        if (!table) continue;
        table.columns.push({
          name: row.column_name,
          dataType: row.data_type,
          nullable: row.is_nullable === 'YES',
          isPrimaryKey: row.is_pk === true,
          ...(row.column_default !== null ? { defaultValue: row.column_default } : {}),
        });
      }

      if (sampleRows > 0) {
        for (const table of tableMap.values()) {
          signal?.throwIfAborted();
          const sample = await client.query<unknown[]>({
            text: `SELECT * FROM ${quoteIdent(table.schema ?? 'public')}.${quoteIdent(table.name)} LIMIT $1`,
            values: [sampleRows],
            rowMode: 'array',
          });
          table.sampleRows = sample.rows.map(toScalarRow);
        }
      }

      return Array.from(tableMap.values());
    } catch (err: unknown) {
      if (signal?.aborted) throw abortErrorFor(signal);
      throw err;
    } finally {
      watch.dispose();
      await this.release(client);
    }
  }

  async query(sql: string, opts: QueryOptions): Promise<QueryRows> {
    const { signal, maxRows, timeoutMs } = opts;
    signal?.throwIfAborted();
    const client = this.newClient();
    const watch = this.watchAbort(client, signal);

    try {
      await client.connect();
      await client.query(`SET statement_timeout = ${Math.max(1, Math.floor(timeoutMs))}`);
      await client.query('SET default_transaction_read_only = on');
      const pidRes = await client.query<{ pid: number }>('SELECT pg_backend_pid() AS pid');
      const pid = pidRes.rows[0]?.pid;
      if (pid !== undefined) watch.setBackend(pid);
      signal?.throwIfAborted();

      const result = await client.query<unknown[]>({ text: sql, rowMode: 'array' });
      if (signal?.aborted) throw abortErrorFor(signal);

      const columns = result.fields.map((f) => f.name);
      const allRows = result.rows;
      const truncated = allRows.length > maxRows;
      const rows = (truncated ? allRows.slice(0, maxRows) : allRows).map(toScalarRow);
      return { columns, rows, truncated };
    } catch (err: unknown) {
      if (signal?.aborted) throw abortErrorFor(signal);
      throw err;
    } finally {
      watch.dispose();
      await this.release(client);
    }
  }

  /** Cancel a running statement from a second session. */
  private async cancelBackend(pid: number): Promise<void> {
    const client = this.newClient();
    try {
      await client.connect();
      await client.query('SELECT pg_cancel_backend($1)', [pid]);
    } finally {
      await this.release(client);
    }
  }

  async close(): Promise<void> {
    // Clients are per operation; nothing stays open between calls.
  }
}
