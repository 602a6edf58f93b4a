/**
 * Database abstraction types for askgate.
 * Engine adapters (SQLite, Postgres) implement DatabaseConnection.
 */

export type SqlDialect = 'sqlite' | 'postgres';

export type DbType = SqlDialect;

export interface SqliteConnectionConfig {
  type: 'sqlite';
  /** Path to the database file. It must already exist. */
  filepath: string;
}

export interface PostgresConnectionConfig {
  type: 'postgres';
  host: string;
  port: number;
  database: string;
  user: string;
  password?: string;
  ssl?: boolean;
  /** Connection timeout in milliseconds */
  connectTimeoutMs?: number;
}

export type ConnectionConfig = SqliteConnectionConfig | PostgresConnectionConfig;

/** A single result cell. */
export type Scalar = string | number | bigint | boolean | null | Uint8Array;

export interface ColumnSpec {
  name: string;
  dataType: string;
  nullable: boolean;
  isPrimaryKey: boolean;
  defaultValue?: string;
}

export interface TableSchema {
  name: string;
  /** Namespace the table lives in (`main` for SQLite, e.g. `public` for Postgres) */
  schema?: string;
  columns: ColumnSpec[];
  rowCount?: number;
  /** A few rows in column order, shown to the generator as examples of the data */
  sampleRows?: Scalar[][];
}

export interface SchemaDescription {
  /** Identity of the database instance the description was read from */
  sourceId: string;
  dialect: SqlDialect;
  tables: TableSchema[];
  capturedAt: Date;
}

export interface ExecutionResult {
  readonly columns: readonly string[];
  readonly rows: ReadonlyArray<readonly Scalar[]>;
  readonly rowCount: number;
  readonly truncated: boolean;
  readonly elapsedMs: number;
}

export interface QueryOptions {
  /** Stop fetching after this many rows */
  maxRows: number;
  /** Time budget in milliseconds; server-side where the engine supports it */
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface QueryRows {
  columns: string[];
  rows: Scalar[][];
  /** True when the engine had more rows than maxRows */
  truncated: boolean;
}

export interface IntrospectOptions {
  includeRowCounts?: boolean;
  /** Rows to read from each table as samples. Default: 0 */
  sampleRows?: number;
  signal?: AbortSignal;
}

/**
 * A read-only handle on one database instance.
 *
 * Every operation opens what it needs and releases it before resolving;
 * `query` must stop promptly when its signal aborts and reject with an
 * AbortError.
 */
export interface DatabaseConnection {
  readonly id: string;
  readonly dialect: SqlDialect;

  /** Round-trip to the engine; resolves with its version string. */
  ping(): Promise<string>;

  /** Catalog read of user tables. May include system tables; callers filter. */
  introspect(opts?: IntrospectOptions): Promise<TableSchema[]>;

  query(sql: string, opts: QueryOptions): Promise<QueryRows>;

  close(): Promise<void>;
}
