/**
 * Schema Inspector: turns a connection's catalog into an immutable
 * SchemaDescription used to ground SQL generation and validation.
 */

import type { Logger } from 'pino';
import type { DatabaseConnection, SchemaDescription, SqlDialect, TableSchema } from './types.js';
import { RequestCancelledError, SchemaUnavailableError, isAbortError } from '../errors.js';
import { silentLogger } from '../logger.js';

export interface InspectorOptions {
  /** Count rows per table (SQLite) or read planner estimates (Postgres). Default: true */
  includeRowCounts?: boolean;
  /** Sample rows read per table for prompt grounding. Default: 0 */
  sampleRows?: number;
  logger?: Logger;
}

const SYSTEM_SCHEMAS = new Set(['pg_catalog', 'information_schema', 'pg_toast']);

/** Engine-owned tables. Each dialect only reserves its own names. */
export function isSystemTable(table: Pick<TableSchema, 'name' | 'schema'>, dialect: SqlDialect): boolean {
  switch (dialect) {
    case 'sqlite':
      return table.name.toLowerCase().startsWith('sqlite_');
    case 'postgres': {
      const namespace = table.schema?.toLowerCase() ?? '';
      return SYSTEM_SCHEMAS.has(namespace) || namespace.startsWith('pg_temp_') || namespace.startsWith('pg_toast_temp_');
    }
  }
}

export class SchemaInspector {
  private readonly includeRowCounts: boolean;
  private readonly sampleRows: number;
  private readonly logger: Logger;

  constructor(opts: InspectorOptions = {}) {
    this.includeRowCounts = opts.includeRowCounts ?? true;
    this.sampleRows = opts.sampleRows ?? 0;
    this.logger = opts.logger ?? silentLogger();
  }

  async describe(
    connection: DatabaseConnection,
    opts: { signal?: AbortSignal } = {},
  ): Promise<SchemaDescription> {
    let tables: TableSchema[];
    try {
      tables = await connection.introspect({
        includeRowCounts: this.includeRowCounts,
        sampleRows: this.sampleRows,
        signal: opts.signal,
      });
    } catch (err: unknown) {
      if (opts.signal?.aborted || isAbortError(err)) {
        throw new RequestCancelledError('schema inspection');
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ connection: connection.id, err: message }, 'schema introspection failed');
      throw new SchemaUnavailableError(`Could not introspect ${connection.id}: ${message}`, err);
    }

    const userTables = tables.filter((t) => !isSystemTable(t, connection.dialect));
    this.logger.debug({ connection: connection.id, tables: userTables.length }, 'schema described');

    return deepFreeze({
      sourceId: connection.id,
      dialect: connection.dialect,
      tables: userTables.map((t) => ({ ...t, columns: t.columns.map((c) => ({ ...c })) })),
      capturedAt: new Date(),
    });
  }
}

/**
 * Case-insensitive table lookup. A qualified name (`main.customers`,
 * `public.orders`) must match the table's namespace as well.
 */
export function findTable(schema: SchemaDescription, name: string): TableSchema | undefined {
  const lower = name.toLowerCase();
  const dot = lower.lastIndexOf('.');
  const qualifier = dot >= 0 ? lower.slice(0, dot) : null;
  const bare = dot >= 0 ? lower.slice(dot + 1) : lower;

  return schema.tables.find((t) => {
    if (t.name.toLowerCase() !== bare) return false;
    if (qualifier === null) return true;
    return (t.schema ?? '').toLowerCase() === qualifier;
  });
}

function deepFreeze<T>(value: T): T {
  // Typed arrays with elements cannot be frozen.
  if (
    value &&
    typeof value === 'object' &&
    !(value instanceof Date) &&
    !ArrayBuffer.isView(value) &&
    !Object.isFrozen(value)
  ) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
