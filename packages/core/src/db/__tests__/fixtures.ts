import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import Database from 'better-sqlite3';
import type { DatabaseConnection, QueryOptions, QueryRows, SqlDialect, TableSchema } from '../types.js';
import { abortErrorFor } from '../util.js';

export interface ShopDb {
  dir: string;
  filepath: string;
  cleanup: () => void;
}

/** A small shop database in a temp directory. */
export function createShopDb(): ShopDb {
  const dir = mkdtempSync(join(tmpdir(), 'askgate-sqlite-test-'));
  const filepath = join(dir, 'shop.sqlite');
  const db = new Database(filepath);
  db.exec(`
    CREATE TABLE customers (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      city TEXT
    );
    CREATE TABLE orders (
      id INTEGER PRIMARY KEY,
      customer_id INTEGER NOT NULL REFERENCES customers(id),
      total REAL NOT NULL DEFAULT 0
    );
    INSERT INTO customers (id, name, city) VALUES
      (1, 'Ada', 'London'),
      (2, 'Grace', 'New York'),
      (3, 'Linus', NULL);
    INSERT INTO orders (id, customer_id, total) VALUES
      (1, 1, 120.5),
      (2, 1, 30),
      (3, 2, 75);
  `);
  db.close();
  return { dir, filepath, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

type QueryBehaviour = (sql: string, opts: QueryOptions) => Promise<QueryRows>;

/** In-process connection whose query behaviour is supplied by the test. */
export class FakeConnection implements DatabaseConnection {
  dialect: SqlDialect = 'sqlite';
  queries: string[] = [];
  introspections = 0;

  constructor(
    readonly id: string,
    private readonly behaviour: QueryBehaviour,
    private readonly tables: () => Promise<TableSchema[]> = async () => [],
  ) {}

  async ping(): Promise<string> {
    return 'fake';
  }

  async introspect(): Promise<TableSchema[]> {
    this.introspections++;
    return this.tables();
  }

  query(sql: string, opts: QueryOptions): Promise<QueryRows> {
    this.queries.push(sql);
    return this.behaviour(sql, opts);
  }

  async close(): Promise<void> {}
}

/** Query behaviour that never finishes on its own and rejects once aborted. */
export function hangUntilAborted(_sql: string, opts: QueryOptions): Promise<QueryRows> {
  return new Promise((_resolve, reject) => {
    const { signal } = opts;
    if (!signal) return;
    signal.addEventListener('abort', () => reject(abortErrorFor(signal)), { once: true });
  });
}
