import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SchemaCache } from '../schema-cache.js';
import { SchemaInspector } from '../inspect.js';
import type { TableSchema } from '../types.js';
import { FakeConnection } from './fixtures.js';

const tables: TableSchema[] = [{ name: 'customers', schema: 'main', columns: [] }];

function connection(id = 'fake:shop', load: () => Promise<TableSchema[]> = async () => tables): FakeConnection {
  return new FakeConnection(id, async () => ({ columns: [], rows: [], truncated: false }), load);
}

describe('SchemaCache', () => {
  it('describes a connection once and serves hits from memory', async () => {
    const cache = new SchemaCache(new SchemaInspector());
    const conn = connection();

    const first = await cache.get(conn);
    const second = await cache.get(conn);

    assert.equal(first, second);
    assert.equal(conn.introspections, 1);
    assert.deepEqual(cache.stats(), { entries: 1, hits: 1, misses: 1 });
  });

  it('shares one inspection between concurrent misses', async () => {
    const cache = new SchemaCache(new SchemaInspector());
    const conn = connection();

    const [a, b] = await Promise.all([cache.get(conn), cache.get(conn)]);

    assert.equal(a, b);
    assert.equal(conn.introspections, 1);
  });

  it('keeps connections apart', async () => {
    const cache = new SchemaCache(new SchemaInspector());
    const one = await cache.get(connection('fake:one'));
    const two = await cache.get(connection('fake:two'));
    assert.equal(one.sourceId, 'fake:one');
    assert.equal(two.sourceId, 'fake:two');
    assert.equal(cache.stats().entries, 2);
  });

  it('describes again after invalidate', async () => {
    const cache = new SchemaCache(new SchemaInspector());
    const conn = connection();

    await cache.get(conn);
    cache.invalidate(conn.id);
    await cache.get(conn);

    assert.equal(conn.introspections, 2);
  });

  it('expires entries older than the ttl', async () => {
    const cache = new SchemaCache(new SchemaInspector(), 0);
    const conn = connection();

    await cache.get(conn);
    await cache.get(conn);

    assert.equal(conn.introspections, 2);
  });

  it('does not cache a failed inspection', async () => {
    let calls = 0;
    const conn = connection('fake:flaky', async () => {
      calls++;
      if (calls === 1) throw new Error('database is locked');
      return tables;
    });
    const cache = new SchemaCache(new SchemaInspector());

    await assert.rejects(cache.get(conn), { code: 'SCHEMA_UNAVAILABLE' });
    const schema = await cache.get(conn);
    assert.equal(schema.tables.length, 1);
  });

  it('does not store a load that started before invalidate', async () => {
    let current = 't1';
    let finishFirst = (): void => {};
    const conn = connection('fake:drift', () => {
      const name = current;
      const table: TableSchema[] = [{ name, schema: 'main', columns: [] }];
      if (conn.introspections > 1) return Promise.resolve(table);
      return new Promise<TableSchema[]>((resolve) => {
        finishFirst = () => resolve(table);
      });
    });
    const cache = new SchemaCache(new SchemaInspector());

    const stale = cache.get(conn);
    await new Promise((resolve) => setImmediate(resolve));
    current = 't2';
    cache.invalidate(conn.id);
    finishFirst();

    assert.deepEqual(
      (await stale).tables.map((t) => t.name),
      ['t1'],
    );
    const fresh = await cache.get(conn);
    assert.deepEqual(
      fresh.tables.map((t) => t.name),
      ['t2'],
    );
    assert.equal(conn.introspections, 2);
  });

  it('lets one caller give up without cancelling the shared load', async () => {
    let finishLoad = (): void => {};
    const conn = connection('fake:slow', () => new Promise<TableSchema[]>((resolve) => {
      finishLoad = () => resolve(tables);
    }));
    const cache = new SchemaCache(new SchemaInspector());
    const controller = new AbortController();

    const leaving = cache.get(conn, { signal: controller.signal });
    const staying = cache.get(conn);
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();
    await assert.rejects(leaving, { code: 'REQUEST_CANCELLED' });

    finishLoad();
    const schema = await staying;
    assert.equal(schema.tables.length, 1);
    assert.equal(conn.introspections, 1);
    assert.equal(await cache.get(conn), schema);
  });
});
