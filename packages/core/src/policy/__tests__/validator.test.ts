/**
 * Safety validator tests: rule order, rejection reasons and LIMIT handling.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SqlSafetyValidator } from '../validator.js';
import type { SchemaDescription, TableSchema } from '../../db/types.js';

function table(name: string, columns: string[], schema = 'main'): TableSchema {
  return {
    name,
    schema,
    columns: columns.map((col, i) => ({
      name: col,
      dataType: i === 0 ? 'INTEGER' : 'TEXT',
      nullable: i !== 0,
      isPrimaryKey: i === 0,
    })),
  };
}

const shop: SchemaDescription = {
  sourceId: 'sqlite:shop.db',
  dialect: 'sqlite',
  tables: [table('customers', ['id', 'name', 'city']), table('orders', ['id', 'customer_id', 'total'])],
  capturedAt: new Date('2026-01-01T00:00:00Z'),
};

const validator = new SqlSafetyValidator(shop);

function rejection(sql: string): { reason: string; message: string } {
  const verdict = validator.validate(sql);
  assert.equal(verdict.accepted, false, `expected rejection for: ${sql}`);
  if (verdict.accepted) throw new Error('unreachable');
  return { reason: verdict.reason, message: verdict.message };
}

describe('SqlSafetyValidator: accepted statements', () => {
  it('accepts a plain SELECT and appends the default LIMIT', () => {
    const verdict = validator.validate('SELECT name FROM customers');
    assert.deepEqual(verdict, {
      accepted: true,
      statement: 'SELECT name FROM customers',
      normalizedStatement: 'SELECT name FROM customers LIMIT 200',
      sourceId: 'sqlite:shop.db',
      tables: ['customers'],
      limitApplied: true,
      limitClamped: false,
      warnings: ['LIMIT 200 added.'],
    });
  });

  it('accepts a single trailing semicolon', () => {
    const verdict = validator.validate('SELECT COUNT(*) FROM orders;');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.normalizedStatement, 'SELECT COUNT(*) FROM orders LIMIT 200');
    }
  });

  it('matches table names case-insensitively', () => {
    assert.equal(validator.validate('select name from CUSTOMERS').accepted, true);
  });

  it('accepts a CTE that reads a known table', () => {
    const verdict = validator.validate('WITH big AS (SELECT id FROM orders WHERE total > 100) SELECT id FROM big');
    assert.equal(verdict.accepted, true);
  });

  it('clamps a LIMIT above the maximum', () => {
    const verdict = validator.validate('SELECT name FROM customers LIMIT 5000');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.normalizedStatement, 'SELECT name FROM customers LIMIT 1000');
      assert.equal(verdict.limitClamped, true);
      assert.deepEqual(verdict.warnings, ['LIMIT 5000 reduced to 1000.']);
    }
  });

  it('leaves a LIMIT within bounds untouched', () => {
    const verdict = validator.validate('SELECT name FROM customers LIMIT 10');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.normalizedStatement, 'SELECT name FROM customers LIMIT 10');
      assert.equal(verdict.limitApplied, false);
      assert.deepEqual(verdict.warnings, []);
    }
  });

  it('applies the configured limits', () => {
    const strict = new SqlSafetyValidator(shop, { defaultLimit: 10, maxLimit: 50 });
    const verdict = strict.validate('SELECT name FROM customers');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.normalizedStatement, 'SELECT name FROM customers LIMIT 10');
      assert.deepEqual(verdict.warnings, ['LIMIT 10 added.']);
    }
  });

  it('takes a candidate object as well as text', () => {
    const verdict = validator.validate({
      statement: 'SELECT id FROM orders',
      source: { text: 'list orders' },
      generatedAt: new Date(),
      rawOutput: '```sql\nSELECT id FROM orders\n```',
    });
    assert.equal(verdict.accepted, true);
  });

  it('returns the same verdict for the same input', () => {
    const sql = 'SELECT city, COUNT(*) FROM customers GROUP BY city';
    assert.deepEqual(validator.validate(sql), validator.validate(sql));
  });
});

describe('SqlSafetyValidator: rejected statements', () => {
  it('rejects stacked statements', () => {
    assert.deepEqual(rejection('SELECT 1; DROP TABLE customers'), {
      reason: 'MULTIPLE_STATEMENTS',
      message: 'Multiple statements detected (2). Only a single statement is allowed.',
    });
    assert.equal(rejection('SELECT * FROM customers; DROP TABLE customers;').reason, 'MULTIPLE_STATEMENTS');
  });

  it('rejects writes by their leading keyword', () => {
    assert.deepEqual(rejection('DELETE FROM customers'), {
      reason: 'WRITE_OR_DDL_FORBIDDEN',
      message: 'Statement type "DELETE" is not allowed. Only SELECT queries may run.',
    });
    assert.equal(rejection("INSERT INTO customers (name) VALUES ('x')").reason, 'WRITE_OR_DDL_FORBIDDEN');
    assert.equal(rejection('DROP TABLE orders').reason, 'WRITE_OR_DDL_FORBIDDEN');
    assert.equal(rejection('PRAGMA table_info(customers)').reason, 'WRITE_OR_DDL_FORBIDDEN');
    assert.equal(rejection("attach database 'other.db' as other").reason, 'WRITE_OR_DDL_FORBIDDEN');
    assert.equal(rejection('  update customers set city = NULL').reason, 'WRITE_OR_DDL_FORBIDDEN');
  });

  it('rejects tables missing from the schema', () => {
    assert.deepEqual(rejection('SELECT * FROM payroll'), {
      reason: 'UNKNOWN_TABLE',
      message: 'Table "payroll" does not exist in sqlite:shop.db.',
    });
  });

  it('rejects catalog functions used as a table', () => {
    assert.deepEqual(rejection("SELECT * FROM pragma_table_info('customers')"), {
      reason: 'UNKNOWN_TABLE',
      message: 'Table function "pragma_table_info" is not a table in sqlite:shop.db.',
    });
    assert.deepEqual(rejection("SELECT name, (SELECT COUNT(*) FROM PRAGMA_INDEX_LIST('orders')) AS n FROM customers"), {
      reason: 'UNKNOWN_TABLE',
      message: 'Table function "pragma_index_list" is not a table in sqlite:shop.db.',
    });
  });

  it('rejects a trailing comment', () => {
    assert.deepEqual(rejection('SELECT name FROM customers -- and more'), {
      reason: 'FORBIDDEN_CONSTRUCT',
      message: 'Statement ends with a comment, which can hide a truncated query.',
    });
  });

  it('rejects forbidden functions', () => {
    assert.deepEqual(rejection("SELECT load_extension('evil')"), {
      reason: 'FORBIDDEN_CONSTRUCT',
      message: 'Function "load_extension" is not allowed.',
    });
  });

  it('rejects an unterminated string', () => {
    assert.deepEqual(rejection("SELECT name FROM customers WHERE name = 'it''s"), {
      reason: 'FORBIDDEN_CONSTRUCT',
      message: 'Statement contains an unterminated string.',
    });
  });

  it('rejects an empty statement', () => {
    assert.deepEqual(rejection('   ;  '), { reason: 'UNPARSEABLE', message: 'Statement is empty.' });
  });

  it('rejects text the parser cannot read', () => {
    assert.equal(rejection('SELECT name FROM customers WHERE').reason, 'UNPARSEABLE');
  });

  it('rejects Postgres functions that sleep or touch files', () => {
    const warehouse = new SqlSafetyValidator({
      sourceId: 'postgres://reader@localhost:5432/app',
      dialect: 'postgres',
      tables: [table('events', ['id', 'kind'], 'public')],
      capturedAt: new Date('2026-01-01T00:00:00Z'),
    });
    assert.deepEqual(warehouse.validate('SELECT pg_sleep(5)'), {
      accepted: false,
      reason: 'FORBIDDEN_CONSTRUCT',
      message: 'Function "pg_sleep" is not allowed.',
    });
    assert.equal(warehouse.validate('SELECT kind FROM public.events').accepted, true);
  });
});
