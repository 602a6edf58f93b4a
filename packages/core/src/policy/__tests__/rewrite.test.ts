import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ensureLimit, readLimit } from '../rewrite.js';

const limits = { defaultLimit: 200, maxLimit: 1000 };

describe('ensureLimit', () => {
  it('appends the default LIMIT when there is none', () => {
    const result = ensureLimit('SELECT id FROM users', limits);
    assert.deepEqual(result, {
      rewrittenSql: 'SELECT id FROM users LIMIT 200',
      limitApplied: true,
      clamped: false,
      wrapped: false,
      originalLimit: null,
    });
  });

  it('keeps a LIMIT within bounds and drops the terminator', () => {
    const result = ensureLimit('SELECT id FROM users LIMIT 50;', limits);
    assert.equal(result.rewrittenSql, 'SELECT id FROM users LIMIT 50');
    assert.equal(result.limitApplied, false);
    assert.equal(result.originalLimit, 50);
  });

  it('keeps a LIMIT equal to the maximum', () => {
    const result = ensureLimit('SELECT id FROM users LIMIT 1000', limits);
    assert.equal(result.limitApplied, false);
    assert.equal(result.clamped, false);
  });

  it('clamps a LIMIT above the maximum and keeps the OFFSET', () => {
    const result = ensureLimit('SELECT id FROM users LIMIT 5000 OFFSET 10', limits);
    assert.equal(result.rewrittenSql, 'SELECT id FROM users LIMIT 1000 OFFSET 10');
    assert.equal(result.clamped, true);
    assert.equal(result.originalLimit, 5000);
  });

  it('clamps the count of a LIMIT offset, count clause', () => {
    const result = ensureLimit('SELECT id FROM users LIMIT 10, 5000', limits);
    assert.equal(result.rewrittenSql, 'SELECT id FROM users LIMIT 10, 1000');
    assert.equal(result.clamped, true);
  });

  it('never appends more than the maximum', () => {
    const result = ensureLimit('SELECT id FROM users', { defaultLimit: 500, maxLimit: 100 });
    assert.equal(result.rewrittenSql, 'SELECT id FROM users LIMIT 100');
  });

  it('bounds the outer query when only a subquery has a LIMIT', () => {
    const result = ensureLimit('SELECT * FROM (SELECT id FROM users LIMIT 5000) AS t', limits);
    assert.equal(result.rewrittenSql, 'SELECT * FROM (SELECT id FROM users LIMIT 5000) AS t LIMIT 200');
  });

  it('wraps a statement whose LIMIT is not a literal', () => {
    const ast = { type: 'select', limit: { seperator: '', value: [{ type: 'origin', value: 'all' }] } };
    const result = ensureLimit('SELECT id FROM users LIMIT ALL', { ...limits, ast });
    assert.equal(result.rewrittenSql, 'SELECT * FROM (SELECT id FROM users LIMIT ALL) AS bounded LIMIT 1000');
    assert.equal(result.wrapped, true);
    assert.equal(result.clamped, false);
  });
});

describe('readLimit', () => {
  it('reads the count of the comma form', () => {
    const ast = {
      limit: { seperator: ',', value: [{ type: 'number', value: 10 }, { type: 'number', value: 20 }] },
    };
    assert.deepEqual(readLimit(ast), { kind: 'literal', value: 20 });
  });

  it('reads the limit of the last branch of a compound query', () => {
    const ast = {
      type: 'select',
      _next: { type: 'select', limit: { seperator: '', value: [{ type: 'number', value: 7 }] } },
    };
    assert.deepEqual(readLimit(ast), { kind: 'literal', value: 7 });
  });

  it('returns none without a limit', () => {
    assert.deepEqual(readLimit({ type: 'select', limit: null }), { kind: 'none' });
    assert.deepEqual(readLimit(null), { kind: 'none' });
  });
});
