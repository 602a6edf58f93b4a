import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { extractStatement } from '../extract.js';
import { GenerationUnparseableError } from '../../errors.js';

describe('extractStatement', () => {
  it('takes the body of a sql fence', () => {
    assert.equal(extractStatement('```sql\nSELECT 1\n```'), 'SELECT 1');
  });

  it('prefers a sql-tagged fence over other fences', () => {
    const raw = 'Options:\n```text\nSELECT nothing\n```\nUse this:\n```sql\nSELECT 2\n```';
    assert.equal(extractStatement(raw), 'SELECT 2');
  });

  it('takes an untagged fence that holds SQL', () => {
    assert.equal(extractStatement('```\nselect id from t\n```'), 'select id from t');
  });

  it('falls back to the first paragraph opening with a keyword', () => {
    const raw = 'Sure.\nSELECT id\nFROM t\n\nThis returns the ids.';
    assert.equal(extractStatement(raw), 'SELECT id\nFROM t');
  });

  it('drops narration that follows the terminating semicolon', () => {
    const raw = 'Here is the query:\nSELECT COUNT(*) FROM customers;\nThis counts every customer.';
    assert.equal(extractStatement(raw), 'SELECT COUNT(*) FROM customers;');
  });

  it('drops narration on the same line as the statement', () => {
    assert.equal(extractStatement("SELECT 'a;b' AS x; That is all."), "SELECT 'a;b' AS x;");
  });

  it('keeps a second statement after the semicolon', () => {
    assert.equal(extractStatement('SELECT 1;\nDROP TABLE t'), 'SELECT 1;\nDROP TABLE t');
  });

  it('keeps a trailing comment after the semicolon', () => {
    assert.equal(extractStatement('SELECT 1; -- one'), 'SELECT 1; -- one');
  });

  it('skips fences without SQL', () => {
    const raw = '```json\n{"a": 1}\n```\nWITH x AS (SELECT 1) SELECT * FROM x';
    assert.equal(extractStatement(raw), 'WITH x AS (SELECT 1) SELECT * FROM x');
  });

  it('extracts write statements unchanged for the validator to judge', () => {
    assert.equal(extractStatement('```sql\nDROP TABLE t\n```'), 'DROP TABLE t');
  });

  it('fails when the output holds no statement', () => {
    assert.throws(
      () => extractStatement('I cannot help with that.'),
      (err: unknown) =>
        err instanceof GenerationUnparseableError &&
        err.rawOutput === 'I cannot help with that.' &&
        err.recoverable,
    );
  });
});
