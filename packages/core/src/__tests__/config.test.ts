import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../config.js';
import { ConfigError } from '../errors.js';

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  assert.fail('expected a ConfigError');
}

describe('loadConfig', () => {
  it('uses safe defaults for an empty environment', () => {
    assert.deepEqual(loadConfig({}), {
      database: null,
      llm: null,
      limits: { defaultLimit: 200, maxLimit: 1000, maxRows: 1000, timeoutMs: 5000 },
      generation: { historyTurns: 5, maxAttempts: 3, sampleRows: 3 },
      routing: { fallbackDomain: 'web-search' },
      logLevel: 'info',
    });
  });

  it('infers SQLite from a database path', () => {
    const config = loadConfig({ ASKGATE_DB_PATH: './shop.sqlite' });
    assert.deepEqual(config.database, { type: 'sqlite', filepath: './shop.sqlite' });
  });

  it('reads a Postgres target with default host and port', () => {
    const config = loadConfig({ ASKGATE_DB_TYPE: 'postgres', ASKGATE_DB_NAME: 'app', ASKGATE_DB_USER: 'reader' });
    assert.deepEqual(config.database, {
      type: 'postgres',
      host: 'localhost',
      port: 5432,
      database: 'app',
      user: 'reader',
    });
  });

  it('requires a Postgres user and database', () => {
    assert.throws(() => loadConfig({ ASKGATE_DB_TYPE: 'postgres' }), ConfigError);
  });

  it('reads OpenAI settings', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret', ASKGATE_MODEL: 'gpt-4o' });
    assert.deepEqual(config.llm, { provider: 'openai', apiKey: 'test-secret', model: 'gpt-4o' });
  });

  it('switches to Azure when an endpoint is set', () => {
    const config = loadConfig({
      AZURE_OPENAI_ENDPOINT: 'https://example.invalid',
      AZURE_OPENAI_KEY: 'test-secret',
      AZURE_OPENAI_DEPLOYMENT: 'sql-writer',
    });
    assert.deepEqual(config.llm, {
      provider: 'azure',
      apiKey: 'test-secret',
      endpoint: 'https://example.invalid',
      deployment: 'sql-writer',
    });
  });

  it('requires an endpoint for Azure', () => {
    assert.deepEqual(
      problemsOf(() => loadConfig({ ASKGATE_LLM_PROVIDER: 'azure', AZURE_OPENAI_API_KEY: 'test-secret' })),
      ['llm.endpoint is required for the azure provider (AZURE_OPENAI_ENDPOINT)'],
    );
  });

  it('reports numbers that do not parse', () => {
    assert.deepEqual(problemsOf(() => loadConfig({ ASKGATE_MAX_ROWS: 'lots' })), [
      'ASKGATE_MAX_ROWS must be a number, got "lots"',
    ]);
  });

  it('rejects out-of-range values', () => {
    assert.deepEqual(problemsOf(() => loadConfig({ ASKGATE_MAX_ATTEMPTS: '0' })), [
      '/generation/maxAttempts must be >= 1',
    ]);
    assert.throws(() => loadConfig({ ASKGATE_FALLBACK_DOMAIN: 'sports' }), ConfigError);
  });

  it('rejects a default LIMIT above the maximum', () => {
    assert.deepEqual(problemsOf(() => loadConfig({ ASKGATE_DEFAULT_LIMIT: '500', ASKGATE_MAX_LIMIT: '100' })), [
      'limits.defaultLimit (500) must not exceed limits.maxLimit (100)',
    ]);
  });

  it('reads generation and routing settings', () => {
    const config = loadConfig({
      ASKGATE_DEADLINE_MS: '30000',
      ASKGATE_HISTORY_TURNS: '0',
      ASKGATE_SAMPLE_ROWS: '0',
      ASKGATE_FALLBACK_DOMAIN: 'document',
      ASKGATE_LOG_LEVEL: 'debug',
    });
    assert.deepEqual(config.generation, { historyTurns: 0, maxAttempts: 3, sampleRows: 0, deadlineMs: 30000 });
    assert.equal(config.routing.fallbackDomain, 'document');
    assert.equal(config.logLevel, 'debug');
  });

  it('applies overrides over the environment', () => {
    const config = loadConfig(
      { ASKGATE_DB_PATH: 'a.sqlite', OPENAI_API_KEY: 'test-secret' },
      { database: { type: 'sqlite', filepath: 'b.sqlite' }, limits: { maxRows: 50, timeoutMs: undefined }, llm: null },
    );
    assert.deepEqual(config.database, { type: 'sqlite', filepath: 'b.sqlite' });
    assert.equal(config.limits.maxRows, 50);
    assert.equal(config.limits.timeoutMs, 5000);
    assert.equal(config.llm, null);
  });
});
