import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SqlGenerator } from '../generator.js';
import { buildSystemPrompt } from '../prompt.js';
import type { CompletionOptions, TextGenerator } from '../types.js';
import type { SchemaDescription } from '../../db/types.js';
import {
  GenerationUnavailableError,
  GenerationUnparseableError,
  RequestCancelledError,
} from '../../errors.js';

const schema: SchemaDescription = {
  sourceId: 'sqlite:shop.db',
  dialect: 'sqlite',
  capturedAt: new Date('2026-01-01T00:00:00Z'),
  tables: [
    {
      name: 'customers',
      schema: 'main',
      columns: [{ name: 'id', dataType: 'INTEGER', nullable: false, isPrimaryKey: true }],
    },
  ],
};

class FakeTextGenerator implements TextGenerator {
  readonly calls: Array<{ prompt: string; options?: CompletionOptions }> = [];

  constructor(private readonly reply: () => Promise<string>) {}

  complete(prompt: string, options?: CompletionOptions): Promise<string> {
    this.calls.push({ prompt, options });
    return this.reply();
  }
}

function replying(text: string): FakeTextGenerator {
  return new FakeTextGenerator(async () => text);
}

describe('SqlGenerator', () => {
  it('returns the extracted statement with its source', async () => {
    const fake = replying('```sql\nSELECT COUNT(*) FROM customers\n```');
    const query = { text: 'How many customers?' };
    const candidate = await new SqlGenerator(fake).generate(query, schema);

    assert.equal(candidate.statement, 'SELECT COUNT(*) FROM customers');
    assert.equal(candidate.source, query);
    assert.equal(candidate.rawOutput, '```sql\nSELECT COUNT(*) FROM customers\n```');
    assert.ok(candidate.generatedAt instanceof Date);
  });

  it('sends the schema, the question and the dialect instructions', async () => {
    const fake = replying('SELECT 1');
    await new SqlGenerator(fake).generate({ text: 'How many customers?' }, schema);

    const [call] = fake.calls;
    assert.ok(call.prompt.startsWith('-- sqlite schema\n\nTABLE customers\n  id INTEGER NOT NULL PK'));
    assert.ok(call.prompt.includes('\n\nQuestion: How many customers?\n\n'));
    assert.ok(call.prompt.endsWith('Generate the SQL query.'));
    assert.equal(call.options?.system, buildSystemPrompt('sqlite'));
  });

  it('includes only the most recent conversation turns', async () => {
    const fake = replying('SELECT 1');
    const context = [
      { role: 'user' as const, content: 'first' },
      { role: 'assistant' as const, content: 'one' },
      { role: 'user' as const, content: 'second' },
      { role: 'assistant' as const, content: 'two' },
    ];
    await new SqlGenerator(fake, { historyTurns: 2 }).generate({ text: 'and now?', context }, schema);

    const { prompt } = fake.calls[0];
    assert.ok(prompt.includes('Conversation so far:\nUser: second\nAssistant: two'));
    assert.equal(prompt.includes('User: first'), false);
  });

  it('adds rejection feedback to a re-prompt', async () => {
    const fake = replying('SELECT 1');
    await new SqlGenerator(fake).generate({ text: 'q' }, schema, {
      feedback: 'UNKNOWN_TABLE: Table "payroll" does not exist in sqlite:shop.db.',
    });

    assert.ok(
      fake.calls[0].prompt.includes(
        'Your previous answer was rejected: UNKNOWN_TABLE: Table "payroll" does not exist in sqlite:shop.db.\n' +
          'Return a corrected statement that fixes this.',
      ),
    );
  });

  it('wraps provider failures as GenerationUnavailableError', async () => {
    const fake = new FakeTextGenerator(async () => {
      throw new Error('socket hang up');
    });
    await assert.rejects(
      new SqlGenerator(fake).generate({ text: 'q' }, schema),
      (err: unknown) =>
        err instanceof GenerationUnavailableError && err.message === 'Text generation failed: socket hang up',
    );
  });

  it('fails as unparseable when the reply holds no SQL', async () => {
    await assert.rejects(
      new SqlGenerator(replying('No idea, sorry.')).generate({ text: 'q' }, schema),
      GenerationUnparseableError,
    );
  });

  it('does not call the provider once cancelled', async () => {
    const fake = replying('SELECT 1');
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(
      new SqlGenerator(fake).generate({ text: 'q' }, schema, { signal: controller.signal }),
      RequestCancelledError,
    );
    assert.equal(fake.calls.length, 0);
  });
});
