/**
 * SQL Generator: asks a text generator for one read-only statement that
 * answers a question over a described schema. Never executes anything.
 */

import type { Logger } from 'pino';
import type { SchemaDescription } from '../db/types.js';
import type { NLQuery } from '../types.js';
import type { CandidateSQL, TextGenerator } from './types.js';
import { SAFE_DEFAULTS } from '../db/defaults.js';
import { AskgateError, GenerationUnavailableError, RequestCancelledError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { buildPrompt, buildSystemPrompt } from './prompt.js';
import { renderSchema, type RenderSchemaOptions } from './schema.js';
import { extractStatement } from './extract.js';

export interface SqlGeneratorOptions {
  /** Prior conversation turns included in the prompt. Default: 5 */
  historyTurns?: number;
  /** Passed to renderSchema; by default every table is rendered */
  schemaOptions?: Omit<RenderSchemaOptions, 'question'>;
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  /** Reason the previous candidate was rejected, for a re-prompt */
  feedback?: string;
}

export class SqlGenerator {
  private readonly historyTurns: number;
  private readonly logger: Logger;

  constructor(
    private readonly textGenerator: TextGenerator,
    private readonly opts: SqlGeneratorOptions = {},
  ) {
    this.historyTurns = opts.historyTurns ?? SAFE_DEFAULTS.historyTurns;
    this.logger = opts.logger ?? silentLogger();
  }

  async generate(
    query: NLQuery,
    schema: SchemaDescription,
    opts: GenerateOptions = {},
  ): Promise<CandidateSQL> {
    const schemaText = renderSchema(schema, { ...this.opts.schemaOptions, question: query.text });
    const prompt = buildPrompt({
      question: query.text,
      schemaText,
      history: query.context,
      historyTurns: this.historyTurns,
      feedback: opts.feedback,
    });

    if (opts.signal?.aborted) {
      throw new RequestCancelledError('generation');
    }

    let rawOutput: string;
    try {
      rawOutput = await this.textGenerator.complete(prompt, {
        system: buildSystemPrompt(schema.dialect),
        signal: opts.signal,
        temperature: this.opts.temperature,
        maxTokens: this.opts.maxTokens,
      });
    } catch (err: unknown) {
      if (err instanceof AskgateError) throw err;
      if (opts.signal?.aborted) throw new RequestCancelledError('generation');
      const message = err instanceof Error ? err.message : String(err);
      throw new GenerationUnavailableError(`Text generation failed: ${message}`, err);
    }

    const statement = extractStatement(rawOutput);
    this.logger.debug({ statement, retry: opts.feedback !== undefined }, 'candidate generated');

    return {
      statement,
      source: query,
      generatedAt: new Date(),
      rawOutput,
    };
  }
}
