/**
 * Text generation types for SQL generation.
 */

import type { NLQuery } from '../types.js';

export interface CompletionOptions {
  /** System instructions sent ahead of the prompt */
  system?: string;
  signal?: AbortSignal;
  temperature?: number;
  maxTokens?: number;
}

/**
 * External text-generation capability. Implementations reject with
 * GenerationUnavailableError when the provider fails or times out.
 */
export interface TextGenerator {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/** SQL text produced by the generator, before any safety check. */
export interface CandidateSQL {
  statement: string;
  source: NLQuery;
  generatedAt: Date;
  /** Full generator output the statement was extracted from */
  rawOutput: string;
}
