/**
 * LLM module barrel export.
 */

export type { CandidateSQL, CompletionOptions, TextGenerator } from './types.js';
export { OpenAITextGenerator, DEFAULT_MODEL } from './openai.js';
export type { OpenAIGeneratorConfig } from './openai.js';
export { SqlGenerator } from './generator.js';
export type { SqlGeneratorOptions, GenerateOptions } from './generator.js';
export { renderSchema } from './schema.js';
export type { RenderSchemaOptions } from './schema.js';
export { buildPrompt, buildSystemPrompt } from './prompt.js';
export { extractStatement } from './extract.js';
