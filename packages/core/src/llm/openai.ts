/**
 * OpenAI text generator for SQL generation.
 * Supports OpenAI and Azure OpenAI; all settings come from the constructor.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type { Logger } from 'pino';
import type { CompletionOptions, TextGenerator } from './types.js';
import { GenerationUnavailableError, RequestCancelledError } from '../errors.js';
import { silentLogger } from '../logger.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_AZURE_API_VERSION = '2024-06-01';

export interface OpenAIGeneratorConfig {
  provider: 'openai' | 'azure';
  apiKey: string;
  /** Model name, or the deployment name on Azure */
  model?: string;
  /** Alternative OpenAI-compatible endpoint */
  baseUrl?: string;
  /** Azure resource endpoint, e.g. https://example.openai.azure.com */
  endpoint?: string;
  deployment?: string;
  apiVersion?: string;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly timeoutMs: number | undefined;
  private readonly logger: Logger;

  constructor(config: OpenAIGeneratorConfig) {
    if (!config.apiKey) {
      throw new GenerationUnavailableError(
        'OpenAI API key is not configured. Set OPENAI_API_KEY (or AZURE_OPENAI_API_KEY for Azure).',
      );
    }

    if (config.provider === 'azure') {
      if (!config.endpoint) {
        throw new GenerationUnavailableError(
          'Azure OpenAI endpoint is not configured. Set AZURE_OPENAI_ENDPOINT.',
        );
      }
      this.client = new AzureOpenAI({
        apiKey: config.apiKey,
        endpoint: config.endpoint,
        deployment: config.deployment,
        apiVersion: config.apiVersion ?? DEFAULT_AZURE_API_VERSION,
        maxRetries: 0,
      });
      this.model = config.deployment ?? config.model ?? DEFAULT_MODEL;
    } else {
      this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 });
      this.model = config.model ?? DEFAULT_MODEL;
    }

    this.timeoutMs = config.timeoutMs;
    this.logger = config.logger ?? silentLogger();
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (options.system) {
      messages.push({ role: 'system', content: options.system });
    }
    messages.push({ role: 'user', content: prompt });

    let content: string | null | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: options.temperature ?? 0.1,
          max_tokens: options.maxTokens ?? 1024,
        },
        { signal: options.signal, timeout: this.timeoutMs },
      );
      content = response.choices[0]?.message?.content;
    } catch (err: unknown) {
      if (options.signal?.aborted) {
        throw new RequestCancelledError('generation');
      }
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ model: this.model, err: message }, 'text generation failed');
      throw new GenerationUnavailableError(`Text generation failed: ${message}`, err);
    }

    if (!content) {
      throw new GenerationUnavailableError('OpenAI returned an empty response.');
    }
    return content;
  }
}
