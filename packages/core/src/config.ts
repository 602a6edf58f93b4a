/**
 * Configuration for askgate.
 *
 * `loadConfig` reads an environment map (never `process.env` directly),
 * applies overrides on top, fills defaults from SAFE_DEFAULTS and validates
 * the result. Components take the pieces they need through their
 * constructors.
 *
 * Environment variables:
 *   ASKGATE_DB_TYPE            sqlite | postgres (sqlite when ASKGATE_DB_PATH is set)
 *   ASKGATE_DB_PATH            SQLite file
 *   ASKGATE_DB_HOST / _PORT / _NAME / _USER / _PASSWORD / _SSL
 *   ASKGATE_LLM_PROVIDER       openai | azure (azure when AZURE_OPENAI_ENDPOINT is set)
 *   OPENAI_API_KEY, OPENAI_BASE_URL, ASKGATE_MODEL
 *   AZURE_OPENAI_API_KEY (or AZURE_OPENAI_KEY), AZURE_OPENAI_ENDPOINT,
 *   AZURE_OPENAI_DEPLOYMENT, AZURE_OPENAI_API_VERSION
 *   ASKGATE_LLM_TIMEOUT_MS
 *   ASKGATE_DEFAULT_LIMIT, ASKGATE_MAX_LIMIT, ASKGATE_MAX_ROWS, ASKGATE_TIMEOUT_MS
 *   ASKGATE_HISTORY_TURNS, ASKGATE_MAX_ATTEMPTS, ASKGATE_SAMPLE_ROWS, ASKGATE_DEADLINE_MS
 *   ASKGATE_FALLBACK_DOMAIN, ASKGATE_LOG_LEVEL
 */

import AjvModule from 'ajv';
import type { ConnectionConfig } from './db/types.js';
import type { Domain } from './types.js';
import type { LogLevel } from './logger.js';
import { SAFE_DEFAULTS } from './db/defaults.js';
import { ConfigError } from './errors.js';

const Ajv = AjvModule.default;

export type Env = Record<string, string | undefined>;

export interface LlmConfig {
  provider: 'openai' | 'azure';
  apiKey: string;
  model?: string;
  baseUrl?: string;
  endpoint?: string;
  deployment?: string;
  apiVersion?: string;
  timeoutMs?: number;
}

export interface LimitsConfig {
  defaultLimit: number;
  maxLimit: number;
  maxRows: number;
  timeoutMs: number;
}

export interface GenerationConfig {
  historyTurns: number;
  maxAttempts: number;
  /** Sample rows read per table for the prompt; 0 turns samples off */
  sampleRows: number;
  deadlineMs?: number;
}

export interface AskgateConfig {
  /** null when no database is configured */
  database: ConnectionConfig | null;
  /** null when no API key is available */
  llm: LlmConfig | null;
  limits: LimitsConfig;
  generation: GenerationConfig;
  routing: { fallbackDomain: Domain };
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  database?: ConnectionConfig | null;
  llm?: Partial<LlmConfig> | null;
  limits?: Partial<LimitsConfig>;
  generation?: Partial<GenerationConfig>;
  routing?: { fallbackDomain?: Domain };
  logLevel?: LogLevel;
}

const positiveInt = { type: 'integer', minimum: 1 } as const;
const nonNegativeInt = { type: 'integer', minimum: 0 } as const;
const text = { type: 'string', minLength: 1 } as const;

const configSchema = {
  type: 'object',
  required: ['database', 'llm', 'limits', 'generation', 'routing', 'logLevel'],
  properties: {
    database: {
      anyOf: [
        { type: 'null' },
        {
          type: 'object',
          required: ['type', 'filepath'],
          additionalProperties: false,
          properties: { type: { const: 'sqlite' }, filepath: text },
        },
        {
          type: 'object',
          required: ['type', 'host', 'port', 'database', 'user'],
          additionalProperties: false,
          properties: {
            type: { const: 'postgres' },
            host: text,
            port: { type: 'integer', minimum: 1, maximum: 65535 },
            database: text,
            user: text,
            password: { type: 'string' },
            ssl: { type: 'boolean' },
            connectTimeoutMs: positiveInt,
          },
        },
      ],
    },
    llm: {
      anyOf: [
        { type: 'null' },
        {
          type: 'object',
          required: ['provider', 'apiKey'],
          additionalProperties: false,
          properties: {
            provider: { enum: ['openai', 'azure'] },
            apiKey: text,
            model: text,
            baseUrl: text,
            endpoint: text,
            deployment: text,
            apiVersion: text,
            timeoutMs: positiveInt,
          },
        },
      ],
    },
    limits: {
      type: 'object',
      required: ['defaultLimit', 'maxLimit', 'maxRows', 'timeoutMs'],
      additionalProperties: false,
      properties: {
        defaultLimit: positiveInt,
        maxLimit: positiveInt,
        maxRows: positiveInt,
        timeoutMs: positiveInt,
      },
    },
    generation: {
      type: 'object',
      required: ['historyTurns', 'maxAttempts', 'sampleRows'],
      additionalProperties: false,
      properties: {
        historyTurns: nonNegativeInt,
        maxAttempts: positiveInt,
        sampleRows: nonNegativeInt,
        deadlineMs: positiveInt,
      },
    },
    routing: {
      type: 'object',
      required: ['fallbackDomain'],
      additionalProperties: false,
      properties: { fallbackDomain: { enum: ['database', 'web-search', 'document'] } },
    },
    logLevel: { enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateConfig = ajv.compile<AskgateConfig>(configSchema);

export function loadConfig(env: Env = {}, overrides: ConfigOverrides = {}): AskgateConfig {
  const problems: string[] = [];
  const num = (name: string): number | undefined => {
    const raw = env[name]?.trim();
    if (!raw) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      problems.push(`${name} must be a number, got "${raw}"`);
      return undefined;
    }
    return value;
  };

  const candidate = {
    database: overrides.database !== undefined ? overrides.database : databaseFromEnv(env, num),
    llm: mergeLlm(llmFromEnv(env, num), overrides.llm),
    limits: {
      defaultLimit: num('ASKGATE_DEFAULT_LIMIT') ?? SAFE_DEFAULTS.defaultLimit,
      maxLimit: num('ASKGATE_MAX_LIMIT') ?? SAFE_DEFAULTS.maxLimit,
      maxRows: num('ASKGATE_MAX_ROWS') ?? SAFE_DEFAULTS.maxRows,
      timeoutMs: num('ASKGATE_TIMEOUT_MS') ?? SAFE_DEFAULTS.statementTimeoutMs,
      ...dropUndefined(overrides.limits ?? {}),
    },
    generation: dropUndefined({
      historyTurns: num('ASKGATE_HISTORY_TURNS') ?? SAFE_DEFAULTS.historyTurns,
      maxAttempts: num('ASKGATE_MAX_ATTEMPTS') ?? SAFE_DEFAULTS.maxAttempts,
      sampleRows: num('ASKGATE_SAMPLE_ROWS') ?? SAFE_DEFAULTS.sampleRows,
      deadlineMs: num('ASKGATE_DEADLINE_MS'),
      ...dropUndefined(overrides.generation ?? {}),
    }),
    routing: {
      fallbackDomain: overrides.routing?.fallbackDomain ?? env.ASKGATE_FALLBACK_DOMAIN ?? 'web-search',
    },
    logLevel: overrides.logLevel ?? env.ASKGATE_LOG_LEVEL ?? 'info',
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  if (!validateConfig(candidate)) {
    throw new ConfigError(
      (validateConfig.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`),
    );
  }

  if (candidate.limits.defaultLimit > candidate.limits.maxLimit) {
    throw new ConfigError([
      `limits.defaultLimit (${candidate.limits.defaultLimit}) must not exceed limits.maxLimit (${candidate.limits.maxLimit})`,
    ]);
  }
  if (candidate.llm?.provider === 'azure' && !candidate.llm.endpoint) {
    throw new ConfigError(['llm.endpoint is required for the azure provider (AZURE_OPENAI_ENDPOINT)']);
  }

  return candidate;
}

function databaseFromEnv(
  env: Env,
  num: (name: string) => number | undefined,
): Record<string, unknown> | null {
  const type = env.ASKGATE_DB_TYPE ?? (env.ASKGATE_DB_PATH ? 'sqlite' : undefined);
  if (type === undefined) return null;

  if (type === 'sqlite') {
    return { type, filepath: env.ASKGATE_DB_PATH ?? '' };
  }
  return dropUndefined({
    type,
    host: env.ASKGATE_DB_HOST ?? 'localhost',
    port: num('ASKGATE_DB_PORT') ?? 5432,
    database: env.ASKGATE_DB_NAME,
    user: env.ASKGATE_DB_USER,
    password: env.ASKGATE_DB_PASSWORD,
    ssl: env.ASKGATE_DB_SSL !== undefined ? env.ASKGATE_DB_SSL === 'true' : undefined,
  });
}

function llmFromEnv(env: Env, num: (name: string) => number | undefined): Record<string, unknown> | null {
  const provider = env.ASKGATE_LLM_PROVIDER ?? (env.AZURE_OPENAI_ENDPOINT ? 'azure' : 'openai');
  const apiKey =
    provider === 'azure' ? (env.AZURE_OPENAI_API_KEY ?? env.AZURE_OPENAI_KEY) : env.OPENAI_API_KEY;
  if (!apiKey) return null;

  return dropUndefined({
    provider,
    apiKey,
    model: env.ASKGATE_MODEL,
    baseUrl: provider === 'openai' ? env.OPENAI_BASE_URL : undefined,
    endpoint: provider === 'azure' ? env.AZURE_OPENAI_ENDPOINT : undefined,
    deployment: provider === 'azure' ? env.AZURE_OPENAI_DEPLOYMENT : undefined,
    apiVersion: provider === 'azure' ? env.AZURE_OPENAI_API_VERSION : undefined,
    timeoutMs: num('ASKGATE_LLM_TIMEOUT_MS'),
  });
}

function mergeLlm(
  fromEnv: Record<string, unknown> | null,
  override: Partial<LlmConfig> | null | undefined,
): Record<string, unknown> | null {
  if (override === null) return null;
  if (override === undefined) return fromEnv;
  const merged = { ...fromEnv, ...dropUndefined(override) };
  return 'apiKey' in merged ? merged : null;
}

function dropUndefined(obj: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, value]) => value !== undefined));
}
