/**
 * Domain signal table: indicator terms per routing domain, kept as data in
 * packages/core/data/signals.json and validated on load.
 */

import { readFileSync } from 'node:fs';
import AjvModule from 'ajv';
import type { SignalTable } from './types.js';
import { ConfigError } from '../errors.js';

const Ajv = AjvModule.default;

interface SignalFile {
  version: number;
  domains: SignalTable;
}

const termList = {
  type: 'array',
  items: { type: 'string', minLength: 1, pattern: '\\S' },
} as const;

const signalFileSchema = {
  type: 'object',
  required: ['version', 'domains'],
  properties: {
    version: { type: 'integer', const: 1 },
    domains: {
      type: 'object',
      required: ['database', 'web-search', 'document'],
      additionalProperties: false,
      properties: {
        database: termList,
        'web-search': termList,
        document: termList,
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true });
const validateSignalFile = ajv.compile<SignalFile>(signalFileSchema);

export const DEFAULT_SIGNALS_URL = new URL('../../data/signals.json', import.meta.url);

let defaultTable: SignalTable | undefined;

/** Validate parsed JSON as a signal table. Terms are lowercased and trimmed. */
export function parseSignalTable(data: unknown): SignalTable {
  if (!validateSignalFile(data)) {
    const problems = (validateSignalFile.errors ?? []).map(
      (e) => `signals${e.instancePath || '/'}: ${e.message ?? 'invalid'}`,
    );
    throw new ConfigError(problems);
  }
  const { domains } = data;
  return {
    database: normalizeTerms(domains.database),
    'web-search': normalizeTerms(domains['web-search']),
    document: normalizeTerms(domains.document),
  };
}

export function loadSignalTable(path: string | URL = DEFAULT_SIGNALS_URL): SignalTable {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError([`signals: cannot read ${String(path)}: ${message}`]);
  }
  return parseSignalTable(data);
}

/** The bundled table, read once. */
export function defaultSignalTable(): SignalTable {
  defaultTable ??= loadSignalTable();
  return defaultTable;
}

function normalizeTerms(terms: string[]): string[] {
  return [...new Set(terms.map((t) => t.trim().toLowerCase()))];
}
