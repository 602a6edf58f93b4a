import type { Scalar } from './types.js';

/** Narrow a driver value to a result cell. Unknown shapes are stringified. */
export function toScalar(value: unknown): Scalar {
  if (value === null || value === undefined) return null;
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (value instanceof Uint8Array) return value;
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

export function toScalarRow(row: unknown): Scalar[] {
  return Array.isArray(row) ? row.map(toScalar) : [toScalar(row)];
}

/** The error an aborted operation should reject with. */
export function abortErrorFor(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const err = new Error('The operation was aborted.');
  err.name = 'AbortError';
  return err;
}

/** The error a statement that outlived its time budget should reject with. */
export function deadlineError(timeoutMs: number): Error {
  const err = new Error(`Statement ran past its ${timeoutMs} ms budget.`);
  err.name = 'TimeoutError';
  return err;
}

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
