import { AskgateError, type ErrorCode, type ErrorInfo } from '@askgate/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_POLICY = 3;

export type CliErrorCode = 'INVALID_ARGS' | 'DB_NOT_CONFIGURED' | ErrorCode;

export type CliErrorKind = 'usage' | 'runtime' | 'policy';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

/** Rebuild a CLI error from the ErrorInfo of a failed response envelope. */
export function fromErrorInfo(info: ErrorInfo): CliError {
  return new CliError(kindForCode(info.code), info.code, info.message, info.details);
}

export function kindForCode(code: ErrorCode): CliErrorKind {
  switch (code) {
    case 'SAFETY_REJECTED':
      return 'policy';
    case 'CONFIG_INVALID':
      return 'usage';
    default:
      return 'runtime';
  }
}

export function toExitCode(error: unknown): number {
  const kind =
    error instanceof CliError
      ? error.kind
      : error instanceof AskgateError
        ? kindForCode(error.code)
        : 'runtime';
  if (kind === 'usage') return EXIT_CODE_USAGE;
  if (kind === 'policy') return EXIT_CODE_POLICY;
  return EXIT_CODE_RUNTIME;
}
