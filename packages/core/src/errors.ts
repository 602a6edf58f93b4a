/**
 * Typed failures raised by the askgate core.
 *
 * Every error carries a stable `code` and a `recoverable` flag. Recoverable
 * errors (unparseable generations, safety rejections) may be retried by
 * re-prompting the generator; everything else ends the current request.
 */

export type ErrorCode =
  | 'SCHEMA_UNAVAILABLE'
  | 'GENERATION_UNAVAILABLE'
  | 'GENERATION_UNPARSEABLE'
  | 'SAFETY_REJECTED'
  | 'EXECUTION_TIMEOUT'
  | 'EXECUTION_ERROR'
  | 'REQUEST_CANCELLED'
  | 'HANDLER_UNAVAILABLE'
  | 'CONFIG_INVALID'
  | 'INTERNAL_ERROR';

export type RejectionReason =
  | 'MULTIPLE_STATEMENTS'
  | 'WRITE_OR_DDL_FORBIDDEN'
  | 'UNKNOWN_TABLE'
  | 'FORBIDDEN_CONSTRUCT'
  | 'UNPARSEABLE';

/** Serializable error shape handed to callers in place of stack traces. */
export interface ErrorInfo {
  code: ErrorCode;
  message: string;
  recoverable: boolean;
  details?: Record<string, unknown>;
}

export class AskgateError extends Error {
  readonly code: ErrorCode;
  readonly recoverable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options: { recoverable?: boolean; details?: Record<string, unknown>; cause?: unknown } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'AskgateError';
    this.code = code;
    this.recoverable = options.recoverable ?? false;
    this.details = options.details;
  }

  toInfo(): ErrorInfo {
    const info: ErrorInfo = { code: this.code, message: this.message, recoverable: this.recoverable };
    if (this.details) info.details = { ...this.details };
    return info;
  }
}

export class SchemaUnavailableError extends AskgateError {
  constructor(message: string, cause?: unknown) {
    super('SCHEMA_UNAVAILABLE', message, { cause });
    this.name = 'SchemaUnavailableError';
  }
}

export class GenerationUnavailableError extends AskgateError {
  constructor(message: string, cause?: unknown) {
    super('GENERATION_UNAVAILABLE', message, { cause });
    this.name = 'GenerationUnavailableError';
  }
}

export class GenerationUnparseableError extends AskgateError {
  readonly rawOutput: string;

  constructor(message: string, rawOutput: string) {
    super('GENERATION_UNPARSEABLE', message, {
      recoverable: true,
      details: { outputSnippet: snippet(rawOutput) },
    });
    this.name = 'GenerationUnparseableError';
    this.rawOutput = rawOutput;
  }
}

export class SafetyRejectionError extends AskgateError {
  readonly reason: RejectionReason;
  readonly statement: string;

  constructor(reason: RejectionReason, message: string, statement: string) {
    super('SAFETY_REJECTED', message, {
      recoverable: true,
      details: { reason, statement },
    });
    this.name = 'SafetyRejectionError';
    this.reason = reason;
    this.statement = statement;
  }
}

export class ExecutionTimeoutError extends AskgateError {
  constructor(timeoutMs: number) {
    super('EXECUTION_TIMEOUT', `Query exceeded the ${timeoutMs} ms timeout and was cancelled.`, {
      details: { timeoutMs },
    });
    this.name = 'ExecutionTimeoutError';
  }
}

export class ExecutionError extends AskgateError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super('EXECUTION_ERROR', message, { details, cause });
    this.name = 'ExecutionError';
  }
}

export class RequestCancelledError extends AskgateError {
  constructor(stage: string) {
    super('REQUEST_CANCELLED', `Request was cancelled during ${stage}.`, { details: { stage } });
    this.name = 'RequestCancelledError';
  }
}

export class HandlerUnavailableError extends AskgateError {
  constructor(domain: string) {
    super('HANDLER_UNAVAILABLE', `No handler is registered for the "${domain}" domain.`, {
      details: { domain },
    });
    this.name = 'HandlerUnavailableError';
  }
}

export class ConfigError extends AskgateError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration:\n${problems.map((p) => `  - ${p}`).join('\n')}`, {
      details: { problems },
    });
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

/**
 * Convert anything thrown into an ErrorInfo. Unknown errors keep only their
 * message.
 */
export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof AskgateError) return err.toInfo();
  const message = err instanceof Error ? err.message : String(err);
  return { code: 'INTERNAL_ERROR', message, recoverable: false };
}

/** True for the DOMException / Error shapes produced by aborted signals. */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

function snippet(text: string): string {
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}
