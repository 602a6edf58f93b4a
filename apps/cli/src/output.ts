import type { Command } from 'commander';
import { AskgateError } from '@askgate/core';
import { formatTable } from './util/table.js';
import { CliError } from './errors.js';

export interface OutputOptions {
  json: boolean;
  quiet: boolean;
  verbose: boolean;
  debug: boolean;
}

export function outputOptionsFromCommand(command: Command): OutputOptions {
  const opts = command.optsWithGlobals();
  return {
    json: Boolean(opts.json),
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
    debug: Boolean(opts.debug),
  };
}

export function printHuman(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.log(message);
  }
}

export function printWarning(message: string, output: OutputOptions): void {
  if (!output.quiet) {
    console.warn(`Warning: ${message}`);
  }
}

export function printJson(value: unknown): void {
  console.log(toJson(value));
}

/** JSON with bigint cells as strings and binary cells as base64. */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, val: unknown) => {
      if (typeof val === 'bigint') return val.toString();
      if (val instanceof Uint8Array) return Buffer.from(val).toString('base64');
      return val;
    },
    2,
  );
}

export function printHumanTable(columns: readonly string[], rows: ReadonlyArray<readonly unknown[]>, output: OutputOptions): void {
  if (output.quiet) return;
  console.log(formatTable(columns, rows));
}

export function printError(error: unknown, output: OutputOptions): void {
  const code =
    error instanceof CliError || error instanceof AskgateError ? error.code : 'INTERNAL_ERROR';
  const message = error instanceof Error ? error.message : String(error);
  const details =
    error instanceof CliError || error instanceof AskgateError ? error.details : undefined;

  if (output.json) {
    const payload: Record<string, unknown> = { ok: false, code, message };
    if (output.debug) {
      payload.details =
        details ?? (error instanceof Error ? { stack: error.stack } : { raw: String(error) });
    }
    printJson(payload);
    return;
  }

  console.error(`Error: ${message}`);
  if (output.debug) {
    if (details !== undefined) {
      console.error('Details:', toJson(details));
    } else if (error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
}

export function printCommandSuccess(value: unknown, output: OutputOptions, humanMessage?: string): void {
  if (output.json) {
    printJson({ ok: true, data: value });
    return;
  }
  if (humanMessage && !output.quiet) {
    console.log(humanMessage);
  }
}

export function withOutputFlags<T extends Command>(command: T): T {
  command
    .option('--json', 'Machine-readable JSON output', false)
    .option('--quiet', 'Suppress non-essential logs', false)
    .option('--verbose', 'Show additional context', false)
    .option('--debug', 'Show debug logs and internal error details', false);
  return command;
}
