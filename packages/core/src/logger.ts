/**
 * Logging via pino. Components receive a logger explicitly; the default is
 * silent so embedding the library never writes to the host's stdout.
 */

import { pino, type Logger, type DestinationStream } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  /** Where log lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const options = { name: opts.name ?? 'askgate', level: opts.level ?? 'info' };
  return opts.destination ? pino(options, opts.destination) : pino(options);
}

const silent = pino({ level: 'silent' });

export function silentLogger(): Logger {
  return silent;
}
