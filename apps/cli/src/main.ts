#!/usr/bin/env node

/**
 * askgate CLI entrypoint.
 * Routes questions, inspects schemas, and validates or runs SQL through the
 * same safety gate the library uses.
 */

import { Command, CommanderError } from 'commander';
import {
  BoundedExecutor,
  DEFAULT_MODEL,
  OpenAITextGenerator,
  Router,
  SafetyRejectionError,
  SchemaInspector,
  SqlGenerator,
  SqlPipeline,
  SqlSafetyValidator,
  createLogger,
  isDomain,
  loadConfig,
  openConnection,
  renderSchema,
  testConnection,
  type AskgateConfig,
  type ConnectionConfig,
  type DatabaseConnection,
  type Domain,
  type Logger,
  type ResponseEnvelope,
  type RouteDecision,
  type SqlAnswer,
} from '@askgate/core';
import { EXIT_CODE_SUCCESS, fromErrorInfo, toExitCode, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

const VERSION = '0.1.0';

// ── Helpers ──────────────────────────────────────────────────────────

interface Services {
  config: AskgateConfig;
  logger: Logger;
}

function loadServices(output: OutputOptions, opts: { db?: string } = {}): Services {
  const config = loadConfig(
    process.env,
    opts.db ? { database: { type: 'sqlite', filepath: opts.db } } : {},
  );
  const level = output.debug ? 'debug' : output.quiet ? 'silent' : config.logLevel;
  const logger = createLogger({ level, name: 'askgate', destination: process.stderr });
  return { config, logger };
}

function requireDatabase(config: AskgateConfig): ConnectionConfig {
  if (!config.database) {
    throw usageError(
      'No database configured. Pass --db <file> or set ASKGATE_DB_PATH (or ASKGATE_DB_TYPE=postgres).',
      'DB_NOT_CONFIGURED',
    );
  }
  return config.database;
}

function parseHint(hint: string | undefined): Domain | undefined {
  if (hint === undefined) return undefined;
  if (!isDomain(hint)) {
    throw usageError(`Invalid --hint "${hint}". Expected database, web-search or document.`);
  }
  return hint;
}

function describeTarget(db: ConnectionConfig): string {
  return db.type === 'sqlite' ? `sqlite ${db.filepath}` : `postgres ${db.user}@${db.host}:${db.port}/${db.database}`;
}

/** Abort in-flight work on Ctrl-C. */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);
  return { signal: controller.signal, dispose: () => process.off('SIGINT', onInterrupt) };
}

async function withConnection<T>(
  config: ConnectionConfig,
  logger: Logger,
  fn: (connection: DatabaseConnection) => Promise<T>,
): Promise<T> {
  const connection = openConnection(config, logger);
  try {
    return await fn(connection);
  } finally {
    await connection.close();
  }
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void>): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function printDecision(decision: RouteDecision, output: OutputOptions): void {
  printHuman(`Domain:   ${decision.domain}${decision.fallback ? ' (fallback)' : ''}`, output);
  printHuman(`Decision: ${decision.kind}`, output);
  printHuman(`Reason:   ${decision.explanation}`, output);
  if (output.verbose) {
    const scores = Object.entries(decision.scores).map(([domain, score]) => `${domain}=${score}`);
    printHuman(`Scores:   ${scores.join(', ')}`, output);
  }
}

function printSqlAnswer(answer: SqlAnswer, output: OutputOptions): void {
  printHuman('SQL:', output);
  printHuman(`  ${answer.sql}`, output);
  for (const warning of answer.warnings) {
    printWarning(warning, output);
  }
  printHuman('', output);
  printHumanTable(answer.result.columns, answer.result.rows, output);
  printHuman('', output);
  printHuman(
    `${answer.result.rowCount} row${answer.result.rowCount !== 1 ? 's' : ''} returned` +
      (answer.result.truncated ? ' (truncated)' : '') +
      ` in ${answer.result.elapsedMs}ms`,
    output,
  );
}

function printEnvelope(envelope: ResponseEnvelope, output: OutputOptions): void {
  if (!envelope.success) return;
  switch (envelope.domain) {
    case 'database':
      printSqlAnswer(envelope.payload, output);
      return;
    case 'web-search':
      printHuman(envelope.payload.answer, output);
      for (const hit of envelope.payload.results) {
        printHuman(`  - ${hit.title} <${hit.url}>`, output);
      }
      return;
    case 'document':
      printHuman(envelope.payload.response, output);
      return;
  }
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('askgate')
  .description('Route questions and answer database questions with guarded SQL')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show debug logs and internal error details', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Setup:    doctor, schema
  Routing:  route, ask
  SQL:      validate, run
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Check configuration and database connectivity')
      .option('--db <file>', 'SQLite database file')
      .action(async function (this: Command, opts: { db?: string }) {
        await runCommand(this, async (output) => {
          const { config, logger } = loadServices(output, opts);
          const nodeVersion = process.version;
          const nodeOk = parseInt(nodeVersion.slice(1), 10) >= 20;

          const connectivity = config.database
            ? await withConnection(config.database, logger, (connection) => testConnection(connection))
            : null;

          const payload = {
            node: { version: nodeVersion, ok: nodeOk, requiredMajor: 20 },
            database: config.database ? { target: describeTarget(config.database), ...connectivity } : null,
            llm: config.llm
              ? { provider: config.llm.provider, model: config.llm.deployment ?? config.llm.model ?? DEFAULT_MODEL }
              : null,
            limits: config.limits,
            generation: config.generation,
            routing: new Router({ fallbackDomain: config.routing.fallbackDomain }).status(),
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('askgate doctor', output);
          printHuman('==============', output);
          printHuman('', output);
          printHuman(`Node.js:   ${nodeVersion} ${nodeOk ? '✓' : '✗ (requires >=20)'}`, output);
          if (config.database && connectivity) {
            printHuman(
              `Database:  ${describeTarget(config.database)} ` +
                (connectivity.ok ? `✓ (${connectivity.serverVersion ?? 'connected'})` : `✗ ${connectivity.error ?? ''}`),
              output,
            );
          } else {
            printHuman('Database:  not configured', output);
          }
          printHuman(
            `LLM:       ${payload.llm ? `${payload.llm.provider} / ${payload.llm.model}` : 'not configured (no API key)'}`,
            output,
          );
          printHuman('', output);
          printHuman('Limits:', output);
          printHuman(`  Default LIMIT:     ${config.limits.defaultLimit}`, output);
          printHuman(`  Max LIMIT:         ${config.limits.maxLimit}`, output);
          printHuman(`  Max rows:          ${config.limits.maxRows}`, output);
          printHuman(`  Statement timeout: ${config.limits.timeoutMs}ms`, output);
          printHuman(`  Attempts:          ${config.generation.maxAttempts}`, output);
          printHuman(`Fallback domain:     ${config.routing.fallbackDomain}`, output);
        });
      }),
  ),
  ['askgate doctor --db ./shop.sqlite', 'askgate doctor --json'],
);

// ── route ────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('route')
      .description('Classify a question without handling it')
      .argument('<question>', 'Natural language question')
      .option('--hint <domain>', 'Force a domain (database|web-search|document)')
      .action(async function (this: Command, question: string, opts: { hint?: string }) {
        await runCommand(this, async (output) => {
          const { config, logger } = loadServices(output);
          const router = new Router({ fallbackDomain: config.routing.fallbackDomain, logger });
          const decision = router.route({ text: question, domainHint: parseHint(opts.hint) });

          if (output.json) {
            printCommandSuccess(decision, output);
            return;
          }
          printDecision(decision, output);
        });
      }),
  ),
  ['askgate route "How many customers do we have?"', 'askgate route "latest news" --json'],
);

// ── schema ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('schema')
      .description('Describe the configured database')
      .option('--db <file>', 'SQLite database file')
      .option('--text', 'Print the schema as it is rendered into generation prompts', false)
      .option('--no-row-counts', 'Skip row counting')
      .action(async function (this: Command, opts: { db?: string; text: boolean; rowCounts: boolean }) {
        await runCommand(this, async (output) => {
          const { config, logger } = loadServices(output, opts);
          const inspector = new SchemaInspector({
            includeRowCounts: opts.rowCounts,
            sampleRows: opts.text ? config.generation.sampleRows : 0,
            logger,
          });
          const interrupt = interruptSignal();
          try {
            const schema = await withConnection(requireDatabase(config), logger, (connection) =>
              inspector.describe(connection, { signal: interrupt.signal }),
            );

            if (output.json) {
              printCommandSuccess(schema, output);
              return;
            }
            if (opts.text) {
              printHuman(renderSchema(schema), output);
              return;
            }

            printHuman(`Source: ${schema.sourceId}`, output);
            printHuman('', output);
            printHumanTable(
              ['table', 'columns', 'rows'],
              schema.tables.map((t) => [t.name, t.columns.map((c) => c.name).join(', '), t.rowCount ?? '-']),
              output,
            );
          } finally {
            interrupt.dispose();
          }
        });
      }),
  ),
  ['askgate schema --db ./shop.sqlite', 'askgate schema --text'],
);

// ── validate ─────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('validate')
      .description('Check a SQL statement against the safety rules without running it')
      .argument('<sql>', 'SQL statement')
      .option('--db <file>', 'SQLite database file')
      .action(async function (this: Command, sql: string, opts: { db?: string }) {
        await runCommand(this, async (output) => {
          const { config, logger } = loadServices(output, opts);
          const schema = await withConnection(requireDatabase(config), logger, (connection) =>
            new SchemaInspector({ includeRowCounts: false, logger }).describe(connection),
          );
          const verdict = new SqlSafetyValidator(schema, config.limits).validate(sql);

          if (!verdict.accepted) {
            throw new SafetyRejectionError(verdict.reason, verdict.message, sql);
          }
          if (output.json) {
            printCommandSuccess(verdict, output);
            return;
          }
          printHuman('Policy: ALLOWED', output);
          printHuman(`  ${verdict.normalizedStatement}`, output);
          for (const warning of verdict.warnings) {
            printWarning(warning, output);
          }
        });
      }),
  ),
  ['askgate validate "SELECT * FROM customers"', 'askgate validate "DELETE FROM customers" --json'],
);

// ── run ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('run')
      .description('Validate and execute a read-only SQL statement')
      .argument('<sql>', 'SQL statement')
      .option('--db <file>', 'SQLite database file')
      .action(async function (this: Command, sql: string, opts: { db?: string }) {
        await runCommand(this, async (output) => {
          const { config, logger } = loadServices(output, opts);
          const interrupt = interruptSignal();
          try {
            const answer = await withConnection(requireDatabase(config), logger, async (connection) => {
              const schema = await new SchemaInspector({ includeRowCounts: false, logger }).describe(
                connection,
                { signal: interrupt.signal },
              );
              const verdict = new SqlSafetyValidator(schema, config.limits).validate(sql);
              if (!verdict.accepted) {
                throw new SafetyRejectionError(verdict.reason, verdict.message, sql);
              }
              const executor = new BoundedExecutor({
                maxRows: config.limits.maxRows,
                timeoutMs: config.limits.timeoutMs,
                logger,
              });
              const result = await executor.execute(verdict, connection, { signal: interrupt.signal });
              return { sql: verdict.normalizedStatement, result, attempts: 0, warnings: verdict.warnings };
            });

            if (output.json) {
              printCommandSuccess(answer, output);
              return;
            }
            printSqlAnswer(answer, output);
          } finally {
            interrupt.dispose();
          }
        });
      }),
  ),
  ['askgate run "SELECT name FROM customers ORDER BY name"', 'askgate run "SELECT COUNT(*) FROM orders" --json'],
);

// ── ask ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('ask')
      .description('Route a question and answer it; database questions are answered with generated SQL')
      .argument('<question>', 'Natural language question')
      .option('--db <file>', 'SQLite database file')
      .option('--hint <domain>', 'Force a domain (database|web-search|document)')
      .action(async function (this: Command, question: string, opts: { db?: string; hint?: string }) {
        await runCommand(this, async (output) => {
          const { config, logger } = loadServices(output, opts);
          const query = { text: question, domainHint: parseHint(opts.hint) };
          const connection = config.database ? openConnection(config.database, logger) : null;
          const interrupt = interruptSignal();

          try {
            const database =
              connection && config.llm
                ? new SqlPipeline({
                    connection,
                    generator: new SqlGenerator(new OpenAITextGenerator({ ...config.llm, logger }), {
                      historyTurns: config.generation.historyTurns,
                      logger,
                    }),
                    executor: new BoundedExecutor({
                      maxRows: config.limits.maxRows,
                      timeoutMs: config.limits.timeoutMs,
                      logger,
                    }),
                    inspector: new SchemaInspector({ sampleRows: config.generation.sampleRows, logger }),
                    policy: config.limits,
                    maxAttempts: config.generation.maxAttempts,
                    deadlineMs: config.generation.deadlineMs,
                    logger,
                  })
                : undefined;

            const router = new Router({ database, fallbackDomain: config.routing.fallbackDomain, logger });
            const envelope = await router.handle(query, { signal: interrupt.signal });

            if (output.verbose && !output.json) {
              printDecision(envelope.decision, output);
              printHuman('', output);
            }
            if (!envelope.success) {
              throw fromErrorInfo(envelope.error);
            }
            if (output.json) {
              printCommandSuccess(envelope, output);
              return;
            }
            printEnvelope(envelope, output);
          } finally {
            interrupt.dispose();
            await connection?.close();
          }
        });
      }),
  ),
  [
    'askgate ask "How many customers do we have?" --db ./shop.sqlite',
    'askgate ask "top products by revenue" --hint database --json',
  ],
);

// ── parse ────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    // Commander wraps usage/validation failures as CommanderError
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = toExitCode(usageError(error.message));
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
