/**
 * @askgate/core barrel export
 *
 * Query routing plus safe SQL generation, validation and execution.
 */

// Request types
export type { Domain, NLQuery, ConversationTurn } from './types.js';
export { DOMAINS, isDomain } from './types.js';

// Errors
export type { ErrorCode, ErrorInfo, RejectionReason } from './errors.js';
export {
  AskgateError,
  SchemaUnavailableError,
  GenerationUnavailableError,
  GenerationUnparseableError,
  SafetyRejectionError,
  ExecutionTimeoutError,
  ExecutionError,
  RequestCancelledError,
  HandlerUnavailableError,
  ConfigError,
  toErrorInfo,
  isAbortError,
} from './errors.js';

// Logging
export { createLogger, silentLogger } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';

// Configuration
export { loadConfig } from './config.js';
export type {
  AskgateConfig,
  ConfigOverrides,
  Env,
  GenerationConfig,
  LimitsConfig,
  LlmConfig,
} from './config.js';

// Database types
export type {
  DbType,
  SqlDialect,
  ConnectionConfig,
  SqliteConnectionConfig,
  PostgresConnectionConfig,
  Scalar,
  ColumnSpec,
  TableSchema,
  SchemaDescription,
  ExecutionResult,
  QueryOptions,
  QueryRows,
  IntrospectOptions,
  DatabaseConnection,
} from './db/types.js';

// Safe session defaults
export { SAFE_DEFAULTS } from './db/defaults.js';

// Connections and schema
export { openConnection, testConnection } from './db/connect.js';
export { SqliteConnection } from './db/adapters/sqlite.js';
export { PostgresConnection } from './db/adapters/postgres.js';
export { SchemaInspector, findTable, isSystemTable } from './db/inspect.js';
export type { InspectorOptions } from './db/inspect.js';
export { SchemaCache } from './db/schema-cache.js';
export type { SchemaCacheStats } from './db/schema-cache.js';

// Execution
export { BoundedExecutor } from './db/execute.js';
export type { ExecutorOptions } from './db/execute.js';

// Safety policy
export type {
  SafetyPolicy,
  AcceptedVerdict,
  RejectedVerdict,
  ValidationVerdict,
} from './policy/types.js';
export { DEFAULT_FORBIDDEN_FUNCTIONS, defaultSafetyPolicy } from './policy/types.js';
export { SqlSafetyValidator } from './policy/validator.js';
export { parseSql } from './policy/parse.js';
export type { ParseResult, ParseOutcome, SqlKind, TableRef } from './policy/parse.js';
export { ensureLimit } from './policy/rewrite.js';
export type { LimitOptions, LimitRewrite } from './policy/rewrite.js';
export { scanSql } from './policy/sql-text.js';
export type { SqlScan } from './policy/sql-text.js';

// SQL generation
export * from './llm/index.js';

// Routing
export * from './router/index.js';

// Pipeline
export { SqlPipeline } from './pipeline.js';
export type { SqlPipelineOptions } from './pipeline.js';
