/**
 * Safe defaults for generation, validation and execution.
 * These are conservative limits enforced by the execute layer.
 */

export const SAFE_DEFAULTS = {
  /** LIMIT appended to queries missing one */
  defaultLimit: 200,
  /** Largest LIMIT a query may keep; higher values are clamped */
  maxLimit: 1000,
  /** Hard cap on fetched rows regardless of the query's LIMIT */
  maxRows: 1000,
  /** Per-query wall-clock timeout in milliseconds */
  statementTimeoutMs: 5_000,
  /** Prior conversation turns included in the generation prompt */
  historyTurns: 5,
  /** Generate/validate attempts before giving up */
  maxAttempts: 3,
  /** Example rows per table in the generation prompt */
  sampleRows: 3,
} as const;
