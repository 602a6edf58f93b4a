/**
 * Router module barrel export.
 */

export type {
  DatabaseHandler,
  DocumentHandler,
  DocumentResult,
  DomainPayloads,
  DomainScores,
  FailureEnvelope,
  HandlerOptions,
  ResponseEnvelope,
  RouteDecision,
  SearchHit,
  SearchResult,
  SignalTable,
  SqlAnswer,
  SuccessEnvelope,
  WebSearchHandler,
} from './types.js';
export { classifyQuery } from './classify.js';
export type { ClassifyOptions } from './classify.js';
export { defaultSignalTable, loadSignalTable, parseSignalTable, DEFAULT_SIGNALS_URL } from './signals.js';
export { Router } from './router.js';
export type { RouterOptions, RouterStatus } from './router.js';
