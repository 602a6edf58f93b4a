/**
 * Routing types: decisions, handler contracts and the response envelope.
 */

import type { ExecutionResult } from '../db/types.js';
import type { ErrorInfo } from '../errors.js';
import type { Domain, NLQuery } from '../types.js';

/** Indicator terms per domain. */
export type SignalTable = Record<Domain, string[]>;

export type DomainScores = Record<Domain, number>;

interface DecisionBase {
  domain: Domain;
  /** Terms of the chosen domain found in the query */
  matchedSignals: string[];
  scores: DomainScores;
  explanation: string;
}

export type RouteDecision =
  | (DecisionBase & { kind: 'matched'; fallback: false })
  | (DecisionBase & { kind: 'hinted'; fallback: false })
  | (DecisionBase & { kind: 'fallback'; fallback: true });

export interface SqlAnswer {
  /** Statement that was executed */
  sql: string;
  result: ExecutionResult;
  /** Generation attempts used, including the successful one */
  attempts: number;
  warnings: string[];
}

export interface SearchHit {
  title: string;
  url: string;
  snippet: string;
}

export interface SearchResult {
  answer: string;
  results: SearchHit[];
  sources: string[];
}

export interface DocumentResult {
  response: string;
  sources: string[];
}

export interface DomainPayloads {
  database: SqlAnswer;
  'web-search': SearchResult;
  document: DocumentResult;
}

export interface HandlerOptions {
  signal?: AbortSignal;
}

export interface DatabaseHandler {
  answer(query: NLQuery, opts?: HandlerOptions): Promise<SqlAnswer>;
}

export interface WebSearchHandler {
  search(query: NLQuery, opts?: HandlerOptions): Promise<SearchResult>;
}

export interface DocumentHandler {
  answer(query: NLQuery, opts?: HandlerOptions): Promise<DocumentResult>;
}

export type SuccessEnvelope = {
  [D in Domain]: { success: true; domain: D; decision: RouteDecision; payload: DomainPayloads[D] };
}[Domain];

export interface FailureEnvelope {
  success: false;
  domain: Domain;
  decision: RouteDecision;
  error: ErrorInfo;
}

export type ResponseEnvelope = SuccessEnvelope | FailureEnvelope;
