/**
 * Router: classifies a query, dispatches it to exactly one domain handler
 * and wraps the outcome in a ResponseEnvelope. It never throws; every
 * failure comes back as a failed envelope.
 */

import type { Logger } from 'pino';
import type { Domain, NLQuery } from '../types.js';
import { DOMAINS } from '../types.js';
import type {
  DatabaseHandler,
  DocumentHandler,
  HandlerOptions,
  ResponseEnvelope,
  RouteDecision,
  SignalTable,
  WebSearchHandler,
} from './types.js';
import { classifyQuery } from './classify.js';
import { defaultSignalTable } from './signals.js';
import { HandlerUnavailableError, toErrorInfo } from '../errors.js';
import { silentLogger } from '../logger.js';

export interface RouterOptions {
  database?: DatabaseHandler;
  webSearch?: WebSearchHandler;
  document?: DocumentHandler;
  /** Defaults to the bundled table in data/signals.json */
  signals?: SignalTable;
  /** Domain for queries with no matching signal. Default: web-search */
  fallbackDomain?: Domain;
  logger?: Logger;
}

export interface RouterStatus {
  domains: Array<{ domain: Domain; available: boolean }>;
  fallbackDomain: Domain;
  /** Number of indicator terms per domain */
  signalCounts: Record<Domain, number>;
}

export class Router {
  private readonly signals: SignalTable;
  private readonly fallbackDomain: Domain;
  private readonly logger: Logger;

  constructor(private readonly opts: RouterOptions = {}) {
    this.signals = opts.signals ?? defaultSignalTable();
    this.fallbackDomain = opts.fallbackDomain ?? 'web-search';
    this.logger = opts.logger ?? silentLogger();
  }

  route(query: NLQuery): RouteDecision {
    const decision = classifyQuery(query, this.signals, { fallbackDomain: this.fallbackDomain });
    this.logger.debug(
      { domain: decision.domain, kind: decision.kind, scores: decision.scores },
      'query routed',
    );
    return decision;
  }

  async dispatch(
    decision: RouteDecision,
    query: NLQuery,
    handlerOpts: HandlerOptions = {},
  ): Promise<ResponseEnvelope> {
    try {
      switch (decision.domain) {
        case 'database': {
          const handler = this.opts.database;
          if (!handler) throw new HandlerUnavailableError('database');
          const payload = await handler.answer(query, handlerOpts);
          return { success: true, domain: 'database', decision, payload };
        }
        case 'web-search': {
          const handler = this.opts.webSearch;
          if (!handler) throw new HandlerUnavailableError('web-search');
          const payload = await handler.search(query, handlerOpts);
          return { success: true, domain: 'web-search', decision, payload };
        }
        case 'document': {
          const handler = this.opts.document;
          if (!handler) throw new HandlerUnavailableError('document');
          const payload = await handler.answer(query, handlerOpts);
          return { success: true, domain: 'document', decision, payload };
        }
      }
    } catch (err: unknown) {
      const error = toErrorInfo(err);
      this.logger.warn({ domain: decision.domain, code: error.code, err: error.message }, 'handler failed');
      return { success: false, domain: decision.domain, decision, error };
    }
  }

  /** Route and dispatch in one step. */
  async handle(query: NLQuery, handlerOpts: HandlerOptions = {}): Promise<ResponseEnvelope> {
    return this.dispatch(this.route(query), query, handlerOpts);
  }

  status(): RouterStatus {
    const available: Record<Domain, boolean> = {
      database: this.opts.database !== undefined,
      'web-search': this.opts.webSearch !== undefined,
      document: this.opts.document !== undefined,
    };
    return {
      domains: DOMAINS.map((domain) => ({ domain, available: available[domain] })),
      fallbackDomain: this.fallbackDomain,
      signalCounts: {
        database: this.signals.database.length,
        'web-search': this.signals['web-search'].length,
        document: this.signals.document.length,
      },
    };
  }
}
