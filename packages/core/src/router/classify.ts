/**
 * Query classification over a static signal table.
 *
 * Each term found in the query (case-insensitive, on word boundaries) adds
 * its word count to its domain's score. The highest score wins; ties go to
 * the earlier domain in DOMAINS order. A valid caller hint overrides the
 * scores, and a query with no signal goes to the fallback domain.
 */

import { DOMAINS, isDomain, type Domain, type NLQuery } from '../types.js';
import type { DomainScores, RouteDecision, SignalTable } from './types.js';

export interface ClassifyOptions {
  /** Domain used when nothing matches. Default: web-search */
  fallbackDomain?: Domain;
}

interface CompiledTerm {
  term: string;
  weight: number;
  pattern: RegExp;
}

type CompiledTable = Record<Domain, CompiledTerm[]>;

const compiled = new WeakMap<SignalTable, CompiledTable>();

export function classifyQuery(
  query: NLQuery,
  signals: SignalTable,
  opts: ClassifyOptions = {},
): RouteDecision {
  const fallbackDomain = opts.fallbackDomain ?? 'web-search';
  const table = compile(signals);

  const scores: DomainScores = { database: 0, 'web-search': 0, document: 0 };
  const matched: Record<Domain, string[]> = { database: [], 'web-search': [], document: [] };

  for (const domain of DOMAINS) {
    for (const { term, weight, pattern } of table[domain]) {
      if (pattern.test(query.text)) {
        scores[domain] += weight;
        matched[domain].push(term);
      }
    }
  }

  const hint: unknown = query.domainHint;
  if (hint !== undefined && isDomain(hint)) {
    return {
      kind: 'hinted',
      domain: hint,
      fallback: false,
      matchedSignals: matched[hint],
      scores,
      explanation: `Routed to ${hint} by caller hint.`,
    };
  }

  let best: Domain = DOMAINS[0];
  for (const domain of DOMAINS) {
    if (scores[domain] > scores[best]) best = domain;
  }

  if (scores[best] === 0) {
    return {
      kind: 'fallback',
      domain: fallbackDomain,
      fallback: true,
      matchedSignals: [],
      scores,
      explanation: `No domain signals matched; using fallback domain ${fallbackDomain}.`,
    };
  }

  const tied = DOMAINS.filter((d) => d !== best && scores[d] === scores[best]);
  const terms = matched[best].map((t) => `"${t}"`).join(', ');
  let explanation = `Matched ${terms} for ${best} (score ${scores[best]}).`;
  if (tied.length > 0) {
    explanation += ` Tied with ${tied.join(', ')}; ${best} takes priority.`;
  }

  return {
    kind: 'matched',
    domain: best,
    fallback: false,
    matchedSignals: matched[best],
    scores,
    explanation,
  };
}

function compile(signals: SignalTable): CompiledTable {
  const cached = compiled.get(signals);
  if (cached) return cached;

  const table: CompiledTable = { database: [], 'web-search': [], document: [] };
  for (const domain of DOMAINS) {
    table[domain] = signals[domain].map((term) => ({
      term,
      weight: term.split(/\s+/).length,
      pattern: termPattern(term),
    }));
  }
  compiled.set(signals, table);
  return table;
}

function termPattern(term: string): RegExp {
  const body = term
    .trim()
    .split(/\s+/)
    .map((word) => word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('\\s+');
  return new RegExp(`(?<![\\w])${body}(?![\\w])`, 'i');
}
