/**
 * Request types shared by the router and the SQL pipeline.
 */

export type Domain = 'database' | 'web-search' | 'document';

export const DOMAINS: readonly Domain[] = ['database', 'web-search', 'document'];

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

/** One natural-language request. Treated as read-only by every component. */
export interface NLQuery {
  text: string;
  /** Prior turns, oldest first */
  context?: readonly ConversationTurn[];
  /** Caller-supplied domain that overrides classification */
  domainHint?: Domain;
}

export function isDomain(value: unknown): value is Domain {
  return typeof value === 'string' && DOMAINS.some((d) => d === value);
}
