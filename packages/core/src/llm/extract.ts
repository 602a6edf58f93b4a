/**
 * Statement extraction from free-form generator output.
 *
 * Best effort and lossy: a fenced code block wins; otherwise the first line
 * that opens with a SQL keyword is taken through the end of its paragraph,
 * or through its first `;` when prose follows it. A second statement after
 * the `;` is kept for the validator to reject. Anything else fails with GenerationUnparseableError. Malformed SQL is
 * never repaired here.
 */

import { GenerationUnparseableError } from '../errors.js';
import { scanSql, statementsOf } from '../policy/sql-text.js';

const SQL_KEYWORDS = [
  'SELECT',
  'WITH',
  'INSERT',
  'UPDATE',
  'DELETE',
  'REPLACE',
  'CREATE',
  'ALTER',
  'DROP',
  'TRUNCATE',
  'ATTACH',
  'DETACH',
  'PRAGMA',
  'EXPLAIN',
] as const;

const LEADING_KEYWORD_RE = new RegExp(`^(?:${SQL_KEYWORDS.join('|')})\\b`, 'i');
const ANY_KEYWORD_RE = new RegExp(`\\b(?:${SQL_KEYWORDS.join('|')})\\b`, 'i');
const FENCE_RE = /```([A-Za-z0-9_-]*)[^\S\n]*\n?([\s\S]*?)```/g;

export function extractStatement(raw: string): string {
  const fenced = fromFence(raw);
  if (fenced) return fenced;

  const paragraph = fromParagraph(raw);
  if (paragraph) return paragraph;

  throw new GenerationUnparseableError('No SQL statement found in the generator output.', raw);
}

function fromFence(raw: string): string | null {
  const blocks: Array<{ lang: string; body: string }> = [];
  for (const match of raw.matchAll(FENCE_RE)) {
    const body = match[2].trim();
    if (body && ANY_KEYWORD_RE.test(body)) {
      blocks.push({ lang: match[1].toLowerCase(), body });
    }
  }
  const sql = blocks.find((b) => b.lang === 'sql');
  return (sql ?? blocks[0])?.body ?? null;
}

function fromParagraph(raw: string): string | null {
  const lines = raw.split(/\r?\n/);
  const start = lines.findIndex((line) => LEADING_KEYWORD_RE.test(line.trim()));
  if (start === -1) return null;

  const taken: string[] = [];
  for (const line of lines.slice(start)) {
    if (line.trim() === '') break;
    taken.push(line);
  }
  const paragraph = taken.join('\n').trim();

  const { firstTerminator } = scanSql(paragraph);
  if (firstTerminator === -1) return paragraph;
  const [next = ''] = statementsOf(scanSql(paragraph.slice(firstTerminator + 1)));
  if (next === '' || LEADING_KEYWORD_RE.test(next)) return paragraph;
  return paragraph.slice(0, firstTerminator + 1);
}
