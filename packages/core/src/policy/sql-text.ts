/**
 * Lexical scanner for candidate SQL.
 *
 * Splits text into top-level statements while respecting string literals,
 * quoted identifiers, dollar-quoted bodies and comments. The validator uses
 * it for the checks that must hold before (and independently of) AST
 * parsing: statement stacking, leading keyword, and truncating comments.
 */

export type Unterminated = 'string' | 'identifier' | 'comment';

export interface SqlScan {
  /** Top-level statements split on `;`, trimmed, comments replaced by a space */
  segments: string[];
  /** Number of top-level `;` terminators */
  semicolons: number;
  /** Offset of the first top-level `;` in the input, or -1 */
  firstTerminator: number;
  /** A comment is the last thing in the input, ignoring whitespace and `;` */
  endsWithComment: boolean;
  /** Construct still open at end of input */
  unterminated: Unterminated | null;
  /** Code with comments removed, literal bodies blanked and identifier quotes dropped */
  masked: string;
}

const DOLLAR_TAG_RE = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

export function scanSql(sql: string): SqlScan {
  const segments: string[] = [];
  let current = '';
  let masked = '';
  let semicolons = 0;
  let firstTerminator = -1;
  let endsWithComment = false;
  let unterminated: Unterminated | null = null;

  let i = 0;
  const n = sql.length;

  while (i < n) {
    const ch = sql[i];
    const next = sql[i + 1];

    // -- line comment
    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i + 2);
      i = end === -1 ? n : end;
      current += ' ';
      masked += ' ';
      endsWithComment = true;
      continue;
    }

    // /* block comment */
    if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      endsWithComment = true;
      if (end === -1) {
        unterminated = 'comment';
        break;
      }
      i = end + 2;
      current += ' ';
      masked += ' ';
      continue;
    }

    if (ch === "'") {
      const end = closingQuote(sql, i, "'");
      endsWithComment = false;
      if (end === -1) {
        unterminated = 'string';
        current += sql.slice(i);
        break;
      }
      const literal = sql.slice(i, end + 1);
      current += literal;
      masked += blankLiteral(literal.length);
      i = end + 1;
      continue;
    }

    if (ch === '"' || ch === '`') {
      const end = closingQuote(sql, i, ch);
      endsWithComment = false;
      if (end === -1) {
        unterminated = 'identifier';
        current += sql.slice(i);
        break;
      }
      const ident = sql.slice(i, end + 1);
      current += ident;
      masked += ident.slice(1, -1).split(ch + ch).join(ch);
      i = end + 1;
      continue;
    }

    if (ch === '$') {
      const tag = DOLLAR_TAG_RE.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        endsWithComment = false;
        if (close === -1) {
          unterminated = 'string';
          current += sql.slice(i);
          break;
        }
        const literal = sql.slice(i, close + tag[0].length);
        current += literal;
        masked += blankLiteral(literal.length);
        i = close + tag[0].length;
        continue;
      }
    }

    if (ch === ';') {
      if (firstTerminator === -1) firstTerminator = i;
      semicolons++;
      segments.push(current);
      current = '';
      masked += ';';
      i++;
      continue;
    }

    current += ch;
    masked += ch;
    if (!/\s/.test(ch)) endsWithComment = false;
    i++;
  }

  segments.push(current);

  return {
    segments: segments.map((s) => s.trim()),
    semicolons,
    firstTerminator,
    endsWithComment,
    unterminated,
    masked,
  };
}

/** Segments that contain code. */
export function statementsOf(scan: SqlScan): string[] {
  return scan.segments.filter((s) => s.length > 0);
}

/** First keyword of a statement, uppercased, skipping opening parentheses. */
export function leadingKeyword(statement: string): string {
  const match = /^[\s(]*([A-Za-z_]+)/.exec(statement);
  return match ? match[1].toUpperCase() : '';
}

/** Calls to any of the given functions in masked code, lowercased, in list order. */
export function findFunctionCalls(masked: string, names: readonly string[]): string[] {
  return names.filter((name) => new RegExp(`\\b${escapeRegExp(name)}\\s*\\(`, 'i').test(masked));
}

function closingQuote(sql: string, start: number, quote: string): number {
  let j = start + 1;
  for (;;) {
    const idx = sql.indexOf(quote, j);
    if (idx === -1) return -1;
    if (sql[idx + 1] === quote) {
      j = idx + 2;
      continue;
    }
    return idx;
  }
}

function blankLiteral(length: number): string {
  return `'${' '.repeat(Math.max(0, length - 2))}'`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
