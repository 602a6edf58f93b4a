/**
 * Prompt construction for SQL generation.
 */

import type { SqlDialect } from '../db/types.js';
import type { ConversationTurn } from '../types.js';

const DIALECT_NAMES: Record<SqlDialect, string> = {
  sqlite: 'SQLite',
  postgres: 'PostgreSQL',
};

export interface PromptInput {
  question: string;
  schemaText: string;
  /** Prior turns, oldest first; only the last `historyTurns` are used */
  history?: readonly ConversationTurn[];
  historyTurns?: number;
  /** Why the previous attempt was rejected */
  feedback?: string;
}

export function buildSystemPrompt(dialect: SqlDialect): string {
  return `You are a SQL query generator for ${DIALECT_NAMES[dialect]} databases.

CONSTRAINTS:
- Generate a SINGLE SQL statement only. Never multiple statements.
- You MUST generate only SELECT statements or CTE (WITH ... SELECT) statements. No INSERT, UPDATE, DELETE, DROP, or DDL.
- Do NOT reference tables not present in the provided schema.
- Write literal values inline; do not use placeholders.
- Include a LIMIT clause when the question does not ask for every row.

Respond with the SQL statement inside a \`\`\`sql code block and nothing else.`;
}

export function buildPrompt(input: PromptInput): string {
  const sections: string[] = [input.schemaText.trimEnd()];

  const turns = recentTurns(input.history ?? [], input.historyTurns ?? 5);
  if (turns.length > 0) {
    const transcript = turns.map((t) => `${t.role === 'user' ? 'User' : 'Assistant'}: ${t.content}`);
    sections.push(`Conversation so far:\n${transcript.join('\n')}`);
  }

  sections.push(`Question: ${input.question}`);

  if (input.feedback) {
    sections.push(
      `Your previous answer was rejected: ${input.feedback}\nReturn a corrected statement that fixes this.`,
    );
  }

  sections.push('Generate the SQL query.');
  return sections.join('\n\n');
}

function recentTurns(history: readonly ConversationTurn[], limit: number): readonly ConversationTurn[] {
  if (limit <= 0) return [];
  return history.slice(-limit);
}
