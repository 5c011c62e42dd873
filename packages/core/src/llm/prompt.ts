/**
 * Versioned prompt builders.
 * Bump the version constant whenever the wording of a template changes.
 */

import { renderCatalog } from '../db/catalog.js';
import type { QueryResult, SchemaCatalog } from '../db/types.js';
import { ENUM_RULES, type EnumRule } from '../sql/enums.js';
import type { PromptMessage } from './types.js';

export const SQL_PROMPT_VERSION = 'sql-v1';
export const SUMMARY_PROMPT_VERSION = 'summary-v1';
export const CHAT_PROMPT_VERSION = 'chat-v1';

export const ASSISTANT_NAME = 'Blu';

/** Free-text columns whose conventional values help the model; no cast needed. */
export interface TextValueHint {
  column: string;
  values: readonly string[];
}

export const TEXT_VALUE_HINTS: readonly TextValueHint[] = [
  { column: 'expense_type', values: ['OFFICE_SUPPLIES', 'UTILITIES', 'MAINTENANCE', 'SALARIES', 'TRAVEL', 'OTHER'] },
  { column: 'department', values: ['SALES', 'MARKETING', 'HR', 'FINANCE', 'OPERATIONS'] },
];

// ── SQL generation ───────────────────────────────────────────────────

export interface SqlPromptInput {
  utterance: string;
  catalog: SchemaCatalog;
  enumRules?: readonly EnumRule[];
  textHints?: readonly TextValueHint[];
}

const quoteAll = (values: readonly string[]): string => values.map((v) => `'${v}'`).join(', ');

export function buildSqlMessages(input: SqlPromptInput): PromptMessage[] {
  const enumRules = input.enumRules ?? ENUM_RULES;
  const textHints = input.textHints ?? TEXT_VALUE_HINTS;

  const enumLines = enumRules.map(
    (r) => `- ${r.typeName} (column ${r.column}): ${quoteAll(r.members)}. Compare as ${r.column} = 'VALUE'::${r.typeName}`,
  );
  const textLines = textHints.map((h) => `- ${h.column} (plain text): ${quoteAll(h.values)}`);
  const example = enumRules[0];
  const exampleMember = example?.members[0];
  const exampleLine =
    example && exampleMember
      ? `\n- Example: WHERE ${example.column} = '${exampleMember}'::${example.typeName} (NOT '${exampleMember.toLowerCase()}')`
      : '';

  const system = `You are a SQL expert. Convert natural language questions into a single PostgreSQL SELECT statement.

Database Schema:
${renderCatalog(input.catalog)}

ENUM COLUMNS (PostgreSQL enums, case-sensitive, stored in UPPERCASE):
${enumLines.join('\n')}

Known values of text columns:
${textLines.join('\n')}

CRITICAL RULES FOR ENUM COLUMNS:
- Always compare enum columns with the type cast syntax: 'VALUE'::enumtype
- Use the UPPERCASE spelling listed above${exampleLine}

Rules:
1. Only generate SELECT queries.
2. Use proper JOINs and table aliases.
3. Use aggregate functions when appropriate.
4. For date-related queries, use functions like CURRENT_DATE, NOW(), and INTERVAL.
5. If a query is ambiguous, generate the most likely and useful query.
6. If the query is conversational or clearly unrelated to the schema (e.g., "what is the capital of France"), return an empty string.
7. When filtering by enum values, always use the type cast syntax: 'VALUE'::enumtype
8. Return only the SQL query, no explanations or markdown.`;

  return [
    { role: 'system', content: system },
    { role: 'user', content: `User Query: ${input.utterance}\n\nSQL Query:` },
  ];
}

// ── Result summary ───────────────────────────────────────────────────

export interface SummaryPromptInput {
  utterance: string;
  result: QueryResult;
  sampleSize: number;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export function buildSummaryMessages(input: SummaryPromptInput): PromptMessage[] {
  const { result } = input;
  const sample = JSON.stringify(result.rows.slice(0, input.sampleSize), jsonReplacer);
  const total = result.truncated
    ? `${result.rowCount} (capped; the query matched more rows)`
    : String(result.rowCount);

  const content = `User's original query: "${input.utterance}"
Query Results (sample): ${sample}
Total results found: ${total}

Provide a clear, concise, and natural language summary of these results.
- Interpret the data and explain what it means in a business context.
- If it's a number, explain what it represents (e.g., "The total sales for the last week were...").
- Do not just repeat the data. Summarize the key insights.
- Keep the tone professional and helpful.
- Do not mention that you are summarizing data or showing results. Just give the answer.`;

  return [{ role: 'user', content }];
}

// ── Conversation ─────────────────────────────────────────────────────

export function buildChatMessages(utterance: string): PromptMessage[] {
  return [
    {
      role: 'system',
      content: `You are a helpful AI assistant named ${ASSISTANT_NAME}. Keep your responses concise and professional.`,
    },
    {
      role: 'user',
      content: `User says: '${utterance}'. Respond in a friendly, brief, and helpful manner. Your name is ${ASSISTANT_NAME}. You assist with business-related questions.`,
    },
  ];
}
