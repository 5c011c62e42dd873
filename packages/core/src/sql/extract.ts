/**
 * Pull the SQL statement out of a raw model reply.
 */

const FENCED_BLOCK = /```[A-Za-z]*[ \t]*\r?\n?([\s\S]*?)```/;

/** First keyword of anything we treat as a statement rather than prose. */
const STATEMENT_START =
  /^\(?\s*(select|with|insert|update|delete|drop|alter|truncate|create|grant|revoke|copy|call|merge|exec|execute|vacuum|reindex)\b/i;

/**
 * Strip code fences, surrounding whitespace and trailing semicolons.
 * Returns '' when the reply is empty or reads as prose: the model signals
 * "not a data question" by answering with no SQL at all.
 * Statements other than SELECT are returned as-is so the guard can reject them.
 */
export function extractCandidateSql(raw: string): string {
  const fenced = FENCED_BLOCK.exec(raw);
  let sql = fenced ? fenced[1] : raw;

  // Stray or unbalanced fence markers
  sql = sql.replace(/```[A-Za-z]*/g, '');
  sql = sql.trim().replace(/(\s*;)+$/, '').trim();

  if (sql === '""' || sql === "''") return '';
  if (!STATEMENT_START.test(sql)) return '';
  return sql;
}
