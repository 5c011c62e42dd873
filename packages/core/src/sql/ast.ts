/**
 * Second opinion from node-sql-parser (PostgreSQL dialect): does the text
 * parse to exactly one SELECT?
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const PG_OPT = { database: 'PostgresQL' } as const;

export type SelectVerdict =
  | { kind: 'single_select' }
  | { kind: 'rejected'; reason: string }
  /** The parser could not read the text; no decision */
  | { kind: 'unparsed'; reason: string };

export function selectVerdict(body: string): SelectVerdict {
  let statements: unknown[];
  try {
    const ast = parser.astify(body, PG_OPT);
    statements = Array.isArray(ast) ? ast : [ast];
  } catch (err: unknown) {
    return { kind: 'unparsed', reason: err instanceof Error ? err.message : String(err) };
  }

  if (statements.length !== 1) {
    return { kind: 'rejected', reason: 'Multiple statements are not allowed.' };
  }
  const type = statementType(statements[0]);
  if (type !== 'select') {
    return { kind: 'rejected', reason: `Only SELECT queries are allowed (parsed as ${type}).` };
  }
  return { kind: 'single_select' };
}

function statementType(statement: unknown): string {
  if (typeof statement === 'object' && statement !== null && 'type' in statement) {
    return String(statement.type).toLowerCase();
  }
  return 'unknown';
}
