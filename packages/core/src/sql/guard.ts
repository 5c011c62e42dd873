/**
 * Read-only guard for generated SQL.
 *
 * Decisions are made on lexer tokens, so keywords inside string literals and
 * quoted identifiers never trigger a rejection. Words inside comments are
 * still checked. Blocked functions are matched under bare, quoted and
 * schema-qualified names. The node-sql-parser pass runs last and only
 * rejects what it positively classifies as something other than one SELECT.
 */

import { fail, ok, type Result } from '../errors.js';
import { silentLogger, type Logger } from '../log.js';
import { isSignificant, tokenize, type Token } from './lexer.js';
import { selectVerdict } from './ast.js';

export const DENYLIST: readonly string[] = [
  'DELETE',
  'DROP',
  'TRUNCATE',
  'UPDATE',
  'INSERT',
  'ALTER',
  'EXEC',
  'EXECUTE',
  'CREATE',
  'GRANT',
  'REVOKE',
  'COPY',
  'CALL',
  'MERGE',
  'VACUUM',
  'REINDEX',
  'INTO',
];

/** Functions with side effects or filesystem/network reach. */
export const BLOCKED_FUNCTIONS: readonly string[] = [
  'pg_sleep',
  'pg_terminate_backend',
  'pg_cancel_backend',
  'pg_read_file',
  'pg_read_binary_file',
  'pg_write_file',
  'pg_ls_dir',
  'lo_import',
  'lo_export',
  'dblink',
  'dblink_exec',
];

const DENIED = new Set(DENYLIST);
const BLOCKED = new Set(BLOCKED_FUNCTIONS);

export interface GuardOptions {
  logger?: Logger;
}

function deniedWordIn(token: Token): string | undefined {
  if (token.kind === 'word') {
    const upper = token.value.toUpperCase();
    return DENIED.has(upper) ? upper : undefined;
  }
  if (token.kind === 'comment') {
    for (const word of token.text.match(/[A-Za-z_][A-Za-z0-9_]*/g) ?? []) {
      const upper = word.toUpperCase();
      if (DENIED.has(upper)) return upper;
    }
  }
  return undefined;
}

/**
 * Name a token would call, as PostgreSQL resolves it: bare words fold to
 * lower case, quoted identifiers keep their exact spelling. A schema
 * qualifier (`pg_catalog.pg_sleep`) precedes the name and needs no handling.
 */
function functionName(token: Token): string | undefined {
  if (token.kind === 'word') return token.value.toLowerCase();
  if (token.kind === 'quoted') return token.value;
  return undefined;
}

/**
 * Accept `sql` only if it is a single read-only SELECT.
 * On success the value is the input, unchanged.
 */
export function validateReadOnly(sql: string, options: GuardOptions = {}): Result<string> {
  const logger = options.logger ?? silentLogger;
  const reject = (reason: string): Result<string> => fail('sql_rejected', reason, sql);

  // Trailing terminators are harmless; anything after them is not
  const body = sql.trim().replace(/(\s*;)+$/, '');

  if (!body) {
    return reject('Empty SQL statement');
  }

  if (!/^select\b/i.test(body)) {
    return reject('Only SELECT queries are allowed.');
  }

  const tokens = tokenize(body);

  for (const token of tokens) {
    const denied = deniedWordIn(token);
    if (denied) {
      return reject(`Dangerous SQL operation detected: ${denied}`);
    }
  }

  if (tokens.some((t) => t.unterminated)) {
    return reject('Unterminated string literal, identifier or comment');
  }

  if (tokens.some((t) => t.kind === 'punct' && t.text === ';')) {
    return reject('Multiple statements are not allowed.');
  }

  const sig = tokens.filter(isSignificant);
  for (let i = 0; i < sig.length; i++) {
    const name = functionName(sig[i]);
    const next = sig[i + 1];
    if (name !== undefined && BLOCKED.has(name) && next?.kind === 'punct' && next.text === '(') {
      return reject(`Function not allowed: ${name}`);
    }
  }

  const verdict = selectVerdict(body);
  if (verdict.kind === 'unparsed') {
    // The parser does not cover every PostgreSQL construct (custom enum casts among them)
    logger.debug('AST check skipped', { reason: verdict.reason });
    return ok(sql);
  }
  if (verdict.kind === 'rejected') {
    return reject(verdict.reason);
  }

  return ok(sql);
}
