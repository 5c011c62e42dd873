/**
 * Minimal PostgreSQL lexer.
 *
 * Not a parser: it only splits text into tokens precisely enough to tell
 * literals, quoted identifiers and comments apart from the SQL around them.
 * Joining every token's `text` reproduces the input exactly.
 */

export type TokenKind =
  | 'word'
  | 'string'
  | 'quoted'
  | 'number'
  | 'param'
  | 'operator'
  | 'punct'
  | 'comment'
  | 'space';

export interface Token {
  kind: TokenKind;
  /** Raw source text */
  text: string;
  /** Decoded content: literal value, identifier name, or the raw text */
  value: string;
  start: number;
  /** Set on strings, quoted identifiers and block comments that never close */
  unterminated?: boolean;
}

const TWO_CHAR_OPERATORS = new Set(['::', '<>', '!=', '<=', '>=', '||', '->', '#>', '~~', '@>', '<@', '&&']);
const PUNCT = new Set(['(', ')', ',', ';', '.', '[', ']']);

const isIdentStart = (ch: string): boolean => /[A-Za-z_\u0080-\uffff]/.test(ch);
const isIdentPart = (ch: string): boolean => /[A-Za-z0-9_$\u0080-\uffff]/.test(ch);
const isDigit = (ch: string): boolean => ch >= '0' && ch <= '9';

export function tokenize(sql: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const push = (kind: TokenKind, end: number, value?: string, unterminated?: boolean): void => {
    const text = sql.slice(i, end);
    const token: Token = { kind, text, value: value ?? text, start: i };
    if (unterminated) token.unterminated = true;
    tokens.push(token);
    i = end;
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1] ?? '';

    if (/\s/.test(ch)) {
      let end = i + 1;
      while (end < sql.length && /\s/.test(sql[end])) end++;
      push('space', end);
      continue;
    }

    if (ch === '-' && next === '-') {
      let end = sql.indexOf('\n', i);
      if (end === -1) end = sql.length;
      push('comment', end);
      continue;
    }

    if (ch === '/' && next === '*') {
      const { end, closed } = scanBlockComment(sql, i);
      push('comment', end, undefined, !closed);
      continue;
    }

    if ((ch === 'E' || ch === 'e') && next === "'") {
      const { end, value, closed } = scanEscapeString(sql, i + 1);
      push('string', end, value, !closed);
      continue;
    }

    if (ch === "'") {
      const { end, value, closed } = scanQuoted(sql, i, "'");
      push('string', end, value, !closed);
      continue;
    }

    if (ch === '"') {
      const { end, value, closed } = scanQuoted(sql, i, '"');
      push('quoted', end, value, !closed);
      continue;
    }

    if (ch === '$') {
      if (isDigit(next)) {
        let end = i + 1;
        while (end < sql.length && isDigit(sql[end])) end++;
        push('param', end);
        continue;
      }
      const tag = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(sql.slice(i));
      if (tag) {
        const delimiter = tag[0];
        const bodyStart = i + delimiter.length;
        const close = sql.indexOf(delimiter, bodyStart);
        if (close === -1) {
          push('string', sql.length, sql.slice(bodyStart), true);
        } else {
          push('string', close + delimiter.length, sql.slice(bodyStart, close));
        }
        continue;
      }
    }

    if (isIdentStart(ch)) {
      let end = i + 1;
      while (end < sql.length && isIdentPart(sql[end])) end++;
      push('word', end);
      continue;
    }

    if (isDigit(ch) || (ch === '.' && isDigit(next))) {
      const match = /^(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/.exec(sql.slice(i));
      push('number', i + (match ? match[0].length : 1));
      continue;
    }

    if (PUNCT.has(ch)) {
      push('punct', i + 1);
      continue;
    }

    if (TWO_CHAR_OPERATORS.has(ch + next)) {
      push('operator', i + 2);
      continue;
    }

    push('operator', i + 1);
  }

  return tokens;
}

/** Tokens that carry meaning: everything except whitespace and comments. */
export function isSignificant(token: Token): boolean {
  return token.kind !== 'space' && token.kind !== 'comment';
}

export function joinTokens(tokens: Token[]): string {
  return tokens.map((t) => t.text).join('');
}

/** Standard '...' strings and "..." identifiers; a doubled quote is an escaped quote. */
function scanQuoted(sql: string, start: number, quote: string): { end: number; value: string; closed: boolean } {
  let value = '';
  let j = start + 1;
  while (j < sql.length) {
    if (sql[j] === quote) {
      if (sql[j + 1] === quote) {
        value += quote;
        j += 2;
        continue;
      }
      return { end: j + 1, value, closed: true };
    }
    value += sql[j];
    j++;
  }
  return { end: sql.length, value, closed: false };
}

/** E'...' strings: backslash escapes the next character, '' still works. */
function scanEscapeString(sql: string, quotePos: number): { end: number; value: string; closed: boolean } {
  let value = '';
  let j = quotePos + 1;
  while (j < sql.length) {
    const ch = sql[j];
    if (ch === '\\' && j + 1 < sql.length) {
      value += sql[j + 1];
      j += 2;
      continue;
    }
    if (ch === "'") {
      if (sql[j + 1] === "'") {
        value += "'";
        j += 2;
        continue;
      }
      return { end: j + 1, value, closed: true };
    }
    value += ch;
    j++;
  }
  return { end: sql.length, value, closed: false };
}

/** Block comments nest in PostgreSQL. */
function scanBlockComment(sql: string, start: number): { end: number; closed: boolean } {
  let depth = 0;
  let j = start;
  while (j < sql.length) {
    if (sql[j] === '/' && sql[j + 1] === '*') {
      depth++;
      j += 2;
      continue;
    }
    if (sql[j] === '*' && sql[j + 1] === '/') {
      depth--;
      j += 2;
      if (depth === 0) return { end: j, closed: true };
      continue;
    }
    j++;
  }
  return { end: sql.length, closed: false };
}
