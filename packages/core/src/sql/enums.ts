/**
 * Enum literal normalization.
 *
 * The ERP schema stores order and attendance status as PostgreSQL enums with
 * upper-case members. Generated SQL often spells them in lower case or
 * compares them against text, so literals are folded to their canonical
 * spelling and, where compared to a status column, cast to the enum type.
 *
 * Other tables have plain-text `status` columns (payroll keeps lower-case
 * 'pending'). A literal compared with a status column that resolves to one
 * of those tables is left exactly as written.
 */

import { isSignificant, joinTokens, tokenize, type Token } from './lexer.js';

export interface EnumRule {
  /** PostgreSQL type name used in the cast */
  typeName: string;
  /** Table whose column carries the type */
  table: string;
  /** Column the type lives on (unqualified) */
  column: string;
  /** Canonical spellings */
  members: readonly string[];
}

/** Member sets are disjoint, so a literal identifies its type. */
export const ENUM_RULES: readonly EnumRule[] = [
  {
    typeName: 'orderstatus',
    table: 'orders',
    column: 'status',
    members: ['PENDING', 'PROCESSING', 'SHIPPED', 'DELIVERED', 'CANCELLED'],
  },
  {
    typeName: 'attendancestatus',
    table: 'attendance',
    column: 'status',
    members: ['PRESENT', 'ABSENT', 'LATE', 'LEAVE'],
  },
];

const COMPARISON_OPERATORS = new Set(['=', '<>', '!=']);

/** Words that end a FROM item instead of naming its alias. */
const CLAUSE_WORDS = new Set([
  'on',
  'using',
  'where',
  'join',
  'inner',
  'left',
  'right',
  'full',
  'cross',
  'natural',
  'lateral',
  'group',
  'order',
  'having',
  'limit',
  'offset',
  'fetch',
  'window',
  'union',
  'intersect',
  'except',
  'for',
]);

interface MemberMatch {
  rule: EnumRule;
  member: string;
}

/** A relation named in FROM or JOIN. */
interface Relation {
  table: string;
  alias?: string;
}

/** Where the column a literal is compared with lives, relative to a rule. */
type ColumnOwner = 'rule_table' | 'other_table' | 'unknown';

function findMember(value: string, rules: readonly EnumRule[]): MemberMatch | undefined {
  const wanted = value.toLowerCase();
  for (const rule of rules) {
    const member = rule.members.find((m) => m.toLowerCase() === wanted);
    if (member) return { rule, member };
  }
  return undefined;
}

/** Plain '...' literal (not E'', not dollar-quoted). */
function isPlainLiteral(token: Token): boolean {
  return token.kind === 'string' && token.text.startsWith("'") && !token.unterminated;
}

/** Identifier as PostgreSQL resolves it: bare words fold to lower case. */
function identifier(token: Token | undefined): string | undefined {
  if (!token) return undefined;
  if (token.kind === 'word') return token.value.toLowerCase();
  if (token.kind === 'quoted') return token.value;
  return undefined;
}

function isPunct(token: Token | undefined, text: string): boolean {
  return token !== undefined && token.kind === 'punct' && token.text === text;
}

function isKeyword(token: Token | undefined, word: string): boolean {
  return token !== undefined && token.kind === 'word' && token.value.toLowerCase() === word;
}

/**
 * Relations named after FROM, JOIN and the commas of a FROM list.
 * Subqueries in FROM contribute nothing.
 */
function collectRelations(sig: Token[]): Relation[] {
  const relations: Relation[] = [];
  for (let i = 0; i < sig.length; i++) {
    if (!isKeyword(sig[i], 'from') && !isKeyword(sig[i], 'join')) continue;

    let j = i + 1;
    for (;;) {
      let table = identifier(sig[j]);
      if (table === undefined || (sig[j].kind === 'word' && CLAUSE_WORDS.has(table))) break;
      j++;
      // schema.table
      while (isPunct(sig[j], '.') && identifier(sig[j + 1]) !== undefined) {
        table = identifier(sig[j + 1]) ?? table;
        j += 2;
      }

      if (isKeyword(sig[j], 'as')) j++;
      const alias = identifier(sig[j]);
      const isAlias = alias !== undefined && !(sig[j].kind === 'word' && CLAUSE_WORDS.has(alias));
      relations.push(isAlias ? { table, alias } : { table });
      if (isAlias) j++;

      if (!isPunct(sig[j], ',')) break;
      j++;
    }
  }
  return relations;
}

function ownerOf(sig: Token[], columnIndex: number, relations: Relation[], rule: EnumRule): ColumnOwner {
  if (isPunct(sig[columnIndex - 1], '.')) {
    const qualifier = identifier(sig[columnIndex - 2]);
    const relation =
      relations.find((r) => r.alias === qualifier) ?? relations.find((r) => r.alias === undefined && r.table === qualifier);
    if (!relation) return 'unknown';
    return relation.table === rule.table ? 'rule_table' : 'other_table';
  }
  if (relations.length === 0) return 'unknown';
  return relations.some((r) => r.table === rule.table) ? 'rule_table' : 'other_table';
}

/**
 * Rewrite enum literals in `sql`. Leaves every other byte untouched.
 * Applying it twice gives the same result as applying it once.
 */
export function normalizeEnumLiterals(sql: string, rules: readonly EnumRule[] = ENUM_RULES): string {
  const tokens = tokenize(sql);
  const sig = tokens.filter(isSignificant);
  const relations = collectRelations(sig);

  for (let k = 0; k < sig.length; k++) {
    const token = sig[k];
    if (!isPlainLiteral(token)) continue;
    const match = findMember(token.value, rules);
    if (!match) continue;

    const columnIndex = comparedColumnIndex(sig, k);
    let compared = false;
    if (columnIndex !== undefined && identifier(sig[columnIndex]) === match.rule.column) {
      if (ownerOf(sig, columnIndex, relations, match.rule) === 'other_table') continue;
      compared = true;
    }

    const alreadyCast = sig[k + 1]?.kind === 'operator' && sig[k + 1].text === '::';
    token.value = match.member;
    token.text = compared && !alreadyCast ? `'${match.member}'::${match.rule.typeName}` : `'${match.member}'`;
  }

  return joinTokens(tokens);
}

/** Index of the column in `status = 'X'` or `status [NOT] IN ('X', ...)`. */
function comparedColumnIndex(sig: Token[], k: number): number | undefined {
  const op = sig[k - 1];
  if (op && op.kind === 'operator' && COMPARISON_OPERATORS.has(op.text)) {
    return k - 2 >= 0 ? k - 2 : undefined;
  }
  return inListColumnIndex(sig, k);
}

function inListColumnIndex(sig: Token[], k: number): number | undefined {
  let j = k - 1;
  while (j >= 0) {
    const t = sig[j];
    if (isPunct(t, '(')) break;
    const inList = t.kind === 'string' || isPunct(t, ',') || (t.kind === 'operator' && t.text === '::') || t.kind === 'word';
    if (!inList) return undefined;
    j--;
  }
  if (j < 0) return undefined;

  let before = j - 1;
  if (!isKeyword(sig[before], 'in')) return undefined;
  before--;
  if (isKeyword(sig[before], 'not')) before--;

  return before >= 0 ? before : undefined;
}
