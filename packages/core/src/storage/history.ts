/**
 * Local interaction history in a SQLite file, through sql.js.
 * Records what was asked and how it was answered; never result rows.
 *
 * sql.js keeps the database in memory; every write is flushed back to the
 * file, so a store opened on the same path later sees it.
 */

import initSqlJsModule from 'sql.js';
import type { Database as SqlDatabase } from 'sql.js';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { AssistantReply, ReplyRoute } from '../assistant/pipeline.js';
import { isQueryErrorKind, type QueryErrorKind } from '../errors.js';

// sql.js ships CommonJS; under ESM its init function is also the module's `default`
const initSqlJs = initSqlJsModule.default;

let engine: ReturnType<typeof initSqlJs> | undefined;

/** Loads the WebAssembly engine once per process. */
function loadEngine(): ReturnType<typeof initSqlJs> {
  engine ??= initSqlJs();
  return engine;
}

const MEMORY = ':memory:';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: interactions
  `CREATE TABLE IF NOT EXISTS interactions (
    id TEXT PRIMARY KEY,
    asked_at TEXT NOT NULL,
    utterance TEXT NOT NULL,
    route TEXT NOT NULL,
    sql TEXT,
    success INTEGER NOT NULL,
    row_count INTEGER,
    error_kind TEXT,
    error_text TEXT
  )`,

  // 2: listing index
  `CREATE INDEX IF NOT EXISTS interactions_asked_at ON interactions (asked_at)`,
];

// ── Types ────────────────────────────────────────────────────────────

export interface HistoryEntry {
  id: string;
  askedAt: string;
  utterance: string;
  route: ReplyRoute;
  sql: string | null;
  success: boolean;
  rowCount: number | null;
  errorKind: QueryErrorKind | null;
  errorText: string | null;
}

/** A row as sql.js hands it back: column name to SQLite value. */
type Row = Record<string, unknown>;

function text(row: Row, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

function textOrNull(row: Row, key: string): string | null {
  const value = row[key];
  return typeof value === 'string' ? value : null;
}

function integerOrNull(row: Row, key: string): number | null {
  const value = row[key];
  return typeof value === 'number' ? value : null;
}

const ROUTES: readonly ReplyRoute[] = ['conversational', 'data', 'error'];

function toRoute(value: string): ReplyRoute {
  return ROUTES.find((r) => r === value) ?? 'error';
}

function toEntry(row: Row): HistoryEntry {
  const errorKind = textOrNull(row, 'error_kind');
  return {
    id: text(row, 'id'),
    askedAt: text(row, 'asked_at'),
    utterance: text(row, 'utterance'),
    route: toRoute(text(row, 'route')),
    sql: textOrNull(row, 'sql'),
    success: row.success === 1,
    rowCount: integerOrNull(row, 'row_count'),
    errorKind: errorKind !== null && isQueryErrorKind(errorKind) ? errorKind : null,
    errorText: textOrNull(row, 'error_text'),
  };
}

// ── HistoryStore ─────────────────────────────────────────────────────

export class HistoryStore {
  private readonly db: SqlDatabase;
  private readonly path: string;

  private constructor(db: SqlDatabase, path: string) {
    this.db = db;
    this.path = path;
  }

  /** `path` may be ':memory:' */
  static async open(path: string): Promise<HistoryStore> {
    const SQL = await loadEngine();

    let data: Buffer | undefined;
    if (path !== MEMORY) {
      const dir = dirname(path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      if (existsSync(path)) {
        data = readFileSync(path);
      }
    }

    const store = new HistoryStore(new SQL.Database(data), path);
    store.migrate();
    return store;
  }

  /** Run all pending migrations */
  private migrate(): void {
    this.db.exec(MIGRATIONS[0]);

    const applied = this.all('SELECT version FROM migrations ORDER BY version', []);
    const appliedSet = new Set(applied.map((r) => r.version));

    let changed = false;
    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        this.db.run('INSERT INTO migrations (version) VALUES (?)', [i]);
        changed = true;
      }
    }
    if (changed) this.flush();
  }

  private all(sql: string, params: Array<string | number>): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.getAsObject());
      }
      return rows;
    } finally {
      stmt.free();
    }
  }

  private flush(): void {
    if (this.path === MEMORY) return;
    writeFileSync(this.path, this.db.export());
  }

  record(utterance: string, reply: AssistantReply, askedAt: Date = new Date()): HistoryEntry {
    const entry: HistoryEntry = {
      id: randomUUID(),
      askedAt: askedAt.toISOString(),
      utterance,
      route: reply.route,
      sql: reply.sql ?? null,
      success: reply.success,
      rowCount: reply.rowCount ?? null,
      errorKind: reply.error?.kind ?? null,
      errorText: reply.error?.message ?? null,
    };

    this.db.run(
      `INSERT INTO interactions (id, asked_at, utterance, route, sql, success, row_count, error_kind, error_text)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        entry.id,
        entry.askedAt,
        entry.utterance,
        entry.route,
        entry.sql,
        entry.success ? 1 : 0,
        entry.rowCount,
        entry.errorKind,
        entry.errorText,
      ],
    );
    this.flush();

    return entry;
  }

  /** Most recent first. */
  list(limit: number = 20): HistoryEntry[] {
    return this.all('SELECT * FROM interactions ORDER BY asked_at DESC, rowid DESC LIMIT ?', [limit]).map(toEntry);
  }

  get(id: string): HistoryEntry | undefined {
    const [row] = this.all('SELECT * FROM interactions WHERE id = ?', [id]);
    return row ? toEntry(row) : undefined;
  }

  /** Full id for an id or unambiguous id prefix. */
  resolveId(prefix: string): string | undefined {
    const rows = this.all("SELECT id FROM interactions WHERE id LIKE ? ESCAPE '\\' LIMIT 2", [
      `${prefix.replace(/[\\%_]/g, (c) => `\\${c}`)}%`,
    ]);
    return rows.length === 1 ? text(rows[0], 'id') : undefined;
  }

  close(): void {
    this.db.close();
  }
}
