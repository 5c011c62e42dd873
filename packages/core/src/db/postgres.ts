/**
 * PostgreSQL implementation of the database collaborator.
 * Uses the `pg` driver; the pool belongs to the caller.
 */

import type { Pool } from 'pg';
import type { Database, QueryLimits, QueryResult, SchemaCatalog } from './types.js';
import { catalogFromColumnRows, type ColumnRow } from './catalog.js';

const COLUMNS_SQL = `
  SELECT c.table_name, c.column_name
  FROM information_schema.columns c
  JOIN information_schema.tables t
    ON t.table_schema = c.table_schema AND t.table_name = c.table_name
  WHERE c.table_schema = $1
    AND t.table_type = 'BASE TABLE'
  ORDER BY c.table_name, c.ordinal_position
`;

export class PostgresDatabase implements Database {
  private readonly pool: Pool;
  private readonly schemaName: string;

  constructor(pool: Pool, schemaName: string = 'public') {
    this.pool = pool;
    this.schemaName = schemaName;
  }

  async introspect(): Promise<SchemaCatalog> {
    const res = await this.pool.query<ColumnRow>(COLUMNS_SQL, [this.schemaName]);
    return catalogFromColumnRows(res.rows);
  }

  /**
   * Execute one statement with safety guardrails:
   * - BEGIN READ ONLY, so a statement that slipped past validation still cannot write
   * - SET LOCAL statement_timeout
   * - rows capped to limits.maxRows
   */
  async query(sql: string, limits: QueryLimits): Promise<QueryResult> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN READ ONLY');
      await client.query(`SET LOCAL statement_timeout = ${Math.floor(limits.statementTimeoutMs)}`);

      const start = performance.now();
      const result = await client.query(sql);
      const execMs = Math.round(performance.now() - start);

      await client.query('COMMIT');

      const columns = result.fields?.map((f) => f.name) ?? [];
      const allRows: Record<string, unknown>[] = result.rows ?? [];
      const truncated = allRows.length > limits.maxRows;
      const rows = truncated ? allRows.slice(0, limits.maxRows) : allRows;

      return { columns, rows, rowCount: rows.length, truncated, execMs };
    } catch (err: unknown) {
      try {
        await client.query('ROLLBACK');
      } catch {
        // connection may already be closed
      }
      throw err;
    } finally {
      client.release();
    }
  }
}
