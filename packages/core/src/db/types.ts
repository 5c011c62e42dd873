/**
 * Database collaborator types.
 * The assistant needs exactly two things from the ERP database: a live
 * listing of tables/columns and a way to run one read-only statement.
 */

export interface CatalogTable {
  name: string;
  columns: string[];
}

/** Ordered (table, columns) pairs, rebuilt from the live database on demand. */
export interface SchemaCatalog {
  tables: CatalogTable[];
  capturedAt: Date;
}

export type ResultRow = Record<string, unknown>;

export interface QueryLimits {
  /** Rows beyond this are dropped and `truncated` is set */
  maxRows: number;
  statementTimeoutMs: number;
}

export interface QueryResult {
  columns: string[];
  rows: ResultRow[];
  /** Number of rows returned (after the cap) */
  rowCount: number;
  truncated: boolean;
  execMs: number;
}

export interface Database {
  /** Snapshot the current tables and columns. Rejects when the database is unreachable. */
  introspect(): Promise<SchemaCatalog>;

  /** Execute a validated read-only statement. Rejects with the driver's error. */
  query(sql: string, limits: QueryLimits): Promise<QueryResult>;
}
