/**
 * Query execution stage.
 */

import type { Database, QueryLimits, QueryResult } from '../db/types.js';
import { errorMessage, fail, ok, type Result } from '../errors.js';

/** Runs an already validated statement. Never retried. */
export async function executeReadOnly(db: Database, sql: string, limits: QueryLimits): Promise<Result<QueryResult>> {
  try {
    return ok(await db.query(sql, limits));
  } catch (err: unknown) {
    return fail('execution_failed', `Error executing SQL: ${errorMessage(err)}`, sql);
  }
}
