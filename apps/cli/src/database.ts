import pg from 'pg';
import { PostgresDatabase, requireDatabaseUrl, type AssistantConfig, type Logger } from '@erp-assistant/core';

const { Pool } = pg;

/** Small pool for one CLI command. Idle-client errors are logged, not thrown. */
export function createPool(connectionString: string, logger: Logger): pg.Pool {
  const pool = new Pool({ connectionString, max: 2 });
  pool.on('error', (err) => logger.warn('Idle database connection failed', { error: err.message }));
  return pool;
}

export async function withDatabase<T>(
  config: AssistantConfig,
  logger: Logger,
  fn: (db: PostgresDatabase) => Promise<T>,
): Promise<T> {
  const pool = createPool(requireDatabaseUrl(config), logger);
  try {
    return await fn(new PostgresDatabase(pool));
  } finally {
    await pool.end();
  }
}
