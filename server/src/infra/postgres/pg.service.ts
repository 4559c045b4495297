import pg from 'pg';
import type { AppConfig } from '../../config/env.js';
import type { Logger } from '../../lib/logger/structured-logger.js';

/**
 * Connection pool for the durable store. Idle-client errors are logged; the
 * pool replaces the broken client on the next checkout.
 */
export function createPgPool(database: AppConfig['database'], logger: Logger): pg.Pool {
  const pool = new pg.Pool({
    connectionString: database.url,
    min: database.poolMin,
    max: database.poolMax,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 5_000
  });

  pool.on('error', (err: Error) => {
    logger.error({ event: 'pg_pool_error', error: err.message }, '[Postgres] Idle client error');
  });

  return pool;
}
