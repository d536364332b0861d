import pg from 'pg';
import type { Pool } from 'pg';
import type { DatabaseConfig } from '../../types/config.js';

/**
 * Builds a pool with connection guardrails. A statement timeout of 0 leaves
 * the server default in place.
 */
export function createPgPool(config: DatabaseConfig): Pool {
  const options = config.statementTimeoutMs > 0 ? `-c statement_timeout=${config.statementTimeoutMs}` : undefined;

  return new pg.Pool({
    connectionString: config.url,
    max: config.poolMax,
    connectionTimeoutMillis: config.connectionTimeoutMs,
    idleTimeoutMillis: config.idleTimeoutMs,
    options,
  });
}
