/**
 * PostgreSQL connection pool.
 * Read-only workload: no transactions, every query bounded by statement_timeout.
 */

import pg from "pg";

// ─── Config ─────────────────────────────────────────────────────────────────

export interface PoolOptions {
  connectionString: string;
  /** Server-side cap for each statement, in milliseconds. */
  statementTimeoutMs: number;
}

const POOL_MAX = 20;
const IDLE_TIMEOUT_MS = 30_000;
const CONNECTION_TIMEOUT_MS = 5_000;

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Create the shared pool. Close it with `pool.end()` (or via Kysely's
 * `destroy()`) on shutdown.
 */
export function createPool(options: PoolOptions): pg.Pool {
  return new pg.Pool({
    connectionString: options.connectionString,
    max: POOL_MAX,
    idleTimeoutMillis: IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: CONNECTION_TIMEOUT_MS,
    statement_timeout: options.statementTimeoutMs,
  });
}
