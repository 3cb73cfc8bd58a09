import { Pool } from 'pg';
import { createLogger } from '../logger';

/**
 * Lightweight singleton wrapper around the pg `Pool`.
 * One pool per process; the CLI closes it before exiting.
 */

let sharedPool: Pool | null = null;

export function getSharedPool(connectionString: string): Pool {
  if (sharedPool) return sharedPool;

  if (!connectionString) {
    throw new Error('Missing PostgreSQL connection string');
  }

  const pool = new Pool({
    connectionString,
    connectionTimeoutMillis: 10_000,
    idleTimeoutMillis: 30_000,
  });

  // An idle client losing its connection must not crash the process
  const logger = createLogger();
  pool.on('error', (error) => {
    logger.error('database', 'Idle PostgreSQL client error', { error: error.message });
  });

  sharedPool = pool;
  return pool;
}

export async function closeSharedPool(): Promise<void> {
  if (!sharedPool) return;
  const pool = sharedPool;
  sharedPool = null;
  await pool.end();
}
