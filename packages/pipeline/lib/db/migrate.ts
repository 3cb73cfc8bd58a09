import fs from 'fs';
import path from 'path';
import type { Pool } from 'pg';
import { StoreError } from '../errors';
import { Logger, createLogger } from '../logger';

export const SCHEMA_PATH = path.join(__dirname, 'schema.sql');

/**
 * Apply schema.sql. Every statement in it is idempotent, so this runs on each start.
 */
export async function ensureSchema(pool: Pool, logger: Logger = createLogger()): Promise<void> {
  const sql = fs.readFileSync(SCHEMA_PATH, 'utf-8');
  try {
    await pool.query(sql);
  } catch (error) {
    throw new StoreError('ensureSchema', error);
  }
  logger.debug('database', 'Schema is up to date', { metadata: { schema_path: SCHEMA_PATH } });
}
