import { Pool } from 'pg';
import { CONFIG } from '../config';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

export function getPool() {
  if (!pool) {
    pool = new Pool({ connectionString: CONFIG.PG_URL, max: 4 });
    pool.on('error', (err) => {
      logger.error('pg_pool_error', { event: 'pg_pool_error', error: err.message });
    });
  }
  return pool;
}

export async function closePool() {
  const current = pool;
  if (!current) return;
  pool = null;
  await current.end();
}
