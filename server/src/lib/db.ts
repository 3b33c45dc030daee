import { Pool } from 'pg';
import { env } from '../config/env';

let pool: Pool | null = null;

export function getPool(): Pool {
  if (pool) return pool;
  if (!env.databaseUrl) throw new Error('DATABASE_URL is not set');
  pool = new Pool({
    connectionString: env.databaseUrl,
    ssl: env.databaseSsl ? { rejectUnauthorized: false } : undefined,
    connectionTimeoutMillis: 5000,
    statement_timeout: 10000,
  });
  pool.on('error', (err) => {
    console.error('[db] idle client error', err.message);
  });
  return pool;
}

/** Returns the pool once the database answers a round trip. */
export async function openPool(): Promise<Pool> {
  const p = getPool();
  try {
    await p.query('select 1');
  } catch (err) {
    console.error('[db] database is unreachable', err);
    throw err;
  }
  return p;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}
