import { Pool } from 'pg';
import { cfg } from '../config';
import { logger } from '../utils/logger';

const log = logger.child({ module: 'db' });

export function createPool(databaseUrl: string = cfg.DATABASE_URL): Pool {
  if (!databaseUrl) {
    throw new Error('[ERROR] DATABASE_URL missing.');
  }

  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: databaseUrl.includes('localhost') || databaseUrl.includes('127.0.0.1')
      ? false
      : { rejectUnauthorized: false },
    max: cfg.DB_MAX_CONNECTIONS,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('connect', () => log.debug('Connected to Postgres'));
  pool.on('error', (err: Error) => log.error({ err: err.message }, 'Database pool error'));

  return pool;
}
