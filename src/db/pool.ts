import pg from 'pg';
import pino from 'pino';
import { config } from '../config/index.js';

const logger = pino({ name: 'db' });

// Queue updates and history writes share this pool with the HTTP handlers
export const pool = new pg.Pool({
  connectionString: config.DATABASE_URL,
  max: config.DB_POOL_MAX,
  application_name: 'backlog-searcher',
});

pool.on('error', (err) => {
  logger.error({ err, totalCount: pool.totalCount }, 'Idle database client failed');
});

/** Round trip used by the health check and boot. */
export async function pingDatabase(): Promise<void> {
  await pool.query('SELECT 1');
}
