import { runner } from 'node-pg-migrate';
import path from 'node:path';
import pino from 'pino';
import { config } from '../config/index.js';

const logger = pino({ name: 'migrate' });

/**
 * Apply pending SQL migrations from ./migrations (instances, search_queues,
 * search_history).
 */
export async function runMigrations(direction: 'up' | 'down' = 'up'): Promise<void> {
  logger.info({ direction }, 'Running database migrations...');

  const applied = await runner({
    databaseUrl: config.DATABASE_URL,
    dir: path.resolve('migrations'),
    direction,
    count: direction === 'down' ? 1 : Infinity,
    migrationsTable: 'pgmigrations',
    log: (msg: string) => logger.info(msg),
  });

  logger.info({ applied: applied.map((m) => m.name) }, 'Migrations completed successfully');
}

// Allow running as standalone script: npm run migrate [-- down]
if (process.argv[1]?.endsWith('migrate.ts')) {
  runMigrations(process.argv.includes('down') ? 'down' : 'up')
    .then(() => process.exit(0))
    .catch((err) => {
      logger.error({ err }, 'Migration failed');
      process.exit(1);
    });
}
