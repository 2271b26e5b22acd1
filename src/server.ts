import type { Server } from 'node:http';
import pino from 'pino';
import { config } from './config/index.js';
import { pingDatabase, pool } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { CooldownTracker } from './services/cooldown/cooldown-tracker.js';
import { createArrClientFactory, QueueExecutionEngine } from './services/engine/index.js';
import { HistoryRecorder } from './services/history/recorder.js';
import { registerHousekeepingJobs } from './services/jobs/housekeeping.js';
import { JobRegistry } from './services/jobs/registry.js';
import { RateLimiterRegistry } from './services/rate-limit/token-bucket.js';
import { SchedulerService } from './services/scheduler/index.js';
import { SecretRefCredentialStore } from './services/stores/credentials.js';
import { PgHistoryStore, PgInstanceRegistry, PgQueueStore } from './services/stores/pg-stores.js';

const logger = pino({ name: 'server' });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${String(reason)}`);
  process.exit(1);
});

async function boot(): Promise<void> {
  // Step 1: Config already validated by Zod at import time
  logger.info('Configuration validated');

  // Step 2: Test database connection
  logger.info('Connecting to database...');
  await pingDatabase();
  logger.info('Database connected');

  // Step 3: Run migrations
  await runMigrations();

  // Step 4: Wire services
  const queues = new PgQueueStore(pool);
  const history = new HistoryRecorder(new PgHistoryStore(pool));
  const cooldown = new CooldownTracker({
    ttlMs: config.COOLDOWN_HOURS * 60 * 60 * 1000,
    mode: config.COOLDOWN_MODE,
  });
  const limiters = new RateLimiterRegistry();

  const engine = new QueueExecutionEngine(
    {
      queues,
      instances: new PgInstanceRegistry(pool),
      credentials: new SecretRefCredentialStore(),
      history,
      cooldown,
      clientFactory: createArrClientFactory(limiters, {
        timeoutMs: config.API_REQUEST_TIMEOUT_MS,
        maxRetries: config.API_MAX_RETRIES,
        retryBaseMs: config.API_RETRY_BASE_MS,
        retryMaxMs: config.API_RETRY_MAX_MS,
      }),
    },
    {
      batchSize: config.SEARCH_BATCH_SIZE,
      failureThreshold: config.FAILURE_THRESHOLD,
      hardStopThreshold: config.HARD_STOP_THRESHOLD,
      runBudgetMs: config.RUN_BUDGET_MS,
      maxConcurrent: config.MAX_CONCURRENT_SEARCHES,
    },
  );

  const scheduler = new SchedulerService(
    { queues, executor: engine },
    {
      tickCron: config.SCHEDULER_TICK_CRON,
      misfireGraceSeconds: config.MISFIRE_GRACE_SECONDS,
      shutdownDrainMs: config.SHUTDOWN_DRAIN_MS,
    },
  );

  const jobs = new JobRegistry();
  registerHousekeepingJobs(jobs, { history, cooldown, historyRetentionDays: config.HISTORY_RETENTION_DAYS });

  // Step 5: Start scheduler (reconciles interrupted runs, loads queues)
  await scheduler.start();

  // Step 6: Start Express
  const app = createApp({ scheduler, history, jobs, limiters, cooldown, checkDatabase: pingDatabase });
  const server: Server = app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    server.close();
    jobs.stopAll();
    await scheduler.stop();
    await limiters.stopAll();
    await pool.end();
    logger.info('Shutdown complete');
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });
  }
}

boot().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
