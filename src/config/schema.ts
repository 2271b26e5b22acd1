import { z } from 'zod';

export const envSchema = z.object({
  DATABASE_URL: z.string(),
  DB_POOL_MAX: z.coerce.number().int().min(1).max(100).default(10),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(7337),

  // Wire client
  API_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1_000).max(120_000).default(30_000),
  API_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(3),
  API_RETRY_BASE_MS: z.coerce.number().int().min(0).default(2_000),
  API_RETRY_MAX_MS: z.coerce.number().int().min(0).default(10_000),

  // Execution engine
  MAX_CONCURRENT_SEARCHES: z.coerce.number().int().min(1).max(20).default(5),
  SEARCH_BATCH_SIZE: z.coerce.number().int().min(1).max(100).default(50),
  FAILURE_THRESHOLD: z.coerce.number().int().min(1).default(5),
  HARD_STOP_THRESHOLD: z.coerce.number().int().min(1).default(3),
  RUN_BUDGET_MS: z.coerce.number().int().min(1_000).default(60 * 60 * 1000),

  // Cooldown
  COOLDOWN_HOURS: z.coerce.number().positive().default(24),
  COOLDOWN_MODE: z.enum(['flat', 'adaptive']).default('flat'),

  // Scheduler
  MISFIRE_GRACE_SECONDS: z.coerce.number().int().min(0).default(300),
  SCHEDULER_TICK_CRON: z.string().default('*/5 * * * * *'),
  SHUTDOWN_DRAIN_MS: z.coerce.number().int().min(0).default(30_000),

  // History
  HISTORY_RETENTION_DAYS: z.coerce.number().int().min(1).default(90),
});

export type AppConfig = z.infer<typeof envSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  return envSchema.parse(env);
}
