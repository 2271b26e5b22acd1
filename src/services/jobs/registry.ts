import cron from 'node-cron';
import pino from 'pino';
import { getErrorMessage } from '../../utils/errors.js';

const log = pino({ name: 'jobs' });

interface JobEntry {
  task: cron.ScheduledTask;
  fn: () => Promise<void>;
  isRunning: boolean;
  isPaused: boolean;
  lastRun: Date | null;
  lastError: string | null;
  runCount: number;
}

export interface JobStatus {
  isRunning: boolean;
  isPaused: boolean;
  lastRun: Date | null;
  lastError: string | null;
  runCount: number;
}

/**
 * Named cron jobs with overlap protection. Owned by the process entry point.
 */
export class JobRegistry {
  private readonly jobs = new Map<string, JobEntry>();

  /**
   * Register a background job.
   *
   * @param schedule - Cron expression (e.g. '0 4 * * *' for daily at 04:00)
   */
  register(name: string, schedule: string, fn: () => Promise<void>): boolean {
    if (this.jobs.has(name)) {
      log.warn({ job: name }, 'Job already registered, skipping');
      return false;
    }
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron expression for job '${name}': ${schedule}`);
    }

    const task = cron.schedule(schedule, () => {
      this.runNow(name).catch((err: unknown) => log.error({ err, job: name }, 'Job runner crashed'));
    });

    this.jobs.set(name, {
      task,
      fn,
      isRunning: false,
      isPaused: false,
      lastRun: null,
      lastError: null,
      runCount: 0,
    });

    log.info({ job: name, schedule }, 'Job registered');
    return true;
  }

  /**
   * Run a job immediately. Returns false when it is unknown or still running.
   */
  async runNow(name: string): Promise<boolean> {
    const job = this.jobs.get(name);
    if (!job) return false;

    // Overlap protection
    if (job.isRunning) {
      log.warn({ job: name }, 'Job still running, skipping this cycle');
      return false;
    }

    job.isRunning = true;
    const startTime = Date.now();

    try {
      await job.fn();
      job.lastRun = new Date();
      job.lastError = null;
      job.runCount++;
      log.info({ job: name, durationMs: Date.now() - startTime, runCount: job.runCount }, 'Job completed');
    } catch (err) {
      job.lastError = getErrorMessage(err);
      log.error({ job: name, err, durationMs: Date.now() - startTime }, 'Job failed');
    } finally {
      job.isRunning = false;
    }
    return true;
  }

  has(name: string): boolean {
    return this.jobs.has(name);
  }

  getStatuses(): Record<string, JobStatus> {
    const statuses: Record<string, JobStatus> = {};
    for (const [name, entry] of this.jobs) {
      statuses[name] = {
        isRunning: entry.isRunning,
        isPaused: entry.isPaused,
        lastRun: entry.lastRun,
        lastError: entry.lastError,
        runCount: entry.runCount,
      };
    }
    return statuses;
  }

  pause(name: string): boolean {
    const job = this.jobs.get(name);
    if (!job) return false;
    job.task.stop();
    job.isPaused = true;
    log.info({ job: name }, 'Job paused');
    return true;
  }

  resume(name: string): boolean {
    const job = this.jobs.get(name);
    if (!job) return false;
    job.task.start();
    job.isPaused = false;
    log.info({ job: name }, 'Job resumed');
    return true;
  }

  stopAll(): void {
    for (const [name, entry] of this.jobs) {
      entry.task.stop();
      log.info({ job: name }, 'Job stopped');
    }
  }
}
