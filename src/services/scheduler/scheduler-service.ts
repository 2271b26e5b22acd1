import { setTimeout as sleep } from 'node:timers/promises';
import cron from 'node-cron';
import pino from 'pino';
import { AppError, ConflictError, NotFoundError, err, getErrorMessage, ok, type Result } from '../../utils/errors.js';
import type { ExecutionResult, QueueExecutor } from '../engine/types.js';
import type { QueueStore } from '../stores/types.js';
import type { ExecutionTrigger, SearchQueue } from '../../types/index.js';
import { DueIndex } from './due-index.js';
import { missedIntervals } from './next-run.js';

const log = pino({ name: 'scheduler' });

export interface SchedulerOptions {
  /** node-cron expression for the due-job poll. */
  tickCron: string;
  misfireGraceSeconds: number;
  shutdownDrainMs: number;
  clock?: () => Date;
}

export interface SchedulerDeps {
  queues: QueueStore;
  executor: QueueExecutor;
}

export interface ScheduledJob {
  queueId: number;
  nextRunAt: Date;
  isRecurring: boolean;
  intervalHours: number | null;
}

export interface SchedulerStatus {
  running: boolean;
  activeJobs: number;
  runningExecutions: number;
  jobs: ScheduledJob[];
}

interface InFlight {
  controller: AbortController;
  promise: Promise<ExecutionResult | null>;
}

/**
 * Decides when queues run.
 *
 * Job records live in an arena keyed by queue id and indexed by due time; a
 * cron tick takes everything due and hands it to the executor. A queue whose
 * firings were missed (downtime, long runs) runs once when next polled, not
 * once per missed interval. After every execution the job is rebuilt from the
 * queue's persisted state, so the store stays the source of truth across
 * restarts.
 */
export class SchedulerService {
  private readonly jobs = new Map<number, ScheduledJob>();
  private readonly index = new DueIndex();
  private readonly inFlight = new Map<number, InFlight>();
  /** Paused through this service; a stale read never puts these back in the arena. */
  private readonly paused = new Set<number>();
  private readonly clock: () => Date;
  private task: cron.ScheduledTask | null = null;
  private started = false;
  private stopping = false;

  constructor(
    private readonly deps: SchedulerDeps,
    private readonly options: SchedulerOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Reconcile runs abandoned by a previous process, load every schedulable
   * queue and start polling. Calling it again only reloads.
   */
  async start(): Promise<void> {
    if (!this.started) {
      const repaired = await this.deps.executor.reconcileInterrupted(this.clock());
      if (repaired.queues > 0 || repaired.records > 0) {
        log.warn(repaired, 'Reconciled interrupted executions from previous run');
      }
    }

    await this.reload();

    if (!this.started) {
      this.stopping = false;
      this.task = cron.schedule(this.options.tickCron, () => {
        this.tick(this.clock());
      });
      this.started = true;
      log.info({ tickCron: this.options.tickCron, jobs: this.jobs.size }, 'Scheduler started');
    }
  }

  /** Rebuild the arena from the store. Idempotent. */
  async reload(): Promise<number> {
    const queues = await this.deps.queues.listActive();
    const seen = new Set<number>();
    for (const queue of queues) {
      seen.add(queue.id);
      this.sync(queue);
    }
    for (const queueId of [...this.jobs.keys()]) {
      if (!seen.has(queueId)) this.removeJob(queueId);
    }
    log.info({ loaded: this.jobs.size }, 'Scheduled queues loaded');
    return this.jobs.size;
  }

  /**
   * Dispatch every job due at `now`. Returns the queue ids started.
   */
  tick(now: Date): number[] {
    if (this.stopping) return [];

    const dispatched: number[] = [];
    for (const entry of this.index.takeDue(now.getTime())) {
      const job = this.jobs.get(entry.queueId);
      this.jobs.delete(entry.queueId);
      if (!job) continue;

      if (this.deps.executor.isRunning(job.queueId) || this.inFlight.has(job.queueId)) {
        log.warn({ queueId: job.queueId }, 'Queue still running at its next firing, skipping');
        continue;
      }

      const lateMs = now.getTime() - job.nextRunAt.getTime();
      if (lateMs > this.options.misfireGraceSeconds * 1000) {
        log.warn(
          {
            queueId: job.queueId,
            lateSeconds: Math.round(lateMs / 1000),
            missedRuns: missedIntervals(job, job.nextRunAt, now),
          },
          'Misfired queue, coalescing missed runs into one',
        );
      }

      this.launch(job.queueId, 'scheduled').catch((error: unknown) => {
        log.error({ err: error, queueId: job.queueId }, 'Scheduled execution failed');
      });
      dispatched.push(job.queueId);
    }
    return dispatched;
  }

  async scheduleQueue(queueId: number, reschedule = false): Promise<Result<ScheduledJob, AppError>> {
    const queue = await this.deps.queues.get(queueId);
    if (!queue) return err(new NotFoundError('Queue', queueId));
    if (!queue.isActive) return err(new ConflictError(`Queue ${queueId} is deactivated`, { queueId }));
    if (queue.status === 'paused') return err(new ConflictError(`Queue ${queueId} is paused`, { queueId }));

    const existing = this.jobs.get(queueId);
    if (existing && !reschedule) return ok(existing);

    let current = queue;
    if (queue.nextRunAt === null && queue.status !== 'completed') {
      current = await this.deps.queues.update(queueId, { nextRunAt: this.clock() });
    }

    const job = this.sync(current);
    if (!job) return err(new ConflictError(`Queue ${queueId} has nothing left to run`, { queueId, status: current.status }));
    log.info({ queueId, nextRunAt: job.nextRunAt, reschedule }, 'Queue scheduled');
    return ok(job);
  }

  async unscheduleQueue(queueId: number): Promise<Result<boolean, AppError>> {
    const queue = await this.deps.queues.get(queueId);
    if (!queue) return err(new NotFoundError('Queue', queueId));

    const removed = this.removeJob(queueId);
    await this.deps.queues.update(queueId, { nextRunAt: null });
    log.info({ queueId, removed }, 'Queue unscheduled');
    return ok(removed);
  }

  /**
   * Stop future firings. A running execution finishes normally and leaves
   * the queue paused. `nextRunAt` is kept.
   */
  async pauseQueue(queueId: number): Promise<Result<SearchQueue, AppError>> {
    const queue = await this.deps.queues.get(queueId);
    if (!queue) return err(new NotFoundError('Queue', queueId));

    this.paused.add(queueId);
    this.removeJob(queueId);

    if (this.deps.executor.isRunning(queueId)) {
      this.deps.executor.requestPause(queueId);
      return ok(queue);
    }
    if (queue.status === 'paused') return ok(queue);

    const updated = await this.deps.queues.update(queueId, { status: 'paused' });
    log.info({ queueId, nextRunAt: updated.nextRunAt }, 'Queue paused');
    return ok(updated);
  }

  async resumeQueue(queueId: number): Promise<Result<SearchQueue, AppError>> {
    const queue = await this.deps.queues.get(queueId);
    if (!queue) return err(new NotFoundError('Queue', queueId));

    this.paused.delete(queueId);
    if (this.deps.executor.isRunning(queueId)) {
      this.deps.executor.cancelPauseRequest(queueId);
      return ok(queue);
    }
    if (queue.status !== 'paused') {
      this.sync(queue);
      return ok(queue);
    }

    const updated = await this.deps.queues.update(queueId, {
      status: 'pending',
      nextRunAt: queue.nextRunAt ?? this.clock(),
    });
    this.sync(updated);
    log.info({ queueId, nextRunAt: updated.nextRunAt }, 'Queue resumed');
    return ok(updated);
  }

  /**
   * Bring a queue back after automatic deactivation. It runs on the next poll.
   */
  async reactivateQueue(queueId: number): Promise<Result<SearchQueue, AppError>> {
    const queue = await this.deps.queues.get(queueId);
    if (!queue) return err(new NotFoundError('Queue', queueId));
    if (queue.isActive) {
      this.sync(queue);
      return ok(queue);
    }

    this.paused.delete(queueId);
    const updated = await this.deps.queues.update(queueId, {
      isActive: true,
      consecutiveFailures: 0,
      status: 'pending',
      lastError: null,
      nextRunAt: this.clock(),
    });
    this.sync(updated);
    log.info({ queueId }, 'Queue reactivated');
    return ok(updated);
  }

  /**
   * Run a queue now, outside its schedule. Its next scheduled firing is
   * recomputed from this run.
   */
  async executeQueueNow(queueId: number): Promise<Result<ExecutionResult, AppError>> {
    if (this.stopping) return err(new AppError('Scheduler is shutting down', { code: 'SHUTTING_DOWN', statusCode: 503 }));
    if (this.deps.executor.isRunning(queueId) || this.inFlight.has(queueId)) {
      return err(new ConflictError(`Queue ${queueId} is already running`, { queueId }));
    }

    const queue = await this.deps.queues.get(queueId);
    if (!queue) return err(new NotFoundError('Queue', queueId));

    this.removeJob(queueId);
    const result = await this.launch(queueId, 'manual');
    return result
      ? ok(result)
      : err(new AppError(`Queue ${queueId} execution failed unexpectedly`, { code: 'EXECUTION_CRASHED' }));
  }

  getSchedulerStatus(): SchedulerStatus {
    return {
      running: this.started && !this.stopping,
      activeJobs: this.jobs.size,
      runningExecutions: this.deps.executor.runningCount(),
      jobs: this.index
        .toArray()
        .map((entry) => this.jobs.get(entry.queueId))
        .filter((job): job is ScheduledJob => job !== undefined),
    };
  }

  /** Resolves once no execution launched by the scheduler is in flight. */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.values()].map((f) => f.promise));
    }
  }

  /**
   * Stop polling, cancel running executions and wait up to
   * `shutdownDrainMs` for them to finalize. Executions still running after
   * that are left for startup reconciliation.
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    this.task?.stop();
    this.task = null;

    const running = [...this.inFlight.values()];
    for (const flight of running) flight.controller.abort();

    if (running.length > 0) {
      log.info({ running: running.length, drainMs: this.options.shutdownDrainMs }, 'Draining running executions');
      const drain = new AbortController();
      const drained = await Promise.race([
        Promise.allSettled(running.map((f) => f.promise)).then(() => true),
        sleep(this.options.shutdownDrainMs, false, { signal: drain.signal }).catch(() => false),
      ]);
      drain.abort();
      if (!drained) {
        log.warn({ abandoned: this.inFlight.size }, 'Shutdown drain timed out, abandoning executions');
      }
    }

    for (const job of this.jobs.values()) {
      await this.deps.queues.update(job.queueId, { nextRunAt: job.nextRunAt });
    }

    this.jobs.clear();
    this.index.clear();
    this.started = false;
    log.info('Scheduler stopped');
  }

  /**
   * Mirror a queue's persisted state into the arena. Returns the job, or
   * null when the queue is not schedulable.
   */
  private sync(queue: SearchQueue): ScheduledJob | null {
    const schedulable =
      queue.isActive &&
      queue.status !== 'paused' &&
      queue.status !== 'in_progress' &&
      !this.paused.has(queue.id) &&
      queue.nextRunAt !== null;
    if (!schedulable || !queue.nextRunAt) {
      this.removeJob(queue.id);
      return null;
    }

    const job: ScheduledJob = {
      queueId: queue.id,
      nextRunAt: queue.nextRunAt,
      isRecurring: queue.isRecurring,
      intervalHours: queue.intervalHours,
    };
    this.jobs.set(queue.id, job);
    this.index.set(queue.id, queue.nextRunAt.getTime());
    return job;
  }

  private removeJob(queueId: number): boolean {
    this.index.delete(queueId);
    return this.jobs.delete(queueId);
  }

  private launch(queueId: number, trigger: ExecutionTrigger): Promise<ExecutionResult | null> {
    const controller = new AbortController();
    const promise = this.runAndResync(queueId, trigger, controller.signal);
    this.inFlight.set(queueId, { controller, promise });
    return promise;
  }

  private async runAndResync(
    queueId: number,
    trigger: ExecutionTrigger,
    signal: AbortSignal,
  ): Promise<ExecutionResult | null> {
    let result: ExecutionResult | null = null;
    try {
      result = await this.deps.executor.execute(queueId, { trigger, signal });
    } catch (error) {
      log.error({ err: error, queueId, trigger }, 'Queue execution crashed');
    }

    try {
      if (!this.stopping) {
        const queue = await this.deps.queues.get(queueId);
        if (queue) this.sync(queue);
      }
    } catch (error) {
      log.error({ queueId, error: getErrorMessage(error) }, 'Could not reschedule queue after execution');
    } finally {
      this.inFlight.delete(queueId);
    }
    return result;
  }
}
