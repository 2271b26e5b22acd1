import Bottleneck from 'bottleneck';
import pino, { type Logger } from 'pino';
import { AppError, NotFoundError, getErrorMessage } from '../../utils/errors.js';
import {
  AuthenticationError,
  ExecutionCancelledError,
  ValidationError,
  redactSecret,
} from '../arr/errors.js';
import { cooldownKey, type CooldownTracker } from '../cooldown/cooldown-tracker.js';
import { ZERO_COUNTERS, type FinalOutcome, type HistoryRecorder, type RunCounters } from '../history/recorder.js';
import { createExecutionContext } from '../logger/correlation.js';
import { computeNextRunAt } from '../scheduler/next-run.js';
import type { CredentialStore, InstanceRegistry, QueuePatch, QueueStore } from '../stores/types.js';
import { createStrategy, iterateCandidates } from '../strategy/strategies.js';
import type { ExecutionTrigger, SearchQueue } from '../../types/index.js';
import type {
  ArrClientFactory,
  EngineOptions,
  ExecuteOptions,
  ExecutionResult,
  ExecutionStatus,
  QueueExecutor,
} from './types.js';

const log = pino({ name: 'engine' });

const MAX_ERROR_SUMMARY = 500;

export class HardStopError extends AppError {
  constructor(consecutive: number, lastError: string) {
    super(`Stopped after ${consecutive} consecutive rejected searches: ${lastError}`, {
      code: 'HARD_STOP',
      context: { consecutive },
    });
  }
}

export interface EngineDeps {
  queues: QueueStore;
  instances: InstanceRegistry;
  credentials: CredentialStore;
  history: HistoryRecorder;
  cooldown: CooldownTracker;
  clientFactory: ArrClientFactory;
}

interface RunOutcome {
  outcome: FinalOutcome;
  error: string | null;
}

/**
 * Runs one queue end to end: strategy pages, cooldown filter, rate-limited
 * search commands, history and queue state.
 *
 * At most one execution per queue id is in flight; a second request while
 * one is queued or running returns `skipped`. Across queues, at most
 * `maxConcurrent` executions run at once.
 */
export class QueueExecutionEngine implements QueueExecutor {
  private readonly running = new Set<number>();
  private readonly pauseRequested = new Set<number>();
  private readonly slots: Bottleneck;
  private readonly clock: () => Date;

  constructor(
    private readonly deps: EngineDeps,
    private readonly options: EngineOptions,
  ) {
    this.slots = new Bottleneck({ maxConcurrent: options.maxConcurrent });
    this.clock = options.clock ?? (() => new Date());
  }

  isRunning(queueId: number): boolean {
    return this.running.has(queueId);
  }

  runningCount(): number {
    return this.running.size;
  }

  requestPause(queueId: number): boolean {
    if (!this.running.has(queueId)) return false;
    this.pauseRequested.add(queueId);
    log.info({ queueId }, 'Pause requested for running queue; applies when the run finalizes');
    return true;
  }

  cancelPauseRequest(queueId: number): boolean {
    return this.pauseRequested.delete(queueId);
  }

  async execute(queueId: number, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    if (this.running.has(queueId)) {
      log.warn({ queueId }, 'Queue already executing, skipping');
      return this.skipped(queueId, 'Queue is already executing');
    }

    this.running.add(queueId);
    try {
      return await this.slots.schedule(() => this.run(queueId, options.trigger ?? 'scheduled', options.signal));
    } finally {
      this.running.delete(queueId);
      this.pauseRequested.delete(queueId);
    }
  }

  /**
   * Repair state left by a process that stopped mid-run: queues stuck
   * `in_progress` go back to `pending` with their `nextRunAt` intact and open
   * history records become `interrupted`.
   */
  async reconcileInterrupted(now: Date = this.clock()): Promise<{ queues: number; records: number }> {
    const stuck = await this.deps.queues.listByStatus('in_progress');
    for (const queue of stuck) {
      if (this.running.has(queue.id)) continue;
      await this.deps.queues.update(queue.id, { status: 'pending' });
    }
    const records = await this.deps.history.reconcileStarted(now);
    if (stuck.length > 0) {
      log.warn({ queues: stuck.map((q) => q.id) }, 'Reset queues left in progress');
    }
    return { queues: stuck.length, records };
  }

  private async run(
    queueId: number,
    trigger: ExecutionTrigger,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionResult> {
    const queue = await this.deps.queues.get(queueId);
    if (!queue) throw new NotFoundError('Queue', queueId);

    if (!queue.isActive) {
      return this.skipped(queueId, 'Queue is deactivated');
    }
    if (queue.status === 'paused' && trigger === 'scheduled') {
      return this.skipped(queueId, 'Queue is paused');
    }
    if (signal?.aborted) {
      return this.skipped(queueId, 'Cancelled before start');
    }

    const startedAt = this.clock();
    const ctx = createExecutionContext(queue.id, queue.instanceId, trigger);
    const runLog = log.child({ correlationId: ctx.correlationId, queueId: queue.id, instanceId: queue.instanceId });
    const counters: RunCounters = { ...ZERO_COUNTERS };

    await this.deps.queues.update(queue.id, { status: 'in_progress' });
    try {
      const record = await this.deps.history.start({ queue, trigger, correlationId: ctx.correlationId, startedAt });
      runLog.info({ strategy: queue.strategy.kind, trigger }, 'Queue execution started');

      const result = await this.searchBacklog(queue, counters, startedAt, signal, runLog);
      const completedAt = this.clock();

      await this.deps.history.finalize(record.id, {
        outcome: result.outcome,
        counters,
        errorSummary: result.error,
        completedAt,
      });
      const updated = await this.deps.queues.update(
        queue.id,
        this.finalPatch(queue, result, counters, startedAt, completedAt),
      );

      const durationMs = completedAt.getTime() - startedAt.getTime();
      const logFields = { outcome: result.outcome, ...counters, durationMs, nextRunAt: updated.nextRunAt };
      if (result.outcome === 'failed') {
        runLog.error({ ...logFields, error: result.error, consecutiveFailures: updated.consecutiveFailures }, 'Queue execution failed');
        if (!updated.isActive) {
          runLog.error({ consecutiveFailures: updated.consecutiveFailures }, 'Queue deactivated after repeated failures');
        }
      } else {
        runLog.info(logFields, 'Queue execution finished');
      }

      return {
        queueId: queue.id,
        status: result.outcome,
        correlationId: ctx.correlationId,
        historyId: record.id,
        ...counters,
        error: result.error,
        nextRunAt: updated.nextRunAt,
        durationMs,
      };
    } catch (error) {
      await this.releaseAfterCrash(queue, counters, startedAt, error, runLog);
      throw error;
    }
  }

  /**
   * A history or queue write failed mid-run. The run counts as failed so the
   * queue leaves `in_progress` and the failure threshold still applies.
   */
  private async releaseAfterCrash(
    queue: SearchQueue,
    counters: RunCounters,
    startedAt: Date,
    error: unknown,
    runLog: Logger,
  ): Promise<void> {
    const message = redactSecret(getErrorMessage(error), undefined, MAX_ERROR_SUMMARY);
    runLog.error({ err: error }, 'Queue execution crashed');
    try {
      const patch = this.finalPatch(queue, { outcome: 'failed', error: message }, counters, startedAt, this.clock());
      await this.deps.queues.update(queue.id, patch);
    } catch (updateError) {
      runLog.error({ err: updateError }, 'Could not release crashed queue, leaving it for startup reconciliation');
    }
  }

  /**
   * Walk the strategy's candidates and trigger searches. Never throws:
   * every failure becomes an outcome.
   */
  private async searchBacklog(
    queue: SearchQueue,
    counters: RunCounters,
    startedAt: Date,
    signal: AbortSignal | undefined,
    runLog: Logger,
  ): Promise<RunOutcome> {
    const { batchSize, hardStopThreshold, runBudgetMs } = this.options;
    let apiKey: string | undefined;
    let truncated = false;

    try {
      const instance = await this.deps.instances.get(queue.instanceId);
      if (!instance) throw new NotFoundError('Instance', queue.instanceId);
      apiKey = await this.deps.credentials.resolve(instance.credentialRef);

      const client = this.deps.clientFactory(instance, apiKey, {
        onRetry: () => {
          counters.retryAttempts++;
        },
      });
      const strategy = createStrategy(queue.strategy, { client, pageSize: batchSize, now: startedAt, signal });

      batches: for await (const batch of iterateCandidates(strategy)) {
        let consecutiveRejected = 0;

        for (const item of batch) {
          if (signal?.aborted) throw new ExecutionCancelledError();
          const now = this.clock();
          if (now.getTime() - startedAt.getTime() >= runBudgetMs) {
            truncated = true;
            runLog.warn({ runBudgetMs, ...counters }, 'Run budget exhausted, stopping early');
            break batches;
          }

          const key = cooldownKey(instance.id, item.itemType, item.id);
          if (this.deps.cooldown.isSuppressed(key, now)) {
            counters.itemsSkipped++;
            continue;
          }

          counters.itemsSearched++;
          try {
            await client.triggerSearch([item.id], { signal });
            this.deps.cooldown.markSearched(key, this.clock(), item.date);
            counters.itemsFound++;
            consecutiveRejected = 0;
          } catch (error) {
            if (!(error instanceof AuthenticationError || error instanceof ValidationError)) {
              throw error;
            }
            counters.itemsFailed++;
            consecutiveRejected++;
            runLog.warn({ itemId: item.id, kind: error.kind, consecutiveRejected }, 'Search rejected for item');
            if (consecutiveRejected >= hardStopThreshold) {
              throw new HardStopError(consecutiveRejected, error.message);
            }
          }
        }
      }

      return { outcome: counters.itemsFailed > 0 || truncated ? 'partial' : 'completed', error: null };
    } catch (error) {
      if (error instanceof ExecutionCancelledError || signal?.aborted) {
        return { outcome: 'interrupted', error: 'Cancelled by shutdown' };
      }
      return { outcome: 'failed', error: redactSecret(getErrorMessage(error), apiKey, MAX_ERROR_SUMMARY) };
    }
  }

  private finalPatch(
    queue: SearchQueue,
    result: RunOutcome,
    counters: RunCounters,
    startedAt: Date,
    completedAt: Date,
  ): QueuePatch {
    const pause = this.pauseRequested.has(queue.id) || queue.status === 'paused';

    if (result.outcome === 'interrupted') {
      // Not a failure: nextRunAt is kept so the run is picked up after restart
      return { status: pause ? 'paused' : 'pending' };
    }

    const totals = {
      lastRunAt: startedAt,
      itemsSearched: queue.itemsSearched + counters.itemsSearched,
      itemsFound: queue.itemsFound + counters.itemsFound,
    };

    if (result.outcome === 'failed') {
      const consecutiveFailures = queue.consecutiveFailures + 1;
      const isActive = consecutiveFailures < this.options.failureThreshold;
      return {
        ...totals,
        consecutiveFailures,
        isActive,
        lastError: result.error,
        status: pause && isActive ? 'paused' : 'failed',
        nextRunAt: isActive ? computeNextRunAt(queue, completedAt) : null,
      };
    }

    const nextRunAt = computeNextRunAt(queue, completedAt);
    let status: QueuePatch['status'] = queue.isRecurring ? 'pending' : 'completed';
    if (pause && queue.isRecurring) status = 'paused';

    return {
      ...totals,
      consecutiveFailures: 0,
      lastError: null,
      status,
      nextRunAt,
    };
  }

  private skipped(queueId: number, reason: string): ExecutionResult {
    const status: ExecutionStatus = 'skipped';
    return {
      queueId,
      status,
      correlationId: null,
      historyId: null,
      ...ZERO_COUNTERS,
      error: reason,
      nextRunAt: null,
      durationMs: 0,
    };
  }
}
