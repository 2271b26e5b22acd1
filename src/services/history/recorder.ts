import { randomUUID } from 'node:crypto';
import pino from 'pino';
import { ConflictError, NotFoundError } from '../../utils/errors.js';
import type { StrategyKind } from '../strategy/schema.js';
import type { HistoryFilter, HistoryStore } from '../stores/types.js';
import type {
  ExecutionTrigger,
  HistoryOutcome,
  SearchHistoryRecord,
  SearchQueue,
} from '../../types/index.js';

const log = pino({ name: 'history' });

const DAY_MS = 24 * 60 * 60 * 1000;

export type FinalOutcome = Exclude<HistoryOutcome, 'started'>;

export interface RunCounters {
  itemsSearched: number;
  itemsFound: number;
  itemsSkipped: number;
  itemsFailed: number;
  retryAttempts: number;
}

export interface StartRunInput {
  queue: Pick<SearchQueue, 'id' | 'name' | 'instanceId' | 'strategy'>;
  trigger: ExecutionTrigger;
  correlationId: string;
  startedAt?: Date;
}

export interface FinalizeRunInput {
  outcome: FinalOutcome;
  counters: RunCounters;
  errorSummary?: string | null;
  completedAt?: Date;
}

export interface DailyStat {
  /** UTC calendar day, YYYY-MM-DD. */
  date: string;
  runs: number;
  successful: number;
  failed: number;
  itemsFound: number;
}

export interface HistoryStatistics {
  periodDays: number;
  totalRuns: number;
  successfulRuns: number;
  failedRuns: number;
  interruptedRuns: number;
  /** Percentage of decided runs (completed, partial, failed) that succeeded. */
  successRate: number;
  totalItemsSearched: number;
  totalItemsFound: number;
  averageDurationSeconds: number | null;
  runsByStrategy: Record<StrategyKind, number>;
  daily: DailyStat[];
}

export interface QueuePerformance {
  queueId: number;
  periodDays: number;
  totalRuns: number;
  successRate: number;
  averageItemsFound: number;
  averageDurationSeconds: number | null;
  lastSuccessAt: Date | null;
  lastFailureAt: Date | null;
}

export const ZERO_COUNTERS: RunCounters = {
  itemsSearched: 0,
  itemsFound: 0,
  itemsSkipped: 0,
  itemsFailed: 0,
  retryAttempts: 0,
};

/** Partial runs count as successes. */
export function isSuccessful(outcome: HistoryOutcome): boolean {
  return outcome === 'completed' || outcome === 'partial';
}

function isDecided(outcome: HistoryOutcome): boolean {
  return isSuccessful(outcome) || outcome === 'failed';
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 1000) / 10;
}

function averageDurationSeconds(records: SearchHistoryRecord[]): number | null {
  const durations: number[] = [];
  for (const r of records) {
    if (r.completedAt) durations.push((r.completedAt.getTime() - r.startedAt.getTime()) / 1000);
  }
  if (durations.length === 0) return null;
  const total = durations.reduce((sum, d) => sum + d, 0);
  return Math.round((total / durations.length) * 100) / 100;
}

function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Append-only run history. A record is written when a run starts and
 * finalized exactly once; everything else is read-side aggregation.
 */
export class HistoryRecorder {
  constructor(private readonly store: HistoryStore) {}

  async start(input: StartRunInput): Promise<SearchHistoryRecord> {
    const record: SearchHistoryRecord = {
      id: randomUUID(),
      queueId: input.queue.id,
      instanceId: input.queue.instanceId,
      queueName: input.queue.name,
      strategy: input.queue.strategy.kind,
      trigger: input.trigger,
      correlationId: input.correlationId,
      startedAt: input.startedAt ?? new Date(),
      completedAt: null,
      outcome: 'started',
      ...ZERO_COUNTERS,
      errorSummary: null,
    };
    await this.store.insert(record);
    return record;
  }

  async finalize(id: string, input: FinalizeRunInput): Promise<SearchHistoryRecord> {
    const existing = await this.store.get(id);
    if (!existing) throw new NotFoundError('History record', id);
    if (existing.outcome !== 'started') {
      throw new ConflictError(`History record ${id} is already finalized`, { outcome: existing.outcome });
    }

    return this.store.update(id, {
      outcome: input.outcome,
      completedAt: input.completedAt ?? new Date(),
      errorSummary: input.errorSummary ?? null,
      ...input.counters,
    });
  }

  /**
   * Close out records left `started` by a process that died mid-run.
   */
  async reconcileStarted(now: Date = new Date()): Promise<number> {
    const open = await this.store.findByOutcome('started');
    for (const record of open) {
      await this.store.update(record.id, {
        outcome: 'interrupted',
        completedAt: now,
        errorSummary: 'Run did not finish before the previous shutdown',
      });
    }
    if (open.length > 0) {
      log.warn({ count: open.length }, 'Marked abandoned runs as interrupted');
    }
    return open.length;
  }

  async getStatistics(
    options: { days?: number; now?: Date } & HistoryFilter = {},
  ): Promise<HistoryStatistics> {
    const days = options.days ?? 7;
    const now = options.now ?? new Date();
    const since = new Date(startOfUtcDay(now).getTime() - (days - 1) * DAY_MS);

    const records = await this.store.findSince(since, {
      queueId: options.queueId,
      instanceId: options.instanceId,
    });

    const decided = records.filter((r) => isDecided(r.outcome));
    const successful = decided.filter((r) => isSuccessful(r.outcome));

    const runsByStrategy: Record<StrategyKind, number> = { missing: 0, cutoff_unmet: 0, recent: 0, custom: 0 };
    for (const record of records) {
      runsByStrategy[record.strategy] += 1;
    }

    const daily = new Map<string, DailyStat>();
    for (let i = 0; i < days; i++) {
      const date = utcDay(new Date(since.getTime() + i * DAY_MS));
      daily.set(date, { date, runs: 0, successful: 0, failed: 0, itemsFound: 0 });
    }
    for (const record of records) {
      const bucket = daily.get(utcDay(record.startedAt));
      if (!bucket) continue;
      bucket.runs += 1;
      bucket.itemsFound += record.itemsFound;
      if (isSuccessful(record.outcome)) bucket.successful += 1;
      if (record.outcome === 'failed') bucket.failed += 1;
    }

    return {
      periodDays: days,
      totalRuns: records.length,
      successfulRuns: successful.length,
      failedRuns: decided.length - successful.length,
      interruptedRuns: records.filter((r) => r.outcome === 'interrupted').length,
      successRate: percent(successful.length, decided.length),
      totalItemsSearched: records.reduce((sum, r) => sum + r.itemsSearched, 0),
      totalItemsFound: records.reduce((sum, r) => sum + r.itemsFound, 0),
      averageDurationSeconds: averageDurationSeconds(records),
      runsByStrategy,
      daily: [...daily.values()],
    };
  }

  async getQueuePerformance(queueId: number, days = 30, now: Date = new Date()): Promise<QueuePerformance> {
    const since = new Date(now.getTime() - days * DAY_MS);
    const records = await this.store.findSince(since, { queueId });

    const decided = records.filter((r) => isDecided(r.outcome));
    const successful = decided.filter((r) => isSuccessful(r.outcome));
    const failed = decided.filter((r) => r.outcome === 'failed');

    return {
      queueId,
      periodDays: days,
      totalRuns: records.length,
      successRate: percent(successful.length, decided.length),
      averageItemsFound:
        records.length === 0
          ? 0
          : Math.round((records.reduce((sum, r) => sum + r.itemsFound, 0) / records.length) * 100) / 100,
      averageDurationSeconds: averageDurationSeconds(records),
      lastSuccessAt: successful.at(-1)?.startedAt ?? null,
      lastFailureAt: failed.at(-1)?.startedAt ?? null,
    };
  }

  getRecentFailures(limit = 10): Promise<SearchHistoryRecord[]> {
    return this.store.findRecentFailures(limit);
  }

  async cleanup(retentionDays: number, now: Date = new Date()): Promise<number> {
    const before = new Date(now.getTime() - retentionDays * DAY_MS);
    const deleted = await this.store.deleteBefore(before);
    log.info({ deleted, retentionDays }, 'Cleaned up old search history');
    return deleted;
  }
}
