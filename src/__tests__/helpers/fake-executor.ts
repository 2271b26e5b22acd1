import type { ExecuteOptions, ExecutionResult, QueueExecutor } from '../../services/engine/types.js';
import { computeNextRunAt } from '../../services/scheduler/next-run.js';
import type { MemoryQueueStore } from './memory-stores.js';

/**
 * Stands in for the engine: records calls and reschedules the queue the way
 * a completed run would.
 */
export class FakeExecutor implements QueueExecutor {
  readonly calls: Array<{ queueId: number; options: ExecuteOptions }> = [];
  readonly pauseRequests: number[] = [];
  readonly busy = new Set<number>();
  /** Runs inside execute before the queue is updated. */
  work: (signal: AbortSignal | undefined) => Promise<void> = async () => undefined;

  constructor(
    private readonly queues: MemoryQueueStore,
    private readonly clock: () => Date,
  ) {}

  async execute(queueId: number, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    this.calls.push({ queueId, options });
    this.busy.add(queueId);
    try {
      await this.work(options.signal);
      const queue = await this.queues.get(queueId);
      if (!queue) throw new Error('missing queue');
      const interrupted = options.signal?.aborted ?? false;
      const nextRunAt = interrupted ? queue.nextRunAt : computeNextRunAt(queue, this.clock());
      await this.queues.update(queueId, { status: 'pending', nextRunAt });
      return {
        queueId,
        status: interrupted ? 'interrupted' : 'completed',
        correlationId: 'abcd1234',
        historyId: 'rec-1',
        itemsSearched: 0,
        itemsFound: 0,
        itemsSkipped: 0,
        itemsFailed: 0,
        retryAttempts: 0,
        error: null,
        nextRunAt,
        durationMs: 0,
      };
    } finally {
      this.busy.delete(queueId);
    }
  }

  isRunning(queueId: number): boolean {
    return this.busy.has(queueId);
  }

  runningCount(): number {
    return this.busy.size;
  }

  requestPause(queueId: number): boolean {
    this.pauseRequests.push(queueId);
    return true;
  }

  cancelPauseRequest(): boolean {
    return true;
  }

  async reconcileInterrupted(): Promise<{ queues: number; records: number }> {
    return { queues: 0, records: 0 };
  }
}
