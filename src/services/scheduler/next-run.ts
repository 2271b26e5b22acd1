import type { SearchQueue } from '../../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Next firing time for a queue after a run that ended at `from`.
 * One-off queues have none. For recurring queues the result is never
 * earlier than the queue's current `nextRunAt`.
 */
export function computeNextRunAt(
  queue: Pick<SearchQueue, 'isRecurring' | 'intervalHours' | 'nextRunAt'>,
  from: Date,
): Date | null {
  if (!queue.isRecurring || queue.intervalHours === null || queue.intervalHours <= 0) {
    return null;
  }
  const next = from.getTime() + queue.intervalHours * HOUR_MS;
  const previous = queue.nextRunAt?.getTime() ?? 0;
  return new Date(Math.max(next, previous));
}

/**
 * Whole intervals that elapsed between `due` and `now`. Used to report how
 * many firings a late run stands in for.
 */
export function missedIntervals(
  queue: Pick<SearchQueue, 'isRecurring' | 'intervalHours'>,
  due: Date,
  now: Date,
): number {
  if (!queue.isRecurring || !queue.intervalHours) return 0;
  const late = now.getTime() - due.getTime();
  if (late <= 0) return 0;
  return Math.floor(late / (queue.intervalHours * HOUR_MS));
}
