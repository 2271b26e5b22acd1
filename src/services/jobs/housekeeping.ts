import pino from 'pino';
import type { CooldownTracker } from '../cooldown/cooldown-tracker.js';
import type { HistoryRecorder } from '../history/recorder.js';
import type { JobRegistry } from './registry.js';

const log = pino({ name: 'housekeeping' });

export interface HousekeepingDeps {
  history: HistoryRecorder;
  cooldown: CooldownTracker;
  historyRetentionDays: number;
}

/**
 * Register maintenance jobs.
 *
 *   Job              | Schedule        | Purpose
 *   -----------------|-----------------|--------------------------------------
 *   history-cleanup  | Daily at 04:00  | Delete history older than retention
 *   cooldown-prune   | Every hour      | Evict expired cooldown entries
 */
export function registerHousekeepingJobs(jobs: JobRegistry, deps: HousekeepingDeps): void {
  jobs.register('history-cleanup', '0 4 * * *', async () => {
    const deleted = await deps.history.cleanup(deps.historyRetentionDays);
    log.info({ deleted, retentionDays: deps.historyRetentionDays }, 'History cleanup complete');
  });

  jobs.register('cooldown-prune', '0 * * * *', async () => {
    const removed = deps.cooldown.prune();
    log.info({ removed, ...deps.cooldown.getStats() }, 'Cooldown prune complete');
  });
}
