export { SchedulerService } from './scheduler-service.js';
export type { ScheduledJob, SchedulerDeps, SchedulerOptions, SchedulerStatus } from './scheduler-service.js';
export { computeNextRunAt, missedIntervals } from './next-run.js';
export { DueIndex } from './due-index.js';
