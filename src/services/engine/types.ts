import type { ExecutionTrigger } from '../../types/index.js';
import type { ArrApi, RetryInfo } from '../arr/client.js';
import type { Instance } from '../../types/index.js';

export type ExecutionStatus = 'completed' | 'partial' | 'failed' | 'interrupted' | 'skipped';

export interface ExecutionResult {
  queueId: number;
  status: ExecutionStatus;
  correlationId: string | null;
  historyId: string | null;
  itemsSearched: number;
  itemsFound: number;
  itemsSkipped: number;
  itemsFailed: number;
  retryAttempts: number;
  /** Redacted. */
  error: string | null;
  nextRunAt: Date | null;
  durationMs: number;
}

export interface ExecuteOptions {
  trigger?: ExecutionTrigger;
  /** Aborted on shutdown; the run is finalized as interrupted. */
  signal?: AbortSignal;
}

/**
 * What the scheduler needs from the engine.
 */
export interface QueueExecutor {
  execute(queueId: number, options?: ExecuteOptions): Promise<ExecutionResult>;
  isRunning(queueId: number): boolean;
  runningCount(): number;
  /** Ask a running execution to leave the queue paused when it finalizes. */
  requestPause(queueId: number): boolean;
  cancelPauseRequest(queueId: number): boolean;
  reconcileInterrupted(now?: Date): Promise<{ queues: number; records: number }>;
}

export interface ClientHooks {
  onRetry: (info: RetryInfo) => void;
}

export type ArrClientFactory = (instance: Instance, apiKey: string, hooks: ClientHooks) => ArrApi;

export interface EngineOptions {
  batchSize: number;
  failureThreshold: number;
  hardStopThreshold: number;
  runBudgetMs: number;
  maxConcurrent: number;
  clock?: () => Date;
}
