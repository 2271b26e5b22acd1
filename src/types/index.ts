import type { StrategyKind, StrategySpec } from '../services/strategy/schema.js';

export type InstanceKind = 'sonarr' | 'radarr';

/**
 * A configured Sonarr/Radarr endpoint. Owned by the instance registry;
 * the engine only reads it.
 */
export interface Instance {
  id: number;
  name: string;
  kind: InstanceKind;
  baseUrl: string;
  /** Reference resolved by the credential store, e.g. `env:SONARR_API_KEY`. */
  credentialRef: string;
  rateLimitPerSecond: number;
}

export type QueueStatus = 'pending' | 'in_progress' | 'completed' | 'failed' | 'paused';

export interface SearchQueue {
  id: number;
  name: string;
  instanceId: number;
  strategy: StrategySpec;
  isRecurring: boolean;
  intervalHours: number | null;
  status: QueueStatus;
  consecutiveFailures: number;
  nextRunAt: Date | null;
  lastRunAt: Date | null;
  isActive: boolean;
  lastError: string | null;
  itemsSearched: number;
  itemsFound: number;
}

export type HistoryOutcome = 'started' | 'completed' | 'partial' | 'failed' | 'interrupted';

export type ExecutionTrigger = 'scheduled' | 'manual';

export interface SearchHistoryRecord {
  id: string;
  queueId: number;
  instanceId: number;
  queueName: string;
  strategy: StrategyKind;
  trigger: ExecutionTrigger;
  correlationId: string;
  startedAt: Date;
  completedAt: Date | null;
  outcome: HistoryOutcome;
  itemsSearched: number;
  itemsFound: number;
  itemsSkipped: number;
  itemsFailed: number;
  retryAttempts: number;
  errorSummary: string | null;
}
