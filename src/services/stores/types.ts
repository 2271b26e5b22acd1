import type {
  HistoryOutcome,
  Instance,
  SearchHistoryRecord,
  SearchQueue,
} from '../../types/index.js';

export type QueuePatch = Partial<
  Pick<
    SearchQueue,
    | 'status'
    | 'consecutiveFailures'
    | 'nextRunAt'
    | 'lastRunAt'
    | 'isActive'
    | 'lastError'
    | 'itemsSearched'
    | 'itemsFound'
  >
>;

export interface QueueStore {
  get(id: number): Promise<SearchQueue | null>;
  /** Active queues, any status. */
  listActive(): Promise<SearchQueue[]>;
  listByStatus(status: SearchQueue['status']): Promise<SearchQueue[]>;
  update(id: number, patch: QueuePatch): Promise<SearchQueue>;
}

export type HistoryPatch = Partial<
  Pick<
    SearchHistoryRecord,
    | 'completedAt'
    | 'outcome'
    | 'itemsSearched'
    | 'itemsFound'
    | 'itemsSkipped'
    | 'itemsFailed'
    | 'retryAttempts'
    | 'errorSummary'
  >
>;

export interface HistoryFilter {
  queueId?: number;
  instanceId?: number;
}

export interface HistoryStore {
  insert(record: SearchHistoryRecord): Promise<void>;
  update(id: string, patch: HistoryPatch): Promise<SearchHistoryRecord>;
  get(id: string): Promise<SearchHistoryRecord | null>;
  /** Records started at or after `since`, oldest first. */
  findSince(since: Date, filter?: HistoryFilter): Promise<SearchHistoryRecord[]>;
  findByOutcome(outcome: HistoryOutcome): Promise<SearchHistoryRecord[]>;
  /** Most recent failed records first. */
  findRecentFailures(limit: number): Promise<SearchHistoryRecord[]>;
  /** Delete finalized records started before `before`. Returns the count removed. */
  deleteBefore(before: Date): Promise<number>;
}

export interface InstanceRegistry {
  get(id: number): Promise<Instance | null>;
}

export interface CredentialStore {
  /** Resolve a credential reference to the secret. Rejects when it cannot be resolved. */
  resolve(ref: string): Promise<string>;
}
