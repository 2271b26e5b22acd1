import type pg from 'pg';
import pino from 'pino';
import { AppError, NotFoundError } from '../../utils/errors.js';
import { strategySpecSchema, STRATEGY_KINDS, type StrategyKind, type StrategySpec } from '../strategy/schema.js';
import type {
  ExecutionTrigger,
  HistoryOutcome,
  Instance,
  InstanceKind,
  QueueStatus,
  SearchHistoryRecord,
  SearchQueue,
} from '../../types/index.js';
import type {
  HistoryFilter,
  HistoryPatch,
  HistoryStore,
  InstanceRegistry,
  QueuePatch,
  QueueStore,
} from './types.js';

const log = pino({ name: 'stores' });

/** The slice of pg.Pool the stores use. */
export type Queryable = Pick<pg.Pool, 'query'>;

// --- Row shapes ---

type InstanceRow = {
  id: number;
  name: string;
  kind: InstanceKind;
  base_url: string;
  credential_ref: string;
  rate_limit_per_second: string | number;
};

type QueueRow = {
  id: number;
  name: string;
  instance_id: number;
  strategy: unknown;
  is_recurring: boolean;
  interval_hours: string | number | null;
  status: QueueStatus;
  consecutive_failures: number;
  next_run_at: Date | null;
  last_run_at: Date | null;
  is_active: boolean;
  last_error: string | null;
  items_searched: number;
  items_found: number;
};

type HistoryRow = {
  id: string;
  queue_id: number;
  instance_id: number;
  queue_name: string;
  strategy: string;
  trigger: ExecutionTrigger;
  correlation_id: string;
  started_at: Date;
  completed_at: Date | null;
  outcome: HistoryOutcome;
  items_searched: number;
  items_found: number;
  items_skipped: number;
  items_failed: number;
  retry_attempts: number;
  error_summary: string | null;
};

function toStrategyKind(value: string): StrategyKind {
  const kind = STRATEGY_KINDS.find((k) => k === value);
  if (!kind) throw new Error(`Unknown strategy kind in history: ${value}`);
  return kind;
}

function toInstance(row: InstanceRow): Instance {
  return {
    id: row.id,
    name: row.name,
    kind: row.kind,
    baseUrl: row.base_url,
    credentialRef: row.credential_ref,
    rateLimitPerSecond: Number(row.rate_limit_per_second),
  };
}

class InvalidQueueError extends AppError {
  constructor(
    queueId: number,
    readonly issues: string[],
  ) {
    super(`Queue ${queueId} has an invalid strategy: ${issues.join('; ')}`, {
      code: 'INVALID_QUEUE',
      statusCode: 422,
      context: { queueId, issues },
    });
  }
}

function parseStrategy(row: QueueRow): StrategySpec | InvalidQueueError {
  const parsed = strategySpecSchema.safeParse(row.strategy);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message));
  return new InvalidQueueError(row.id, issues);
}

function toQueue(row: QueueRow): SearchQueue {
  const strategy = parseStrategy(row);
  if (strategy instanceof InvalidQueueError) throw strategy;
  return toQueueWith(row, strategy);
}

/** Rows whose strategy does not validate are logged and left out. */
function toQueues(rows: QueueRow[]): SearchQueue[] {
  const queues: SearchQueue[] = [];
  for (const row of rows) {
    const strategy = parseStrategy(row);
    if (strategy instanceof InvalidQueueError) {
      log.error({ queueId: row.id, issues: strategy.issues }, 'Skipping queue with an invalid strategy');
      continue;
    }
    queues.push(toQueueWith(row, strategy));
  }
  return queues;
}

function toQueueWith(row: QueueRow, strategy: StrategySpec): SearchQueue {
  return {
    id: row.id,
    name: row.name,
    instanceId: row.instance_id,
    strategy,
    isRecurring: row.is_recurring,
    intervalHours: row.interval_hours === null ? null : Number(row.interval_hours),
    status: row.status,
    consecutiveFailures: row.consecutive_failures,
    nextRunAt: row.next_run_at,
    lastRunAt: row.last_run_at,
    isActive: row.is_active,
    lastError: row.last_error,
    itemsSearched: row.items_searched,
    itemsFound: row.items_found,
  };
}

function toHistory(row: HistoryRow): SearchHistoryRecord {
  return {
    id: row.id,
    queueId: row.queue_id,
    instanceId: row.instance_id,
    queueName: row.queue_name,
    strategy: toStrategyKind(row.strategy),
    trigger: row.trigger,
    correlationId: row.correlation_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    outcome: row.outcome,
    itemsSearched: row.items_searched,
    itemsFound: row.items_found,
    itemsSkipped: row.items_skipped,
    itemsFailed: row.items_failed,
    retryAttempts: row.retry_attempts,
    errorSummary: row.error_summary,
  };
}

/**
 * Build `SET col = $n, ...` from a camelCase patch. Keys missing from
 * `columns` are ignored.
 */
function buildSet(
  patch: Record<string, unknown>,
  columns: Record<string, string>,
  startIndex: number,
): { clause: string; values: unknown[] } {
  const parts: string[] = [];
  const values: unknown[] = [];
  for (const [key, value] of Object.entries(patch)) {
    const column = columns[key];
    if (!column || value === undefined) continue;
    values.push(value);
    parts.push(`${column} = $${startIndex + values.length - 1}`);
  }
  return { clause: parts.join(', '), values };
}

// --- Instances ---

export class PgInstanceRegistry implements InstanceRegistry {
  constructor(private readonly pool: Queryable) {}

  async get(id: number): Promise<Instance | null> {
    const { rows } = await this.pool.query<InstanceRow>(
      `SELECT id, name, kind, base_url, credential_ref, rate_limit_per_second
       FROM instances WHERE id = $1`,
      [id],
    );
    return rows[0] ? toInstance(rows[0]) : null;
  }
}

// --- Queues ---

const QUEUE_COLUMNS: Record<keyof QueuePatch, string> = {
  status: 'status',
  consecutiveFailures: 'consecutive_failures',
  nextRunAt: 'next_run_at',
  lastRunAt: 'last_run_at',
  isActive: 'is_active',
  lastError: 'last_error',
  itemsSearched: 'items_searched',
  itemsFound: 'items_found',
};

const QUEUE_SELECT = `SELECT id, name, instance_id, strategy, is_recurring, interval_hours, status,
  consecutive_failures, next_run_at, last_run_at, is_active, last_error, items_searched, items_found
  FROM search_queues`;

export class PgQueueStore implements QueueStore {
  constructor(private readonly pool: Queryable) {}

  async get(id: number): Promise<SearchQueue | null> {
    const { rows } = await this.pool.query<QueueRow>(`${QUEUE_SELECT} WHERE id = $1`, [id]);
    return rows[0] ? toQueue(rows[0]) : null;
  }

  async listActive(): Promise<SearchQueue[]> {
    const { rows } = await this.pool.query<QueueRow>(`${QUEUE_SELECT} WHERE is_active = TRUE ORDER BY id`);
    return toQueues(rows);
  }

  async listByStatus(status: QueueStatus): Promise<SearchQueue[]> {
    const { rows } = await this.pool.query<QueueRow>(`${QUEUE_SELECT} WHERE status = $1 ORDER BY id`, [status]);
    return toQueues(rows);
  }

  async update(id: number, patch: QueuePatch): Promise<SearchQueue> {
    const { clause, values } = buildSet(patch, QUEUE_COLUMNS, 2);
    if (!clause) {
      const current = await this.get(id);
      if (!current) throw new NotFoundError('Queue', id);
      return current;
    }

    const { rows } = await this.pool.query<QueueRow>(
      `UPDATE search_queues SET ${clause}, updated_at = NOW() WHERE id = $1
       RETURNING id, name, instance_id, strategy, is_recurring, interval_hours, status,
         consecutive_failures, next_run_at, last_run_at, is_active, last_error, items_searched, items_found`,
      [id, ...values],
    );
    if (!rows[0]) throw new NotFoundError('Queue', id);
    return toQueue(rows[0]);
  }
}

// --- History ---

const HISTORY_COLUMNS: Record<keyof HistoryPatch, string> = {
  completedAt: 'completed_at',
  outcome: 'outcome',
  itemsSearched: 'items_searched',
  itemsFound: 'items_found',
  itemsSkipped: 'items_skipped',
  itemsFailed: 'items_failed',
  retryAttempts: 'retry_attempts',
  errorSummary: 'error_summary',
};

const HISTORY_FIELDS = `id, queue_id, instance_id, queue_name, strategy, trigger, correlation_id, started_at,
  completed_at, outcome, items_searched, items_found, items_skipped, items_failed, retry_attempts, error_summary`;

export class PgHistoryStore implements HistoryStore {
  constructor(private readonly pool: Queryable) {}

  async insert(record: SearchHistoryRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO search_history (${HISTORY_FIELDS})
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16)`,
      [
        record.id,
        record.queueId,
        record.instanceId,
        record.queueName,
        record.strategy,
        record.trigger,
        record.correlationId,
        record.startedAt,
        record.completedAt,
        record.outcome,
        record.itemsSearched,
        record.itemsFound,
        record.itemsSkipped,
        record.itemsFailed,
        record.retryAttempts,
        record.errorSummary,
      ],
    );
  }

  async update(id: string, patch: HistoryPatch): Promise<SearchHistoryRecord> {
    const { clause, values } = buildSet(patch, HISTORY_COLUMNS, 2);
    if (!clause) {
      const current = await this.get(id);
      if (!current) throw new NotFoundError('History record', id);
      return current;
    }
    const { rows } = await this.pool.query<HistoryRow>(
      `UPDATE search_history SET ${clause} WHERE id = $1 RETURNING ${HISTORY_FIELDS}`,
      [id, ...values],
    );
    if (!rows[0]) throw new NotFoundError('History record', id);
    return toHistory(rows[0]);
  }

  async get(id: string): Promise<SearchHistoryRecord | null> {
    const { rows } = await this.pool.query<HistoryRow>(
      `SELECT ${HISTORY_FIELDS} FROM search_history WHERE id = $1`,
      [id],
    );
    return rows[0] ? toHistory(rows[0]) : null;
  }

  async findSince(since: Date, filter: HistoryFilter = {}): Promise<SearchHistoryRecord[]> {
    const { rows } = await this.pool.query<HistoryRow>(
      `SELECT ${HISTORY_FIELDS} FROM search_history
       WHERE started_at >= $1
         AND ($2::int IS NULL OR queue_id = $2)
         AND ($3::int IS NULL OR instance_id = $3)
       ORDER BY started_at ASC`,
      [since, filter.queueId ?? null, filter.instanceId ?? null],
    );
    return rows.map(toHistory);
  }

  async findByOutcome(outcome: HistoryOutcome): Promise<SearchHistoryRecord[]> {
    const { rows } = await this.pool.query<HistoryRow>(
      `SELECT ${HISTORY_FIELDS} FROM search_history WHERE outcome = $1 ORDER BY started_at ASC`,
      [outcome],
    );
    return rows.map(toHistory);
  }

  async findRecentFailures(limit: number): Promise<SearchHistoryRecord[]> {
    const { rows } = await this.pool.query<HistoryRow>(
      `SELECT ${HISTORY_FIELDS} FROM search_history
       WHERE outcome = 'failed'
       ORDER BY started_at DESC
       LIMIT $1`,
      [limit],
    );
    return rows.map(toHistory);
  }

  async deleteBefore(before: Date): Promise<number> {
    const result = await this.pool.query(
      `DELETE FROM search_history WHERE started_at < $1 AND outcome <> 'started'`,
      [before],
    );
    return result.rowCount || 0;
  }
}
