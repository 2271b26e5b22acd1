import { setTimeout as sleep } from 'node:timers/promises';
import pino from 'pino';
import type { z } from 'zod';
import type { Instance } from '../../types/index.js';
import { RateLimitTimeoutError, type AcquireOptions } from '../rate-limit/token-bucket.js';
import {
  ArrApiError,
  ExecutionCancelledError,
  RateLimitExceededError,
  TransientNetworkError,
  ValidationError,
  classifyResponse,
  redactSecret,
} from './errors.js';
import { profileFor, type ArrProfile } from './profiles.js';
import {
  commandSchema,
  qualityProfileSchema,
  systemStatusSchema,
  wantedPageSchema,
  type CommandHandle,
  type CommandState,
  type CommandStatus,
  type HealthResult,
  type Page,
  type PageCursor,
  type QualityProfile,
  type RequestOptions,
  type SortOrder,
  type SystemStatus,
} from './types.js';

const logger = pino({
  name: 'arr-client',
  redact: ['apiKey', 'headers["X-Api-Key"]', 'headers["x-api-key"]'],
});

export const MAX_PAGE_SIZE = 100;

/** Anything that hands out request slots; InstanceRateLimiter in production. */
export interface RequestGate {
  acquire(options?: AcquireOptions): Promise<void>;
}

export interface RetryInfo {
  /** 1-based number of the retry about to happen. */
  attempt: number;
  delayMs: number;
  error: ArrApiError;
}

export interface ArrClientOptions {
  instance: Pick<Instance, 'id' | 'name' | 'kind' | 'baseUrl'>;
  apiKey: string;
  gate: RequestGate;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  retryMaxMs?: number;
  /** Upper bound on waiting for a rate-limit slot; unbounded when omitted. */
  acquireTimeoutMs?: number;
  onRetry?: (info: RetryInfo) => void;
}

/**
 * Operations the engine needs from an instance.
 */
export interface ArrApi {
  readonly profile: ArrProfile;
  testConnection(options?: RequestOptions): Promise<HealthResult>;
  listMissing(cursor: PageCursor, sort?: SortOrder, options?: RequestOptions): Promise<Page>;
  listCutoffUnmet(cursor: PageCursor, sort?: SortOrder, options?: RequestOptions): Promise<Page>;
  triggerSearch(itemIds: number[], options?: RequestOptions): Promise<CommandHandle>;
  commandStatus(handle: Pick<CommandHandle, 'commandId'>, options?: RequestOptions): Promise<CommandStatus>;
  getSystemStatus(options?: RequestOptions): Promise<SystemStatus>;
  getQualityProfiles(options?: RequestOptions): Promise<QualityProfile[]>;
}

/**
 * Delay before retry number `attempt` (0-based): base, 2x base, 4x base, ...
 * capped at `maxMs`. A server-supplied Retry-After wins when present.
 */
export function computeBackoff(attempt: number, error: ArrApiError, baseMs: number, maxMs: number): number {
  if (error instanceof RateLimitExceededError && error.retryAfterMs !== null) {
    return error.retryAfterMs;
  }
  return Math.min(baseMs * Math.pow(2, attempt), maxMs);
}

interface CallOptions<T> {
  method: 'GET' | 'POST';
  path: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  query?: Record<string, string | number>;
  body?: Record<string, unknown>;
  signal?: AbortSignal;
  maxRetries?: number;
}

const COMMAND_STATES: readonly CommandState[] = ['queued', 'started', 'completed', 'failed', 'aborted', 'cancelled'];

function toCommandState(status: string): CommandState {
  const normalized = status.toLowerCase();
  return COMMAND_STATES.find((s) => s === normalized) ?? 'unknown';
}

/**
 * HTTP client for one Sonarr or Radarr instance.
 *
 * Every attempt, retries included, first takes a slot from the instance's
 * rate limiter. Transient and rate-limited failures are retried with
 * exponential backoff; authentication and validation failures are not.
 */
export class ArrClient implements ArrApi {
  readonly profile: ArrProfile;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly retryMaxMs: number;

  constructor(private readonly options: ArrClientOptions) {
    this.profile = profileFor(options.instance.kind);
    this.baseUrl = options.instance.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBaseMs = options.retryBaseMs ?? 2_000;
    this.retryMaxMs = options.retryMaxMs ?? 10_000;
  }

  async testConnection(options: RequestOptions = {}): Promise<HealthResult> {
    const startedAt = Date.now();
    try {
      const status = await this.call({
        method: 'GET',
        path: '/api/v3/system/status',
        schema: systemStatusSchema,
        signal: options.signal,
        maxRetries: 0,
      });
      return { ok: true, latencyMs: Date.now() - startedAt, version: status.version, error: null };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return {
        ok: false,
        latencyMs: Date.now() - startedAt,
        version: null,
        error: redactSecret(message, this.options.apiKey),
      };
    }
  }

  listMissing(cursor: PageCursor, sort?: SortOrder, options: RequestOptions = {}): Promise<Page> {
    return this.listWanted('missing', cursor, sort ?? this.profile.missingSort, options);
  }

  listCutoffUnmet(cursor: PageCursor, sort?: SortOrder, options: RequestOptions = {}): Promise<Page> {
    return this.listWanted('cutoff', cursor, sort ?? this.profile.cutoffSort, options);
  }

  async triggerSearch(itemIds: number[], options: RequestOptions = {}): Promise<CommandHandle> {
    if (itemIds.length === 0) {
      throw new ValidationError('Cannot trigger a search without item ids', { instanceId: this.options.instance.id });
    }

    const command = await this.call({
      method: 'POST',
      path: '/api/v3/command',
      schema: commandSchema,
      body: { name: this.profile.searchCommand, [this.profile.idsField]: itemIds },
      signal: options.signal,
    });

    logger.debug(
      { instanceId: this.options.instance.id, commandId: command.id, items: itemIds.length },
      'Search command accepted',
    );
    return { commandId: command.id, name: command.name, itemIds };
  }

  async commandStatus(handle: Pick<CommandHandle, 'commandId'>, options: RequestOptions = {}): Promise<CommandStatus> {
    const command = await this.call({
      method: 'GET',
      path: `/api/v3/command/${handle.commandId}`,
      schema: commandSchema,
      signal: options.signal,
    });
    const endedAt = command.ended ? new Date(command.ended) : null;
    return {
      commandId: command.id,
      name: command.name,
      state: toCommandState(command.status),
      message: command.message ?? null,
      endedAt: endedAt && !Number.isNaN(endedAt.getTime()) ? endedAt : null,
    };
  }

  getSystemStatus(options: RequestOptions = {}): Promise<SystemStatus> {
    return this.call({ method: 'GET', path: '/api/v3/system/status', schema: systemStatusSchema, signal: options.signal });
  }

  getQualityProfiles(options: RequestOptions = {}): Promise<QualityProfile[]> {
    return this.call({
      method: 'GET',
      path: '/api/v3/qualityprofile',
      schema: qualityProfileSchema.array(),
      signal: options.signal,
    });
  }

  private async listWanted(
    source: 'missing' | 'cutoff',
    cursor: PageCursor,
    sort: SortOrder,
    options: RequestOptions,
  ): Promise<Page> {
    const pageSize = Math.min(Math.max(1, cursor.pageSize), MAX_PAGE_SIZE);
    const page = Math.max(1, cursor.page);

    const result = await this.call({
      method: 'GET',
      path: `/api/v3/wanted/${source}`,
      schema: wantedPageSchema,
      query: { page, pageSize, sortKey: sort.key, sortDirection: sort.direction },
      signal: options.signal,
    });

    return {
      items: result.records.map((record) => this.profile.toItem(record)),
      page: result.page,
      pageSize: result.pageSize,
      totalRecords: result.totalRecords,
      hasMore: result.records.length > 0 && result.page * result.pageSize < result.totalRecords,
    };
  }

  private async call<T>(call: CallOptions<T>): Promise<T> {
    const maxRetries = call.maxRetries ?? this.maxRetries;

    for (let attempt = 0; ; attempt++) {
      await this.acquireSlot(call.signal);

      let failure: ArrApiError;
      try {
        return await this.attempt(call);
      } catch (error) {
        if (!(error instanceof ArrApiError) || !error.retryable || attempt >= maxRetries) {
          throw error;
        }
        failure = error;
      }

      const delayMs = computeBackoff(attempt, failure, this.retryBaseMs, this.retryMaxMs);
      this.options.onRetry?.({ attempt: attempt + 1, delayMs, error: failure });
      logger.warn(
        { instanceId: this.options.instance.id, path: call.path, kind: failure.kind, attempt: attempt + 1, delayMs },
        'Retryable error, backing off',
      );

      try {
        await sleep(delayMs, undefined, { signal: call.signal });
      } catch (error) {
        throw new ExecutionCancelledError(`Cancelled during retry backoff: ${redactSecret(String(error), this.options.apiKey)}`);
      }
    }
  }

  private async acquireSlot(signal: AbortSignal | undefined): Promise<void> {
    if (signal?.aborted) throw new ExecutionCancelledError();
    try {
      await this.options.gate.acquire({ signal, timeoutMs: this.options.acquireTimeoutMs });
    } catch (error) {
      if (error instanceof RateLimitTimeoutError && error.reason === 'cancelled') {
        throw new ExecutionCancelledError('Cancelled while waiting for a rate-limit slot');
      }
      throw error;
    }
  }

  private async attempt<T>(call: CallOptions<T>): Promise<T> {
    const url = new URL(`${this.baseUrl}${call.path}`);
    for (const [key, value] of Object.entries(call.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = call.signal ? AbortSignal.any([call.signal, timeout]) : timeout;
    const context = { instanceId: this.options.instance.id, method: call.method, path: call.path };

    let res: Response;
    try {
      res = await fetch(url, {
        method: call.method,
        headers: {
          'X-Api-Key': this.options.apiKey,
          Accept: 'application/json',
          ...(call.body ? { 'Content-Type': 'application/json' } : {}),
        },
        body: call.body ? JSON.stringify(call.body) : undefined,
        redirect: 'manual',
        signal,
      });
    } catch (error) {
      if (call.signal?.aborted) {
        throw new ExecutionCancelledError();
      }
      if (timeout.aborted) {
        throw new TransientNetworkError(`Request timed out after ${this.timeoutMs}ms`, context, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientNetworkError(`Network error: ${redactSecret(message, this.options.apiKey)}`, context, error);
    }

    const text = await res.text().catch(() => '');

    if (!res.ok) {
      throw classifyResponse(res.status, redactSecret(text, this.options.apiKey), res.headers.get('retry-after'), context);
    }

    let json: unknown;
    try {
      json = text ? JSON.parse(text) : null;
    } catch {
      throw new ValidationError('Response body is not valid JSON', { ...context, status: res.status });
    }

    const parsed = call.schema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        ...context,
        status: res.status,
      });
    }
    return parsed.data;
  }
}
