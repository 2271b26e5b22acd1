import Bottleneck from 'bottleneck';
import pino from 'pino';
import { AppError } from '../../utils/errors.js';
import type { Instance } from '../../types/index.js';

const log = pino({ name: 'rate-limiter' });

export class RateLimitTimeoutError extends AppError {
  public readonly reason: 'timeout' | 'cancelled';

  constructor(instanceId: number, reason: 'timeout' | 'cancelled', waitedMs: number) {
    super(
      reason === 'timeout'
        ? `Timed out after ${waitedMs}ms waiting for a request slot on instance ${instanceId}`
        : `Cancelled while waiting for a request slot on instance ${instanceId}`,
      { code: 'RATE_LIMIT_TIMEOUT', statusCode: 503, context: { instanceId, waitedMs } },
    );
    this.reason = reason;
  }
}

export interface AcquireOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface RateLimitState {
  instanceId: number;
  ratePerSecond: number;
  capacity: number;
  tokens: number | null;
  queued: number;
  dispatched: number;
  lastDispatchAt: Date | null;
}

/**
 * Token bucket for one instance, backed by a Bottleneck reservoir.
 *
 * Capacity equals the configured rate; one token is added back every
 * `1000 / rate` ms up to capacity, and dispatches are spaced by the same
 * interval. A caller that gives up (timeout or abort) still burns the slot it
 * was queued for, so abandoned waiters can only lower the dispatch rate.
 */
export class InstanceRateLimiter {
  readonly capacity: number;
  readonly intervalMs: number;
  private readonly limiter: Bottleneck;
  private lastDispatchAt: Date | null = null;
  private dispatched = 0;
  private stopped = false;

  constructor(
    readonly instanceId: number,
    readonly ratePerSecond: number,
  ) {
    if (!(ratePerSecond > 0)) {
      throw new RangeError(`Rate limit must be positive (instance ${instanceId}: ${ratePerSecond})`);
    }

    this.intervalMs = Math.ceil(1000 / ratePerSecond);
    this.capacity = Math.max(1, Math.floor(ratePerSecond));

    // heartbeatInterval is a local-datastore option missing from Bottleneck's typings;
    // the reservoir can grow at most once per heartbeat.
    const options: Bottleneck.ConstructorOptions & { heartbeatInterval: number } = {
      id: `instance-${instanceId}`,
      minTime: this.intervalMs,
      reservoir: this.capacity,
      reservoirIncreaseAmount: 1,
      reservoirIncreaseInterval: this.intervalMs,
      reservoirIncreaseMaximum: this.capacity,
      heartbeatInterval: Math.min(250, this.intervalMs),
    };
    this.limiter = new Bottleneck(options);

    this.limiter.on('error', (err) => {
      log.error({ err, instanceId }, 'Rate limiter error');
    });
  }

  /**
   * Wait for a token. Rejects with RateLimitTimeoutError when `timeoutMs`
   * elapses or `signal` aborts first.
   */
  acquire(options: AcquireOptions = {}): Promise<void> {
    const { signal, timeoutMs } = options;
    const startedAt = Date.now();

    if (signal?.aborted) {
      return Promise.reject(new RateLimitTimeoutError(this.instanceId, 'cancelled', 0));
    }

    let settled = false;
    const slot = this.limiter.schedule(async () => {
      if (settled) return false;
      settled = true;
      this.dispatched++;
      this.lastDispatchAt = new Date();
      return true;
    });

    return new Promise<void>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const giveUp = (reason: 'timeout' | 'cancelled') => {
        if (settled) return;
        settled = true;
        cleanup();
        log.debug({ instanceId: this.instanceId, reason }, 'Gave up waiting for token');
        reject(new RateLimitTimeoutError(this.instanceId, reason, Date.now() - startedAt));
      };

      const onAbort = () => giveUp('cancelled');

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => giveUp('timeout'), timeoutMs);
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      slot.then(
        (granted) => {
          cleanup();
          if (granted) resolve();
        },
        (err: unknown) => {
          cleanup();
          if (settled) return;
          settled = true;
          reject(err);
        },
      );
    });
  }

  async state(): Promise<RateLimitState> {
    const counts = this.limiter.counts();
    return {
      instanceId: this.instanceId,
      ratePerSecond: this.ratePerSecond,
      capacity: this.capacity,
      tokens: await this.limiter.currentReservoir(),
      queued: counts.QUEUED + counts.RECEIVED,
      dispatched: this.dispatched,
      lastDispatchAt: this.lastDispatchAt,
    };
  }

  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await this.limiter.stop({ dropWaitingJobs: true });
  }

  /** Stop taking new work but let queued waiters drain. */
  async retire(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await this.limiter.stop({ dropWaitingJobs: false });
  }
}

/**
 * One bucket per instance. A bucket is rebuilt when the instance's configured
 * rate changes; the previous bucket is retired and drains its own waiters.
 * Clients hold a gate from `gateFor`, never a bucket, so requests made after a
 * rebuild go to the new bucket.
 */
export class RateLimiterRegistry {
  private readonly limiters = new Map<number, InstanceRateLimiter>();

  forInstance(instance: Pick<Instance, 'id' | 'rateLimitPerSecond'>): InstanceRateLimiter {
    const existing = this.limiters.get(instance.id);
    if (existing && existing.ratePerSecond === instance.rateLimitPerSecond) {
      return existing;
    }

    if (existing) {
      log.info(
        { instanceId: instance.id, from: existing.ratePerSecond, to: instance.rateLimitPerSecond },
        'Instance rate limit changed, rebuilding bucket',
      );
      existing.retire().catch((err: unknown) => {
        log.warn({ err, instanceId: instance.id }, 'Failed to retire previous rate limiter');
      });
    }

    const limiter = new InstanceRateLimiter(instance.id, instance.rateLimitPerSecond);
    this.limiters.set(instance.id, limiter);
    return limiter;
  }

  /**
   * Request gate bound to the instance id. Each acquire draws from whichever
   * bucket is current at that moment.
   */
  gateFor(instance: Pick<Instance, 'id' | 'rateLimitPerSecond'>): Pick<InstanceRateLimiter, 'acquire'> {
    this.forInstance(instance);
    return {
      acquire: (options?: AcquireOptions) =>
        (this.limiters.get(instance.id) ?? this.forInstance(instance)).acquire(options),
    };
  }

  async states(): Promise<RateLimitState[]> {
    return Promise.all([...this.limiters.values()].map((l) => l.state()));
  }

  async stopAll(): Promise<void> {
    await Promise.all([...this.limiters.values()].map((l) => l.stop()));
    this.limiters.clear();
  }
}
