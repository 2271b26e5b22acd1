import { describe, it, expect, vi, afterEach } from 'vitest';

// Suppress pino log noise in tests
vi.mock('pino', () => ({
  default: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
  }),
}));

import { CooldownTracker, cooldownKey } from '../../services/cooldown/cooldown-tracker.js';
import { QueueExecutionEngine, createArrClientFactory, type EngineOptions } from '../../services/engine/index.js';
import { HistoryRecorder } from '../../services/history/recorder.js';
import { RateLimiterRegistry } from '../../services/rate-limit/token-bucket.js';
import type { SearchQueue } from '../../types/index.js';
import {
  MemoryHistoryStore,
  MemoryInstanceRegistry,
  MemoryQueueStore,
  StaticCredentialStore,
  makeHistoryRecord,
  makeInstance,
  makeQueue,
} from '../helpers/memory-stores.js';
import {
  episodeRecord,
  jsonResponse,
  sonarrBacklog,
  stubFetch,
  textResponse,
  wantedPage,
  type FetchHandler,
} from '../helpers/fake-arr.js';

const API_KEY = 'test-secret';

function episodes(count: number) {
  return Array.from({ length: count }, (_, i) => episodeRecord(i + 1, '2026-03-01T20:00:00Z'));
}

interface Setup {
  queue?: Partial<SearchQueue>;
  queues?: Partial<SearchQueue>[];
  rateLimitPerSecond?: number;
  options?: Partial<EngineOptions>;
  credentials?: Record<string, string>;
}

let limiters: RateLimiterRegistry | null = null;

function setup(handler: FetchHandler, config: Setup = {}) {
  const requests = stubFetch(handler);
  const queues = new MemoryQueueStore((config.queues ?? [config.queue]).map((q) => makeQueue(q)));
  const historyStore = new MemoryHistoryStore();
  const cooldown = new CooldownTracker();
  limiters = new RateLimiterRegistry();

  const engine = new QueueExecutionEngine(
    {
      queues,
      instances: new MemoryInstanceRegistry([makeInstance({ rateLimitPerSecond: config.rateLimitPerSecond ?? 1000 })]),
      credentials: new StaticCredentialStore(config.credentials ?? { 'env:SONARR_KEY': API_KEY }),
      history: new HistoryRecorder(historyStore),
      cooldown,
      clientFactory: createArrClientFactory(limiters, {
        timeoutMs: 5_000,
        maxRetries: 3,
        retryBaseMs: 1,
        retryMaxMs: 5,
      }),
    },
    {
      batchSize: 50,
      failureThreshold: 5,
      hardStopThreshold: 3,
      runBudgetMs: 60_000,
      maxConcurrent: 5,
      ...config.options,
    },
  );

  return { engine, queues, historyStore, cooldown, requests };
}

function commands(requests: ReturnType<typeof stubFetch>) {
  return requests.filter((r) => r.method === 'POST' && r.url.pathname === '/api/v3/command');
}

afterEach(async () => {
  vi.unstubAllGlobals();
  await limiters?.stopAll();
  limiters = null;
});

describe('QueueExecutionEngine', () => {
  it('searches every missing item within the instance rate limit', async () => {
    const { engine, queues, historyStore, requests } = setup(sonarrBacklog(episodes(10)), { rateLimitPerSecond: 5 });

    const startedAt = Date.now();
    const result = await engine.execute(1);
    const elapsed = Date.now() - startedAt;

    expect(result.status).toBe('completed');
    expect(result.itemsSearched).toBe(10);
    expect(result.itemsFound).toBe(10);
    expect(commands(requests)).toHaveLength(10);
    // 11 requests spaced 200ms apart
    expect(requests).toHaveLength(11);
    expect(elapsed).toBeGreaterThanOrEqual(2000);

    const queue = await queues.get(1);
    expect(queue?.status).toBe('pending');
    expect(queue?.itemsSearched).toBe(10);
    expect(queue?.lastRunAt).not.toBeNull();
    expect(queue?.nextRunAt).toEqual(result.nextRunAt);

    const [record] = historyStore.all();
    expect(record.outcome).toBe('completed');
    expect(record.itemsFound).toBe(10);
    expect(record.correlationId).toBe(result.correlationId);
  }, 10_000);

  it('fails the run without retrying when credentials are rejected', async () => {
    const { engine, queues, historyStore, requests } = setup(() => textResponse('Unauthorized', 401));

    const result = await engine.execute(1);

    expect(result.status).toBe('failed');
    expect(result.error).toBe('Instance rejected credentials (HTTP 401)');
    expect(result.retryAttempts).toBe(0);
    expect(requests).toHaveLength(1);

    const queue = await queues.get(1);
    expect(queue?.status).toBe('failed');
    expect(queue?.consecutiveFailures).toBe(1);
    expect(queue?.isActive).toBe(true);
    expect(queue?.lastError).toBe('Instance rejected credentials (HTTP 401)');
    expect(queue?.nextRunAt).not.toBeNull();
    expect(historyStore.all()[0].outcome).toBe('failed');
  });

  it('retries a transient failure and counts the retries', async () => {
    let commandCalls = 0;
    const backlog = sonarrBacklog(episodes(1));
    const { engine, historyStore } = setup((request) => {
      if (request.method === 'POST') {
        commandCalls++;
        if (commandCalls <= 3) return textResponse('Service Unavailable', 503);
      }
      return backlog(request);
    });

    const result = await engine.execute(1);

    expect(result.status).toBe('completed');
    expect(result.retryAttempts).toBe(3);
    expect(result.itemsFound).toBe(1);
    expect(commandCalls).toBe(4);
    expect(historyStore.all()[0].retryAttempts).toBe(3);
  });

  it('leaves the queue paused when a pause is requested mid-run', async () => {
    const backlog = sonarrBacklog(episodes(3));
    let engineRef: QueueExecutionEngine | null = null;
    const { engine, queues } = setup((request) => {
      if (request.method === 'POST') engineRef?.requestPause(1);
      return backlog(request);
    });
    engineRef = engine;

    const result = await engine.execute(1);

    expect(result.status).toBe('completed');
    expect(result.itemsSearched).toBe(3);
    const queue = await queues.get(1);
    expect(queue?.status).toBe('paused');
    expect(queue?.nextRunAt).not.toBeNull();
  });

  it('keeps searching when the instance rate changes mid-run', async () => {
    const backlog = sonarrBacklog(episodes(3));
    let changed = false;
    const { engine, queues } = setup((request) => {
      if (request.method === 'POST' && !changed) {
        changed = true;
        limiters?.forInstance({ id: 1, rateLimitPerSecond: 500 });
      }
      return backlog(request);
    });

    const result = await engine.execute(1);

    expect(result.status).toBe('completed');
    expect(result.itemsFound).toBe(3);
    expect((await queues.get(1))?.consecutiveFailures).toBe(0);
    const states = (await limiters?.states()) ?? [];
    expect(states.map((s) => s.ratePerSecond)).toEqual([500]);
    expect(states[0].dispatched).toBe(2);
  });

  it('skips a scheduled run of a paused queue but runs a manual one', async () => {
    const { engine, queues, requests } = setup(sonarrBacklog(episodes(1)), { queue: { status: 'paused' } });

    const scheduled = await engine.execute(1);
    expect(scheduled.status).toBe('skipped');
    expect(scheduled.error).toBe('Queue is paused');
    expect(requests).toHaveLength(0);

    const manual = await engine.execute(1, { trigger: 'manual' });
    expect(manual.status).toBe('completed');
    expect((await queues.get(1))?.status).toBe('paused');
  });

  it('fails the run and releases the queue when a history write breaks', async () => {
    const { engine, queues, historyStore } = setup(sonarrBacklog(episodes(1)));
    vi.spyOn(historyStore, 'update').mockRejectedValue(new Error('db down'));

    await expect(engine.execute(1)).rejects.toThrow('db down');

    const queue = await queues.get(1);
    expect(queue?.status).toBe('failed');
    expect(queue?.consecutiveFailures).toBe(1);
    expect(queue?.lastError).toBe('db down');
    expect(queue?.nextRunAt).not.toBeNull();
    expect(engine.isRunning(1)).toBe(false);
  });

  it('runs no more queues at once than the concurrency cap', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const backlog = sonarrBacklog([]);
    const { engine, queues, requests, historyStore } = setup(
      async (request) => {
        await gate;
        return backlog(request);
      },
      { queues: [{ id: 1 }, { id: 2, name: 'second queue' }], options: { maxConcurrent: 1 } },
    );

    const first = engine.execute(1);
    const second = engine.execute(2);
    await vi.waitFor(() => expect(requests).toHaveLength(1));
    await new Promise((resolve) => setTimeout(resolve, 100));

    expect(requests).toHaveLength(1);
    expect(engine.isRunning(2)).toBe(true);
    expect((await queues.get(2))?.status).toBe('pending');
    expect(historyStore.all().map((r) => r.queueId)).toEqual([1]);
    release();

    const results = await Promise.all([first, second]);
    expect(results.map((r) => r.status)).toEqual(['completed', 'completed']);
    expect(requests).toHaveLength(2);
    const [firstRun, secondRun] = historyStore.all();
    expect(secondRun.queueId).toBe(2);
    expect(secondRun.startedAt.getTime()).toBeGreaterThanOrEqual(firstRun.completedAt?.getTime() ?? Infinity);
  });

  it('stops after consecutive rejected searches', async () => {
    const backlog = sonarrBacklog(episodes(5));
    const { engine, requests } = setup((request) =>
      request.method === 'POST' ? textResponse('bad request', 400) : backlog(request),
    );

    const result = await engine.execute(1);

    expect(result.status).toBe('failed');
    expect(result.itemsFailed).toBe(3);
    expect(result.error).toBe('Stopped after 3 consecutive rejected searches: Request rejected (HTTP 400): bad request');
    expect(commands(requests)).toHaveLength(3);
  });

  it('finishes as partial when some items are rejected', async () => {
    const backlog = sonarrBacklog(episodes(3));
    const { engine, queues } = setup((request) => {
      if (request.method === 'POST' && JSON.stringify(request.body).includes('"episodeIds":[2]')) {
        return textResponse('bad request', 400);
      }
      return backlog(request);
    });

    const result = await engine.execute(1);

    expect(result.status).toBe('partial');
    expect(result.itemsSearched).toBe(3);
    expect(result.itemsFound).toBe(2);
    expect(result.itemsFailed).toBe(1);
    const queue = await queues.get(1);
    expect(queue?.status).toBe('pending');
    expect(queue?.consecutiveFailures).toBe(0);
  });

  it('deactivates a queue at the failure threshold', async () => {
    const { engine, queues } = setup(() => textResponse('Unauthorized', 401), {
      queue: { consecutiveFailures: 4 },
    });

    await engine.execute(1);

    const queue = await queues.get(1);
    expect(queue?.consecutiveFailures).toBe(5);
    expect(queue?.isActive).toBe(false);
    expect(queue?.status).toBe('failed');
    expect(queue?.nextRunAt).toBeNull();
  });

  it('resets the failure count after a successful run', async () => {
    const { engine, queues } = setup(sonarrBacklog(episodes(1)), {
      queue: { consecutiveFailures: 3, lastError: 'Instance rejected credentials (HTTP 401)' },
    });

    await engine.execute(1);

    const queue = await queues.get(1);
    expect(queue?.consecutiveFailures).toBe(0);
    expect(queue?.lastError).toBeNull();
  });

  it('skips a deactivated queue', async () => {
    const { engine, requests, historyStore } = setup(sonarrBacklog(episodes(1)), { queue: { isActive: false } });

    const result = await engine.execute(1);

    expect(result.status).toBe('skipped');
    expect(result.error).toBe('Queue is deactivated');
    expect(requests).toHaveLength(0);
    expect(historyStore.all()).toHaveLength(0);
  });

  it('skips a second execution of a queue that is already running', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const backlog = sonarrBacklog(episodes(1));
    const { engine } = setup(async (request) => {
      if (request.method === 'GET') await gate;
      return backlog(request);
    });

    const first = engine.execute(1);
    const second = await engine.execute(1);
    expect(engine.isRunning(1)).toBe(true);
    release();

    expect(second.status).toBe('skipped');
    expect(second.error).toBe('Queue is already executing');
    expect((await first).status).toBe('completed');
    expect(engine.isRunning(1)).toBe(false);
  });

  it('marks a cancelled run interrupted and keeps its schedule', async () => {
    const controller = new AbortController();
    const nextRunAt = new Date('2026-03-10T12:00:00Z');
    const { engine, queues, historyStore } = setup(
      () => {
        controller.abort();
        return jsonResponse(wantedPage(episodes(2)));
      },
      { queue: { nextRunAt } },
    );

    const result = await engine.execute(1, { signal: controller.signal });

    expect(result.status).toBe('interrupted');
    expect(result.error).toBe('Cancelled by shutdown');
    const queue = await queues.get(1);
    expect(queue?.status).toBe('pending');
    expect(queue?.nextRunAt).toEqual(nextRunAt);
    expect(queue?.consecutiveFailures).toBe(0);
    expect(historyStore.all()[0].outcome).toBe('interrupted');
  });

  it('stops early when the run budget is spent', async () => {
    let tick = Date.parse('2026-03-10T12:00:00Z');
    const clock = () => {
      tick += 1000;
      return new Date(tick);
    };
    const { engine } = setup(sonarrBacklog(episodes(5)), { options: { runBudgetMs: 1500, clock } });

    const result = await engine.execute(1);

    expect(result.status).toBe('partial');
    expect(result.itemsSearched).toBe(1);
  });

  it('skips items still in cooldown', async () => {
    const { engine, cooldown, requests } = setup(sonarrBacklog(episodes(2)));
    cooldown.markSearched(cooldownKey(1, 'episode', 1), new Date());

    const result = await engine.execute(1);

    expect(result.itemsSkipped).toBe(1);
    expect(result.itemsSearched).toBe(1);
    expect(commands(requests).map((r) => r.body)).toEqual([{ name: 'EpisodeSearch', episodeIds: [2] }]);

    const again = await engine.execute(1);
    expect(again.itemsSkipped).toBe(2);
    expect(again.itemsSearched).toBe(0);
    expect(again.status).toBe('completed');
  });

  it('completes a one-off queue without a next run', async () => {
    const { engine, queues } = setup(sonarrBacklog(episodes(1)), {
      queue: { isRecurring: false, intervalHours: null },
    });

    const result = await engine.execute(1, { trigger: 'manual' });

    expect(result.nextRunAt).toBeNull();
    const queue = await queues.get(1);
    expect(queue?.status).toBe('completed');
  });

  it('keeps the api key out of the recorded error', async () => {
    const { engine, historyStore } = setup(() => textResponse(`invalid key ${API_KEY}`, 400));

    const result = await engine.execute(1);

    expect(result.error).toBe('Request rejected (HTTP 400): invalid key [REDACTED]');
    expect(historyStore.all()[0].errorSummary).toBe('Request rejected (HTTP 400): invalid key [REDACTED]');
  });

  it('fails when the credential cannot be resolved', async () => {
    const { engine, requests } = setup(sonarrBacklog(episodes(1)), { credentials: {} });

    const result = await engine.execute(1);

    expect(result.status).toBe('failed');
    expect(result.error).toBe('No credential for env:SONARR_KEY');
    expect(requests).toHaveLength(0);
  });

  it('rejects an unknown queue', async () => {
    const { engine } = setup(sonarrBacklog([]));
    await expect(engine.execute(99)).rejects.toThrow("Queue '99' not found");
  });
});

describe('reconcileInterrupted', () => {
  it('resets stuck queues and closes open history records', async () => {
    const { engine, queues, historyStore } = setup(sonarrBacklog([]), {
      queue: { status: 'in_progress', nextRunAt: new Date('2026-03-10T12:00:00Z') },
    });
    await historyStore.insert(makeHistoryRecord({ id: 'open', outcome: 'started', completedAt: null }));

    const now = new Date('2026-03-10T13:00:00Z');
    const result = await engine.reconcileInterrupted(now);

    expect(result).toEqual({ queues: 1, records: 1 });
    const queue = await queues.get(1);
    expect(queue?.status).toBe('pending');
    expect(queue?.nextRunAt).toEqual(new Date('2026-03-10T12:00:00Z'));
    const record = await historyStore.get('open');
    expect(record?.outcome).toBe('interrupted');
    expect(record?.completedAt).toEqual(now);
  });
});
