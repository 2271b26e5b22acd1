import { describe, it, expect, vi } from 'vitest';

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

import { profileFor, type ItemDescriptor, type Page, type PageCursor } from '../../services/arr/index.js';
import { strategySpecSchema } from '../../services/strategy/schema.js';
import {
  createStrategy,
  iterateCandidates,
  matchesPredicate,
  type StrategyContext,
} from '../../services/strategy/strategies.js';

const NOW = new Date('2026-03-10T12:00:00Z');
const DAY = 24 * 60 * 60 * 1000;

function item(id: number, ageDays: number | null, overrides: Partial<ItemDescriptor> = {}): ItemDescriptor {
  return {
    id,
    itemType: 'episode',
    title: `Item ${id}`,
    date: ageDays === null ? null : new Date(NOW.getTime() - ageDays * DAY),
    monitored: true,
    qualityResolution: null,
    ...overrides,
  };
}

/** Serves `items` in pages of the requested size from either wanted list. */
function fakeClient(missing: ItemDescriptor[], cutoff: ItemDescriptor[] = []) {
  const pageOf = (all: ItemDescriptor[], cursor: PageCursor): Page => {
    const start = (cursor.page - 1) * cursor.pageSize;
    return {
      items: all.slice(start, start + cursor.pageSize),
      page: cursor.page,
      pageSize: cursor.pageSize,
      totalRecords: all.length,
      hasMore: start + cursor.pageSize < all.length,
    };
  };
  return {
    profile: profileFor('sonarr'),
    listMissing: vi.fn(async (cursor: PageCursor) => pageOf(missing, cursor)),
    listCutoffUnmet: vi.fn(async (cursor: PageCursor) => pageOf(cutoff, cursor)),
  };
}

function context(client: StrategyContext['client'], pageSize = 2): StrategyContext {
  return { client, pageSize, now: NOW };
}

async function collect(ctx: StrategyContext, raw: unknown): Promise<number[][]> {
  const strategy = createStrategy(strategySpecSchema.parse(raw), ctx);
  const batches: number[][] = [];
  for await (const batch of iterateCandidates(strategy)) {
    batches.push(batch.map((i) => i.id));
  }
  return batches;
}

describe('missing and cutoff_unmet', () => {
  it('walks every page of the missing list', async () => {
    const client = fakeClient([item(1, 1), item(2, 2), item(3, 3)]);

    const batches = await collect(context(client), { kind: 'missing' });

    expect(batches).toEqual([[1, 2], [3]]);
    expect(client.listMissing).toHaveBeenCalledTimes(2);
    expect(client.listCutoffUnmet).not.toHaveBeenCalled();
  });

  it('reads the cutoff list', async () => {
    const client = fakeClient([], [item(7, 5)]);

    const batches = await collect(context(client), { kind: 'cutoff_unmet' });

    expect(batches).toEqual([[7]]);
    expect(client.listMissing).not.toHaveBeenCalled();
  });

  it('yields nothing for an empty backlog', async () => {
    const client = fakeClient([]);
    expect(await collect(context(client), { kind: 'missing' })).toEqual([]);
  });
});

describe('recent', () => {
  it('stops at the first item older than the window', async () => {
    const client = fakeClient([item(1, 1), item(2, 5), item(3, 40), item(4, 2)]);

    const batches = await collect(context(client), { kind: 'recent', withinDays: 30 });

    expect(batches).toEqual([[1, 2]]);
    expect(client.listMissing).toHaveBeenCalledTimes(2);
  });

  it('asks for newest-first ordering', async () => {
    const client = fakeClient([item(1, 1)]);

    await collect(context(client), { kind: 'recent' });

    expect(client.listMissing).toHaveBeenCalledWith(
      { page: 1, pageSize: 2 },
      { key: 'airDateUtc', direction: 'descending' },
      { signal: undefined },
    );
  });

  it('skips undated items', async () => {
    const client = fakeClient([item(1, null), item(2, 3)]);

    expect(await collect(context(client), { kind: 'recent', withinDays: 7 })).toEqual([[2]]);
  });
});

describe('custom', () => {
  it('filters the chosen source with the predicate', async () => {
    const client = fakeClient(
      [],
      [
        item(1, 10, { qualityResolution: 720 }),
        item(2, 10, { qualityResolution: 1080 }),
        item(3, 10, { monitored: false }),
        item(4, 10),
      ],
    );

    const batches = await collect(context(client, 10), {
      kind: 'custom',
      predicate: { source: 'cutoff_unmet', maxResolution: 1080 },
    });

    expect(batches).toEqual([[1, 4]]);
  });

  it('skips pages whose items are all filtered out', async () => {
    const client = fakeClient([item(1, 1), item(2, 1), item(3, 60)]);

    const batches = await collect(context(client), {
      kind: 'custom',
      predicate: { minAgeDays: 30 },
    });

    expect(batches).toEqual([[3]]);
    expect(client.listMissing).toHaveBeenCalledTimes(2);
  });
});

describe('matchesPredicate', () => {
  const base = { source: 'missing' as const, monitoredOnly: true };

  it('rejects unmonitored items only when asked', () => {
    const unmonitored = item(1, 1, { monitored: false });
    expect(matchesPredicate(unmonitored, base, NOW)).toBe(false);
    expect(matchesPredicate(unmonitored, { ...base, monitoredOnly: false }, NOW)).toBe(true);
  });

  it('applies inclusive age bounds and rejects undated items', () => {
    const predicate = { ...base, minAgeDays: 7, maxAgeDays: 30 };
    expect(matchesPredicate(item(1, 7), predicate, NOW)).toBe(true);
    expect(matchesPredicate(item(2, 30), predicate, NOW)).toBe(true);
    expect(matchesPredicate(item(3, 6), predicate, NOW)).toBe(false);
    expect(matchesPredicate(item(4, 31), predicate, NOW)).toBe(false);
    expect(matchesPredicate(item(5, null), predicate, NOW)).toBe(false);
  });

  it('keeps items without a file under a resolution threshold', () => {
    expect(matchesPredicate(item(1, 1), { ...base, maxResolution: 1080 }, NOW)).toBe(true);
  });
});

describe('strategySpecSchema', () => {
  it('defaults the recent window to 30 days', () => {
    expect(strategySpecSchema.parse({ kind: 'recent' })).toEqual({ kind: 'recent', withinDays: 30 });
  });

  it('rejects an inverted age range', () => {
    const result = strategySpecSchema.safeParse({ kind: 'custom', predicate: { minAgeDays: 10, maxAgeDays: 5 } });
    expect(result.success).toBe(false);
  });

  it('rejects unknown kinds', () => {
    expect(strategySpecSchema.safeParse({ kind: 'everything' }).success).toBe(false);
  });
});
