import pino from 'pino';
import type { ArrApi } from '../arr/client.js';
import type { ItemDescriptor, Page, PageCursor } from '../arr/types.js';
import type { CustomPredicate, StrategyKind, StrategySpec } from './schema.js';

const log = pino({ name: 'strategy' });

const DAY_MS = 24 * 60 * 60 * 1000;

export interface StrategyCursor {
  page: number;
}

export interface StrategyBatch {
  items: ItemDescriptor[];
  /** null once the sequence is exhausted. */
  nextCursor: StrategyCursor | null;
}

export interface StrategyContext {
  client: Pick<ArrApi, 'profile' | 'listMissing' | 'listCutoffUnmet'>;
  pageSize: number;
  now: Date;
  signal?: AbortSignal;
}

export interface SearchStrategy {
  readonly kind: StrategyKind;
  evaluate(cursor: StrategyCursor): Promise<StrategyBatch>;
}

export const INITIAL_CURSOR: StrategyCursor = { page: 1 };

function nextFrom(page: Page, cursor: StrategyCursor): StrategyCursor | null {
  return page.hasMore ? { page: cursor.page + 1 } : null;
}

function ageInDays(item: ItemDescriptor, now: Date): number | null {
  if (!item.date) return null;
  return (now.getTime() - item.date.getTime()) / DAY_MS;
}

export function matchesPredicate(item: ItemDescriptor, predicate: CustomPredicate, now: Date): boolean {
  if (predicate.monitoredOnly && !item.monitored) return false;

  if (predicate.minAgeDays !== undefined || predicate.maxAgeDays !== undefined) {
    const age = ageInDays(item, now);
    if (age === null) return false;
    if (predicate.minAgeDays !== undefined && age < predicate.minAgeDays) return false;
    if (predicate.maxAgeDays !== undefined && age > predicate.maxAgeDays) return false;
  }

  if (predicate.maxResolution !== undefined && item.qualityResolution !== null) {
    if (item.qualityResolution >= predicate.maxResolution) return false;
  }

  return true;
}

class MissingStrategy implements SearchStrategy {
  readonly kind = 'missing';

  constructor(private readonly ctx: StrategyContext) {}

  async evaluate(cursor: StrategyCursor): Promise<StrategyBatch> {
    const pageCursor: PageCursor = { page: cursor.page, pageSize: this.ctx.pageSize };
    const page = await this.ctx.client.listMissing(pageCursor, undefined, { signal: this.ctx.signal });
    return { items: page.items, nextCursor: nextFrom(page, cursor) };
  }
}

class CutoffUnmetStrategy implements SearchStrategy {
  readonly kind = 'cutoff_unmet';

  constructor(private readonly ctx: StrategyContext) {}

  async evaluate(cursor: StrategyCursor): Promise<StrategyBatch> {
    const pageCursor: PageCursor = { page: cursor.page, pageSize: this.ctx.pageSize };
    const page = await this.ctx.client.listCutoffUnmet(pageCursor, undefined, { signal: this.ctx.signal });
    return { items: page.items, nextCursor: nextFrom(page, cursor) };
  }
}

/**
 * Missing items newest first. The sequence ends at the first dated item
 * older than the window; undated items are skipped.
 */
class RecentStrategy implements SearchStrategy {
  readonly kind = 'recent';
  private readonly cutoff: number;

  constructor(
    private readonly ctx: StrategyContext,
    withinDays: number,
  ) {
    this.cutoff = ctx.now.getTime() - withinDays * DAY_MS;
  }

  async evaluate(cursor: StrategyCursor): Promise<StrategyBatch> {
    const pageCursor: PageCursor = { page: cursor.page, pageSize: this.ctx.pageSize };
    const page = await this.ctx.client.listMissing(pageCursor, this.ctx.client.profile.recentSort, {
      signal: this.ctx.signal,
    });

    const items: ItemDescriptor[] = [];
    for (const item of page.items) {
      if (!item.date) continue;
      if (item.date.getTime() < this.cutoff) {
        return { items, nextCursor: null };
      }
      items.push(item);
    }
    return { items, nextCursor: nextFrom(page, cursor) };
  }
}

class CustomStrategy implements SearchStrategy {
  readonly kind = 'custom';

  constructor(
    private readonly ctx: StrategyContext,
    private readonly predicate: CustomPredicate,
  ) {}

  async evaluate(cursor: StrategyCursor): Promise<StrategyBatch> {
    const pageCursor: PageCursor = { page: cursor.page, pageSize: this.ctx.pageSize };
    const options = { signal: this.ctx.signal };
    const page =
      this.predicate.source === 'cutoff_unmet'
        ? await this.ctx.client.listCutoffUnmet(pageCursor, undefined, options)
        : await this.ctx.client.listMissing(pageCursor, undefined, options);

    const items = page.items.filter((item) => matchesPredicate(item, this.predicate, this.ctx.now));
    return { items, nextCursor: nextFrom(page, cursor) };
  }
}

export function createStrategy(spec: StrategySpec, ctx: StrategyContext): SearchStrategy {
  switch (spec.kind) {
    case 'missing':
      return new MissingStrategy(ctx);
    case 'cutoff_unmet':
      return new CutoffUnmetStrategy(ctx);
    case 'recent':
      return new RecentStrategy(ctx, spec.withinDays);
    case 'custom':
      return new CustomStrategy(ctx, spec.predicate);
    default: {
      const unknown: never = spec;
      throw new Error(`Unknown strategy: ${JSON.stringify(unknown)}`);
    }
  }
}

/**
 * Pull batches lazily until the strategy reports no next cursor. Pages whose
 * items were all filtered out are skipped rather than yielded.
 */
export async function* iterateCandidates(
  strategy: SearchStrategy,
  start: StrategyCursor = INITIAL_CURSOR,
): AsyncGenerator<ItemDescriptor[], void, undefined> {
  let cursor: StrategyCursor | null = start;
  while (cursor) {
    const batch: StrategyBatch = await strategy.evaluate(cursor);
    log.debug({ kind: strategy.kind, page: cursor.page, items: batch.items.length }, 'Evaluated strategy page');
    if (batch.items.length > 0) {
      yield batch.items;
    }
    cursor = batch.nextCursor;
  }
}
