import pino from 'pino';

const log = pino({ name: 'cooldown' });

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export type CooldownMode = 'flat' | 'adaptive';

/** Adaptive tiers: items younger than `maxAgeMs` cool down for `cooldownMs`. */
const ADAPTIVE_TIERS: Array<{ maxAgeMs: number; cooldownMs: number }> = [
  { maxAgeMs: DAY_MS, cooldownMs: 6 * HOUR_MS },
  { maxAgeMs: 7 * DAY_MS, cooldownMs: 12 * HOUR_MS },
  { maxAgeMs: 30 * DAY_MS, cooldownMs: 24 * HOUR_MS },
  { maxAgeMs: 365 * DAY_MS, cooldownMs: 72 * HOUR_MS },
];
const ADAPTIVE_OLDEST_MS = 168 * HOUR_MS;

export interface CooldownOptions {
  ttlMs?: number;
  mode?: CooldownMode;
  maxEntries?: number;
}

interface CooldownEntry {
  lastSearchedAt: number;
  ttlMs: number;
}

export function cooldownKey(instanceId: number, itemType: string, itemId: number): string {
  return `${instanceId}:${itemType}:${itemId}`;
}

/**
 * In-memory record of when each item was last searched.
 *
 * An item marked at time T is suppressed for every check before T + ttl and
 * eligible again at T + ttl. Expired entries count as absent whether or not
 * `prune()` has evicted them yet.
 */
export class CooldownTracker {
  readonly ttlMs: number;
  readonly mode: CooldownMode;
  private readonly maxEntries: number;
  private readonly entries = new Map<string, CooldownEntry>();

  constructor(options: CooldownOptions = {}) {
    this.ttlMs = options.ttlMs ?? 24 * HOUR_MS;
    this.mode = options.mode ?? 'flat';
    this.maxEntries = options.maxEntries ?? 100_000;
  }

  isSuppressed(key: string, now: Date = new Date()): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    return now.getTime() < entry.lastSearchedAt + entry.ttlMs;
  }

  /**
   * Record a search. In adaptive mode the item's air/added date picks the
   * cooldown tier; without a date the flat TTL applies.
   */
  markSearched(key: string, now: Date = new Date(), itemDate: Date | null = null): void {
    if (this.entries.size >= this.maxEntries && !this.entries.has(key)) {
      this.evictOldest(now);
    }
    // Re-insert so iteration order tracks recency of marking
    this.entries.delete(key);
    this.entries.set(key, { lastSearchedAt: now.getTime(), ttlMs: this.ttlFor(itemDate, now) });
  }

  ttlFor(itemDate: Date | null, now: Date = new Date()): number {
    if (this.mode === 'flat' || itemDate === null) return this.ttlMs;

    const ageMs = now.getTime() - itemDate.getTime();
    for (const tier of ADAPTIVE_TIERS) {
      if (ageMs < tier.maxAgeMs) return tier.cooldownMs;
    }
    return ADAPTIVE_OLDEST_MS;
  }

  /**
   * Drop expired entries. Returns the number removed.
   */
  prune(now: Date = new Date()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now.getTime() >= entry.lastSearchedAt + entry.ttlMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      log.info({ removed, remaining: this.entries.size }, 'Pruned expired cooldown entries');
    }
    return removed;
  }

  getStats(): { size: number; maxEntries: number; mode: CooldownMode; ttlMs: number } {
    return { size: this.entries.size, maxEntries: this.maxEntries, mode: this.mode, ttlMs: this.ttlMs };
  }

  private evictOldest(now: Date): void {
    if (this.prune(now) > 0) return;

    // Map iterates in insertion order; evict 10% of the oldest marks at a time
    const toEvict = Math.max(1, Math.floor(this.maxEntries / 10));
    const iterator = this.entries.keys();
    for (let i = 0; i < toEvict; i++) {
      const next = iterator.next();
      if (next.done) break;
      this.entries.delete(next.value);
    }
    log.warn({ evicted: toEvict, remaining: this.entries.size }, 'Cooldown map full, evicted oldest entries');
  }
}
