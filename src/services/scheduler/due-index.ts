export interface DueEntry {
  queueId: number;
  dueAt: number;
}

/**
 * Queue ids ordered by due time, earliest first. Ties break on queue id so
 * iteration order is deterministic.
 */
export class DueIndex {
  private entries: DueEntry[] = [];
  private readonly positions = new Map<number, number>();

  get size(): number {
    return this.entries.length;
  }

  has(queueId: number): boolean {
    return this.positions.has(queueId);
  }

  dueAt(queueId: number): number | undefined {
    return this.positions.get(queueId);
  }

  set(queueId: number, dueAt: number): void {
    this.delete(queueId);
    const index = this.insertionPoint(queueId, dueAt);
    this.entries.splice(index, 0, { queueId, dueAt });
    this.positions.set(queueId, dueAt);
  }

  delete(queueId: number): boolean {
    const dueAt = this.positions.get(queueId);
    if (dueAt === undefined) return false;
    const index = this.insertionPoint(queueId, dueAt);
    this.entries.splice(index, 1);
    this.positions.delete(queueId);
    return true;
  }

  /** Remove and return every entry due at or before `now`. */
  takeDue(now: number): DueEntry[] {
    let count = 0;
    while (count < this.entries.length && this.entries[count].dueAt <= now) count++;
    const due = this.entries.splice(0, count);
    for (const entry of due) this.positions.delete(entry.queueId);
    return due;
  }

  peek(): DueEntry | undefined {
    return this.entries[0];
  }

  toArray(): DueEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
    this.positions.clear();
  }

  private insertionPoint(queueId: number, dueAt: number): number {
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const entry = this.entries[mid];
      if (entry.dueAt < dueAt || (entry.dueAt === dueAt && entry.queueId < queueId)) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
