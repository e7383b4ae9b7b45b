/**
 * Tracks broker event ids seen within a time window so redelivered
 * events can be recognised
 */

export interface DuplicateCheck {
  isDuplicate: boolean;
  /** When the event id was first seen, for duplicates */
  firstSeen?: string;
  count: number;
}

export class DuplicateTracker {
  private readonly seen: Map<string, { firstSeen: number; count: number }> = new Map();

  constructor(
    private readonly windowMs: number = 5 * 60 * 1000,
    private readonly maxEntries: number = 10000,
    private readonly now: () => number = Date.now
  ) {}

  record(eventId: string): DuplicateCheck {
    const existing = this.seen.get(eventId);
    if (existing && this.now() - existing.firstSeen <= this.windowMs) {
      existing.count++;
      return { isDuplicate: true, firstSeen: new Date(existing.firstSeen).toISOString(), count: existing.count };
    }

    this.seen.delete(eventId);
    this.seen.set(eventId, { firstSeen: this.now(), count: 1 });
    if (this.seen.size > this.maxEntries) {
      this.prune();
      // Still full of fresh ids: drop the oldest insertions
      for (const id of this.seen.keys()) {
        if (this.seen.size <= this.maxEntries) break;
        this.seen.delete(id);
      }
    }
    return { isDuplicate: false, count: 1 };
  }

  /** Forget ids older than the window; returns how many were dropped */
  prune(): number {
    const cutoff = this.now() - this.windowMs;
    let removed = 0;
    for (const [eventId, entry] of this.seen) {
      if (entry.firstSeen < cutoff) {
        this.seen.delete(eventId);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.seen.clear();
  }

  get size(): number {
    return this.seen.size;
  }
}
