export interface TtlCacheEntry<V> {
  value: V;
  /** epoch milliseconds */
  insertedAt: number;
}

export interface TtlCacheOptions {
  ttlMs: number;
  /** `set` sweeps expired entries once the entry count exceeds this. */
  sweepThreshold: number;
  now?: () => number;
}

/**
 * In-memory key/value store with a single TTL for every entry.
 *
 * Entries are expired lazily on `get` and in bulk by `sweepExpired`, which
 * `set` triggers past the size threshold. There is no capacity cap and no
 * LRU. All operations are synchronous, so no two of them interleave.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, TtlCacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly sweepThreshold: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.sweepThreshold = options.sweepThreshold;
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.isExpired(entry, this.now())) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  /**
   * Stores the value, replacing any previous entry. Returns the number of
   * expired entries removed by the sweep this write triggered, if any.
   */
  set(key: string, value: V): number {
    this.entries.set(key, { value, insertedAt: this.now() });

    return this.entries.size > this.sweepThreshold ? this.sweepExpired() : 0;
  }

  sweepExpired(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        removed += 1;
      }
    }

    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): number {
    const cleared = this.entries.size;
    this.entries.clear();
    return cleared;
  }

  private isExpired(entry: TtlCacheEntry<V>, now: number): boolean {
    return now - entry.insertedAt >= this.ttlMs;
  }
}
