export type Clock = () => number;

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export const DEFAULT_MAX_ENTRIES = 1000;

/**
 * In-memory memo with a fixed freshness window. A stale key simply misses and
 * the caller fetches again. Expired entries are swept on every write, and past
 * `maxEntries` the oldest insertions go first.
 */
export class TtlCache<V> {
  private entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now,
    private readonly maxEntries: number = DEFAULT_MAX_ENTRIES
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: string, value: V): void {
    if (this.ttlMs <= 0 || this.maxEntries <= 0) {
      return;
    }

    const now = this.now();
    this.sweep(now);

    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: now + this.ttlMs });
  }

  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  /**
   * Returns the cached value for `key`, or runs `load` and stores its result.
   * Rejections are not cached.
   */
  async getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await load();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
