import { Clock, systemClock } from '../../shared/utils/clock';

export interface CacheEntry<V> {
  key: string;
  value: V;
  /** epoch milliseconds */
  insertedAt: number;
}

export interface SizeCacheOptions {
  ttlSeconds?: number;
  capacity?: number;
  clock?: Clock;
}

/**
 * TTL cache for remote size lookups.
 *
 * When a put pushes the entry count above capacity, the oldest half (by
 * insertion time) is dropped in one go. Concurrent `getOrLoad` calls for the
 * same key share a single pending lookup.
 */
export class SizeCache<V = number> {
  static readonly DEFAULT_TTL_SECONDS = 300;
  static readonly DEFAULT_CAPACITY = 100;

  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly pending = new Map<string, Promise<V>>();
  private readonly ttlMs: number;
  private readonly capacity: number;
  private readonly clock: Clock;

  constructor(options: SizeCacheOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? SizeCache.DEFAULT_TTL_SECONDS) * 1000;
    this.capacity = options.capacity ?? SizeCache.DEFAULT_CAPACITY;
    this.clock = options.clock ?? systemClock;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.clock() - entry.insertedAt > this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  put(key: string, value: V): void {
    this.entries.delete(key);
    this.entries.set(key, { key, value, insertedAt: this.clock() });

    if (this.entries.size > this.capacity) {
      this.evictOldest(Math.floor(this.capacity / 2));
    }
  }

  /**
   * Cached value, or the result of `loader` stored under `key`. A failed
   * load is not cached.
   */
  async getOrLoad(key: string, loader: () => Promise<V>): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const load = loader()
      .then(value => {
        this.put(key, value);
        return value;
      })
      .finally(() => {
        this.pending.delete(key);
      });
    this.pending.set(key, load);
    return load;
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  private evictOldest(count: number): void {
    const oldest = Array.from(this.entries.values())
      .sort((a, b) => a.insertedAt - b.insertedAt)
      .slice(0, count);

    for (const entry of oldest) {
      this.entries.delete(entry.key);
    }
  }
}
