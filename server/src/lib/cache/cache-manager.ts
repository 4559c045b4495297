/**
 * Cache Manager
 * In-process TTL map with a size bound.
 *
 * - Lazy expiry on read (no background timers)
 * - Oldest-written entry evicted when full
 */

export interface CacheEntry<T> {
  data: T;
  expiresAt: number;
}

export type Clock = () => number;

export class CacheManager<T> {
  private entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly maxSize: number = 1000,
    private readonly now: Clock = Date.now
  ) {}

  /**
   * Value for key, or null when absent or expired.
   */
  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return null;
    }
    return entry.data;
  }

  set(key: string, data: T, ttlMs: number): void {
    // Re-inserting moves the key to the back of insertion order
    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      this.evictOldest();
    }
    this.entries.set(key, { data, expiresAt: this.now() + ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Entries held, expired ones included until they are next read. */
  size(): number {
    return this.entries.size;
  }

  private evictOldest(): void {
    // Map iteration order is insertion order, so the first key is the oldest write
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
    }
  }
}
