import type { CacheEntry } from '../types.js';

/**
 * Bounded map with least-recently-used eviction. Entries carry the time
 * bucket they were stored in; stale buckets simply stop being looked up and
 * age out through eviction or `cleanup`.
 */
export class MemoryCache<T> {
  private cache = new Map<string, CacheEntry<T>>();

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  set(key: string, value: T, bucket: number): void {
    this.cache.delete(key);
    this.cache.set(key, {
      key,
      value,
      bucket,
      createdAt: Date.now()
    });

    while (this.cache.size > this.capacity) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    // Re-insert so iteration order tracks recency
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  delete(key: string): void {
    this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  keys(): string[] {
    return [...this.cache.keys()];
  }

  /** Drop every entry stored in a bucket older than `currentBucket`. */
  cleanup(currentBucket: number): number {
    let removed = 0;
    for (const [key, entry] of this.cache.entries()) {
      if (entry.bucket < currentBucket) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.cache.size;
  }
}
