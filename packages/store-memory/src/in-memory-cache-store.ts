import type { MemoryCacheTier } from '@layered-http/core';

export interface InMemoryCacheStoreOptions {
  /**
   * Maximum number of entries. When exceeded the least recently used entry
   * is evicted. Defaults to `Infinity` (no eviction).
   */
  maxItems?: number;
}

/**
 * Memory tier of the response cache. Values are kept by reference, so a
 * read returns the same object that was written.
 */
export class InMemoryCacheStore implements MemoryCacheTier {
  // Map iteration order doubles as recency order: oldest first
  private cache = new Map<string, unknown>();
  private readonly maxItems: number;
  private destroyed = false;

  constructor(options: InMemoryCacheStoreOptions = {}) {
    const maxItems = options.maxItems ?? Infinity;
    if (!(maxItems > 0)) {
      throw new Error('maxItems must be greater than 0');
    }
    this.maxItems = maxItems;
  }

  get(key: string): unknown | undefined {
    if (!this.cache.has(key)) return undefined;

    const value = this.cache.get(key);
    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(key: string, value: unknown): void {
    if (this.destroyed) return;

    this.cache.delete(key);
    this.cache.set(key, value);

    while (this.cache.size > this.maxItems) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  delete(key: string): void {
    this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  getStats(): { totalItems: number; maxItems: number; itemUtilization: number } {
    return {
      totalItems: this.cache.size,
      maxItems: this.maxItems,
      itemUtilization: Number.isFinite(this.maxItems)
        ? this.cache.size / this.maxItems
        : 0,
    };
  }

  /** Drop all entries and ignore further writes. */
  destroy(): void {
    this.destroyed = true;
    this.cache.clear();
  }
}
