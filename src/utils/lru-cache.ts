/**
 * LRU (Least Recently Used) Cache
 *
 * Small bounded map used for memoizing derived values such as image hashes.
 * Map insertion order doubles as recency order.
 */

export class LRUCache<V> {
  private cache: Map<string, V> = new Map();
  private maxSize: number;

  constructor(options: { maxSize: number }) {
    this.maxSize = Math.max(1, options.maxSize);
  }

  /**
   * Get a value and mark it most recently used
   */
  get(key: string): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) return undefined;

    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(key: string, value: V): void {
    this.cache.delete(key);

    while (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }

    this.cache.set(key, value);
  }

  has(key: string): boolean {
    return this.cache.has(key);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
