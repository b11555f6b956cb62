/**
 * Least-recently-used map with a fixed capacity.
 * Reads refresh an entry; inserting past capacity evicts the oldest one.
 */
export class LRUCache<K, V> {
  private cache = new Map<K, V>();

  constructor(private readonly maxSize = 1000) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`LRUCache size must be a positive integer, got ${maxSize}`);
    }
  }

  get(key: K): V | undefined {
    const value = this.cache.get(key);
    if (value === undefined) return undefined;

    this.cache.delete(key);
    this.cache.set(key, value);
    return value;
  }

  set(key: K, value: V): this {
    this.cache.delete(key);
    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(key, value);
    return this;
  }

  /** Returns the cached value, computing and storing it on a miss. */
  getOrCreate(key: K, create: () => V): V {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const value = create();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }
}
