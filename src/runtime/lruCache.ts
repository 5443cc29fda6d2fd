/**
 * Map-backed LRU cache. `get` refreshes recency; `set` evicts the least
 * recently used entry once the cache is over capacity.
 */
export class LRUCache<K, V> {
  private readonly map = new Map<K, V>();
  private maxSize: number;

  constructor(maxSize: number) {
    this.maxSize = Math.max(1, Math.floor(maxSize));
  }

  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value === undefined) return undefined;
    this.map.delete(key);
    this.map.set(key, value);
    return value;
  }

  set(key: K, value: V): void {
    this.map.delete(key);
    this.map.set(key, value);
    this.evictOverflow();
  }

  has(key: K): boolean {
    return this.map.has(key);
  }

  delete(key: K): boolean {
    return this.map.delete(key);
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  setCapacity(newSize: number): void {
    this.maxSize = Math.max(1, Math.floor(newSize));
    this.evictOverflow();
  }

  private evictOverflow(): void {
    for (const oldest of this.map.keys()) {
      if (this.map.size <= this.maxSize) {
        return;
      }
      this.map.delete(oldest);
    }
  }
}
