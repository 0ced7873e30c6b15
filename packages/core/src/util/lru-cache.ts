/**
 * Bounded LRU map with insert-if-absent semantics.
 *
 * Values stored here are derived deterministically from their key, so when
 * two computations for the same key race, the first stored value wins and
 * the later one is discarded.
 */
export class LRUCache<K, V> {
  private readonly map = new Map<K, V>();

  constructor(private readonly capacity: number) {}

  get(key: K): V | undefined {
    const value = this.map.get(key);
    if (value !== undefined) {
      this.map.delete(key);
      this.map.set(key, value);
    }
    return value;
  }

  /** Store `value` unless the key is already present; returns the stored value */
  setIfAbsent(key: K, value: V): V {
    const existing = this.get(key);
    if (existing !== undefined) return existing;
    if (this.capacity <= 0) return value;
    this.map.set(key, value);
    if (this.map.size > this.capacity) {
      const oldest = this.map.keys().next();
      if (!oldest.done) this.map.delete(oldest.value);
    }
    return value;
  }

  clear(): void {
    this.map.clear();
  }

  get size(): number {
    return this.map.size;
  }
}
