/**
 * Map with per-entry time-to-live
 */

interface CacheEntry<V> {
  value: V;
  fetchedAt: number;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private entries = new Map<K, CacheEntry<V>>();
  private ttlMs: number;
  private now: () => number;

  constructor(ttlMs: number, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.value;
  }

  set(key: K, value: V): void {
    const fetchedAt = this.now();
    this.entries.set(key, { value, fetchedAt, expiresAt: fetchedAt + this.ttlMs });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
