import { CacheEntry, CacheStore } from '../types/cache.types';

export type Clock = () => number;

/**
 * Map-backed store. Node runs these operations to completion on one thread, so the map
 * needs no further locking.
 */
export class MemoryCacheStore implements CacheStore {
  private entries: Map<string, CacheEntry> = new Map();

  constructor(private readonly clock: Clock = Date.now) {}

  get(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.payload;
  }

  put(key: string, payload: string, ttlSeconds: number): void {
    this.entries.set(key, { key, payload, createdAt: this.clock(), ttlSeconds });
  }

  clear(): void {
    this.entries.clear();
  }

  purgeExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.clock() > entry.createdAt + entry.ttlSeconds * 1000;
  }
}
