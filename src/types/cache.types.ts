export interface CacheEntry {
  key: string;
  payload: string;
  /** Epoch milliseconds */
  createdAt: number;
  ttlSeconds: number;
}

/**
 * Storage backing the resolution cache. Implementations only need TTL-aware get/put;
 * expired entries must read as absent.
 */
export interface CacheStore {
  get(key: string): string | undefined;
  put(key: string, payload: string, ttlSeconds: number): void;
  clear(): void;
  purgeExpired(): number;
  size(): number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  errors: number;
  entries: number;
}
