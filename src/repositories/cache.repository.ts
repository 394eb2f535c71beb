import Database from 'better-sqlite3';
import { CacheEntry, CacheStore } from '../types/cache.types';
import { DatabaseConnection } from '../models/database';
import { Clock } from './memory-cache.repository';

interface CacheRow {
  cache_key: string;
  payload: string;
  created_at: number;
  ttl_seconds: number;
}

function isCacheRow(row: unknown): row is CacheRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'cache_key' in row &&
    typeof row.cache_key === 'string' &&
    'payload' in row &&
    typeof row.payload === 'string' &&
    'created_at' in row &&
    typeof row.created_at === 'number' &&
    'ttl_seconds' in row &&
    typeof row.ttl_seconds === 'number'
  );
}

/**
 * SQLite-backed cache store. Expired rows are deleted when read and by purgeExpired().
 */
export class CacheRepository implements CacheStore {
  private db: Database.Database;
  private readonly clock: Clock;

  constructor(db?: Database.Database, clock: Clock = Date.now) {
    this.db = db ?? DatabaseConnection.getInstance();
    this.clock = clock;
  }

  get(key: string): string | undefined {
    const row: unknown = this.db.prepare('SELECT * FROM resolution_cache WHERE cache_key = ?').get(key);
    if (!isCacheRow(row)) return undefined;

    const entry = this.mapRowToEntry(row);
    if (this.clock() > entry.createdAt + entry.ttlSeconds * 1000) {
      this.db.prepare('DELETE FROM resolution_cache WHERE cache_key = ?').run(key);
      return undefined;
    }
    return entry.payload;
  }

  put(key: string, payload: string, ttlSeconds: number): void {
    this.db
      .prepare(
        `INSERT INTO resolution_cache (cache_key, payload, created_at, ttl_seconds)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(cache_key) DO UPDATE SET
           payload = excluded.payload,
           created_at = excluded.created_at,
           ttl_seconds = excluded.ttl_seconds`
      )
      .run(key, payload, this.clock(), ttlSeconds);
  }

  clear(): void {
    this.db.prepare('DELETE FROM resolution_cache').run();
  }

  purgeExpired(): number {
    const result = this.db
      .prepare('DELETE FROM resolution_cache WHERE created_at + ttl_seconds * 1000 < ?')
      .run(this.clock());
    return result.changes;
  }

  size(): number {
    const row: unknown = this.db.prepare('SELECT COUNT(*) AS count FROM resolution_cache').get();
    if (typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number') {
      return row.count;
    }
    return 0;
  }

  private mapRowToEntry(row: CacheRow): CacheEntry {
    return {
      key: row.cache_key,
      payload: row.payload,
      createdAt: row.created_at,
      ttlSeconds: row.ttl_seconds,
    };
  }
}
