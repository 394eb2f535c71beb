import Database from 'better-sqlite3';
import { DatabaseConnection } from '../models/database';
import { CacheRepository } from '../repositories/cache.repository';

describe('CacheRepository', () => {
  let db: Database.Database;
  let now: number;
  let repository: CacheRepository;

  beforeEach(() => {
    db = new Database(':memory:');
    DatabaseConnection.initializeTables(db);
    now = 0;
    repository = new CacheRepository(db, () => now);
  });

  afterEach(() => {
    db.close();
  });

  test('should store and read a payload', () => {
    repository.put('tmdb:heat:1995', '{"strategy":null,"candidates":[]}', 60);
    expect(repository.get('tmdb:heat:1995')).toBe('{"strategy":null,"candidates":[]}');
    expect(repository.get('tmdb:missing:0')).toBeUndefined();
  });

  test('should overwrite an existing key', () => {
    repository.put('key', 'first', 60);
    now = 10_000;
    repository.put('key', 'second', 60);
    expect(repository.get('key')).toBe('second');
    expect(repository.size()).toBe(1);
  });

  test('should delete an expired row when it is read', () => {
    repository.put('key', 'value', 1);
    now = 1_001;
    expect(repository.get('key')).toBeUndefined();
    expect(repository.size()).toBe(0);
  });

  test('should purge expired rows', () => {
    repository.put('short', 'a', 1);
    repository.put('long', 'b', 100);
    now = 2_000;
    expect(repository.purgeExpired()).toBe(1);
    expect(repository.get('long')).toBe('b');
    expect(repository.size()).toBe(1);
  });

  test('should clear all rows', () => {
    repository.put('a', '1', 60);
    repository.put('b', '2', 60);
    repository.clear();
    expect(repository.size()).toBe(0);
  });
});
