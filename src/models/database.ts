import Database from 'better-sqlite3';
import { getConfig } from '../config/env.config';
import fs from 'fs';
import path from 'path';

export class DatabaseConnection {
  private static instance: Database.Database | null = null;

  private constructor() {}

  public static getInstance(): Database.Database {
    if (!DatabaseConnection.instance) {
      const config = getConfig();
      const dbDir = path.dirname(config.databasePath);

      if (!fs.existsSync(dbDir)) {
        fs.mkdirSync(dbDir, { recursive: true });
      }

      const db = new Database(config.databasePath);
      db.pragma('journal_mode = WAL');
      DatabaseConnection.initializeTables(db);
      DatabaseConnection.instance = db;
    }

    return DatabaseConnection.instance;
  }

  public static initializeTables(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS resolution_cache (
        cache_key TEXT PRIMARY KEY,
        payload TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        ttl_seconds INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_resolution_cache_created_at ON resolution_cache(created_at);
    `);
  }

  public static close(): void {
    if (DatabaseConnection.instance) {
      DatabaseConnection.instance.close();
      DatabaseConnection.instance = null;
    }
  }
}
