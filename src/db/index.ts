/**
 * Drizzle ORM database setup (SQLite via better-sqlite3).
 * Pass ':memory:' for a throwaway database.
 */

import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import * as schema from '@/db/schema';
import { runMigrations } from '@/db/migrate';

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close(): void;
}

export function databasePath(dataDir: string): string {
  return path.join(dataDir, 'data', 'nutrition.sqlite');
}

export function createDatabase(filename: string): DatabaseHandle {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  const sqlite = new Database(filename);
  sqlite.pragma('journal_mode = WAL');
  runMigrations(sqlite);
  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
