import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type SyncDb = BetterSQLite3Database;

export function openSqlite(dbPath: string) {
  if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
  const sqlite = new Database(dbPath);
  if (dbPath !== ':memory:') sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  // Concurrent sweep workers in other processes wait for the write lock instead of failing at once.
  sqlite.pragma('busy_timeout = 5000');
  const db = drizzle(sqlite);
  return { sqlite, db };
}
