// ============================================
// DEADZONE - Database Configuration
// ============================================

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import path from 'path';
import { env } from './env.js';
import * as schema from '../db/schema/index.js';
import { createTables } from '../db/bootstrap.js';

export type DrizzleDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  sqlite: Database.Database;
  db: DrizzleDb;
}

let handle: DatabaseHandle | null = null;

export function getDbPath(): string {
  if (env.DB_PATH === ':memory:') return env.DB_PATH;
  return path.isAbsolute(env.DB_PATH)
    ? env.DB_PATH
    : path.join(process.cwd(), env.DB_PATH);
}

/**
 * Open a database and make sure every table exists.
 * Tests call this with ':memory:' to get an isolated store.
 */
export function openDatabase(dbPath: string = getDbPath()): DatabaseHandle {
  const sqlite = new Database(dbPath);
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 2000');
  createTables(sqlite);
  return { sqlite, db: drizzle(sqlite, { schema }) };
}

export function getDatabase(): DatabaseHandle {
  if (!handle) {
    handle = openDatabase();
  }
  return handle;
}

export function closeDatabaseConnection(): void {
  if (handle) {
    handle.sqlite.close();
    handle = null;
  }
}
