import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { initSchema } from './schema.js';

let db: Database.Database | null = null;

export const DEFAULT_DB_PATH = resolve('data', 'repo-mirror.db');

/**
 * Get or create the SQLite database connection.
 * Creates the directory and schema on first call.
 */
export function getDb(dbPath?: string): Database.Database {
  if (db) return db;

  const path = dbPath ?? DEFAULT_DB_PATH;
  const dir = dirname(path);

  if (path !== ':memory:' && !existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  db = new Database(path);

  // Enable WAL mode for better concurrent read performance
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  // The admin CLI may write users while the server is running
  db.pragma('busy_timeout = 5000');

  initSchema(db);

  return db;
}

/**
 * Close the database connection (for clean shutdown).
 */
export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Reset the database connection. Closes the existing connection (if any)
 * and creates a fresh one at the given path.
 *
 * Primarily used for testing — pass ':memory:' for an isolated in-memory DB.
 */
export function resetDb(dbPath?: string): Database.Database {
  closeDb();
  return getDb(dbPath ?? ':memory:');
}
