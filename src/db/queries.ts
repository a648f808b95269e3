import { getDb } from './connection.js';
import {
  type Repository,
  type RepositoryPage,
  type RepositoryRow,
  type RepositoryStore,
  type User,
  type UserRow,
  rowToRepository,
  rowToUser,
} from '../types.js';

// === Repository CRUD ===

export function getRepositoryById(id: string): Repository | null {
  const db = getDb();
  const row = db
    .prepare('SELECT * FROM repositories WHERE id = ?')
    .get(id) as RepositoryRow | undefined;

  return row ? rowToRepository(row) : null;
}

export function getRepositoryByUrl(url: string): Repository | null {
  const db = getDb();
  const row = db
    .prepare('SELECT * FROM repositories WHERE url = ?')
    .get(url) as RepositoryRow | undefined;

  return row ? rowToRepository(row) : null;
}

/** Newest repositories first, matching the listing order of the web UI. */
export function listRepositories(offset: number, limit: number): RepositoryPage {
  const db = getDb();
  const rows = db
    .prepare('SELECT * FROM repositories ORDER BY created_at DESC, id ASC LIMIT ? OFFSET ?')
    .all(limit, offset) as RepositoryRow[];
  const { total } = db
    .prepare('SELECT COUNT(*) as total FROM repositories')
    .get() as { total: number };

  return { items: rows.map(rowToRepository), total };
}

export function upsertRepository(repository: Repository): void {
  const db = getDb();
  db.prepare(`
    INSERT INTO repositories (id, url, name, local_path, status, last_synced, last_error, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      status = excluded.status,
      last_synced = excluded.last_synced,
      last_error = excluded.last_error
  `).run(
    repository.id,
    repository.url,
    repository.name,
    repository.localPath,
    repository.status,
    repository.lastSynced,
    repository.lastError,
    repository.createdAt,
  );
}

export function deleteRepository(id: string): boolean {
  const db = getDb();
  const result = db.prepare('DELETE FROM repositories WHERE id = ?').run(id);
  return result.changes > 0;
}

/** RepositoryStore backed by the shared SQLite connection. */
export const sqliteRepositoryStore: RepositoryStore = {
  get: getRepositoryById,
  list: listRepositories,
  upsert: upsertRepository,
  delete: (id) => {
    deleteRepository(id);
  },
  findByUrl: getRepositoryByUrl,
};

// === Users ===

export function getUserByUsername(username: string): User | null {
  const db = getDb();
  const row = db
    .prepare('SELECT * FROM users WHERE username = ?')
    .get(username) as UserRow | undefined;

  return row ? rowToUser(row) : null;
}

/** Create the user, or replace the password of an existing one. */
export function upsertUser(username: string, passwordHash: string): User {
  const db = getDb();
  const now = new Date().toISOString();
  db.prepare(`
    INSERT INTO users (username, password_hash, created_at) VALUES (?, ?, ?)
    ON CONFLICT(username) DO UPDATE SET password_hash = excluded.password_hash
  `).run(username, passwordHash, now);

  const user = getUserByUsername(username);
  if (!user) {
    throw new Error(`Failed to store user ${username}`);
  }
  return user;
}

/** Returns false if the user does not exist. */
export function updateUserPassword(username: string, passwordHash: string): boolean {
  const db = getDb();
  const result = db
    .prepare('UPDATE users SET password_hash = ? WHERE username = ?')
    .run(passwordHash, username);
  return result.changes > 0;
}

/** Returns false if the user does not exist. */
export function deleteUser(username: string): boolean {
  const db = getDb();
  const result = db.prepare('DELETE FROM users WHERE username = ?').run(username);
  return result.changes > 0;
}

export function listUsers(): User[] {
  const db = getDb();
  const rows = db
    .prepare('SELECT * FROM users ORDER BY username ASC')
    .all() as UserRow[];
  return rows.map(rowToUser);
}
