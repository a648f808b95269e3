// === Repository Status ===

export const REPOSITORY_STATUSES = [
  'pending',
  'cloning',
  'synced',
  'syncing',
  'conflict',
  'error',
] as const;

export type RepositoryStatus = (typeof REPOSITORY_STATUSES)[number];

/** Statuses that only exist while an operation holds the repository lock. */
export const TRANSIENT_STATUSES: readonly RepositoryStatus[] = ['cloning', 'syncing'];

// === Sync Outcomes ===

export const OUTCOME_KINDS = [
  'no_remote_changes',
  'fast_forwarded',
  'local_changes_preserved',
  'failed',
] as const;

export type OutcomeKind = (typeof OUTCOME_KINDS)[number];

// === Interfaces ===

export interface Repository {
  id: string;
  url: string;
  name: string;
  localPath: string;
  status: RepositoryStatus;
  lastSynced: string | null;
  lastError: string | null;
  createdAt: string;
}

/** Row shape as stored in SQLite */
export interface RepositoryRow {
  id: string;
  url: string;
  name: string;
  local_path: string;
  status: string;
  last_synced: string | null;
  last_error: string | null;
  created_at: string;
}

/**
 * Result of one synchronization attempt. Never stored; consumed once by the
 * status manager to move the repository to its next status.
 */
export interface SyncOutcome {
  repositoryId: string;
  kind: OutcomeKind;
  detail: string;
  observedAt: string;
}

export interface User {
  id: number;
  username: string;
  passwordHash: string;
  createdAt: string;
}

export interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  created_at: string;
}

export interface SessionToken {
  token: string;
  username: string;
  issuedAt: number;
  expiresAt: number;
}

/** A page of repositories plus the total count across all pages. */
export interface RepositoryPage {
  items: Repository[];
  total: number;
}

/**
 * Durable record of known repositories. The status manager is the only
 * writer of `status`, `lastSynced` and `lastError`.
 */
export interface RepositoryStore {
  get(id: string): Repository | null;
  list(offset: number, limit: number): RepositoryPage;
  upsert(repository: Repository): void;
  delete(id: string): void;
  findByUrl(url: string): Repository | null;
}

// === Helpers ===

function isRepositoryStatus(value: string): value is RepositoryStatus {
  return REPOSITORY_STATUSES.some((status) => status === value);
}

/** Convert a DB row to a Repository. Unknown statuses read back as 'error'. */
export function rowToRepository(row: RepositoryRow): Repository {
  return {
    id: row.id,
    url: row.url,
    name: row.name,
    localPath: row.local_path,
    status: isRepositoryStatus(row.status) ? row.status : 'error',
    lastSynced: row.last_synced,
    lastError: row.last_error,
    createdAt: row.created_at,
  };
}

export function rowToUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

/** Terminal status reached by a repository after the given outcome. */
export function statusForOutcome(kind: OutcomeKind): RepositoryStatus {
  switch (kind) {
    case 'fast_forwarded':
    case 'no_remote_changes':
      return 'synced';
    case 'local_changes_preserved':
      return 'conflict';
    case 'failed':
      return 'error';
  }
}
