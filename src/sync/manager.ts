/**
 * Repository status manager.
 *
 * Owns the repository status machine and is the only component that writes
 * `status`, `lastSynced` and `lastError`. Every mutation of a working copy
 * happens while the repository's guard in the lock table is held; a caller
 * that finds the guard taken gets SyncInProgressError immediately.
 *
 *   pending -> cloning -> synced | error
 *   synced | conflict | error -> syncing -> synced | conflict | error
 */

import { join } from 'node:path';
import {
  AlreadyExistsError,
  NotFoundError,
  SyncInProgressError,
  errorMessage,
} from '../errors.js';
import {
  TRANSIENT_STATUSES,
  statusForOutcome,
  type Repository,
  type RepositoryStatus,
  type RepositoryStore,
  type SyncOutcome,
} from '../types.js';
import type { WorkingCopyAdapter } from './adapter.js';
import { makeOutcome, synchronize } from './engine.js';
import { RepositoryLockTable } from './locks.js';
import { parseRepositoryUrl, workingCopyDirName } from './url.js';

export const INTERRUPTED_MESSAGE = 'Interrupted before completion';

const ENUMERATE_PAGE_SIZE = 100;

export interface RepositoryManagerOptions {
  store: RepositoryStore;
  adapter: WorkingCopyAdapter;
  /** Root directory holding one working copy per repository. */
  reposDir: string;
  locks?: RepositoryLockTable;
}

export interface SyncResult {
  repository: Repository;
  outcome: SyncOutcome;
}

export interface RepositoryListing {
  items: Repository[];
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

export class RepositoryManager {
  private readonly store: RepositoryStore;
  private readonly adapter: WorkingCopyAdapter;
  private readonly reposDir: string;
  readonly locks: RepositoryLockTable;

  constructor(options: RepositoryManagerOptions) {
    this.store = options.store;
    this.adapter = options.adapter;
    this.reposDir = options.reposDir;
    this.locks = options.locks ?? new RepositoryLockTable();
  }

  /**
   * Register a remote and clone it. Resolves with the stored record, which is
   * `synced` after a successful clone and `error` (with `lastError`) after a
   * failed one; the scheduler retries failed clones on its next tick.
   */
  async addRepository(url: string): Promise<Repository> {
    const trimmed = url.trim();
    const { key, name } = parseRepositoryUrl(trimmed);

    if (this.store.findByUrl(trimmed) || this.store.get(key)) {
      throw new AlreadyExistsError(trimmed);
    }

    const pending: Repository = {
      id: key,
      url: trimmed,
      name,
      localPath: join(this.reposDir, workingCopyDirName(key)),
      status: 'pending',
      lastSynced: null,
      lastError: null,
      createdAt: new Date().toISOString(),
    };
    this.store.upsert(pending);
    console.error(`Added repository ${trimmed} (${key})`);

    const result = await this.locks.withLock(key, async () => {
      const cloning = this.transition(pending, 'cloning');
      let outcome: SyncOutcome;
      try {
        await this.adapter.ensureCloned(cloning.url, cloning.localPath);
        outcome = makeOutcome(key, 'fast_forwarded', 'Cloned working copy');
      } catch (error) {
        outcome = makeOutcome(key, 'failed', errorMessage(error));
      }
      return this.applyOutcome(cloning, outcome);
    });

    if (!result) {
      throw new SyncInProgressError(key);
    }
    return result.value;
  }

  /**
   * Forget a repository. The working copy at `localPath` is left on disk.
   * Refused while an operation on the repository is in flight.
   */
  removeRepository(id: string): Repository {
    const repository = this.getRepository(id);

    const release = this.locks.tryAcquire(id);
    if (!release) {
      throw new SyncInProgressError(id);
    }
    try {
      this.store.delete(id);
    } finally {
      release();
      this.locks.evict(id);
    }

    console.error(`Removed repository ${repository.url} (working copy kept at ${repository.localPath})`);
    return repository;
  }

  /** Synchronize one repository now. Fails fast if it is already busy. */
  async triggerSync(id: string): Promise<SyncResult> {
    // Unknown ids are NotFound even if nothing holds their guard
    this.getRepository(id);

    const result = await this.locks.withLock(id, async () => {
      const current = this.getRepository(id);
      const transient: RepositoryStatus =
        current.status === 'pending' || current.status === 'cloning' ? 'cloning' : 'syncing';
      const running = this.transition(current, transient);

      const outcome = await synchronize(this.adapter, running);
      if (outcome.kind === 'failed') {
        console.error(`Sync failed for ${running.url}: ${outcome.detail}`);
      }
      return { repository: this.applyOutcome(running, outcome), outcome };
    });

    if (!result) {
      throw new SyncInProgressError(id);
    }
    return result.value;
  }

  /** Move a repository to the terminal status implied by an outcome. */
  applyOutcome(repository: Repository, outcome: SyncOutcome): Repository {
    const failed = outcome.kind === 'failed';
    const next: Repository = {
      ...repository,
      status: statusForOutcome(outcome.kind),
      lastSynced: failed ? repository.lastSynced : outcome.observedAt,
      lastError: failed ? outcome.detail : null,
    };
    this.store.upsert(next);
    return next;
  }

  getRepository(id: string): Repository {
    const repository = this.store.get(id);
    if (!repository) {
      throw new NotFoundError(`Repository ${id}`);
    }
    return repository;
  }

  /** Look a repository up by its remote URL, falling back to its id. */
  resolveRepository(key: string): Repository {
    const repository = this.store.findByUrl(key) ?? this.store.get(key);
    if (!repository) {
      throw new NotFoundError(`Repository ${key}`);
    }
    return repository;
  }

  listRepositories(page: number, limit: number): RepositoryListing {
    const { items, total } = this.store.list((page - 1) * limit, limit);
    return {
      items,
      page,
      limit,
      total,
      totalPages: Math.max(1, Math.ceil(total / limit)),
    };
  }

  /** Every known repository, read page by page. */
  listAllRepositories(): Repository[] {
    const all: Repository[] = [];
    for (let offset = 0; ; offset += ENUMERATE_PAGE_SIZE) {
      const { items, total } = this.store.list(offset, ENUMERATE_PAGE_SIZE);
      all.push(...items);
      if (items.length < ENUMERATE_PAGE_SIZE || offset + items.length >= total) break;
    }
    return all;
  }

  /**
   * Records left in a transient status by a process that stopped mid-operation
   * are moved to `error`. Call once at startup, before any sync runs.
   */
  recoverInterrupted(): number {
    let recovered = 0;
    for (const repository of this.listAllRepositories()) {
      if (!TRANSIENT_STATUSES.includes(repository.status)) continue;
      if (this.locks.isHeld(repository.id)) continue;
      this.store.upsert({ ...repository, status: 'error', lastError: INTERRUPTED_MESSAGE });
      recovered++;
    }
    return recovered;
  }

  private transition(repository: Repository, status: RepositoryStatus): Repository {
    const next = { ...repository, status };
    this.store.upsert(next);
    return next;
  }
}
