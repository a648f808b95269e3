/**
 * Sync layer — keeps local working copies of remote repositories current.
 *
 * The engine decides the maximal safe update for one working copy, the
 * manager applies outcomes to repository records under a per-repository
 * guard, and the scheduler drives every repository on a cron cadence.
 */

export type { RemoteRefSnapshot, WorkingCopyAdapter } from './adapter.js';
export { GitWorkingCopyAdapter, DEFAULT_GIT_TIMEOUT_MS, toAdapterError } from './git.js';
export type { GitAdapterOptions } from './git.js';
export { synchronize, makeOutcome } from './engine.js';
export { RepositoryLockTable } from './locks.js';
export type { ReleaseLock } from './locks.js';
export { RepositoryManager, INTERRUPTED_MESSAGE } from './manager.js';
export type { RepositoryManagerOptions, RepositoryListing, SyncResult } from './manager.js';
export { SyncScheduler, DEFAULT_SYNC_PATTERN, DEFAULT_SYNC_CONCURRENCY } from './scheduler.js';
export type { BatchReport, SchedulerState, SyncSchedulerOptions } from './scheduler.js';
export { parseRepositoryUrl, workingCopyDirName } from './url.js';
export type { ParsedRepositoryUrl } from './url.js';
