/**
 * Per-repository mutual exclusion.
 *
 * One guard per repository id, created on acquire and dropped on release, so
 * the table only ever holds entries for operations in flight. Acquisition
 * never waits: a second caller gets null and is expected to report
 * SyncInProgress.
 */

/** Releases the guard. Calling it more than once is a no-op. */
export type ReleaseLock = () => void;

export class RepositoryLockTable {
  private readonly held = new Map<string, symbol>();

  /** Acquire the guard for `id`, or return null if it is already held. */
  tryAcquire(id: string): ReleaseLock | null {
    if (this.held.has(id)) return null;

    const owner = Symbol(id);
    this.held.set(id, owner);
    return () => {
      // A stale release must not free a guard re-acquired by someone else
      if (this.held.get(id) === owner) {
        this.held.delete(id);
      }
    };
  }

  /** Run `fn` while holding the guard; null if the guard was taken. */
  async withLock<T>(id: string, fn: () => Promise<T>): Promise<{ value: T } | null> {
    const release = this.tryAcquire(id);
    if (!release) return null;
    try {
      return { value: await fn() };
    } finally {
      release();
    }
  }

  isHeld(id: string): boolean {
    return this.held.has(id);
  }

  /** Drop any guard for a repository that no longer exists. */
  evict(id: string): void {
    this.held.delete(id);
  }

  get size(): number {
    return this.held.size;
  }
}
