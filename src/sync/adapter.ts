/**
 * Working-copy capability consumed by the sync engine.
 *
 * Every operation may reject with an AdapterError. Implementations must
 * never rewrite or discard commits: the only mutation besides the initial
 * clone is a fast-forward of the checked-out branch.
 */

/** Remote pointers observed by one fetch. */
export interface RemoteRefSnapshot {
  /** Checked-out local branch, or null on a detached HEAD. */
  branch: string | null;
  /** Tip of the remote branch tracked by `branch`, or null if the remote has none. */
  remoteTip: string | null;
  /** Remote-tracking ref name -> commit id. */
  refs: Record<string, string>;
  /** Remote-tracking refs as they were before this fetch. */
  baseline: Record<string, string>;
}

export interface WorkingCopyAdapter {
  /** True if `path` already holds a working copy. */
  hasWorkingCopy(path: string): Promise<boolean>;
  /** Clone `url` into `path` unless a working copy is already there. */
  ensureCloned(url: string, path: string): Promise<void>;
  /** Download remote pointers without touching the working tree or local branches. */
  fetchRefs(path: string): Promise<RemoteRefSnapshot>;
  /**
   * Uncommitted changes, or commits on HEAD that none of the snapshot's
   * pre-fetch remote refs contain.
   */
  hasLocalModifications(path: string, snapshot: RemoteRefSnapshot): Promise<boolean>;
  /** True iff HEAD equals or is an ancestor of the snapshot's remote tip. */
  canFastForward(path: string, snapshot: RemoteRefSnapshot): Promise<boolean>;
  /** Move the checked-out branch to the remote tip. Fast-forward only. */
  fastForwardMerge(path: string, snapshot: RemoteRefSnapshot): Promise<void>;
  /** Commit id of HEAD, or null when the branch has no commits yet. */
  currentHead(path: string): Promise<string | null>;
}
