import { resetDb, closeDb } from '../db/connection.js';
import { AdapterError } from '../errors.js';
import type { RemoteRefSnapshot, WorkingCopyAdapter } from '../sync/adapter.js';

/**
 * Initialize a fresh in-memory database for testing.
 * Call in beforeEach() to get full test isolation.
 */
export function setupTestDb(): void {
  resetDb(':memory:');
}

/**
 * Clean up the database connection after tests.
 * Call in afterAll() or afterEach().
 */
export function teardownTestDb(): void {
  closeDb();
}

type Operation = 'clone' | 'fetch' | 'status' | 'merge';

interface FakeCopy {
  url: string;
  /** Local branch history, oldest first. */
  local: string[];
  /** Remote branch as of the last clone or fetch. */
  tracking: string[];
  dirty: boolean;
}

function isPrefix(prefix: string[], of: string[]): boolean {
  return prefix.length <= of.length && prefix.every((commit, i) => of[i] === commit);
}

/**
 * In-memory working-copy adapter. Histories are linear lists of commit ids;
 * a remote "rewrite" is modelled by replacing the remote list.
 */
export class FakeAdapter implements WorkingCopyAdapter {
  readonly remotes = new Map<string, string[]>();
  readonly copies = new Map<string, FakeCopy>();
  readonly calls: string[] = [];
  private readonly failures = new Map<string, AdapterError>();
  private readonly holds = new Map<string, Promise<void>>();
  /** Branch history observed by a clone or fetch, keyed by its tip. */
  private readonly histories = new Map<string, string[]>();

  addRemote(url: string, commits: string[]): void {
    this.remotes.set(url, [...commits]);
  }

  pushRemote(url: string, commit: string): void {
    const commits = this.remotes.get(url);
    if (!commits) throw new Error(`No remote ${url}`);
    commits.push(commit);
  }

  commitLocally(path: string, commit: string): void {
    this.copy(path).local.push(commit);
  }

  editLocally(path: string): void {
    this.copy(path).dirty = true;
  }

  /** Make `op` fail for the given path (or URL, for clone) until cleared. */
  fail(op: Operation, target: string, error: AdapterError): void {
    this.failures.set(`${op}:${target}`, error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  /** Block fetches of `path` until the returned function is called. */
  hold(path: string): () => void {
    let release = (): void => {};
    this.holds.set(path, new Promise<void>((resolve) => {
      release = () => {
        this.holds.delete(path);
        resolve();
      };
    }));
    return release;
  }

  head(path: string): string | null {
    return this.copy(path).local.at(-1) ?? null;
  }

  copy(path: string): FakeCopy {
    const copy = this.copies.get(path);
    if (!copy) throw new AdapterError('filesystem', `No working copy at ${path}`);
    return copy;
  }

  private check(op: Operation, target: string): void {
    this.calls.push(`${op}:${target}`);
    const failure = this.failures.get(`${op}:${target}`);
    if (failure) throw failure;
  }

  async hasWorkingCopy(path: string): Promise<boolean> {
    return this.copies.has(path);
  }

  async ensureCloned(url: string, path: string): Promise<void> {
    this.check('clone', url);
    if (this.copies.has(path)) return;
    const remote = this.remotes.get(url);
    if (!remote) throw new AdapterError('network', `repository '${url}' not found`);
    this.copies.set(path, { url, local: [...remote], tracking: [...remote], dirty: false });
    this.observe(remote);
  }

  private observe(history: string[]): void {
    const tip = history.at(-1);
    if (tip) this.histories.set(tip, [...history]);
  }

  private trackingRefs(history: string[]): Record<string, string> {
    const tip = history.at(-1);
    return tip ? { 'refs/remotes/origin/main': tip } : {};
  }

  async fetchRefs(path: string): Promise<RemoteRefSnapshot> {
    this.check('fetch', path);
    const hold = this.holds.get(path);
    if (hold) await hold;

    const copy = this.copy(path);
    const remote = this.remotes.get(copy.url);
    if (!remote) throw new AdapterError('network', `repository '${copy.url}' not found`);
    const baseline = this.trackingRefs(copy.tracking);
    copy.tracking = [...remote];
    this.observe(remote);

    return {
      branch: 'main',
      remoteTip: remote.at(-1) ?? null,
      refs: this.trackingRefs(remote),
      baseline,
    };
  }

  async hasLocalModifications(path: string, snapshot: RemoteRefSnapshot): Promise<boolean> {
    this.check('status', path);
    const copy = this.copy(path);
    const known = new Set(
      Object.values(snapshot.baseline).flatMap((tip) => this.histories.get(tip) ?? [tip]),
    );
    return copy.dirty || copy.local.some((commit) => !known.has(commit));
  }

  async canFastForward(path: string, snapshot: RemoteRefSnapshot): Promise<boolean> {
    if (!snapshot.remoteTip) return false;
    const copy = this.copy(path);
    return isPrefix(copy.local, copy.tracking);
  }

  async fastForwardMerge(path: string): Promise<void> {
    this.check('merge', path);
    const copy = this.copy(path);
    copy.local = [...copy.tracking];
  }

  async currentHead(path: string): Promise<string | null> {
    return this.head(path);
  }
}

/** Resolve after pending microtasks and timers have had a chance to run. */
export function tick(ms = 0): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
