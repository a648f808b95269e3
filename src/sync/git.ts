/**
 * Git CLI implementation of the working-copy adapter.
 *
 * All commands run through async execFile so a slow clone or fetch never
 * blocks the event loop serving HTTP requests. Network operations carry a
 * timeout; a timed-out command surfaces as a network AdapterError.
 *
 * SECURITY: commands use execFile (not exec) so remote URLs and paths are
 * never interpreted by a shell. URLs are passed after `--`.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { AdapterError, type AdapterErrorKind } from '../errors.js';
import type { RemoteRefSnapshot, WorkingCopyAdapter } from './adapter.js';

const execFileAsync = promisify(execFile);

export const DEFAULT_GIT_TIMEOUT_MS = 60_000;

const NETWORK_RE =
  /could not resolve host|unable to access|could not read from remote|connection (refused|reset|timed out)|timed out|authentication failed|publickey|repository .* (not found|does not exist)|\b(ssl|tls|proxy)\b/i;
const FILESYSTEM_RE =
  /not a git repository|permission denied|no such file or directory|already exists and is not an empty directory|read-only file system|no space left|unable to create|could not create/i;

export interface GitAdapterOptions {
  /** Timeout for clone, fetch and merge, in milliseconds. */
  timeoutMs?: number;
  remote?: string;
}

function stderrOf(error: unknown): string {
  if (error instanceof Error && 'stderr' in error && typeof error.stderr === 'string') {
    return error.stderr.trim();
  }
  return '';
}

function exitCodeOf(error: unknown): number | string | null {
  if (error instanceof Error && 'code' in error) {
    const code = error.code;
    if (typeof code === 'number' || typeof code === 'string') return code;
  }
  return null;
}

function wasKilled(error: unknown): boolean {
  return error instanceof Error && 'killed' in error && error.killed === true;
}

/** Classify a failed git invocation into the adapter error taxonomy. */
export function toAdapterError(operation: string, error: unknown, timeoutMs: number): AdapterError {
  if (wasKilled(error)) {
    return new AdapterError('network', `git ${operation} timed out after ${Math.round(timeoutMs / 1000)}s`);
  }

  const code = exitCodeOf(error);
  if (code === 'ENOENT' || code === 'EACCES') {
    return new AdapterError('filesystem', `git ${operation} failed: ${code}`);
  }

  const stderr = stderrOf(error);
  const detail = stderr || (error instanceof Error ? error.message : String(error));
  let kind: AdapterErrorKind = 'protocol';
  if (NETWORK_RE.test(detail)) {
    kind = 'network';
  } else if (FILESYSTEM_RE.test(detail)) {
    kind = 'filesystem';
  }
  // Last line of stderr is usually the fatal: message
  const lastLine = detail.split('\n').filter(Boolean).pop() ?? detail;
  return new AdapterError(kind, `git ${operation} failed: ${lastLine}`);
}

export class GitWorkingCopyAdapter implements WorkingCopyAdapter {
  private readonly timeoutMs: number;
  private readonly remote: string;

  constructor(options: GitAdapterOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
    this.remote = options.remote ?? 'origin';
  }

  private async exec(args: string[], cwd?: string): Promise<string> {
    const { stdout } = await execFileAsync('git', args, {
      cwd,
      encoding: 'utf-8',
      timeout: this.timeoutMs,
      maxBuffer: 16 * 1024 * 1024,
      // Never wait on an interactive credential prompt
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });
    return stdout;
  }

  private async git(operation: string, args: string[], cwd?: string): Promise<string> {
    try {
      return await this.exec(args, cwd);
    } catch (error) {
      throw toAdapterError(operation, error, this.timeoutMs);
    }
  }

  /** Run a command whose exit status 1 means "no", returning null in that case. */
  private async gitMaybe(operation: string, args: string[], cwd: string): Promise<string | null> {
    try {
      return await this.exec(args, cwd);
    } catch (error) {
      if (exitCodeOf(error) === 1 && !wasKilled(error)) return null;
      throw toAdapterError(operation, error, this.timeoutMs);
    }
  }

  async hasWorkingCopy(path: string): Promise<boolean> {
    return existsSync(join(path, '.git'));
  }

  async ensureCloned(url: string, path: string): Promise<void> {
    if (await this.hasWorkingCopy(path)) return;

    const parent = dirname(path);
    try {
      mkdirSync(parent, { recursive: true });
    } catch (error) {
      throw new AdapterError(
        'filesystem',
        `Cannot create ${parent}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    console.error(`Cloning ${url} into ${path}`);
    await this.git('clone', ['clone', '--origin', this.remote, '--', url, path]);
  }

  async fetchRefs(path: string): Promise<RemoteRefSnapshot> {
    const baseline = await this.remoteRefs(path);
    await this.git('fetch', ['fetch', '--prune', this.remote], path);

    const branch = await this.currentBranch(path);
    const refs = await this.remoteRefs(path);
    const remoteTip = branch ? refs[`refs/remotes/${this.remote}/${branch}`] ?? null : null;
    return { branch, remoteTip, refs, baseline };
  }

  async hasLocalModifications(path: string, snapshot: RemoteRefSnapshot): Promise<boolean> {
    const status = await this.git('status', ['status', '--porcelain'], path);
    if (status.trim().length > 0) return true;

    if ((await this.currentHead(path)) === null) return false;

    // Commits reachable from HEAD that no remote ref contained before the fetch
    const known = [...new Set(Object.values(snapshot.baseline))];
    const count = await this.git('rev-list', ['rev-list', '--count', 'HEAD', '--not', ...known], path);
    return parseInt(count.trim(), 10) > 0;
  }

  async canFastForward(path: string, snapshot: RemoteRefSnapshot): Promise<boolean> {
    if (!snapshot.remoteTip) return false;
    const head = await this.currentHead(path);
    if (head === null) return true;
    if (head === snapshot.remoteTip) return true;

    const result = await this.gitMaybe(
      'merge-base',
      ['merge-base', '--is-ancestor', head, snapshot.remoteTip],
      path,
    );
    return result !== null;
  }

  async fastForwardMerge(path: string, snapshot: RemoteRefSnapshot): Promise<void> {
    if (!snapshot.remoteTip) {
      throw new AdapterError('protocol', 'No remote tip to fast-forward to');
    }
    await this.git('merge', ['merge', '--ff-only', '--quiet', snapshot.remoteTip], path);
  }

  async currentHead(path: string): Promise<string | null> {
    const output = await this.gitMaybe('rev-parse', ['rev-parse', '--verify', '--quiet', 'HEAD'], path);
    return output === null ? null : output.trim() || null;
  }

  /** Remote-tracking ref name -> commit id, as currently recorded locally. */
  private async remoteRefs(path: string): Promise<Record<string, string>> {
    const output = await this.git(
      'for-each-ref',
      ['for-each-ref', '--format=%(refname) %(objectname)', `refs/remotes/${this.remote}`],
      path,
    );

    const refs: Record<string, string> = {};
    for (const line of output.split('\n')) {
      const [name, id] = line.trim().split(' ');
      if (name && id) refs[name] = id;
    }
    return refs;
  }

  private async currentBranch(path: string): Promise<string | null> {
    const output = await this.gitMaybe(
      'symbolic-ref',
      ['symbolic-ref', '--quiet', '--short', 'HEAD'],
      path,
    );
    return output === null ? null : output.trim() || null;
  }
}
