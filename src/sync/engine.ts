/**
 * Safe synchronization of a single working copy.
 *
 * The engine only ever fast-forwards. Whenever local and remote history
 * might have diverged (uncommitted edits, local-only commits, a rewritten
 * remote) the fetch is kept but the working tree and local branch are left
 * exactly as they were, and the outcome is `local_changes_preserved`.
 *
 * The engine never throws: every failure becomes a `failed` outcome.
 */

import { errorMessage } from '../errors.js';
import type { OutcomeKind, Repository, SyncOutcome } from '../types.js';
import type { WorkingCopyAdapter } from './adapter.js';

export function makeOutcome(repositoryId: string, kind: OutcomeKind, detail: string): SyncOutcome {
  return { repositoryId, kind, detail, observedAt: new Date().toISOString() };
}

function shortId(commit: string): string {
  return commit.slice(0, 7);
}

export async function synchronize(
  adapter: WorkingCopyAdapter,
  repository: Pick<Repository, 'id' | 'url' | 'localPath'>,
): Promise<SyncOutcome> {
  const { id, url, localPath } = repository;

  try {
    if (!(await adapter.hasWorkingCopy(localPath))) {
      await adapter.ensureCloned(url, localPath);
      return makeOutcome(id, 'fast_forwarded', 'Cloned working copy');
    }

    const snapshot = await adapter.fetchRefs(localPath);

    if (await adapter.hasLocalModifications(localPath, snapshot)) {
      console.error(`Repository ${url} has local changes, skipping merge to preserve local history`);
      return makeOutcome(id, 'local_changes_preserved', 'Working copy has local changes; remote refs fetched, merge skipped');
    }

    if (!snapshot.remoteTip) {
      const where = snapshot.branch ? `branch ${snapshot.branch}` : 'detached HEAD';
      return makeOutcome(id, 'no_remote_changes', `No remote branch to follow for ${where}`);
    }

    if (!(await adapter.canFastForward(localPath, snapshot))) {
      console.error(`Repository ${url} has diverged from remote, skipping merge to preserve local history`);
      return makeOutcome(id, 'local_changes_preserved', 'Local and remote history have diverged; merge skipped');
    }

    const head = await adapter.currentHead(localPath);
    if (head === snapshot.remoteTip) {
      return makeOutcome(id, 'no_remote_changes', `Up to date at ${shortId(head)}`);
    }

    await adapter.fastForwardMerge(localPath, snapshot);
    const from = head === null ? 'empty branch' : shortId(head);
    console.error(`Fast-forwarded ${url} from ${from} to ${shortId(snapshot.remoteTip)}`);
    return makeOutcome(id, 'fast_forwarded', `Fast-forwarded ${from} -> ${shortId(snapshot.remoteTip)}`);
  } catch (error) {
    return makeOutcome(id, 'failed', errorMessage(error));
  }
}
