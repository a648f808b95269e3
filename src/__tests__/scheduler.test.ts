import { describe, it, expect, beforeEach, afterAll, afterEach } from 'vitest';
import { setupTestDb, teardownTestDb, FakeAdapter, tick } from './helpers.js';
import { sqliteRepositoryStore } from '../db/queries.js';
import { RepositoryManager, type SyncResult } from '../sync/manager.js';
import { DEFAULT_SYNC_PATTERN, SyncScheduler } from '../sync/scheduler.js';
import { AdapterError } from '../errors.js';
import type { Repository } from '../types.js';

const urls = ['alpha', 'beta', 'gamma'].map((name) => `https://example.com/acme/${name}.git`);
const pathOf = (name: string) => `/repos/example.com%2Facme%2F${name}`;

let adapter: FakeAdapter;
let manager: RepositoryManager;
let scheduler: SyncScheduler;

beforeEach(async () => {
  setupTestDb();
  adapter = new FakeAdapter();
  manager = new RepositoryManager({ store: sqliteRepositoryStore, adapter, reposDir: '/repos' });
  for (const url of urls) {
    adapter.addRemote(url, ['c1']);
    await manager.addRepository(url);
  }
  scheduler = new SyncScheduler(manager, { concurrency: 2 });
});

afterEach(() => {
  scheduler.stop();
});

afterAll(() => {
  teardownTestDb();
});

describe('SyncScheduler.runBatch', () => {
  it('syncs every repository and reports the totals', async () => {
    adapter.pushRemote(urls[0], 'c2');

    const report = await scheduler.runBatch();

    expect(report).toMatchObject({ total: 3, synced: 3, conflicts: 0, failed: 0, skipped: 0 });
    expect(adapter.head(pathOf('alpha'))).toBe('c2');
    expect(scheduler.lastBatch).toEqual(report);
    expect(scheduler.state).toBe('idle');
  });

  it('isolates failures and conflicts from the rest of the batch', async () => {
    adapter.fail('fetch', pathOf('alpha'), new AdapterError('network', 'git fetch failed: connection refused'));
    adapter.editLocally(pathOf('beta'));
    adapter.pushRemote(urls[2], 'c2');

    const report = await scheduler.runBatch();

    expect(report).toMatchObject({ total: 3, synced: 1, conflicts: 1, failed: 1, skipped: 0 });
    expect(manager.getRepository('example.com/acme/alpha').status).toBe('error');
    expect(manager.getRepository('example.com/acme/beta').status).toBe('conflict');
    expect(manager.getRepository('example.com/acme/gamma').status).toBe('synced');
    expect(adapter.head(pathOf('gamma'))).toBe('c2');
  });

  it('skips a repository that is already being synced', async () => {
    const release = adapter.hold(pathOf('beta'));
    const manual = manager.triggerSync('example.com/acme/beta');
    await tick();

    const report = await scheduler.runBatch();

    expect(report).toMatchObject({ total: 3, synced: 2, skipped: 1, failed: 0 });
    release();
    await manual;
  });

  it('coalesces a tick that arrives while a batch is running', async () => {
    const release = adapter.hold(pathOf('alpha'));
    const first = scheduler.runBatch();
    await tick();

    expect(scheduler.state).toBe('running');
    expect(await scheduler.runBatch()).toBeNull();

    release();
    const report = await first;
    expect(report?.total).toBe(3);
    expect(scheduler.state).toBe('idle');
  });

  it('reports an empty batch when there are no repositories', async () => {
    for (const repository of manager.listAllRepositories()) {
      manager.removeRepository(repository.id);
    }

    const report = await scheduler.runBatch();

    expect(report).toMatchObject({ total: 0, synced: 0, failed: 0 });
  });
});

describe('SyncScheduler with a stub manager', () => {
  function repository(id: string): Repository {
    return {
      id,
      url: `https://example.com/${id}.git`,
      name: id,
      localPath: `/repos/${id}`,
      status: 'synced',
      lastSynced: null,
      lastError: null,
      createdAt: '2026-01-01T00:00:00.000Z',
    };
  }

  function result(repo: Repository): SyncResult {
    return {
      repository: repo,
      outcome: { repositoryId: repo.id, kind: 'no_remote_changes', detail: 'Up to date', observedAt: '2026-01-01T00:00:00.000Z' },
    };
  }

  it('never runs more workers than the concurrency bound', async () => {
    const repos = Array.from({ length: 10 }, (_, i) => repository(`r${i}`));
    let active = 0;
    let peak = 0;
    const stub = new SyncScheduler({
      listAllRepositories: () => repos,
      triggerSync: async (id) => {
        active++;
        peak = Math.max(peak, active);
        await tick(5);
        active--;
        return result(repos.find((r) => r.id === id) ?? repository(id));
      },
    }, { concurrency: 3 });

    const report = await stub.runBatch();

    expect(peak).toBe(3);
    expect(report?.synced).toBe(10);
  });

  it('counts an unexpected rejection as a failure and continues', async () => {
    const repos = [repository('a'), repository('b')];
    const stub = new SyncScheduler({
      listAllRepositories: () => repos,
      triggerSync: async (id) => {
        if (id === 'a') throw new Error('database is locked');
        return result(repos[1]);
      },
    });

    const report = await stub.runBatch();

    expect(report).toMatchObject({ total: 2, synced: 1, failed: 1 });
  });

  it('still produces a report when enumeration fails', async () => {
    const stub = new SyncScheduler({
      listAllRepositories: () => {
        throw new Error('no such table: repositories');
      },
      triggerSync: async (id) => result(repository(id)),
    });

    const report = await stub.runBatch();

    expect(report).toMatchObject({ total: 0, synced: 0, failed: 0 });
    expect(stub.state).toBe('idle');
  });
});

describe('SyncScheduler scheduling', () => {
  it('uses the nightly default pattern', () => {
    expect(scheduler.pattern).toBe(DEFAULT_SYNC_PATTERN);
    expect(scheduler.isScheduled).toBe(false);
    expect(scheduler.nextRun()).toBeNull();
  });

  it('reports the next run while started', () => {
    scheduler.start();

    expect(scheduler.isScheduled).toBe(true);
    const next = scheduler.nextRun();
    expect(next).toBeInstanceOf(Date);
    expect(next?.getHours()).toBe(2);
    expect(next?.getMinutes()).toBe(0);

    scheduler.stop();
    expect(scheduler.isScheduled).toBe(false);
  });
});
