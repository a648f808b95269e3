/**
 * Background sync scheduler.
 *
 * On every cron tick, enumerates all repositories and pushes each through
 * `triggerSync` with a bounded number of workers. A tick that fires while
 * the previous batch is still running is skipped, not queued. Failures are
 * counted and logged per repository and never abort the rest of the batch.
 */

import { Cron } from 'croner';
import { SyncInProgressError, errorMessage } from '../errors.js';
import type { Repository } from '../types.js';
import type { RepositoryManager } from './manager.js';

export const DEFAULT_SYNC_PATTERN = '0 0 2 * * *';
export const DEFAULT_SYNC_CONCURRENCY = 4;

export type SchedulerState = 'idle' | 'running';

export interface BatchReport {
  startedAt: string;
  finishedAt: string;
  total: number;
  synced: number;
  conflicts: number;
  failed: number;
  /** Repositories another operation was already working on. */
  skipped: number;
}

export interface SyncSchedulerOptions {
  /** Six-field cron pattern (seconds first). */
  pattern?: string;
  concurrency?: number;
  timezone?: string;
}

type SyncTarget = Pick<RepositoryManager, 'listAllRepositories' | 'triggerSync'>;

export class SyncScheduler {
  readonly pattern: string;
  readonly concurrency: number;
  private readonly timezone: string | undefined;
  private job: Cron | null = null;
  private running = false;
  private last: BatchReport | null = null;

  constructor(
    private readonly manager: SyncTarget,
    options: SyncSchedulerOptions = {},
  ) {
    this.pattern = options.pattern ?? DEFAULT_SYNC_PATTERN;
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_SYNC_CONCURRENCY);
    this.timezone = options.timezone;
  }

  get state(): SchedulerState {
    return this.running ? 'running' : 'idle';
  }

  get lastBatch(): BatchReport | null {
    return this.last;
  }

  /** True while the cron job is active. */
  get isScheduled(): boolean {
    return this.job !== null;
  }

  /** Next scheduled tick, or null when the scheduler is stopped. */
  nextRun(): Date | null {
    return this.job?.nextRun() ?? null;
  }

  start(): void {
    if (this.job) return;
    this.job = new Cron(this.pattern, { timezone: this.timezone }, async () => {
      console.error('Starting scheduled repository sync');
      const report = await this.runBatch();
      if (report) {
        console.error(
          `Scheduled sync: ${report.total} repositories, ${report.synced} synced, ` +
          `${report.conflicts} conflicts, ${report.failed} failed, ${report.skipped} skipped`,
        );
      }
    });
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  /**
   * Run one batch now. Resolves with null without doing anything if a batch
   * is already running.
   */
  async runBatch(): Promise<BatchReport | null> {
    if (this.running) {
      console.error('Previous sync batch still running, skipping this tick');
      return null;
    }
    this.running = true;

    const report: BatchReport = {
      startedAt: new Date().toISOString(),
      finishedAt: '',
      total: 0,
      synced: 0,
      conflicts: 0,
      failed: 0,
      skipped: 0,
    };

    try {
      const repositories = this.manager.listAllRepositories();
      report.total = repositories.length;

      let next = 0;
      const worker = async (): Promise<void> => {
        while (next < repositories.length) {
          const repository = repositories[next++];
          await this.syncOne(repository, report);
        }
      };
      const workers = Math.min(this.concurrency, repositories.length);
      await Promise.all(Array.from({ length: workers }, worker));
    } catch (error) {
      console.error(`Sync batch aborted: ${errorMessage(error)}`);
    } finally {
      report.finishedAt = new Date().toISOString();
      this.last = report;
      this.running = false;
    }

    return report;
  }

  private async syncOne(repository: Repository, report: BatchReport): Promise<void> {
    try {
      const { outcome } = await this.manager.triggerSync(repository.id);
      switch (outcome.kind) {
        case 'failed':
          report.failed++;
          break;
        case 'local_changes_preserved':
          report.conflicts++;
          break;
        default:
          report.synced++;
      }
    } catch (error) {
      if (error instanceof SyncInProgressError) {
        report.skipped++;
        console.error(`Skipping ${repository.url}: sync already in progress`);
        return;
      }
      report.failed++;
      console.error(`Failed to sync repository ${repository.url}: ${errorMessage(error)}`);
    }
  }
}
