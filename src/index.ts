#!/usr/bin/env node

import { mkdirSync } from 'node:fs';
import { getDb, closeDb } from './db/connection.js';
import { sqliteRepositoryStore } from './db/queries.js';
import { SessionTable } from './auth/sessions.js';
import { createRequestHandler } from './http/handler.js';
import { startApiServer, stopApiServer } from './http/server.js';
import { loadConfig, USAGE, type ServerConfig } from './config.js';
import { errorMessage } from './errors.js';
import {
  GitWorkingCopyAdapter,
  RepositoryManager,
  SyncScheduler,
} from './sync/index.js';

const SESSION_SWEEP_MS = 15 * 60 * 1000;

async function main(config: ServerConfig): Promise<void> {
  // Initialize database
  getDb(config.dbPath);
  console.error(`Database initialized at ${config.dbPath}`);

  mkdirSync(config.reposDir, { recursive: true });

  const manager = new RepositoryManager({
    store: sqliteRepositoryStore,
    adapter: new GitWorkingCopyAdapter({ timeoutMs: config.gitTimeoutMs }),
    reposDir: config.reposDir,
  });

  const recovered = manager.recoverInterrupted();
  if (recovered > 0) {
    console.error(`Marked ${recovered} interrupted repositories as error`);
  }

  const scheduler = new SyncScheduler(manager, {
    pattern: config.syncPattern ?? undefined,
    concurrency: config.syncConcurrency,
    timezone: config.syncTimezone,
  });
  if (config.syncPattern) {
    scheduler.start();
    console.error(
      `Scheduled sync: "${config.syncPattern}", next run ${scheduler.nextRun()?.toISOString() ?? 'never'}`,
    );
  } else {
    console.error('Scheduled sync disabled');
  }

  const sessions = new SessionTable({ ttlMs: config.sessionTtlMs });
  const sweepInterval = setInterval(() => {
    const removed = sessions.sweep();
    if (removed > 0) {
      console.error(`Session sweep: ${removed} expired sessions removed`);
    }
  }, SESSION_SWEEP_MS);
  sweepInterval.unref();

  const handler = createRequestHandler({ manager, sessions, scheduler });
  await startApiServer(handler, config.port, config.host);

  // Clean shutdown
  const shutdown = async () => {
    scheduler.stop();
    clearInterval(sweepInterval);
    await stopApiServer();
    closeDb();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

let parsed: ReturnType<typeof loadConfig>;
try {
  parsed = loadConfig(process.argv.slice(2));
} catch (error) {
  console.error(`Error: ${errorMessage(error)}`);
  console.error(USAGE);
  process.exit(1);
}

if (parsed.help) {
  console.error(USAGE);
  process.exit(0);
}

main(parsed.config).catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
