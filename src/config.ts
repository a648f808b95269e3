/**
 * Server configuration from command-line flags, with environment variables
 * as fallback. Validated with zod; `loadConfig` throws on bad input.
 */

import { z } from 'zod';
import { resolve } from 'node:path';
import { Cron } from 'croner';
import { DEFAULT_DB_PATH } from './db/connection.js';
import { DEFAULT_GIT_TIMEOUT_MS } from './sync/git.js';
import { DEFAULT_SYNC_CONCURRENCY } from './sync/scheduler.js';
import { DEFAULT_SESSION_TTL_MS } from './auth/sessions.js';

export interface ServerConfig {
  dbPath: string;
  reposDir: string;
  port: number;
  host: string;
  /** Six-field cron pattern, or null when scheduled sync is disabled. */
  syncPattern: string | null;
  syncTimezone: string | undefined;
  syncConcurrency: number;
  gitTimeoutMs: number;
  sessionTtlMs: number;
}

export const USAGE = `
repo-mirror — keeps local mirrors of remote git repositories current

Usage:
  repo-mirror [options]

Options:
  --db-path <path>            SQLite database (env REPO_MIRROR_DB, default: ./data/repo-mirror.db)
  --repos-dir <path>          Root of the working copies (env REPO_MIRROR_REPOS_DIR, default: ./repos)
  --port <port>               HTTP port (env REPO_MIRROR_PORT, default: 3030)
  --host <address>            Bind address (env REPO_MIRROR_HOST, default: 0.0.0.0)
  --sync-time <HH:MM>         Daily sync time (env REPO_MIRROR_SYNC_TIME, default: 02:00)
  --sync-cron <pattern>       Six-field cron pattern, overrides --sync-time (env REPO_MIRROR_SYNC_CRON)
  --sync-timezone <tz>        IANA timezone for the schedule (env REPO_MIRROR_SYNC_TZ, default: local)
  --no-schedule               Disable scheduled sync
  --sync-concurrency <n>      Repositories synced in parallel (default: 4)
  --git-timeout <seconds>     Timeout for clone, fetch and merge (default: 60)
  --session-ttl <hours>       Session lifetime (default: 24)
  --help                      Show this help message
`;

const SYNC_TIME_RE = /^([01]?\d|2[0-3]):([0-5]\d)$/;

/** Convert a daily `HH:MM` wall-clock time to a cron pattern. */
export function syncTimeToPattern(time: string): string {
  const match = time.match(SYNC_TIME_RE);
  if (!match) {
    throw new Error(`Invalid sync time "${time}", expected HH:MM`);
  }
  return `0 ${parseInt(match[2], 10)} ${parseInt(match[1], 10)} * * *`;
}

function isValidPattern(pattern: string): boolean {
  try {
    new Cron(pattern, { paused: true }).stop();
    return true;
  } catch {
    return false;
  }
}

const intString = (min: number, max: number) =>
  z.coerce.number().int().min(min).max(max);

const RawConfigSchema = z.object({
  dbPath: z.string().min(1),
  reposDir: z.string().min(1),
  port: intString(0, 65535),
  host: z.string().min(1),
  syncTime: z.string().regex(SYNC_TIME_RE, 'expected HH:MM'),
  syncCron: z.string().refine(isValidPattern, 'invalid cron pattern').optional(),
  syncTimezone: z.string().optional(),
  schedule: z.boolean(),
  syncConcurrency: intString(1, 32),
  gitTimeoutSec: intString(1, 3600),
  sessionTtlHours: intString(1, 24 * 30),
});

export type ParsedArgs = { help: true } | { help: false; config: ServerConfig };

/**
 * Parse argv (without the node and script entries) and the environment.
 * Unknown flags are rejected.
 */
export function loadConfig(
  args: string[],
  env: NodeJS.ProcessEnv = process.env,
): ParsedArgs {
  const raw: Record<string, string | boolean | undefined> = {
    dbPath: env.REPO_MIRROR_DB ?? DEFAULT_DB_PATH,
    reposDir: env.REPO_MIRROR_REPOS_DIR ?? 'repos',
    port: env.REPO_MIRROR_PORT ?? '3030',
    host: env.REPO_MIRROR_HOST ?? '0.0.0.0',
    syncTime: env.REPO_MIRROR_SYNC_TIME ?? '02:00',
    syncCron: env.REPO_MIRROR_SYNC_CRON,
    syncTimezone: env.REPO_MIRROR_SYNC_TZ,
    schedule: true,
    syncConcurrency: String(DEFAULT_SYNC_CONCURRENCY),
    gitTimeoutSec: String(DEFAULT_GIT_TIMEOUT_MS / 1000),
    sessionTtlHours: String(DEFAULT_SESSION_TTL_MS / (60 * 60 * 1000)),
  };

  const valueFlags = new Map<string, string>([
    ['--db-path', 'dbPath'],
    ['--repos-dir', 'reposDir'],
    ['--port', 'port'],
    ['--host', 'host'],
    ['--sync-time', 'syncTime'],
    ['--sync-cron', 'syncCron'],
    ['--sync-timezone', 'syncTimezone'],
    ['--sync-concurrency', 'syncConcurrency'],
    ['--git-timeout', 'gitTimeoutSec'],
    ['--session-ttl', 'sessionTtlHours'],
  ]);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help') {
      return { help: true };
    } else if (arg === '--no-schedule') {
      raw.schedule = false;
    } else {
      const key = valueFlags.get(arg);
      if (!key) {
        throw new Error(`Unknown option: ${arg}`);
      }
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      raw[key] = value;
      i++;
    }
  }

  const result = RawConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const parsed = result.data;

  let syncPattern: string | null = null;
  if (parsed.schedule) {
    syncPattern = parsed.syncCron ?? syncTimeToPattern(parsed.syncTime);
  }

  return {
    help: false,
    config: {
      dbPath: parsed.dbPath === ':memory:' ? parsed.dbPath : resolve(parsed.dbPath),
      reposDir: resolve(parsed.reposDir),
      port: parsed.port,
      host: parsed.host,
      syncPattern,
      syncTimezone: parsed.syncTimezone,
      syncConcurrency: parsed.syncConcurrency,
      gitTimeoutMs: parsed.gitTimeoutSec * 1000,
      sessionTtlMs: parsed.sessionTtlHours * 60 * 60 * 1000,
    },
  };
}
