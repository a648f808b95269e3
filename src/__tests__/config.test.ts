import { describe, it, expect } from 'vitest';
import { resolve } from 'node:path';
import { loadConfig, syncTimeToPattern, type ServerConfig } from '../config.js';
import { DEFAULT_DB_PATH } from '../db/connection.js';

function configOf(args: string[], env: NodeJS.ProcessEnv = {}): ServerConfig {
  const parsed = loadConfig(args, env);
  if (parsed.help) throw new Error('unexpected --help');
  return parsed.config;
}

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(configOf([])).toEqual({
      dbPath: DEFAULT_DB_PATH,
      reposDir: resolve('repos'),
      port: 3030,
      host: '0.0.0.0',
      syncPattern: '0 0 2 * * *',
      syncTimezone: undefined,
      syncConcurrency: 4,
      gitTimeoutMs: 60_000,
      sessionTtlMs: 24 * 60 * 60 * 1000,
    });
  });

  it('reads flags', () => {
    const config = configOf([
      '--db-path', ':memory:',
      '--port', '8080',
      '--sync-time', '23:30',
      '--sync-concurrency', '8',
      '--git-timeout', '30',
      '--session-ttl', '2',
    ]);

    expect(config.dbPath).toBe(':memory:');
    expect(config.port).toBe(8080);
    expect(config.syncPattern).toBe('0 30 23 * * *');
    expect(config.syncConcurrency).toBe(8);
    expect(config.gitTimeoutMs).toBe(30_000);
    expect(config.sessionTtlMs).toBe(2 * 60 * 60 * 1000);
  });

  it('reads the environment, with flags taking precedence', () => {
    const env = { REPO_MIRROR_PORT: '9000', REPO_MIRROR_HOST: '127.0.0.1', REPO_MIRROR_SYNC_TZ: 'Europe/Oslo' };

    const config = configOf(['--port', '9100'], env);

    expect(config.port).toBe(9100);
    expect(config.host).toBe('127.0.0.1');
    expect(config.syncTimezone).toBe('Europe/Oslo');
  });

  it('lets a cron pattern override the daily time', () => {
    expect(configOf(['--sync-time', '04:00', '--sync-cron', '0 */15 * * * *']).syncPattern).toBe('0 */15 * * * *');
  });

  it('disables the schedule with --no-schedule', () => {
    expect(configOf(['--no-schedule']).syncPattern).toBeNull();
  });

  it('returns help without validating the rest', () => {
    expect(loadConfig(['--port', 'nope', '--help'], {})).toEqual({ help: true });
  });

  it('rejects unknown options and missing values', () => {
    expect(() => loadConfig(['--verbose'], {})).toThrow('Unknown option: --verbose');
    expect(() => loadConfig(['--port'], {})).toThrow('Missing value for --port');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig(['--port', 'abc'], {})).toThrow(/^Invalid configuration: port: /);
    expect(() => loadConfig(['--sync-time', '25:00'], {})).toThrow('Invalid configuration: syncTime: expected HH:MM');
    expect(() => loadConfig(['--sync-cron', 'every night'], {})).toThrow(
      'Invalid configuration: syncCron: invalid cron pattern',
    );
    expect(() => loadConfig(['--sync-concurrency', '0'], {})).toThrow(/^Invalid configuration: syncConcurrency: /);
  });
});

describe('syncTimeToPattern', () => {
  it('converts HH:MM to a seconds-first cron pattern', () => {
    expect(syncTimeToPattern('02:00')).toBe('0 0 2 * * *');
    expect(syncTimeToPattern('7:05')).toBe('0 5 7 * * *');
  });

  it('rejects out-of-range times', () => {
    expect(() => syncTimeToPattern('24:00')).toThrow('Invalid sync time "24:00", expected HH:MM');
  });
});
