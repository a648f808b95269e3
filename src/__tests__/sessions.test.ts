import { describe, it, expect } from 'vitest';
import { SessionTable } from '../auth/sessions.js';

function clock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe('SessionTable', () => {
  it('issues distinct 64-character hex tokens', () => {
    const sessions = new SessionTable();
    const a = sessions.create('alice');
    const b = sessions.create('alice');

    expect(a.token).toMatch(/^[0-9a-f]{64}$/);
    expect(a.token).not.toBe(b.token);
    expect(sessions.size).toBe(2);
  });

  it('sets expiry from the configured lifetime', () => {
    const time = clock();
    const sessions = new SessionTable({ ttlMs: 5000, now: time.now });

    const session = sessions.create('alice');

    expect(session.issuedAt).toBe(1_000_000);
    expect(session.expiresAt).toBe(1_005_000);
  });

  it('validates a live token', () => {
    const time = clock();
    const sessions = new SessionTable({ ttlMs: 5000, now: time.now });
    const session = sessions.create('alice');
    time.advance(4999);

    expect(sessions.validate(session.token)?.username).toBe('alice');
  });

  it('treats a token as expired from its expiry instant and drops it', () => {
    const time = clock();
    const sessions = new SessionTable({ ttlMs: 5000, now: time.now });
    const session = sessions.create('alice');
    time.advance(5000);

    expect(sessions.validate(session.token)).toBeNull();
    expect(sessions.size).toBe(0);
  });

  it('rejects unknown and revoked tokens', () => {
    const sessions = new SessionTable();
    const session = sessions.create('alice');

    expect(sessions.validate('not-a-token')).toBeNull();
    expect(sessions.revoke(session.token)).toBe(true);
    expect(sessions.revoke(session.token)).toBe(false);
    expect(sessions.validate(session.token)).toBeNull();
  });

  it('sweeps only expired sessions', () => {
    const time = clock();
    const sessions = new SessionTable({ ttlMs: 5000, now: time.now });
    sessions.create('old');
    time.advance(3000);
    const fresh = sessions.create('new');
    time.advance(2000);

    expect(sessions.sweep()).toBe(1);
    expect(sessions.size).toBe(1);
    expect(sessions.validate(fresh.token)?.username).toBe('new');
  });
});
