/**
 * In-memory session tokens.
 *
 * Tokens live only in this process and vanish on restart. Expired tokens
 * read as absent and are dropped on lookup; `sweep()` removes the rest.
 * Node runs handlers on one thread, so each map operation is atomic and no
 * further guard is needed.
 */

import { randomBytes } from 'node:crypto';
import type { SessionToken } from '../types.js';

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

export class SessionTable {
  private readonly sessions = new Map<string, SessionToken>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  create(username: string): SessionToken {
    const issuedAt = this.now();
    const session: SessionToken = {
      token: randomBytes(32).toString('hex'),
      username,
      issuedAt,
      expiresAt: issuedAt + this.ttlMs,
    };
    this.sessions.set(session.token, session);
    return session;
  }

  /** The live session for a token, or null if unknown or expired. */
  validate(token: string): SessionToken | null {
    const session = this.sessions.get(token);
    if (!session) return null;
    if (session.expiresAt <= this.now()) {
      this.sessions.delete(token);
      return null;
    }
    return session;
  }

  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }

  /** Drop every expired session. Returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (session.expiresAt <= now) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
