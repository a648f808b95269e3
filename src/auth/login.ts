import { getUserByUsername } from '../db/queries.js';
import { AuthenticationError } from '../errors.js';
import type { SessionToken } from '../types.js';
import { verifyPassword } from './passwords.js';
import type { SessionTable } from './sessions.js';

/**
 * Check credentials against the users table and open a session.
 * Unknown users and wrong passwords fail the same way.
 */
export async function login(
  sessions: SessionTable,
  username: string,
  password: string,
): Promise<SessionToken> {
  const user = getUserByUsername(username);
  if (!user || !(await verifyPassword(password, user.passwordHash))) {
    throw new AuthenticationError();
  }
  return sessions.create(user.username);
}
