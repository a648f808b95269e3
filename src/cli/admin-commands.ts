/**
 * User administration commands behind repo-mirror-admin.
 */

import { deleteUser, listUsers, updateUserPassword, upsertUser } from '../db/queries.js';
import { hashPassword } from '../auth/passwords.js';

export const ADMIN_USAGE = `
repo-mirror-admin — user administration

Usage:
  repo-mirror-admin [--db-path <path>] <command>

Commands:
  add <username> <password>      Add a user, or replace an existing user's password
  remove <username>              Remove a user
  update <username> <password>   Change an existing user's password
  list                           List all users

Environment:
  REPO_MIRROR_DB                 SQLite database (default: ./data/repo-mirror.db)
`;

export interface AdminResult {
  exitCode: number;
  lines: string[];
}

/**
 * Run one admin command. Output lines are returned rather than printed so
 * the command can be exercised without a terminal.
 */
export async function runAdminCommand(args: string[]): Promise<AdminResult> {
  const [command, ...rest] = args;

  switch (command) {
    case 'add': {
      if (rest.length !== 2) return { exitCode: 1, lines: ['Usage: repo-mirror-admin add <username> <password>'] };
      const [username, password] = rest;
      upsertUser(username, await hashPassword(password));
      return { exitCode: 0, lines: [`User '${username}' created/updated`] };
    }
    case 'remove': {
      if (rest.length !== 1) return { exitCode: 1, lines: ['Usage: repo-mirror-admin remove <username>'] };
      const [username] = rest;
      return deleteUser(username)
        ? { exitCode: 0, lines: [`User '${username}' removed`] }
        : { exitCode: 0, lines: [`User '${username}' not found`] };
    }
    case 'update': {
      if (rest.length !== 2) return { exitCode: 1, lines: ['Usage: repo-mirror-admin update <username> <password>'] };
      const [username, password] = rest;
      if (!updateUserPassword(username, await hashPassword(password))) {
        return {
          exitCode: 1,
          lines: [`User '${username}' not found. Use 'add ${username} <password>' to create one.`],
        };
      }
      return { exitCode: 0, lines: [`Password for user '${username}' updated`] };
    }
    case 'list': {
      const users = listUsers();
      if (users.length === 0) return { exitCode: 0, lines: ['No users found'] };
      return {
        exitCode: 0,
        lines: users.map((user) => `${user.username}\t(created ${user.createdAt})`),
      };
    }
    default:
      return {
        exitCode: 1,
        lines: [command ? `Unknown command: ${command}` : 'Missing command', ADMIN_USAGE],
      };
  }
}
