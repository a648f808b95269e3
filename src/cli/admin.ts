#!/usr/bin/env node

/**
 * User administration entry point (repo-mirror-admin).
 */

import { getDb, closeDb } from '../db/connection.js';
import { errorMessage } from '../errors.js';
import { ADMIN_USAGE, runAdminCommand } from './admin-commands.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  let dbPath = process.env.REPO_MIRROR_DB;

  if (args[0] === '--db-path') {
    dbPath = args[1];
    args.splice(0, 2);
  }
  if (args[0] === '--help' || args.length === 0) {
    console.error(ADMIN_USAGE);
    process.exit(args.length === 0 ? 1 : 0);
  }

  getDb(dbPath);
  try {
    const result = await runAdminCommand(args);
    for (const line of result.lines) {
      if (result.exitCode === 0) console.log(line);
      else console.error(line);
    }
    process.exitCode = result.exitCode;
  } finally {
    closeDb();
  }
}

main().catch((error) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
