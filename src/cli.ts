#!/usr/bin/env node
// ---------------------------------------------------------------------------
// Batch entry point
//
//   INVENTORY_MODE=full SCAN_REPORT_PATH=... ROSTER_PATH=... node dist/cli.js
//
// All locations and the mode come from the environment (or .env); see
// loadBatchConfig for the variables each mode requires.
// ---------------------------------------------------------------------------

import pino from 'pino';
import { loadBatchConfig } from './config';
import { createDb, initDb } from './db';
import { runJob } from './jobs';

async function main(): Promise<void> {
  const config = loadBatchConfig();
  const logger = pino({ level: config.logLevel });
  const db = createDb(config.databasePath);

  try {
    await initDb(db);
    await runJob(config.job, { db, logger, inventory: config.inventory });
  } finally {
    await db.destroy();
  }
}

main().catch((err: unknown) => {
  pino().error({ err }, 'Inventory job aborted');
  process.exitCode = 1;
});
