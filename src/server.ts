// ---------------------------------------------------------------------------
// Fastify server — entry point
// ---------------------------------------------------------------------------

import fs from 'fs';
import { buildApp } from './app';
import { loadServerConfig } from './config';
import { createDb, initDb } from './db';

async function start(): Promise<void> {
  const config = loadServerConfig();
  const db = createDb(config.databasePath);

  // ── Database ──────────────────────────────────────────────────────────────
  await initDb(db);

  const server = await buildApp({
    db,
    apiKey: config.apiKey,
    inventory: config.inventory,
    bodyLimit: config.bodyLimit,
    logger: { level: config.logLevel },
    tls: config.ssl
      ? {
          key: fs.readFileSync(config.ssl.keyPath),
          cert: fs.readFileSync(config.ssl.certPath),
        }
      : undefined,
  });
  server.log.info('Database initialised');

  // ── Start ─────────────────────────────────────────────────────────────────
  try {
    await server.listen({ port: config.port, host: '0.0.0.0' });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  console.error('Failed to start inventory-reconciler:', err);
  process.exit(1);
});
