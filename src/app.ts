// ---------------------------------------------------------------------------
// Fastify application
//
// Built separately from the listening entry point (server.ts) so tests can
// drive it with server.inject().  The app owns the knex handle it is given:
// closing the server destroys it.
// ---------------------------------------------------------------------------

import https from 'https';
import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { Knex } from 'knex';
import type { InventoryOptions } from './inventory/types';
import { registerRequestLogger } from './middleware/request-logger';
import authPlugin from './plugins/auth';
import { inventoryRoutes } from './routes/inventory';

export interface AppOptions {
  db: Knex;
  apiKey: string;
  inventory: InventoryOptions;
  logger?: FastifyServerOptions['logger'];
  bodyLimit?: number;
  /** PEM key + certificate; plain HTTP when omitted. */
  tls?: { key: Buffer; cert: Buffer };
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { tls } = options;

  const server = Fastify({
    logger: options.logger ?? false,
    bodyLimit: options.bodyLimit,
    serverFactory: tls ? (handler) => https.createServer(tls, handler) : undefined,
  });

  server.addHook('onClose', async () => {
    await options.db.destroy();
  });

  // ── Round-trip request/response logger ───────────────────────────────────
  registerRequestLogger(server, options.db);

  // ── Plugins ───────────────────────────────────────────────────────────────
  await server.register(authPlugin, { apiKey: options.apiKey });

  // ── Authenticated inventory routes ────────────────────────────────────────
  await server.register(inventoryRoutes, {
    prefix: '/inventory',
    db: options.db,
    inventory: options.inventory,
  });

  // Health check — unauthenticated, used by load balancers and monitoring
  server.get('/health', async (_request, reply) => {
    return reply.status(200).send({ status: 'ok', service: 'inventory-reconciler' });
  });

  return server;
}
