// ---------------------------------------------------------------------------
// Round-trip HTTP request/response logger
//
//   onRequest  → remember the start time
//   onSend     → capture the serialised response payload
//   onResponse → INSERT one incoming_requests row with status + duration
//
// Request bodies are not stored (scan reports can run to megabytes); only
// their size is.  Per-request state lives in a Map keyed by request.id.
// ---------------------------------------------------------------------------

import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';

const MAX_STORED_BODY = 65_535;

interface RequestMeta {
  startTime: number;
  responseBody: string | null;
}

function payloadText(payload: unknown): string | null {
  if (typeof payload === 'string') return payload;
  if (Buffer.isBuffer(payload)) return payload.toString('utf8');
  return null;
}

export function registerRequestLogger(server: FastifyInstance, db: Knex): void {
  const meta = new Map<string, RequestMeta>();

  server.addHook('onRequest', async (request) => {
    meta.set(request.id, { startTime: Date.now(), responseBody: null });
  });

  server.addHook('onSend', async (request, _reply, payload) => {
    const entry = meta.get(request.id);
    if (entry) entry.responseBody = payloadText(payload);
    return payload;
  });

  server.addHook('onResponse', async (request, reply) => {
    const entry = meta.get(request.id);
    if (!entry) return;
    meta.delete(request.id);

    const length = Number(request.headers['content-length']);

    try {
      await db('incoming_requests').insert({
        method: request.method,
        url: request.url,
        ip: request.ip,
        request_bytes: Number.isFinite(length) ? length : null,
        response_status: reply.statusCode,
        response_body: entry.responseBody
          ? entry.responseBody.substring(0, MAX_STORED_BODY)
          : null,
        duration_ms: Date.now() - entry.startTime,
      });
    } catch (err) {
      server.log.error({ err }, '[request-logger] Failed to insert incoming_requests row');
    }
  });
}
