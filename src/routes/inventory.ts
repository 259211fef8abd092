// ---------------------------------------------------------------------------
// /inventory endpoints
//
//   POST /inventory/latest     — latest record per workstation
//   POST /inventory/reconcile  — roster vs. reference (or vs. raw scan records)
//   GET  /inventory/runs       — run audit log, newest first
//
// Every POST is recorded in inventory_runs, whether it succeeds or fails.
// ---------------------------------------------------------------------------

import type { FastifyInstance, FastifyReply } from 'fastify';
import type { Knex } from 'knex';
import { formatError, formatListResponse, formatRun } from '../formatter';
import { mapInventoryErrorToHttp } from '../inventory/errors';
import { reconcile } from '../inventory/reconciler';
import { selectLatest } from '../inventory/selector';
import type { InventoryOptions } from '../inventory/types';
import { listRuns, newRunId, recordRun } from '../runs';
import type { RunMode } from '../types';
import { latestBodySchema, reconcileBodySchema, runsQuerySchema } from './schemas';

export interface InventoryRoutesOptions {
  db: Knex;
  inventory: InventoryOptions;
}

export async function inventoryRoutes(
  server: FastifyInstance,
  { db, inventory }: InventoryRoutesOptions,
): Promise<void> {
  server.addHook('onRequest', server.authenticate);

  async function fail(
    reply: FastifyReply,
    err: unknown,
    run: { runId: string; mode: RunMode; inputCount: number; startTime: number },
  ): Promise<FastifyReply> {
    const { status, errorType, detail } = mapInventoryErrorToHttp(err);
    if (status >= 500) {
      server.log.error({ err, runId: run.runId }, `${run.mode} run failed`);
    } else {
      server.log.warn({ runId: run.runId, errorType, detail }, `${run.mode} run rejected`);
    }

    await recordRun(db, {
      runId: run.runId,
      mode: run.mode,
      source: 'api',
      inputCount: run.inputCount,
      status: 'failed',
      error: err instanceof Error ? err.message : String(err),
      durationMs: Date.now() - run.startTime,
    });

    return reply.status(status).send(formatError(status, detail, errorType));
  }

  // ──────────────────────────────────────────────────────────────────────────
  // POST /inventory/latest
  // ──────────────────────────────────────────────────────────────────────────

  server.post('/latest', async (request, reply) => {
    const parsed = latestBodySchema.safeParse(request.body);
    if (!parsed.success) {
      const { status, errorType, detail } = mapInventoryErrorToHttp(parsed.error);
      return reply.status(status).send(formatError(status, detail, errorType));
    }

    const { records, groupKeyPolicy } = parsed.data;
    const runId = newRunId();
    const startTime = Date.now();

    try {
      const selection = selectLatest(records, {
        ...inventory,
        groupKeyPolicy: groupKeyPolicy ?? inventory.groupKeyPolicy,
      });

      if (selection.skippedBlankNames > 0) {
        server.log.warn(
          { runId, skippedBlankNames: selection.skippedBlankNames },
          'Scan records without a workstation name were skipped',
        );
      }

      await recordRun(db, {
        runId,
        mode: 'latest',
        source: 'api',
        inputCount: records.length,
        outputCount: selection.records.length,
        skippedBlankNames: selection.skippedBlankNames,
        status: 'completed',
        durationMs: Date.now() - startTime,
      });

      return reply.status(200).send({
        runId,
        totalResults: selection.records.length,
        skippedBlankNames: selection.skippedBlankNames,
        records: selection.records,
      });
    } catch (err) {
      return fail(reply, err, { runId, mode: 'latest', inputCount: records.length, startTime });
    }
  });

  // ──────────────────────────────────────────────────────────────────────────
  // POST /inventory/reconcile
  // ──────────────────────────────────────────────────────────────────────────

  server.post('/reconcile', async (request, reply) => {
    const parsed = reconcileBodySchema.safeParse(request.body);
    if (!parsed.success) {
      const { status, errorType, detail } = mapInventoryErrorToHttp(parsed.error);
      return reply.status(status).send(formatError(status, detail, errorType));
    }

    const body = parsed.data;
    // Raw scan records go through the selector first: a "full" run.
    const mode: RunMode = body.reference ? 'reconcile' : 'full';
    const runId = newRunId();
    const startTime = Date.now();
    const inputCount = body.records?.length ?? body.roster.length;

    try {
      let reference = body.reference ?? [];
      let skippedBlankNames = 0;
      if (body.records) {
        const selection = selectLatest(body.records, {
          ...inventory,
          groupKeyPolicy: body.groupKeyPolicy ?? inventory.groupKeyPolicy,
        });
        reference = selection.records;
        skippedBlankNames = selection.skippedBlankNames;
      }

      const result = reconcile(reference, body.roster);

      if (result.collidingKeys.length > 0) {
        server.log.warn(
          { runId, collidingKeys: result.collidingKeys },
          'Reference table has names that collide after normalization',
        );
      }

      await recordRun(db, {
        runId,
        mode,
        source: 'api',
        inputCount,
        outputCount: reference.length,
        matchedCount: result.matched.length,
        unmatchedCount: result.unmatched.length,
        skippedBlankNames,
        status: 'completed',
        durationMs: Date.now() - startTime,
      });

      return reply.status(200).send({
        runId,
        summary: {
          rosterSize: body.roster.length,
          matchedCount: result.matched.length,
          unmatchedCount: result.unmatched.length,
          collidingKeys: result.collidingKeys,
        },
        matched: result.matched,
        unmatched: result.unmatched,
      });
    } catch (err) {
      return fail(reply, err, { runId, mode, inputCount, startTime });
    }
  });

  // ──────────────────────────────────────────────────────────────────────────
  // GET /inventory/runs
  // ──────────────────────────────────────────────────────────────────────────

  server.get('/runs', async (request, reply) => {
    const parsed = runsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      const { status, errorType, detail } = mapInventoryErrorToHttp(parsed.error);
      return reply.status(status).send(formatError(status, detail, errorType));
    }

    try {
      const rows = await listRuns(db, parsed.data.limit);
      return reply.status(200).send(formatListResponse(rows.map(formatRun)));
    } catch (err) {
      server.log.error({ err }, 'GET /inventory/runs failed');
      return reply.status(500).send(formatError(500, 'Internal server error'));
    }
  });
}
