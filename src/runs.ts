// ---------------------------------------------------------------------------
// Run audit log
//
// Every selection / reconciliation (API or batch) is written to
// inventory_runs, including failed ones.
// ---------------------------------------------------------------------------

import type { Knex } from 'knex';
import { v4 as uuidv4 } from 'uuid';
import type { InventoryRunRow, RunMode, RunSource, RunStatus } from './types';

export interface RunRecord {
  runId?: string;
  mode: RunMode;
  source: RunSource;
  inputCount: number;
  outputCount?: number | null;
  matchedCount?: number | null;
  unmatchedCount?: number | null;
  skippedBlankNames?: number;
  status: RunStatus;
  error?: string | null;
  durationMs: number;
}

export function newRunId(): string {
  return uuidv4();
}

/** Insert one audit row and return its run id. */
export async function recordRun(db: Knex, run: RunRecord): Promise<string> {
  const runId = run.runId ?? newRunId();

  await db('inventory_runs').insert({
    run_id: runId,
    mode: run.mode,
    source: run.source,
    input_count: run.inputCount,
    output_count: run.outputCount ?? null,
    matched_count: run.matchedCount ?? null,
    unmatched_count: run.unmatchedCount ?? null,
    skipped_blank_names: run.skippedBlankNames ?? 0,
    status: run.status,
    last_error: run.error ? run.error.substring(0, 2000) : null,
    duration_ms: run.durationMs,
    created_at: new Date().toISOString(),
  });

  return runId;
}

export async function listRuns(db: Knex, limit: number): Promise<InventoryRunRow[]> {
  const rows = await db<InventoryRunRow>('inventory_runs')
    .orderBy('id', 'desc')
    .limit(limit)
    .select();
  return rows;
}

export async function getRun(db: Knex, runId: string): Promise<InventoryRunRow | undefined> {
  const row = await db<InventoryRunRow>('inventory_runs').where({ run_id: runId }).first();
  return row;
}
