// ---------------------------------------------------------------------------
// Batch job runner
//
// Reads the configured tables, runs the selector and/or reconciler, writes the
// result tables and records the run.  The mode comes from JobConfig; nothing
// here prompts or reads the environment.
// ---------------------------------------------------------------------------

import type { Knex } from 'knex';
import type { Logger } from 'pino';
import type { FullJobConfig, JobConfig, LatestJobConfig, ReconcileJobConfig } from './config';
import {
  canonicalColumns,
  canonicalToRow,
  rosterToRow,
  rowsToCanonicalRecords,
  rowsToRoster,
  rowsToScanRecords,
  UNMATCHED_COLUMN,
} from './config/mapping';
import { readTable, writeTable } from './io/tabular';
import { reconcile } from './inventory/reconciler';
import { selectLatest } from './inventory/selector';
import type { CanonicalRecord, InventoryOptions, ReconciliationResult } from './inventory/types';
import { newRunId, recordRun } from './runs';
import type { RunMode } from './types';

export interface JobDeps {
  db: Knex;
  logger: Logger;
  inventory: InventoryOptions;
}

export interface JobSummary {
  runId: string;
  mode: RunMode;
  inputCount: number;
  canonicalCount: number | null;
  matchedCount: number | null;
  unmatchedCount: number | null;
  skippedBlankNames: number;
  collidingKeys: string[];
}

export async function runJob(job: JobConfig, deps: JobDeps): Promise<JobSummary> {
  const runId = newRunId();
  const log = deps.logger.child({ runId, mode: job.mode });
  const startTime = Date.now();

  log.info('Inventory job started');

  let summary: JobSummary;
  try {
    summary = await execute(job, runId, deps);
  } catch (err) {
    log.error({ err }, 'Inventory job failed');
    await recordRun(deps.db, {
      runId,
      mode: job.mode,
      source: 'batch',
      inputCount: 0,
      status: 'failed',
      error: err instanceof Error ? err.message : String(err),
      durationMs: Date.now() - startTime,
    });
    throw err;
  }

  if (summary.skippedBlankNames > 0) {
    log.warn({ skippedBlankNames: summary.skippedBlankNames }, 'Scan records without a workstation name were skipped');
  }
  if (summary.collidingKeys.length > 0) {
    log.warn({ collidingKeys: summary.collidingKeys }, 'Reference table has names that collide after normalization');
  }

  await recordRun(deps.db, {
    runId,
    mode: summary.mode,
    source: 'batch',
    inputCount: summary.inputCount,
    outputCount: summary.canonicalCount,
    matchedCount: summary.matchedCount,
    unmatchedCount: summary.unmatchedCount,
    skippedBlankNames: summary.skippedBlankNames,
    status: 'completed',
    durationMs: Date.now() - startTime,
  });

  log.info(
    {
      inputCount: summary.inputCount,
      canonicalCount: summary.canonicalCount,
      matchedCount: summary.matchedCount,
      unmatchedCount: summary.unmatchedCount,
    },
    'Inventory job completed',
  );

  return summary;
}

// ---------------------------------------------------------------------------
// Modes
// ---------------------------------------------------------------------------

function execute(job: JobConfig, runId: string, deps: JobDeps): Promise<JobSummary> {
  switch (job.mode) {
    case 'latest':
      return runLatest(job, runId, deps);
    case 'reconcile':
      return runReconcile(job, runId);
    case 'full':
      return runFull(job, runId, deps);
  }
}

async function runLatest(job: LatestJobConfig, runId: string, deps: JobDeps): Promise<JobSummary> {
  const scans = rowsToScanRecords(await readTable(job.scanReportPath), job.scanReportPath);
  const selection = selectLatest(scans, deps.inventory);

  await writeLatest(job.latestOutputPath, selection.records);

  return {
    runId,
    mode: job.mode,
    inputCount: scans.length,
    canonicalCount: selection.records.length,
    matchedCount: null,
    unmatchedCount: null,
    skippedBlankNames: selection.skippedBlankNames,
    collidingKeys: [],
  };
}

async function runReconcile(job: ReconcileJobConfig, runId: string): Promise<JobSummary> {
  const reference = rowsToCanonicalRecords(await readTable(job.referencePath), job.referencePath);
  const roster = rowsToRoster(await readTable(job.rosterPath), job.rosterPath);
  const result = reconcile(reference, roster);

  await writeReconciliation(job, result);

  return {
    runId,
    mode: job.mode,
    inputCount: roster.length,
    canonicalCount: reference.length,
    matchedCount: result.matched.length,
    unmatchedCount: result.unmatched.length,
    skippedBlankNames: 0,
    collidingKeys: result.collidingKeys,
  };
}

async function runFull(job: FullJobConfig, runId: string, deps: JobDeps): Promise<JobSummary> {
  const scans = rowsToScanRecords(await readTable(job.scanReportPath), job.scanReportPath);
  const roster = rowsToRoster(await readTable(job.rosterPath), job.rosterPath);
  const selection = selectLatest(scans, deps.inventory);
  const result = reconcile(selection.records, roster);

  if (job.latestOutputPath) {
    await writeLatest(job.latestOutputPath, selection.records);
  }
  await writeReconciliation(job, result);

  return {
    runId,
    mode: job.mode,
    inputCount: scans.length,
    canonicalCount: selection.records.length,
    matchedCount: result.matched.length,
    unmatchedCount: result.unmatched.length,
    skippedBlankNames: selection.skippedBlankNames,
    collidingKeys: result.collidingKeys,
  };
}

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

async function writeLatest(filePath: string, records: readonly CanonicalRecord[]): Promise<void> {
  await writeTable(filePath, canonicalColumns(), records.map(canonicalToRow));
}

async function writeReconciliation(
  paths: { matchedOutputPath: string; unmatchedOutputPath: string },
  result: ReconciliationResult,
): Promise<void> {
  await writeTable(paths.matchedOutputPath, canonicalColumns(), result.matched.map(canonicalToRow));
  await writeTable(paths.unmatchedOutputPath, [UNMATCHED_COLUMN], result.unmatched.map(rosterToRow));
}
