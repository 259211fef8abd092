import type { InventoryRunRow } from './types';

// ---------------------------------------------------------------------------
// Error envelope
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  status: number;
  errorType?: string;
  detail: string;
}

export function formatError(status: number, detail: string, errorType?: string): ErrorResponse {
  return {
    status,
    ...(errorType ? { errorType } : {}),
    detail,
  };
}

// ---------------------------------------------------------------------------
// Run audit rows → API shape
// ---------------------------------------------------------------------------

export interface RunResource {
  runId: string;
  mode: InventoryRunRow['mode'];
  source: InventoryRunRow['source'];
  status: InventoryRunRow['status'];
  inputCount: number;
  outputCount: number | null;
  matchedCount: number | null;
  unmatchedCount: number | null;
  skippedBlankNames: number;
  error: string | null;
  durationMs: number;
  created: string;
}

export function formatRun(row: InventoryRunRow): RunResource {
  return {
    runId: row.run_id,
    mode: row.mode,
    source: row.source,
    status: row.status,
    inputCount: row.input_count,
    outputCount: row.output_count,
    matchedCount: row.matched_count,
    unmatchedCount: row.unmatched_count,
    skippedBlankNames: row.skipped_blank_names,
    error: row.last_error,
    durationMs: row.duration_ms,
    created: row.created_at,
  };
}

export interface ListResponse<T> {
  totalResults: number;
  resources: T[];
}

export function formatListResponse<T>(resources: T[]): ListResponse<T> {
  return { totalResults: resources.length, resources };
}
