// ---------------------------------------------------------------------------
// Database row types for inventory-reconciler
// ---------------------------------------------------------------------------

export type RunMode = 'latest' | 'reconcile' | 'full';

export type RunSource = 'api' | 'batch';

export type RunStatus = 'completed' | 'failed';

export interface InventoryRunRow {
  id: number;
  run_id: string;
  mode: RunMode;
  source: RunSource;
  /** Scan records read (or roster size for a reconcile-only run). */
  input_count: number;
  /** Canonical records produced, or reference records indexed. */
  output_count: number | null;
  matched_count: number | null;
  unmatched_count: number | null;
  skipped_blank_names: number;
  status: RunStatus;
  last_error: string | null;
  duration_ms: number;
  created_at: string;
}
