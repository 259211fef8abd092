// ---------------------------------------------------------------------------
// Inventory record types
// ---------------------------------------------------------------------------

/**
 * The projection kept for every workstation after deduplication.
 * Optional scan fields that were absent on input are carried as `''`.
 */
export interface CanonicalRecord {
  workstationName: string;
  /** Raw timestamp string as received, `''` when no scan was recorded. */
  lastHardwareScan: string;
  lastLoggedUserId: string;
  primaryUserId: string;
  ipAddress: string;
  subnet: string;
}

/**
 * One hardware scan observation.  `workstationName` is the value as received
 * (not normalized).  Any extra columns the source carries ride along and are
 * dropped by the selector's projection.
 */
export interface ScanRecord {
  workstationName: string;
  lastHardwareScan?: string;
  lastLoggedUserId?: string;
  primaryUserId?: string;
  ipAddress?: string;
  subnet?: string;
  [field: string]: string | undefined;
}

/** One name to look up in the reference table. */
export interface RosterEntry {
  pcName: string;
}

/** Anything the reconciler can index by workstation name. */
export interface NamedRecord {
  workstationName: string;
}

// ---------------------------------------------------------------------------
// Options / results
// ---------------------------------------------------------------------------

/**
 * How the selector groups records:
 *   exact       the raw `workstationName`, verbatim
 *   normalized  the reconciler's comparison key (folds case/whitespace variants)
 */
export type GroupKeyPolicy = 'exact' | 'normalized';

export const GROUP_KEY_POLICIES: readonly GroupKeyPolicy[] = ['exact', 'normalized'];

export const DEFAULT_SCAN_TIMESTAMP_FORMATS: readonly string[] = [
  'M/d/yyyy H:mm',
  'M/d/yyyy H:mm:ss',
];

export interface InventoryOptions {
  /** date-fns patterns tried in order. */
  timestampFormats: readonly string[];
  groupKeyPolicy: GroupKeyPolicy;
}

export interface SelectionResult {
  records: CanonicalRecord[];
  /** Records excluded from grouping because their name was blank. */
  skippedBlankNames: number;
}

export interface ReconciliationResult<R extends NamedRecord = CanonicalRecord> {
  matched: R[];
  unmatched: RosterEntry[];
  /** Normalized keys shared by more than one reference record. */
  collidingKeys: string[];
}
