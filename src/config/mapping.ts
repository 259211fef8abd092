// ---------------------------------------------------------------------------
// Spreadsheet column ↔ inventory field mapping
//
// This file is the single source of truth for which report headers feed which
// record fields.  Headers are compared after folding case and dropping
// punctuation, so "Workstation Name", "workstation_name" and "workstationName"
// are the same column.  Add aliases here when a report export renames a column.
// ---------------------------------------------------------------------------

import { TabularSourceError } from '../inventory/errors';
import { toCanonical } from '../inventory/selector';
import type { CanonicalRecord, RosterEntry, ScanRecord } from '../inventory/types';

export type TabularRow = Record<string, string>;

type CanonicalField = keyof CanonicalRecord;

export const SCAN_COLUMN_ALIASES: Record<CanonicalField, readonly string[]> = {
  workstationName: ['workstation name', 'workstation', 'computer name', 'device name', 'pc name', 'name'],
  lastHardwareScan: ['last hardware scan', 'last hw scan', 'hardware scan', 'last scan'],
  lastLoggedUserId: ['last logged user id', 'last logged on user', 'last logon user', 'last user'],
  primaryUserId: ['primary user id', 'primary user'],
  ipAddress: ['ip address', 'ip', 'ipv4 address'],
  subnet: ['subnet', 'ip subnet'],
};

export const ROSTER_COLUMN_ALIASES: readonly string[] = [
  'pc name',
  'workstation name',
  'computer name',
  'hostname',
  'name',
];

/** Column headers written for canonical and matched tables, in order. */
export const CANONICAL_COLUMNS: Record<CanonicalField, string> = {
  workstationName: 'Workstation Name',
  lastHardwareScan: 'Last Hardware Scan',
  lastLoggedUserId: 'Last Logged User ID',
  primaryUserId: 'Primary User ID',
  ipAddress: 'IP Address',
  subnet: 'Subnet',
};

export const UNMATCHED_COLUMN = 'PC Name';

const CANONICAL_FIELDS = Object.keys(CANONICAL_COLUMNS).filter(isCanonicalField);

function isCanonicalField(key: string): key is CanonicalField {
  return key in SCAN_COLUMN_ALIASES;
}

// ---------------------------------------------------------------------------
// Header detection
// ---------------------------------------------------------------------------

export function headerKey(header: string): string {
  return header
    .toLowerCase()
    .replace(/[^a-z0-9]/g, '');
}

/**
 * Find the first header matching any alias.  Aliases are tried in order of
 * preference, so a report carrying both "Workstation Name" and "Name" maps to
 * the former.
 */
export function findColumn(headers: readonly string[], aliases: readonly string[]): string | null {
  const byKey = new Map<string, string>();
  for (const header of headers) {
    const key = headerKey(header);
    if (!byKey.has(key)) byKey.set(key, header);
  }
  for (const alias of aliases) {
    const found = byKey.get(headerKey(alias));
    if (found !== undefined) return found;
  }
  return null;
}

function headersOf(rows: readonly TabularRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const header of Object.keys(row)) seen.add(header);
  }
  return Array.from(seen);
}

// ---------------------------------------------------------------------------
// Rows → records
// ---------------------------------------------------------------------------

/**
 * Map scan-report rows to scan records.  Unmapped columns are carried as extra
 * fields under their original header.
 */
export function rowsToScanRecords(rows: readonly TabularRow[], location?: string): ScanRecord[] {
  if (rows.length === 0) return [];

  const headers = headersOf(rows);
  const columns = new Map<CanonicalField, string>();
  for (const field of CANONICAL_FIELDS) {
    const column = findColumn(headers, SCAN_COLUMN_ALIASES[field]);
    if (column !== null) columns.set(field, column);
  }

  const nameColumn = columns.get('workstationName');
  if (nameColumn === undefined) {
    throw new TabularSourceError('no workstation name column found in scan report', location);
  }
  const mapped = new Set(columns.values());

  return rows.map((row) => {
    const record: ScanRecord = { workstationName: row[nameColumn] ?? '' };
    for (const [field, column] of columns) {
      if (field !== 'workstationName' && row[column] !== undefined) {
        record[field] = row[column];
      }
    }
    for (const [header, value] of Object.entries(row)) {
      if (!mapped.has(header) && !isCanonicalField(header)) record[header] = value;
    }
    return record;
  });
}

/** Map a previously written canonical table back into canonical records. */
export function rowsToCanonicalRecords(rows: readonly TabularRow[], location?: string): CanonicalRecord[] {
  return rowsToScanRecords(rows, location).map(toCanonical);
}

export function rowsToRoster(rows: readonly TabularRow[], location?: string): RosterEntry[] {
  if (rows.length === 0) return [];

  const column = findColumn(headersOf(rows), ROSTER_COLUMN_ALIASES);
  if (column === null) {
    throw new TabularSourceError('no PC name column found in roster', location);
  }
  return rows.map((row) => ({ pcName: row[column] ?? '' }));
}

// ---------------------------------------------------------------------------
// Records → rows
// ---------------------------------------------------------------------------

export function canonicalColumns(): string[] {
  return CANONICAL_FIELDS.map((field) => CANONICAL_COLUMNS[field]);
}

export function canonicalToRow(record: CanonicalRecord): TabularRow {
  const row: TabularRow = {};
  for (const field of CANONICAL_FIELDS) {
    row[CANONICAL_COLUMNS[field]] = record[field];
  }
  return row;
}

export function rosterToRow(entry: RosterEntry): TabularRow {
  return { [UNMATCHED_COLUMN]: entry.pcName };
}
