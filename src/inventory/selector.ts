// ---------------------------------------------------------------------------
// Latest-record selector
//
// Groups scan records by workstation and keeps the most recent observation
// per group:
//   - blank timestamps lose to any parsed timestamp
//   - ties keep the first record encountered
//   - a malformed timestamp aborts the whole selection
// ---------------------------------------------------------------------------

import { MalformedTimestampError } from './errors';
import { isBlankName, normalizeName } from './normalize';
import { parseScanTimestamp } from './timestamp';
import { DEFAULT_SCAN_TIMESTAMP_FORMATS } from './types';
import type {
  CanonicalRecord,
  InventoryOptions,
  ScanRecord,
  SelectionResult,
} from './types';

interface Candidate {
  record: ScanRecord;
  /** Epoch ms, or `null` when the record carries no scan. */
  scannedAt: number | null;
}

export function selectLatest(
  records: readonly ScanRecord[],
  options: Partial<InventoryOptions> = {},
): SelectionResult {
  const formats = options.timestampFormats ?? DEFAULT_SCAN_TIMESTAMP_FORMATS;
  const groupKey =
    options.groupKeyPolicy === 'normalized'
      ? normalizeName
      : (name: string): string => name;

  const groups = new Map<string, Candidate>();
  let skippedBlankNames = 0;

  records.forEach((record, index) => {
    if (isBlankName(record.workstationName)) {
      skippedBlankNames++;
      return;
    }

    const scannedAt = parseScanTimestamp(record.lastHardwareScan, formats);
    if (scannedAt === undefined) {
      throw new MalformedTimestampError(
        record.workstationName,
        record.lastHardwareScan ?? '',
        index,
      );
    }

    const key = groupKey(record.workstationName);
    const current = groups.get(key);
    if (!current || isNewer(scannedAt, current.scannedAt)) {
      groups.set(key, { record, scannedAt });
    }
  });

  return {
    records: Array.from(groups.values(), ({ record }) => toCanonical(record)),
    skippedBlankNames,
  };
}

// Strictly newer only, so an equal timestamp never displaces the earlier record.
function isNewer(candidate: number | null, current: number | null): boolean {
  if (candidate === null) return false;
  return current === null || candidate > current;
}

export function toCanonical(record: ScanRecord): CanonicalRecord {
  return {
    workstationName: record.workstationName,
    lastHardwareScan: record.lastHardwareScan ?? '',
    lastLoggedUserId: record.lastLoggedUserId ?? '',
    primaryUserId: record.primaryUserId ?? '',
    ipAddress: record.ipAddress ?? '',
    subnet: record.subnet ?? '',
  };
}
