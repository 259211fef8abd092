// ---------------------------------------------------------------------------
// Roster reconciler
//
// Partitions a roster into reference records that match by normalized name
// and roster entries that match nothing.  The reference table is indexed once;
// each roster entry is then a single map lookup.
// ---------------------------------------------------------------------------

import { normalizeName } from './normalize';
import type {
  CanonicalRecord,
  NamedRecord,
  ReconciliationResult,
  RosterEntry,
} from './types';

export interface NameIndex<R extends NamedRecord> {
  byKey: Map<string, R>;
  collidingKeys: string[];
}

/**
 * Index reference records by normalized name.  On a key collision the first
 * record in reference order wins and the key is reported.  Blank names are
 * not indexed, so a blank roster entry never matches.
 */
export function buildNameIndex<R extends NamedRecord>(reference: readonly R[]): NameIndex<R> {
  const byKey = new Map<string, R>();
  const collisions = new Set<string>();

  for (const record of reference) {
    const key = normalizeName(record.workstationName);
    if (key === '') continue;

    if (byKey.has(key)) {
      collisions.add(key);
    } else {
      byKey.set(key, record);
    }
  }

  return { byKey, collidingKeys: Array.from(collisions) };
}

export function reconcile<R extends NamedRecord = CanonicalRecord>(
  reference: readonly R[],
  roster: readonly RosterEntry[],
): ReconciliationResult<R> {
  const { byKey, collidingKeys } = buildNameIndex(reference);
  const matched: R[] = [];
  const unmatched: RosterEntry[] = [];

  for (const entry of roster) {
    const hit = byKey.get(normalizeName(entry.pcName));
    if (hit) {
      matched.push(hit);
    } else {
      unmatched.push(entry);
    }
  }

  return { matched, unmatched, collidingKeys };
}
