import { utc, UTCDate } from '@date-fns/utc';
import { isValid, parse } from 'date-fns';

// Report timestamps are wall-clock values with no zone.  They are parsed as if
// they were UTC so that ordering never depends on the host's zone or its
// daylight-saving gaps.  Fixed reference date so that patterns lacking a
// component resolve the same way on every run.
const REFERENCE_DATE = new UTCDate(2000, 0, 1);

// `yyyy` also accepts one to three digits; "1/5/24" is not year 24.
const MIN_FULL_YEAR = 1000;

/**
 * Parse a scan timestamp against each pattern in turn.
 *
 * @returns wall-clock epoch milliseconds, `null` for a blank/absent value, or
 *          `undefined` when the value is present but matches no pattern.
 */
export function parseScanTimestamp(
  raw: string | undefined,
  formats: readonly string[],
): number | null | undefined {
  const value = raw?.trim() ?? '';
  if (value === '') return null;

  for (const format of formats) {
    const parsed = parse(value, format, REFERENCE_DATE, { in: utc });
    if (!isValid(parsed)) continue;
    if (format.includes('yyyy') && parsed.getFullYear() < MIN_FULL_YEAR) continue;
    return parsed.getTime();
  }

  return undefined;
}
