// ---------------------------------------------------------------------------
// Inventory error taxonomy
// ---------------------------------------------------------------------------

import { ZodError } from 'zod';

export type InventoryErrorCode = 'malformedTimestamp' | 'invalidSource';

export class InventoryError extends Error {
  constructor(
    readonly code: InventoryErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A scan timestamp was present and non-blank but matched none of the
 * configured formats.  Fatal for the whole selection.
 */
export class MalformedTimestampError extends InventoryError {
  constructor(
    readonly workstationName: string,
    readonly rawValue: string,
    /** Zero-based position of the record in the selector's input. */
    readonly recordIndex: number,
  ) {
    super(
      'malformedTimestamp',
      `Malformed last hardware scan '${rawValue}' for workstation '${workstationName}' (record ${recordIndex + 1}).`,
    );
  }
}

/** A table could not be read into records: unknown format or missing column. */
export class TabularSourceError extends InventoryError {
  constructor(
    message: string,
    readonly location?: string,
  ) {
    super('invalidSource', location ? `${location}: ${message}` : message);
  }
}

// ---------------------------------------------------------------------------
// Map any thrown value to an HTTP status + error type
// ---------------------------------------------------------------------------

export function mapInventoryErrorToHttp(
  err: unknown,
): { status: number; errorType?: string; detail: string } {
  if (err instanceof MalformedTimestampError) {
    return { status: 422, errorType: err.code, detail: err.message };
  }
  if (err instanceof InventoryError) {
    return { status: 400, errorType: err.code, detail: err.message };
  }
  if (err instanceof ZodError) {
    const detail = err.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { status: 400, errorType: 'invalidValue', detail };
  }

  return { status: 500, detail: 'Internal server error' };
}
