import { z } from 'zod';

// ---------------------------------------------------------------------------
// Request body schemas for /inventory
// Only the fields the selector and reconciler read are validated.
// ---------------------------------------------------------------------------

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

export const scanRecordSchema = z.object({
  workstationName: z.string(),
  lastHardwareScan: optionalText,
  lastLoggedUserId: optionalText,
  primaryUserId: optionalText,
  ipAddress: optionalText,
  subnet: optionalText,
});

export const canonicalRecordSchema = z.object({
  workstationName: z.string(),
  lastHardwareScan: text,
  lastLoggedUserId: text,
  primaryUserId: text,
  ipAddress: text,
  subnet: text,
});

const rosterEntrySchema = z.union([
  z.string().transform((pcName) => ({ pcName })),
  z.object({ pcName: z.string() }),
]);

const groupKeyPolicySchema = z.enum(['exact', 'normalized']);

export const latestBodySchema = z.object({
  records: z.array(scanRecordSchema),
  groupKeyPolicy: groupKeyPolicySchema.optional(),
});

export const reconcileBodySchema = z
  .object({
    roster: z.array(rosterEntrySchema),
    reference: z.array(canonicalRecordSchema).optional(),
    records: z.array(scanRecordSchema).optional(),
    groupKeyPolicy: groupKeyPolicySchema.optional(),
  })
  .refine((body) => (body.reference === undefined) !== (body.records === undefined), {
    message: 'Exactly one of reference or records is required.',
  });

export const runsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});
