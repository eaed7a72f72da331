// Audit change-set validation
//
// Checks records before they reach a persistence adapter.

import { z } from 'zod';
import { TRAIL_TYPES } from '../types/audit.js';
import type { AuditChangeSet, TrailType } from '../types/audit.js';

const trailTypeSchema = z.custom<TrailType>(
  (value) => TRAIL_TYPES.some((trailType) => trailType === value),
  { message: `trailType must be one of: ${TRAIL_TYPES.join(', ')}` }
);

/**
 * Schema for a persisted audit change set.
 */
export const auditChangeSetSchema = z.object({
  id: z.string().min(1),
  entityName: z.string().min(1, 'entityName is required'),
  primaryKey: z.string().nullable(),
  timestamp: z.string().datetime({ offset: true }),
  trailType: trailTypeSchema,
  userId: z.string().nullable(),
  changedColumns: z.array(z.string().min(1)),
  oldValuesJson: z.string().nullable(),
  newValuesJson: z.string().nullable(),
});

/**
 * Schema for a change set that has not been assigned an id yet
 */
export const auditChangeSetDraftSchema = auditChangeSetSchema.omit({ id: true });

export type AuditChangeSetDraft = z.infer<typeof auditChangeSetDraftSchema>;

/**
 * A single validation problem
 */
export type AuditValidationIssue = {
  path: string;
  message: string;
};

export type AuditChangeSetValidationResult =
  | { valid: true; changeSet: AuditChangeSet }
  | { valid: false; errors: AuditValidationIssue[] };

/**
 * Validate an unknown value as an AuditChangeSet.
 */
export function validateAuditChangeSet(input: unknown): AuditChangeSetValidationResult {
  const result = auditChangeSetSchema.safeParse(input);

  if (result.success) {
    return { valid: true, changeSet: result.data };
  }

  return {
    valid: false,
    errors: result.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message,
    })),
  };
}

/**
 * Parse an AuditChangeSet, throwing the zod error on invalid input.
 */
export function parseAuditChangeSet(input: unknown): AuditChangeSet {
  return auditChangeSetSchema.parse(input);
}
