/**
 * Proposed changes and validated change-set entries.
 *
 * @module @autopr/core/models/change-set
 */

import { z } from 'zod';

export const CHANGE_OPERATIONS = ['create', 'modify', 'delete'] as const;
export type ChangeOperation = (typeof CHANGE_OPERATIONS)[number];

export function isChangeOperation(value: string): value is ChangeOperation {
  return CHANGE_OPERATIONS.some((op) => op === value);
}

/**
 * What a generator proposes. The operation is left open here; the
 * validator decides whether it is legal.
 */
export const ProposedChange = z.object({
  filePath: z.string(),
  operation: z.string(),
  originalContent: z.string().optional(),
  proposedContent: z.string().optional(),
  summary: z.string().default(''),
});
export type ProposedChange = z.infer<typeof ProposedChange>;
export type ProposedChangeInput = z.input<typeof ProposedChange>;

export type ValidationStatus = 'valid' | 'invalid' | 'warning';

export interface ValidationIssue {
  rule: string;
  severity: 'error' | 'warning';
  message: string;
}

export interface ChangeSetEntry {
  id: string;
  requestId: string;
  filePath: string;
  operation: string;
  originalContent?: string;
  proposedContent?: string;
  summary: string;
  validationStatus: ValidationStatus;
  issues: readonly ValidationIssue[];
}

/**
 * An entry that passed validation; only these reach the gateway
 */
export interface AcceptedChange {
  entryId: string;
  filePath: string;
  operation: ChangeOperation;
  originalContent?: string;
  proposedContent?: string;
  summary: string;
}
