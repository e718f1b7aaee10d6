/**
 * PR request submission and tracking records.
 *
 * @module @autopr/core/models/pr-request
 */

import { z } from 'zod';
import type { ErrorBody } from '../reliability/error-response.js';
import { ValidationError } from '../reliability/errors.js';
import type { RepositoryRef } from './locator.js';

export const DEFAULT_BASE_BRANCH = 'main';

export const PRRequestOptions = z
  .object({
    branchName: z.string().trim().min(1).max(250).optional(),
    prTitle: z.string().trim().min(1).max(256).optional(),
    prDescription: z.string().max(65536).optional(),
    baseBranch: z.string().trim().min(1).max(250).optional(),
    autoMerge: z.boolean().default(false),
  })
  .strict();
export type PRRequestOptions = z.infer<typeof PRRequestOptions>;

export const PRSubmission = z.object({
  freeTextRequest: z.string().trim().min(1, 'freeTextRequest must not be empty').max(10000),
  repositoryLocator: z.string().trim().min(1, 'repositoryLocator is required'),
  options: PRRequestOptions.default({}),
});
export type PRSubmission = z.infer<typeof PRSubmission>;
export type PRSubmissionInput = z.input<typeof PRSubmission>;

/**
 * Parse a raw submission, reporting every invalid field keyed by its path
 */
export function parseSubmission(input: unknown): PRSubmission {
  const parsed = PRSubmission.safeParse(input);
  if (!parsed.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fieldErrors[issue.path.join('.') || 'body'] = issue.message;
    }
    throw new ValidationError('Invalid PR submission', { fieldErrors });
  }
  return parsed.data;
}

export const PR_REQUEST_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;
export type PRRequestStatus = (typeof PR_REQUEST_STATUSES)[number];

export interface PRRequest {
  id: string;
  freeTextRequest: string;
  repositoryLocator: string;
  repository: RepositoryRef;
  options: PRRequestOptions;
  status: PRRequestStatus;
  createdAt: string;
  updatedAt: string;
  prUrl?: string;
  error?: ErrorBody;
}
