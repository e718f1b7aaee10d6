/**
 * Error Response Shape
 *
 * Every failure that leaves the system, whether from a blocking call, a
 * background task record or the HTTP API, is rendered into one shape:
 *
 * ```json
 * { "error": { "code", "message", "details?", "suggestions", "retryPossible" },
 *   "timestamp", "errorId" }
 * ```
 *
 * @module @autopr/core/reliability/error-response
 */

import { z } from 'zod';
import { AutoPrError, ERROR_CODES, wrapError, type AutoPrErrorCode } from './errors.js';
import { generateId } from '../registry/ids.js';

// =============================================================================
// Schema
// =============================================================================

export const ErrorBody = z.object({
  code: z.enum(ERROR_CODES),
  message: z.string(),
  details: z.record(z.unknown()).optional(),
  suggestions: z.array(z.string()),
  retryPossible: z.boolean(),
});
export type ErrorBody = z.infer<typeof ErrorBody>;

export const ErrorResponse = z.object({
  error: ErrorBody,
  timestamp: z.string(),
  errorId: z.string(),
});
export type ErrorResponse = z.infer<typeof ErrorResponse>;

// =============================================================================
// Suggestions
// =============================================================================

const SUGGESTIONS: Record<AutoPrErrorCode, string[]> = {
  VALIDATION_ERROR: [
    'Check the request fields against the documented input shape',
    'Repository locators look like host/owner/name or owner/name',
  ],
  AUTHENTICATION_ERROR: [
    'Verify that the configured token is valid and has not expired',
    'Make sure the token has repository write access',
  ],
  NOT_FOUND: [
    'Verify the repository, branch or record identifier',
    'Private repositories are reported as missing when the token cannot see them',
  ],
  RATE_LIMITED: [
    'Wait until the rate limit window resets before resubmitting',
    'Reduce the number of concurrent requests',
  ],
  TRANSIENT_NETWORK_ERROR: [
    'Retry the request in a few moments',
    'Check the remote service status page for incidents',
  ],
  NAME_COLLISION: [
    'Choose a different branch name or omit it to have one generated',
  ],
  NAME_GENERATION_EXHAUSTED: [
    'Retry the request; generated names include a time-based suffix',
    'Supply an explicit branch name',
  ],
  GENERATION_ERROR: [
    'Rephrase the change request with more detail',
    'Check that the change generator service is reachable',
  ],
  PARTIAL_COMMIT: [
    'Inspect the branch listed in the details; some files were committed',
    'Delete or finish the branch manually before resubmitting',
  ],
  INVALID_TRANSITION: [
    'The record is already in a terminal state',
  ],
  INTERNAL_ERROR: [
    'Retry the request; report the errorId if the problem persists',
  ],
};

/**
 * Actionable suggestions for an error code
 */
export function suggestionsFor(code: AutoPrErrorCode): string[] {
  return [...SUGGESTIONS[code]];
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Render the body part of the error shape
 */
export function toErrorBody(error: unknown, extraDetails?: Record<string, unknown>): ErrorBody {
  const wrapped: AutoPrError = wrapError(error);
  const details: Record<string, unknown> = { ...wrapped.context };
  for (const [key, value] of Object.entries(extraDetails ?? {})) {
    // An absent extra never hides what the error itself recorded
    if (value !== undefined) details[key] = value;
  }

  const body: ErrorBody = {
    code: wrapped.code,
    message: wrapped.message,
    suggestions: suggestionsFor(wrapped.code),
    retryPossible: wrapped.retryable,
  };
  if (wrapped.retryAfterMs !== undefined) {
    details.retryAfterMs = wrapped.retryAfterMs;
  }
  if (Object.keys(details).length > 0) {
    body.details = details;
  }
  return body;
}

/**
 * Render any thrown value into the shared error response
 */
export function toErrorResponse(error: unknown, extraDetails?: Record<string, unknown>): ErrorResponse {
  return {
    error: toErrorBody(error, extraDetails),
    timestamp: new Date().toISOString(),
    errorId: generateId('err'),
  };
}
