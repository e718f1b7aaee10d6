/**
 * HTTP failure classification for the GitHub REST API.
 *
 * | Response                                        | Error                        |
 * |-------------------------------------------------|------------------------------|
 * | 401                                             | AuthenticationError          |
 * | 403, `x-ratelimit-remaining: 0`                 | RateLimitError (primary)     |
 * | 403/429 secondary limit or `retry-after`        | RateLimitError (secondary)   |
 * | 429 otherwise                                   | RateLimitError (primary)     |
 * | 403 otherwise                                   | AuthenticationError          |
 * | 404                                             | NotFoundError                |
 * | 408, 5xx, timeouts, aborts, socket errors       | TransientNetworkError        |
 * | other 4xx                                       | ValidationError              |
 *
 * @module @autopr/integrations/github/error-mapping
 */

import {
  AuthenticationError,
  AutoPrError,
  NotFoundError,
  RateLimitError,
  TransientNetworkError,
  ValidationError,
  wrapError,
} from '@autopr/core';

const TRANSIENT_SOCKET_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

// =============================================================================
// Narrowing helpers
// =============================================================================

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function stringProp(error: unknown, prop: 'name' | 'code'): string | undefined {
  if (typeof error === 'object' && error !== null && prop in error) {
    const value: unknown = Reflect.get(error, prop);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Read a response header from an Octokit RequestError
 */
export function responseHeader(error: unknown, name: string): string | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) return undefined;
  const response = error.response;
  if (typeof response !== 'object' || response === null || !('headers' in response)) return undefined;
  const headers = response.headers;
  if (typeof headers !== 'object' || headers === null) return undefined;

  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === name);
  const value: unknown = entry?.[1];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isTimeoutOrAbort(error: unknown): boolean {
  const name = stringProp(error, 'name');
  if (name === 'AbortError' || name === 'TimeoutError') return true;

  const code = stringProp(error, 'code');
  if (code !== undefined && TRANSIENT_SOCKET_CODES.has(code)) return true;

  return error instanceof Error && error.cause !== undefined && error.cause !== error && isTimeoutOrAbort(error.cause);
}

// =============================================================================
// Classification
// =============================================================================

function rateLimitError(
  error: unknown,
  status: number,
  operation: string,
  now: number
): RateLimitError | undefined {
  const message = messageOf(error);
  const retryAfter = responseHeader(error, 'retry-after');
  const remaining = responseHeader(error, 'x-ratelimit-remaining');
  const reset = responseHeader(error, 'x-ratelimit-reset');
  const context = { operation, status };

  if (/secondary rate limit/i.test(message) || retryAfter !== undefined) {
    const seconds = retryAfter !== undefined ? Number(retryAfter) : NaN;
    return new RateLimitError(`Secondary rate limit hit during ${operation}`, {
      kind: 'secondary',
      retryAfterMs: Number.isFinite(seconds) ? Math.max(0, seconds * 1000) : undefined,
      context,
      cause: error,
    });
  }

  if (remaining === '0' || status === 429) {
    const resetEpoch = reset !== undefined ? Number(reset) : NaN;
    return new RateLimitError(`Rate limit exhausted during ${operation}`, {
      kind: 'primary',
      retryAfterMs: Number.isFinite(resetEpoch) ? Math.max(0, resetEpoch * 1000 - now) : undefined,
      context: reset !== undefined ? { ...context, resetAt: reset } : context,
      cause: error,
    });
  }

  return undefined;
}

/**
 * Turn anything Octokit throws into a taxonomy error
 */
export function classifyGitHubError(error: unknown, operation: string, now: number = Date.now()): AutoPrError {
  if (error instanceof AutoPrError) {
    return error;
  }

  const status = statusOf(error);
  const message = messageOf(error);

  if (status === undefined) {
    if (isTimeoutOrAbort(error)) {
      return new TransientNetworkError(`Network failure during ${operation}: ${message}`, {
        context: { operation },
        cause: error,
      });
    }
    return wrapError(error, { context: { operation } });
  }

  if (status === 401) {
    return new AuthenticationError(`Credential rejected during ${operation}`, {
      status,
      context: { operation },
      cause: error,
    });
  }

  if (status === 403 || status === 429) {
    const limited = rateLimitError(error, status, operation, now);
    if (limited) return limited;
    return new AuthenticationError(`Credential lacks permission for ${operation}: ${message}`, {
      status,
      context: { operation },
      cause: error,
    });
  }

  if (status === 404) {
    return new NotFoundError(`Not found during ${operation}`, {
      context: { operation, status },
      cause: error,
    });
  }

  if (status === 408 || status >= 500) {
    return new TransientNetworkError(`Remote service error ${status} during ${operation}`, {
      status,
      context: { operation },
      cause: error,
    });
  }

  return new ValidationError(`Remote service rejected ${operation}: ${message}`, {
    context: { operation, status },
    cause: error,
  });
}

/**
 * The service's 422 messages name the conflict in free text
 */
export function isUnprocessable(error: unknown, pattern: RegExp): boolean {
  return statusOf(error) === 422 && pattern.test(messageOf(error));
}
