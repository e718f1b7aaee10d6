/**
 * Error Taxonomy
 *
 * Every failure the workflow can surface is one of these classes. Each
 * carries a stable code, knows whether a transparent retry is allowed, and
 * maps to an HTTP status for transport adapters.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error knows if it's retryable
 * - Only RATE_LIMITED and TRANSIENT_NETWORK_ERROR are retryable
 *
 * @module @autopr/core/reliability/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Stable error codes
 */
export const ERROR_CODES = [
  // Retried inside the gateway
  'RATE_LIMITED',
  'TRANSIENT_NETWORK_ERROR',

  // Never retried
  'VALIDATION_ERROR',
  'AUTHENTICATION_ERROR',
  'NOT_FOUND',
  'NAME_COLLISION',
  'NAME_GENERATION_EXHAUSTED',
  'GENERATION_ERROR',
  'PARTIAL_COMMIT',

  // Internal
  'INVALID_TRANSITION',
  'INTERNAL_ERROR',
] as const;

export type AutoPrErrorCode = (typeof ERROR_CODES)[number];

// =============================================================================
// Base Error Class
// =============================================================================

export interface AutoPrErrorOptions {
  /** Error code */
  code: AutoPrErrorCode;

  /** Whether the error may be retried transparently */
  retryable?: boolean;

  /** Suggested wait before retrying, in ms */
  retryAfterMs?: number;

  /** Additional context for debugging and error responses */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: unknown;
}

/**
 * Base error class
 *
 * All workflow errors extend this for consistent handling.
 */
export class AutoPrError extends Error {
  readonly code: AutoPrErrorCode;
  readonly retryable: boolean;
  readonly retryAfterMs?: number;
  readonly context?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(message: string, options: AutoPrErrorOptions) {
    super(message);
    this.name = 'AutoPrError';
    this.code = options.code;
    this.retryable = options.retryable ?? false;
    this.retryAfterMs = options.retryAfterMs;
    this.context = options.context;
    this.cause = options.cause;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      retryAfterMs: this.retryAfterMs,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// =============================================================================
// Specific Error Types
// =============================================================================

/**
 * Validation error - input failed validation before any remote call
 */
export class ValidationError extends AutoPrError {
  readonly fieldErrors?: Record<string, string>;

  constructor(
    message: string,
    options?: {
      fieldErrors?: Record<string, string>;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: 'VALIDATION_ERROR',
      retryable: false,
      context: options?.fieldErrors
        ? { ...options.context, fieldErrors: options.fieldErrors }
        : options?.context,
      cause: options?.cause,
    });
    this.name = 'ValidationError';
    this.fieldErrors = options?.fieldErrors;
  }
}

/**
 * Authentication error - credential rejected or lacks permission
 */
export class AuthenticationError extends AutoPrError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; context?: Record<string, unknown>; cause?: unknown }) {
    super(message, {
      code: 'AUTHENTICATION_ERROR',
      retryable: false, // Needs operator action
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'AuthenticationError';
    this.status = options?.status;
  }
}

/**
 * Not found error - repository, branch, file or record absent
 */
export class NotFoundError extends AutoPrError {
  readonly resource?: string;

  constructor(message: string, options?: { resource?: string; context?: Record<string, unknown>; cause?: unknown }) {
    super(message, {
      code: 'NOT_FOUND',
      retryable: false,
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'NotFoundError';
    this.resource = options?.resource;
  }
}

export type RateLimitKind = 'primary' | 'secondary';

/**
 * Rate limit error - remote service is throttling this credential
 */
export class RateLimitError extends AutoPrError {
  readonly kind: RateLimitKind;

  constructor(
    message: string,
    options?: {
      kind?: RateLimitKind;
      retryAfterMs?: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: 'RATE_LIMITED',
      retryable: true,
      retryAfterMs: options?.retryAfterMs,
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'RateLimitError';
    this.kind = options?.kind ?? 'primary';
  }
}

/**
 * Transient network error - timeout, reset connection or 5xx
 */
export class TransientNetworkError extends AutoPrError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; context?: Record<string, unknown>; cause?: unknown }) {
    super(message, {
      code: 'TRANSIENT_NETWORK_ERROR',
      retryable: true,
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'TransientNetworkError';
    this.status = options?.status;
  }
}

/**
 * Name collision error - the branch already exists
 */
export class NameCollisionError extends AutoPrError {
  readonly branchName: string;
  readonly callerFixed: boolean;

  constructor(branchName: string, options?: { callerFixed?: boolean; context?: Record<string, unknown>; cause?: unknown }) {
    super(`Branch '${branchName}' already exists`, {
      code: 'NAME_COLLISION',
      retryable: false,
      context: { ...options?.context, branchName },
      cause: options?.cause,
    });
    this.name = 'NameCollisionError';
    this.branchName = branchName;
    this.callerFixed = options?.callerFixed ?? false;
  }
}

/**
 * Name generation exhausted - every generated candidate collided
 */
export class NameGenerationExhaustedError extends AutoPrError {
  readonly attempts: number;
  readonly candidates: string[];

  constructor(baseName: string, candidates: string[]) {
    super(`Could not generate a free branch name for '${baseName}' after ${candidates.length} attempts`, {
      code: 'NAME_GENERATION_EXHAUSTED',
      retryable: false,
      context: { baseName, candidates },
    });
    this.name = 'NameGenerationExhaustedError';
    this.attempts = candidates.length;
    this.candidates = candidates;
  }
}

/**
 * Generation error - the external change generator failed or returned nothing usable
 */
export class GenerationError extends AutoPrError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super(message, {
      code: 'GENERATION_ERROR',
      retryable: false,
      context: options?.context,
      cause: options?.cause,
    });
    this.name = 'GenerationError';
  }
}

/**
 * Partial commit error - some but not all files landed on the branch
 */
export class PartialCommitError extends AutoPrError {
  readonly branchName: string;
  readonly committedFiles: string[];
  readonly failedFile: string;
  readonly pendingFiles: string[];

  constructor(
    branchName: string,
    committedFiles: string[],
    failedFile: string,
    pendingFiles: string[],
    cause?: unknown
  ) {
    super(
      `Committed ${committedFiles.length} of ${committedFiles.length + pendingFiles.length + 1} files to '${branchName}' before '${failedFile}' failed`,
      {
        code: 'PARTIAL_COMMIT',
        retryable: false,
        context: { branchName, committedFiles, failedFile, pendingFiles },
        cause,
      }
    );
    this.name = 'PartialCommitError';
    this.branchName = branchName;
    this.committedFiles = committedFiles;
    this.failedFile = failedFile;
    this.pendingFiles = pendingFiles;
  }
}

/**
 * Invalid state transition on a tracked record
 */
export class InvalidTransitionError extends AutoPrError {
  readonly from: string;
  readonly to: string;

  constructor(entity: string, from: string, to: string) {
    super(`Invalid ${entity} transition: ${from} -> ${to}`, {
      code: 'INVALID_TRANSITION',
      retryable: false,
      context: { entity, from, to },
    });
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.to = to;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Check if an error is retryable
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof AutoPrError) {
    return error.retryable;
  }
  return false;
}

/**
 * Map an error code to the HTTP status a transport adapter should send
 */
export function toHttpStatus(code: AutoPrErrorCode): number {
  switch (code) {
    case 'VALIDATION_ERROR':
      return 400;
    case 'AUTHENTICATION_ERROR':
      return 401;
    case 'NOT_FOUND':
      return 404;
    case 'NAME_COLLISION':
    case 'NAME_GENERATION_EXHAUSTED':
    case 'INVALID_TRANSITION':
      return 409;
    case 'RATE_LIMITED':
      return 429;
    case 'GENERATION_ERROR':
    case 'PARTIAL_COMMIT':
      return 502;
    case 'TRANSIENT_NETWORK_ERROR':
      return 503;
    case 'INTERNAL_ERROR':
      return 500;
  }
}

/**
 * Wrap any error as an AutoPrError
 */
export function wrapError(error: unknown, defaults?: Partial<AutoPrErrorOptions>): AutoPrError {
  if (error instanceof AutoPrError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);

  return new AutoPrError(message, {
    code: defaults?.code ?? 'INTERNAL_ERROR',
    retryable: defaults?.retryable ?? false,
    cause: error,
    ...defaults,
  });
}
