/**
 * Reliability: error taxonomy, error responses and retry policy.
 *
 * @module @autopr/core/reliability
 */

export * from './errors.js';
export * from './error-response.js';
export * from './retry.js';
