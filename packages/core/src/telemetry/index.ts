/**
 * Telemetry: context propagation, structured logging and HTTP middleware.
 *
 * @module @autopr/core/telemetry
 */

export * from './ids.js';
export * from './context.js';
export * from './logger.js';
export * from './middleware.js';
