/**
 * @autopr/core
 *
 * Shared building blocks for the PR workflow engine: data model, error
 * taxonomy, retry policy, registry, configuration, telemetry and the git
 * naming/diff/commit-message utilities.
 *
 * @module @autopr/core
 */

export * from './reliability/index.js';
export * from './telemetry/index.js';
export * from './registry/index.js';
export * from './config/index.js';
export * from './models/index.js';
export * from './git/index.js';
