/**
 * @autopr/integrations
 *
 * The Repository Gateway: contract, GitHub (Octokit) and in-memory
 * implementations, and HTTP failure classification.
 *
 * @module @autopr/integrations
 */

export * from './github/gateway.js';
export * from './github/error-mapping.js';
export * from './github/octokit-gateway.js';
export * from './github/memory-gateway.js';
export * from './github/factory.js';
