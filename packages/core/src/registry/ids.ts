/**
 * Centralized id generation for every tracked record.
 *
 * Format: `<prefix>-<base36 time>-<base36 sequence><6 hex>`. The sequence
 * counter makes ids unique within the process even when two are minted in
 * the same millisecond.
 *
 * @module @autopr/core/registry/ids
 */

import { randomBytes } from 'crypto';

let sequence = 0;

export function generateId(prefix: string): string {
  sequence = (sequence + 1) % Number.MAX_SAFE_INTEGER;
  const timestamp = Date.now().toString(36);
  const random = randomBytes(3).toString('hex');
  return `${prefix}-${timestamp}-${sequence.toString(36)}${random}`;
}

/**
 * Current time as an ISO-8601 string
 */
export function nowIso(): string {
  return new Date().toISOString();
}
