/**
 * Telemetry ID Generation
 *
 * W3C Trace Context compatible IDs:
 * - Trace ID: 32 hex characters (128-bit)
 * - Span ID: 16 hex characters (64-bit)
 *
 * @module @autopr/core/telemetry/ids
 */

import { randomBytes } from 'crypto';

export function generateTraceId(): string {
  return randomBytes(16).toString('hex');
}

export function generateSpanId(): string {
  return randomBytes(8).toString('hex');
}

export function isValidTraceId(id: string): boolean {
  return /^[0-9a-f]{32}$/i.test(id) && !/^0+$/.test(id);
}

export function isValidSpanId(id: string): boolean {
  return /^[0-9a-f]{16}$/i.test(id) && !/^0+$/.test(id);
}

/**
 * Parse `version-traceId-spanId-flags` into its ids, ignoring malformed values
 */
export function parseTraceparent(
  header: string | undefined
): { traceId: string; parentSpanId: string } | undefined {
  if (!header) return undefined;
  const parts = header.trim().toLowerCase().split('-');
  if (parts.length !== 4) return undefined;
  const [, traceId, parentSpanId] = parts;
  if (!isValidTraceId(traceId) || !isValidSpanId(parentSpanId)) return undefined;
  return { traceId, parentSpanId };
}
