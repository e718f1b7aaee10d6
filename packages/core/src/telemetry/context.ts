/**
 * Telemetry Context Module
 *
 * The context that flows through a request, a workflow run and its
 * background worker. Anything logged inside `runWithContextAsync` picks up
 * these fields automatically:
 * - HTTP request -> orchestrator -> gateway calls
 * - Background submission -> worker -> gateway calls
 *
 * @module @autopr/core/telemetry/context
 */

import { AsyncLocalStorage } from 'async_hooks';
import { generateSpanId, generateTraceId, parseTraceparent } from './ids.js';

// =============================================================================
// Telemetry Context Types
// =============================================================================

export type TelemetrySource = 'api' | 'worker' | 'cli' | 'internal';

export const SEVERITIES = ['DEBUG', 'INFO', 'NOTICE', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface TelemetryContext {
  // === Distributed Tracing ===
  /** W3C Trace Context trace ID (32 hex chars) */
  traceId: string;
  /** W3C Trace Context span ID (16 hex chars) */
  spanId: string;
  /** Parent span ID if this is a child span */
  parentSpanId?: string;

  // === Resource Identifiers ===
  /** PR request being processed */
  requestId?: string;
  /** Workflow run executing the request */
  workflowId?: string;
  /** Background task carrying the run */
  taskId?: string;
  /** HTTP request correlation id */
  httpRequestId?: string;

  // === Source Metadata ===
  source: TelemetrySource;

  // === Request Metadata ===
  httpMethod?: string;
  httpPath?: string;

  /** Timestamp when context was created */
  timestamp: Date;
}

export type PartialTelemetryContext = Partial<TelemetryContext>;

// =============================================================================
// Async Local Storage for Context Propagation
// =============================================================================

const telemetryStorage = new AsyncLocalStorage<TelemetryContext>();

export function getCurrentContext(): TelemetryContext | undefined {
  return telemetryStorage.getStore();
}

export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return telemetryStorage.run(ctx, fn);
}

export async function runWithContextAsync<T>(ctx: TelemetryContext, fn: () => Promise<T>): Promise<T> {
  return telemetryStorage.run(ctx, fn);
}

// =============================================================================
// Context Creation
// =============================================================================

/**
 * Create a new root telemetry context
 */
export function createContext(
  source: TelemetrySource,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    traceId: generateTraceId(),
    spanId: generateSpanId(),
    source,
    timestamp: new Date(),
    ...overrides,
  };
}

/**
 * Create a child context (new span under the same trace)
 */
export function createChildContext(
  parent: TelemetryContext,
  overrides?: PartialTelemetryContext
): TelemetryContext {
  return {
    ...parent,
    spanId: generateSpanId(),
    parentSpanId: parent.spanId,
    timestamp: new Date(),
    ...overrides,
  };
}

/**
 * Child of the current context, or a fresh root when none is active
 */
export function deriveContext(source: TelemetrySource, overrides?: PartialTelemetryContext): TelemetryContext {
  const current = getCurrentContext();
  return current ? createChildContext(current, { source, ...overrides }) : createContext(source, overrides);
}

/**
 * Create a context from an HTTP request
 */
export function createContextFromRequest(
  req: {
    headers?: Record<string, string | string[] | undefined>;
    method?: string;
    path?: string;
  },
  source: TelemetrySource = 'api'
): TelemetryContext {
  const headers = req.headers ?? {};
  const parent = parseTraceparent(getHeader(headers, 'traceparent'));

  return createContext(source, {
    traceId: parent?.traceId ?? generateTraceId(),
    parentSpanId: parent?.parentSpanId,
    httpRequestId: getHeader(headers, 'x-request-id') ?? generateSpanId(),
    httpMethod: req.method,
    httpPath: sanitizePath(req.path ?? '/'),
  });
}

// =============================================================================
// Helper Functions
// =============================================================================

function getHeader(
  headers: Record<string, string | string[] | undefined>,
  name: string
): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Drop query strings and collapse generated ids so paths group in logs
 */
function sanitizePath(path: string): string {
  return path
    .split('?')[0]
    .replace(/\/(req|wf|task)-[0-9a-z-]+(?=\/|$)/g, '/:$1Id')
    .replace(/\/[0-9]+(?=\/|$)/g, '/:id');
}
