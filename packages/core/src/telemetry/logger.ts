/**
 * Structured Logger Module
 *
 * Structured JSON logging with:
 * - Automatic telemetry context injection
 * - Secret/token redaction
 * - Consistent field names across services
 *
 * @module @autopr/core/telemetry/logger
 */

import { getCurrentContext, SEVERITIES, type Severity, type TelemetryContext } from './context.js';

// =============================================================================
// Logger Configuration
// =============================================================================

export interface LoggerConfig {
  /** Service name for identification */
  serviceName: string;
  /** Minimum severity to log */
  minSeverity?: Severity;
  /** Whether to pretty print (for development) */
  prettyPrint?: boolean;
  /** Additional default fields */
  defaultFields?: Record<string, unknown>;
  /** Custom redaction patterns */
  redactionPatterns?: RegExp[];
}

const DEFAULT_REDACTION_PATTERNS: RegExp[] = [
  /ghp_[a-zA-Z0-9]{36,}/g,           // GitHub personal access tokens
  /gho_[a-zA-Z0-9]{36,}/g,           // GitHub OAuth tokens
  /ghs_[a-zA-Z0-9]{36,}/g,           // GitHub app installation tokens
  /github_pat_[a-zA-Z0-9_]{22,}/g,   // GitHub fine-grained PATs
  /Bearer\s+[a-zA-Z0-9\-._~+/]+=*/gi,
  /Authorization:\s*[^\s,;]+/gi,

  /password['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /secret['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,
  /api[_-]?key['":\s]*[=:]\s*['"]?[^'"\s,}{]+['"]?/gi,

  /-----BEGIN[A-Z ]*PRIVATE KEY-----[\s\S]*?-----END[A-Z ]*PRIVATE KEY-----/g,
];

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  NOTICE: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5,
};

export function isSeverity(value: string | undefined): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

// =============================================================================
// Log Entry Types
// =============================================================================

export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;

  labels: {
    service: string;
  };

  traceId?: string;
  spanId?: string;

  requestId?: string;
  workflowId?: string;
  taskId?: string;
  httpRequestId?: string;
  eventName?: string;

  error?: {
    message: string;
    stack?: string;
    code?: string;
  };

  [key: string]: unknown;
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private config: Required<LoggerConfig>;
  private redactionPatterns: RegExp[];

  constructor(config: LoggerConfig) {
    this.config = {
      serviceName: config.serviceName,
      minSeverity: config.minSeverity ?? defaultSeverity(),
      prettyPrint: config.prettyPrint ?? (process.env.NODE_ENV === 'development'),
      defaultFields: config.defaultFields ?? {},
      redactionPatterns: config.redactionPatterns ?? [],
    };
    this.redactionPatterns = [...DEFAULT_REDACTION_PATTERNS, ...this.config.redactionPatterns];
  }

  // ===========================================================================
  // Log Methods
  // ===========================================================================

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('INFO', message, data);
  }

  notice(message: string, data?: Record<string, unknown>): void {
    this.log('NOTICE', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('WARNING', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('ERROR', message, { ...data, ...this.formatError(error) });
  }

  critical(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('CRITICAL', message, { ...data, ...this.formatError(error) });
  }

  // ===========================================================================
  // Specialized Logging Methods
  // ===========================================================================

  requestEnd(
    method: string,
    path: string,
    status: number,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = status >= 500 ? 'ERROR' : status >= 400 ? 'WARNING' : 'INFO';
    this.log(severity, 'Request completed', {
      eventName: 'request.end',
      httpMethod: method,
      httpPath: path,
      httpStatus: status,
      durationMs,
      ...data,
    });
  }

  /**
   * Log workflow step start
   */
  stepStart(step: string, data?: Record<string, unknown>): void {
    this.info('Step started', {
      eventName: 'step.start',
      step,
      ...data,
    });
  }

  /**
   * Log workflow step end
   */
  stepEnd(step: string, success: boolean, durationMs: number, data?: Record<string, unknown>): void {
    const severity: Severity = success ? 'INFO' : 'ERROR';
    this.log(severity, `Step ${success ? 'completed' : 'failed'}`, {
      eventName: success ? 'step.success' : 'step.failure',
      step,
      durationMs,
      ...data,
    });
  }

  taskStart(kind: string, taskId: string, data?: Record<string, unknown>): void {
    this.info('Background task started', {
      eventName: 'task.start',
      taskKind: kind,
      taskId,
      ...data,
    });
  }

  taskEnd(
    kind: string,
    taskId: string,
    success: boolean,
    durationMs: number,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = success ? 'INFO' : 'ERROR';
    this.log(severity, `Background task ${success ? 'completed' : 'failed'}`, {
      eventName: success ? 'task.success' : 'task.failure',
      taskKind: kind,
      taskId,
      durationMs,
      ...data,
    });
  }

  /**
   * Log one remote gateway call (after retries)
   */
  gatewayCall(
    operation: string,
    durationMs: number,
    success: boolean,
    data?: Record<string, unknown>
  ): void {
    const severity: Severity = success ? 'DEBUG' : 'WARNING';
    this.log(severity, `Gateway call ${success ? 'succeeded' : 'failed'}`, {
      eventName: success ? 'gateway.success' : 'gateway.failure',
      operation,
      durationMs,
      ...data,
    });
  }

  // ===========================================================================
  // Core Logging
  // ===========================================================================

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (SEVERITY_ORDER[severity] < SEVERITY_ORDER[this.config.minSeverity]) {
      return;
    }

    const entry = this.buildLogEntry(severity, message, getCurrentContext(), data);
    this.output(severity, this.redact(entry));
  }

  private buildLogEntry(
    severity: Severity,
    message: string,
    ctx: TelemetryContext | undefined,
    data?: Record<string, unknown>
  ): LogEntry {
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      labels: { service: this.config.serviceName },
      ...this.config.defaultFields,
    };

    if (ctx) {
      entry.traceId = ctx.traceId;
      entry.spanId = ctx.spanId;
      if (ctx.requestId) entry.requestId = ctx.requestId;
      if (ctx.workflowId) entry.workflowId = ctx.workflowId;
      if (ctx.taskId) entry.taskId = ctx.taskId;
      if (ctx.httpRequestId) entry.httpRequestId = ctx.httpRequestId;
    }

    if (data) {
      Object.assign(entry, data);
    }

    return entry;
  }

  private formatError(error: unknown): Record<string, unknown> {
    if (error === undefined || error === null) return {};

    if (error instanceof Error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      return {
        error: {
          message: error.message,
          stack: error.stack,
          code,
        },
      };
    }

    return {
      error: {
        message: String(error),
      },
    };
  }

  private redact(entry: LogEntry): string {
    let json = JSON.stringify(entry, null, this.config.prettyPrint ? 2 : undefined);

    for (const pattern of this.redactionPatterns) {
      json = json.replace(pattern, '[REDACTED]');
    }

    return json;
  }

  private output(severity: Severity, line: string): void {
    switch (severity) {
      case 'ERROR':
      case 'CRITICAL':
        console.error(line);
        break;
      case 'WARNING':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  // ===========================================================================
  // Child Logger
  // ===========================================================================

  /**
   * Create a child logger with additional default fields
   */
  child(additionalFields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.config,
      defaultFields: {
        ...this.config.defaultFields,
        ...additionalFields,
      },
    });
  }
}

function defaultSeverity(): Severity {
  const level = process.env.LOG_LEVEL?.toUpperCase();
  return isSeverity(level) ? level : 'INFO';
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a logger for a specific service
 */
export function createLogger(serviceName: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({
    serviceName,
    ...config,
  });
}
