/**
 * Structured Logger Tests
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, createLogger } from '../logger.js';
import { createContext, createContextFromRequest, getCurrentContext, runWithContext } from '../context.js';
import { createTelemetryMiddleware } from '../middleware.js';
import { parseTraceparent } from '../ids.js';

describe('StructuredLogger', () => {
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;
  let consoleWarnSpy: ReturnType<typeof vi.spyOn>;
  let logger: Logger;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logger = createLogger('test-service', {
      prettyPrint: false,
      minSeverity: 'DEBUG',
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Basic Logging', () => {
    it('should log debug messages to stdout', () => {
      logger.debug('Debug message');

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);

      expect(logEntry.severity).toBe('DEBUG');
      expect(logEntry.message).toBe('Debug message');
      expect(logEntry.timestamp).toBeDefined();
      expect(logEntry.labels).toEqual({ service: 'test-service' });
    });

    it('should log warnings to stderr warn', () => {
      logger.warn('Warning message');

      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      const logEntry = JSON.parse(consoleWarnSpy.mock.calls[0][0] as string);
      expect(logEntry.severity).toBe('WARNING');
    });

    it('should log errors with message and stack', () => {
      logger.error('Error occurred', new Error('Test error'));

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);

      expect(logEntry.severity).toBe('ERROR');
      expect(logEntry.error.message).toBe('Test error');
      expect(logEntry.error.stack).toContain('Error: Test error');
    });

    it('should include error code if available', () => {
      const error = Object.assign(new Error('File not found'), { code: 'ENOENT' });
      logger.error('File error', error);

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);
      expect(logEntry.error.code).toBe('ENOENT');
    });

    it('should handle string errors', () => {
      logger.error('Error occurred', 'string error');

      const logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);
      expect(logEntry.error).toEqual({ message: 'string error' });
    });
  });

  describe('Context', () => {
    it('should include workflow context fields', () => {
      const ctx = createContext('worker', {
        requestId: 'req-1',
        workflowId: 'wf-1',
        taskId: 'task-1',
      });

      runWithContext(ctx, () => {
        logger.info('Inside run');
      });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.traceId).toBe(ctx.traceId);
      expect(logEntry.spanId).toBe(ctx.spanId);
      expect(logEntry.requestId).toBe('req-1');
      expect(logEntry.workflowId).toBe('wf-1');
      expect(logEntry.taskId).toBe('task-1');
    });

    it('should omit context fields outside a context', () => {
      logger.info('Outside');

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.traceId).toBeUndefined();
      expect(logEntry.requestId).toBeUndefined();
    });

    it('should merge child logger fields', () => {
      logger.child({ component: 'gateway' }).info('Child message', { attempt: 2 });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.component).toBe('gateway');
      expect(logEntry.attempt).toBe(2);
    });
  });

  describe('Severity Filtering', () => {
    it('should respect minimum severity level', () => {
      const filteredLogger = createLogger('filtered-service', {
        prettyPrint: false,
        minSeverity: 'WARNING',
      });

      filteredLogger.debug('Should not log');
      filteredLogger.info('Should not log');
      filteredLogger.notice('Should not log');
      filteredLogger.warn('Should log');
      filteredLogger.error('Should log');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(consoleWarnSpy).toHaveBeenCalledTimes(1);
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('Sensitive Data Redaction', () => {
    it('should redact GitHub tokens in message', () => {
      const testToken = 'gh' + 'p_' + '12345678'.repeat(5);
      logger.info(`Token: ${testToken} found`);

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.message).toBe('Token: [REDACTED] found');
    });

    it('should redact installation tokens of any length', () => {
      const testToken = 'gh' + 's_' + 'abcdef'.repeat(7);
      logger.info(`Using ${testToken}`);

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.message).toBe('Using [REDACTED]');
    });

    it('should redact bearer tokens in data', () => {
      logger.info('Outgoing call', { header: 'Bearer test-secret' });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.header).toBe('[REDACTED]');
    });

    it('should leave safe data untouched', () => {
      logger.info('Safe message', { safeField: 'safe value' });

      const logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.safeField).toBe('safe value');
    });
  });

  describe('Specialized Logging Methods', () => {
    it('should log request end with status-based severity', () => {
      logger.requestEnd('GET', '/api/pr', 200, 150);
      let logEntry = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      expect(logEntry.severity).toBe('INFO');
      expect(logEntry.httpStatus).toBe(200);
      expect(logEntry.durationMs).toBe(150);

      logger.requestEnd('GET', '/api/pr', 404, 50);
      logEntry = JSON.parse(consoleWarnSpy.mock.calls[0][0] as string);
      expect(logEntry.severity).toBe('WARNING');

      logger.requestEnd('GET', '/api/pr', 500, 100);
      logEntry = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);
      expect(logEntry.severity).toBe('ERROR');
    });

    it('should log step lifecycle', () => {
      logger.stepStart('PrepareBranch');
      logger.stepEnd('PrepareBranch', false, 20);

      const start = JSON.parse(consoleLogSpy.mock.calls[0][0] as string);
      const end = JSON.parse(consoleErrorSpy.mock.calls[0][0] as string);
      expect(start.eventName).toBe('step.start');
      expect(start.step).toBe('PrepareBranch');
      expect(end.eventName).toBe('step.failure');
      expect(end.durationMs).toBe(20);
    });

    it('should log task lifecycle', () => {
      logger.taskStart('pr_creation', 'task-9');
      logger.taskEnd('pr_creation', 'task-9', true, 1200);

      const end = JSON.parse(consoleLogSpy.mock.calls[1][0] as string);
      expect(end.eventName).toBe('task.success');
      expect(end.taskKind).toBe('pr_creation');
      expect(end.taskId).toBe('task-9');
    });
  });
});

describe('Telemetry context', () => {
  it('should adopt trace id from a valid traceparent header', () => {
    const traceId = '0af7651916cd43dd8448eb211c80319c';
    const ctx = createContextFromRequest({
      headers: {
        traceparent: `00-${traceId}-b7ad6b7169203331-01`,
        'x-request-id': 'http-1',
      },
      method: 'POST',
      path: '/api/pr',
    });

    expect(ctx.traceId).toBe(traceId);
    expect(ctx.parentSpanId).toBe('b7ad6b7169203331');
    expect(ctx.httpRequestId).toBe('http-1');
    expect(ctx.httpPath).toBe('/api/pr');
  });

  it('should ignore malformed traceparent headers', () => {
    expect(parseTraceparent('garbage')).toBeUndefined();
    expect(parseTraceparent(`00-${'0'.repeat(32)}-b7ad6b7169203331-01`)).toBeUndefined();
  });

  it('should collapse generated ids in paths', () => {
    const ctx = createContextFromRequest({ path: '/api/tasks/task-lx2k9-1a3f2b1c?verbose=1' });
    expect(ctx.httpPath).toBe('/api/tasks/:taskId');
  });
});

describe('createTelemetryMiddleware', () => {
  it('should run the chain inside a request context', () => {
    const middleware = createTelemetryMiddleware({ serviceName: 'api' });
    const headers: Record<string, string> = {};
    let seenInside: string | undefined;

    middleware(
      { method: 'GET', path: '/api/pr/req-1/status', headers: { 'x-request-id': 'http-7' } },
      { statusCode: 200, setHeader: (name, value) => { headers[name] = value; } },
      () => {
        seenInside = getCurrentContext()?.httpRequestId;
      }
    );

    expect(seenInside).toBe('http-7');
    expect(headers['x-request-id']).toBe('http-7');
  });

  it('should skip health checks', () => {
    const middleware = createTelemetryMiddleware({ serviceName: 'api' });
    const setHeader = vi.fn();
    const next = vi.fn();

    middleware({ method: 'GET', path: '/health' }, { setHeader }, next);

    expect(next).toHaveBeenCalledTimes(1);
    expect(setHeader).not.toHaveBeenCalled();
  });
});
