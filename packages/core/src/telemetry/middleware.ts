/**
 * Telemetry HTTP Middleware
 *
 * Express-compatible middleware that creates a telemetry context per
 * request, runs the rest of the chain inside it and logs completion.
 *
 * @module @autopr/core/telemetry/middleware
 */

import { createContextFromRequest, runWithContext, type TelemetrySource } from './context.js';
import { createLogger, type Logger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

export interface RequestLike {
  method?: string;
  path?: string;
  headers?: Record<string, string | string[] | undefined>;
}

export interface ResponseLike {
  statusCode?: number;
  setHeader?: (name: string, value: string) => unknown;
  on?: (event: 'finish', listener: () => void) => unknown;
}

export type NextFunction = (err?: unknown) => void;

export interface TelemetryMiddlewareOptions {
  /** Service name for logging */
  serviceName: string;
  source?: TelemetrySource;
  /** Paths to skip logging (e.g., health checks) */
  skipPaths?: string[];
  logger?: Logger;
}

// =============================================================================
// Express-style Middleware
// =============================================================================

/**
 * Usage:
 * ```typescript
 * app.use(createTelemetryMiddleware({ serviceName: 'api' }));
 * ```
 */
export function createTelemetryMiddleware(options: TelemetryMiddlewareOptions) {
  const logger = options.logger ?? createLogger(options.serviceName);
  const skipPaths = new Set(options.skipPaths ?? ['/health']);
  const source = options.source ?? 'api';

  return function telemetryMiddleware(req: RequestLike, res: ResponseLike, next: NextFunction): void {
    const path = req.path ?? '/';

    if (skipPaths.has(path)) {
      next();
      return;
    }

    const ctx = createContextFromRequest({ headers: req.headers, method: req.method, path }, source);
    const startTime = Date.now();

    if (ctx.httpRequestId) {
      res.setHeader?.('x-request-id', ctx.httpRequestId);
    }

    res.on?.('finish', () => {
      runWithContext(ctx, () => {
        logger.requestEnd(req.method ?? 'GET', ctx.httpPath ?? path, res.statusCode ?? 200, Date.now() - startTime);
      });
    });

    runWithContext(ctx, () => next());
  };
}
