/**
 * PR Workflow HTTP API
 *
 * Thin express layer over the orchestrator. Every failure leaves the
 * service in the shared error shape produced by `toErrorResponse`.
 *
 * Endpoints:
 * - GET  /health                      Liveness
 * - POST /api/pr                      Blocking PR submission
 * - POST /api/pr/async                Background PR submission
 * - GET  /api/pr/:requestId/status    Request, workflow and change set
 * - GET  /api/tasks/:taskId           Background task status
 * - POST /api/repositories/analyze    Repository analysis
 *
 * @module @autopr/api/app
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { z } from 'zod';
import {
  createLogger,
  createTelemetryMiddleware,
  generateId,
  NotFoundError,
  parseSubmission,
  toErrorResponse,
  toHttpStatus,
  ValidationError,
  wrapError,
  type Logger,
} from '@autopr/core';
import type { PROrchestrator } from '@autopr/engine';

// =============================================================================
// Request Schemas
// =============================================================================

const AnalyzeRequest = z.object({
  repositoryLocator: z.string().trim().min(1, 'repositoryLocator is required'),
  background: z.boolean().default(false),
});

export interface AppOptions {
  orchestrator: PROrchestrator;
  logger?: Logger;
  /** Origins allowed by CORS; every origin when omitted */
  corsOrigins?: string[];
  /** Maximum accepted JSON body size */
  bodyLimit?: string;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Forward rejections from async handlers to the error middleware
 */
function handle(fn: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const fieldErrors: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      fieldErrors[issue.path.join('.') || 'body'] = issue.message;
    }
    throw new ValidationError('Invalid request body', { fieldErrors });
  }
  return parsed.data;
}

// =============================================================================
// App
// =============================================================================

export function createApp(options: AppOptions): express.Express {
  const { orchestrator } = options;
  const logger = options.logger ?? createLogger('api');
  const app = express();

  app.use(helmet());
  app.use(cors(options.corsOrigins ? { origin: options.corsOrigins } : undefined));
  app.use(express.json({ limit: options.bodyLimit ?? '2mb' }));
  app.use(createTelemetryMiddleware({ serviceName: 'api', logger }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * POST /api/pr - Run the whole workflow and answer with its outcome
   */
  app.post(
    '/api/pr',
    handle(async (req, res) => {
      const submission = parseSubmission(req.body);
      const response = await orchestrator.submit(submission);

      if (response.status === 'failed' && response.error) {
        res.status(toHttpStatus(response.error.code)).json({
          error: response.error,
          timestamp: new Date().toISOString(),
          errorId: generateId('err'),
        });
        return;
      }
      res.status(201).json(response);
    })
  );

  /**
   * POST /api/pr/async - Accept the submission and run it in the background
   */
  app.post(
    '/api/pr/async',
    handle(async (req, res) => {
      const submission = parseSubmission(req.body);
      const accepted = orchestrator.submitInBackground(submission);
      res.status(202).location(accepted.statusPollingLocation).json(accepted);
    })
  );

  app.get(
    '/api/pr/:requestId/status',
    handle(async (req, res) => {
      res.json(orchestrator.getRequestStatus(req.params.requestId));
    })
  );

  app.get(
    '/api/tasks/:taskId',
    handle(async (req, res) => {
      res.json(orchestrator.getTask(req.params.taskId));
    })
  );

  /**
   * POST /api/repositories/analyze - Analyze now, or hand back a task handle
   */
  app.post(
    '/api/repositories/analyze',
    handle(async (req, res) => {
      const body = parseBody(AnalyzeRequest, req.body);
      if (body.background) {
        const task = orchestrator.analyzeRepositoryInBackground(body.repositoryLocator);
        res.status(202).location(task.statusPollingLocation).json(task);
        return;
      }
      res.json(await orchestrator.analyzeRepository(body.repositoryLocator));
    })
  );

  // ===========================================================================
  // Fallthrough and Error Handling
  // ===========================================================================

  app.use((req, _res, next) => {
    next(new NotFoundError(`No route for ${req.method} ${req.path}`, { context: { method: req.method, path: req.path } }));
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // body-parser reports malformed JSON as a SyntaxError
    const error = err instanceof SyntaxError ? new ValidationError('Malformed JSON body', { cause: err }) : err;
    const status = toHttpStatus(wrapError(error).code);

    if (status >= 500) {
      logger.error('Unhandled API error', error);
    }
    res.status(status).json(toErrorResponse(error));
  });

  return app;
}
