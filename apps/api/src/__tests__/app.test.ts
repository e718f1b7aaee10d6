/**
 * HTTP API tests
 *
 * Drives the express app through supertest against an orchestrator wired
 * to the in-memory gateway and a canned generator.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { InMemoryRepositoryGateway } from '@autopr/integrations';
import { PROrchestrator, type ChangeGenerator, type GenerationResultInput } from '@autopr/engine';
import { createApp } from '../app.js';

const HELLO_REQUEST = 'Add hello.py printing Hello World';

class CannedGenerator implements ChangeGenerator {
  constructor(private readonly reply: GenerationResultInput) {}

  async generate(): Promise<GenerationResultInput> {
    return this.reply;
  }
}

const helloReply: GenerationResultInput = {
  changes: [{ filePath: 'hello.py', operation: 'create', proposedContent: 'print("Hello World")\n' }],
  summary: HELLO_REQUEST,
};

describe('API', () => {
  let gateway: InMemoryRepositoryGateway;
  let orchestrator: PROrchestrator;
  let app: Express;

  beforeEach(() => {
    gateway = new InMemoryRepositoryGateway({ retryPolicy: { sleep: async () => {} } });
    gateway.seedRepository({
      owner: 'example',
      name: 'demo',
      files: { 'README.md': '# Demo\n' },
      branches: ['feature/hello'],
    });
    orchestrator = new PROrchestrator({ gateway, generator: new CannedGenerator(helloReply) });
    app = createApp({ orchestrator });
  });

  it('should report health with security headers', async () => {
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.headers['x-content-type-options']).toBe('nosniff');
  });

  // ===========================================================================
  // POST /api/pr
  // ===========================================================================

  describe('POST /api/pr', () => {
    it('should create a pull request and answer 201', async () => {
      const res = await request(app)
        .post('/api/pr')
        .send({ freeTextRequest: HELLO_REQUEST, repositoryLocator: 'example/demo' });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        status: 'completed',
        overallCompletion: 'success',
        prUrl: 'https://github.com/example/demo/pull/1',
        prNumber: 1,
        workflowDetails: { baseBranch: 'main', committedFiles: ['hello.py'] },
      });
      expect(gateway.pullRequests('example/demo')).toHaveLength(1);
    });

    it('should answer a failed workflow with its classified status', async () => {
      const res = await request(app)
        .post('/api/pr')
        .send({
          freeTextRequest: HELLO_REQUEST,
          repositoryLocator: 'example/demo',
          options: { branchName: 'feature/hello' },
        });

      expect(res.status).toBe(409);
      expect(res.body.error).toMatchObject({
        code: 'NAME_COLLISION',
        message: "Branch 'feature/hello' already exists",
        details: { branchName: 'feature/hello', failedStep: 'PrepareBranch' },
        retryPossible: false,
      });
      expect(res.body.errorId).toMatch(/^err-/);
      expect(gateway.callsTo('createBranch')).toHaveLength(0);
    });

    it('should reject a missing field before touching the repository', async () => {
      const res = await request(app).post('/api/pr').send({ freeTextRequest: HELLO_REQUEST });

      expect(res.status).toBe(400);
      expect(res.body.error).toMatchObject({
        code: 'VALIDATION_ERROR',
        details: { fieldErrors: { repositoryLocator: 'Required' } },
      });
      expect(gateway.calls).toEqual([]);
    });

    it('should reject a malformed locator', async () => {
      const res = await request(app).post('/api/pr').send({ freeTextRequest: HELLO_REQUEST, repositoryLocator: 'demo' });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(gateway.calls).toEqual([]);
    });

    it('should reject malformed JSON', async () => {
      const res = await request(app).post('/api/pr').set('Content-Type', 'application/json').send('{"freeTextRequest":');

      expect(res.status).toBe(400);
      expect(res.body.error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Malformed JSON body' });
    });
  });

  // ===========================================================================
  // Background submission and polling
  // ===========================================================================

  describe('POST /api/pr/async', () => {
    it('should accept with 202 and expose the outcome for polling', async () => {
      const accepted = await request(app)
        .post('/api/pr/async')
        .send({ freeTextRequest: HELLO_REQUEST, repositoryLocator: 'example/demo' });

      expect(accepted.status).toBe(202);
      expect(accepted.body.statusPollingLocation).toBe(`/api/tasks/${accepted.body.taskId}`);
      expect(accepted.headers.location).toBe(accepted.body.statusPollingLocation);

      await orchestrator.drain();

      const task = await request(app).get(accepted.body.statusPollingLocation);
      expect(task.status).toBe(200);
      expect(task.body).toMatchObject({
        kind: 'pr_creation',
        status: 'completed',
        progressPercent: 100,
        result: { requestId: accepted.body.requestId, prUrl: 'https://github.com/example/demo/pull/1' },
      });

      const status = await request(app).get(`/api/pr/${accepted.body.requestId}/status`);
      expect(status.status).toBe(200);
      expect(status.body.request.status).toBe('completed');
      expect(status.body.workflow.id).toBe(accepted.body.workflowId);
      expect(status.body.progressPercent).toBe(100);
    });

    it('should reject invalid input synchronously', async () => {
      const res = await request(app).post('/api/pr/async').send({ freeTextRequest: '', repositoryLocator: 'example/demo' });

      expect(res.status).toBe(400);
      expect(res.body.error.details.fieldErrors).toEqual({ freeTextRequest: 'freeTextRequest must not be empty' });
    });
  });

  describe('lookups', () => {
    it('should answer unknown requests and tasks with 404', async () => {
      const missingRequest = await request(app).get('/api/pr/req-missing/status');
      const missingTask = await request(app).get('/api/tasks/task-missing');

      expect(missingRequest.status).toBe(404);
      expect(missingRequest.body.error.code).toBe('NOT_FOUND');
      expect(missingTask.status).toBe(404);
      expect(missingTask.body.error.code).toBe('NOT_FOUND');
    });

    it('should answer unknown routes in the error shape', async () => {
      const res = await request(app).get('/api/nope');

      expect(res.status).toBe(404);
      expect(res.body.error).toMatchObject({
        code: 'NOT_FOUND',
        message: 'No route for GET /api/nope',
        details: { method: 'GET', path: '/api/nope' },
      });
    });
  });

  // ===========================================================================
  // POST /api/repositories/analyze
  // ===========================================================================

  describe('POST /api/repositories/analyze', () => {
    it('should return the analysis inline', async () => {
      const res = await request(app).post('/api/repositories/analyze').send({ repositoryLocator: 'example/demo' });

      expect(res.status).toBe(200);
      expect(res.body.summary).toMatchObject({ fullName: 'example/demo', defaultBranch: 'main' });
      expect(res.body.files).toContainEqual(expect.objectContaining({ path: 'README.md', type: 'file' }));
    });

    it('should hand back a task when asked to run in the background', async () => {
      const res = await request(app)
        .post('/api/repositories/analyze')
        .send({ repositoryLocator: 'example/demo', background: true });

      expect(res.status).toBe(202);
      await orchestrator.drain();

      const task = await request(app).get(`/api/tasks/${res.body.taskId}`);
      expect(task.body).toMatchObject({ kind: 'repository_analysis', status: 'completed' });
    });

    it('should answer a missing repository with 404', async () => {
      const res = await request(app).post('/api/repositories/analyze').send({ repositoryLocator: 'example/missing' });

      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NOT_FOUND');
    });

    it('should validate the body', async () => {
      const res = await request(app).post('/api/repositories/analyze').send({ background: 'yes' });

      expect(res.status).toBe(400);
      expect(res.body.error.details.fieldErrors).toEqual({
        repositoryLocator: 'Required',
        background: 'Expected boolean, received string',
      });
    });
  });
});
