/**
 * Background task runner tests
 */

import { describe, it, expect } from 'vitest';
import { GenerationError, getCurrentContext, NotFoundError, toErrorBody } from '@autopr/core';
import { BackgroundTaskRunner } from '../task-runner.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('BackgroundTaskRunner', () => {
  it('should return a handle before the work starts', async () => {
    const runner = new BackgroundTaskRunner();
    let started = false;

    const handle = runner.submit('repository_analysis', async () => {
      started = true;
      return { ok: true };
    });

    expect(started).toBe(false);
    expect(handle.taskId).toMatch(/^task-/);
    expect(handle.statusPollingLocation).toBe(`/api/tasks/${handle.taskId}`);
    expect(runner.get(handle.taskId)).toMatchObject({
      status: 'processing',
      kind: 'repository_analysis',
      progressPercent: 0,
    });

    const done = await runner.waitFor(handle.taskId);
    expect(started).toBe(true);
    expect(done.status).toBe('completed');
    expect(done.progressPercent).toBe(100);
    expect(done.result).toEqual({ ok: true });
    expect(done.completedAt).toBeDefined();
  });

  it('should keep progress monotonic and below 100 until completion', async () => {
    const runner = new BackgroundTaskRunner({ pollingLocation: (id) => `/tasks/${id}` });
    const gate = deferred<void>();

    const handle = runner.submit('pr_creation', async (report) => {
      report(50);
      report(20);
      report(150);
      await gate.promise;
      return 'done';
    });
    expect(handle.statusPollingLocation).toBe(`/tasks/${handle.taskId}`);

    await Promise.resolve();
    await Promise.resolve();
    expect(runner.get(handle.taskId).progressPercent).toBe(99);
    expect(runner.activeCount).toBe(1);

    gate.resolve();
    await runner.drain();
    expect(runner.get(handle.taskId).progressPercent).toBe(100);
    expect(runner.activeCount).toBe(0);
  });

  it('should record failures in the shared error shape', async () => {
    const runner = new BackgroundTaskRunner();

    const handle = runner.submit('pr_creation', async () => {
      throw new GenerationError('Change generator proposed no changes');
    });
    const done = await runner.waitFor(handle.taskId);

    expect(done.status).toBe('failed');
    expect(done.result).toBeUndefined();
    expect(done.error).toMatchObject({
      code: 'GENERATION_ERROR',
      message: 'Change generator proposed no changes',
      retryPossible: false,
    });
    expect(done.error?.suggestions.length).toBeGreaterThan(0);
  });

  it('should record the body produced by renderError', async () => {
    const runner = new BackgroundTaskRunner();
    const failure = new GenerationError('boom');

    const handle = runner.submit(
      'pr_creation',
      async () => {
        throw failure;
      },
      { renderError: (error) => toErrorBody(error, { branchName: 'autopr/left-over' }) }
    );
    const done = await runner.waitFor(handle.taskId);

    expect(done.error).toMatchObject({ code: 'GENERATION_ERROR', details: { branchName: 'autopr/left-over' } });
  });

  it('should run the work inside a worker context', async () => {
    const runner = new BackgroundTaskRunner();

    const handle = runner.submit('pr_creation', async () => getCurrentContext(), {
      context: { requestId: 'req-1', workflowId: 'wf-1' },
    });
    const done = await runner.waitFor(handle.taskId);

    expect(done.result).toMatchObject({
      source: 'worker',
      requestId: 'req-1',
      workflowId: 'wf-1',
      taskId: handle.taskId,
    });
  });

  it('should raise NotFoundError for unknown tasks', () => {
    const runner = new BackgroundTaskRunner();

    expect(() => runner.get('task-missing')).toThrow(NotFoundError);
  });
});
