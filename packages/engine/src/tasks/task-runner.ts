/**
 * Background Task Runner
 *
 * Runs units of work off the caller's path and exposes a poll-only status
 * record per task. Only the worker that owns a task writes its record;
 * anyone may read it by id.
 *
 * Cancellation is not supported: a caller can stop polling, the worker
 * still runs to completion.
 *
 * @module @autopr/engine/tasks/task-runner
 */

import {
  createLogger,
  deriveContext,
  generateId,
  nowIso,
  Registry,
  runWithContextAsync,
  toErrorBody,
  type BackgroundTask,
  type ErrorBody,
  type TaskHandle,
  type TaskKind,
  type TaskStatusView,
} from '@autopr/core';

const logger = createLogger('task-runner');

/**
 * Progress callback handed to a worker, percent in [0, 100)
 */
export type ProgressReporter = (percent: number) => void;

export type TaskWork<T> = (reportProgress: ProgressReporter) => Promise<T>;

export interface TaskRunnerConfig {
  /** Where callers poll a task, relative to the API root */
  pollingLocation?: (taskId: string) => string;
}

export interface SubmitOptions {
  /** Request id or locator the task works on */
  label?: string;
  /** Extra telemetry context for the worker */
  context?: { requestId?: string; workflowId?: string };
  /** Error body recorded when the work throws; `toErrorBody` otherwise */
  renderError?: (error: unknown) => ErrorBody;
}

export class BackgroundTaskRunner {
  private readonly tasks = new Registry<BackgroundTask>('Background task');
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly pollingLocation: (taskId: string) => string;

  constructor(config: TaskRunnerConfig = {}) {
    this.pollingLocation = config.pollingLocation ?? ((taskId) => `/api/tasks/${taskId}`);
  }

  /**
   * Start `work` in the background and return its handle immediately
   */
  submit<T>(kind: TaskKind, work: TaskWork<T>, options: SubmitOptions = {}): TaskHandle {
    const id = generateId('task');
    this.tasks.create({
      id,
      kind,
      status: 'processing',
      progressPercent: 0,
      startedAt: nowIso(),
      label: options.label,
    });

    const ctx = deriveContext('worker', { ...options.context, taskId: id });
    const renderError = options.renderError ?? toErrorBody;
    this.inFlight.set(
      id,
      runWithContextAsync(ctx, () => this.execute(id, kind, work, renderError)).finally(() => this.inFlight.delete(id))
    );

    return { taskId: id, statusPollingLocation: this.pollingLocation(id) };
  }

  private async execute<T>(
    id: string,
    kind: TaskKind,
    work: TaskWork<T>,
    renderError: (error: unknown) => ErrorBody
  ): Promise<void> {
    // Let submit() return before the worker does anything
    await Promise.resolve();

    const started = Date.now();
    logger.taskStart(kind, id);

    const reportProgress: ProgressReporter = (percent) => {
      const bounded = Math.min(99, Math.max(0, Math.round(percent)));
      this.tasks.update(id, (task) => ({ ...task, progressPercent: Math.max(task.progressPercent, bounded) }));
    };

    try {
      const result = await work(reportProgress);
      this.tasks.update(id, (task) => ({
        ...task,
        status: 'completed',
        progressPercent: 100,
        completedAt: nowIso(),
        result,
      }));
      logger.taskEnd(kind, id, true, Date.now() - started);
    } catch (error) {
      this.tasks.update(id, (task) => ({
        ...task,
        status: 'failed',
        progressPercent: 100,
        completedAt: nowIso(),
        error: renderError(error),
      }));
      logger.taskEnd(kind, id, false, Date.now() - started, {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Poll view of a task; throws NotFoundError for unknown ids
   */
  get(taskId: string): TaskStatusView {
    const task = this.tasks.require(taskId);
    return {
      taskId: task.id,
      status: task.status,
      kind: task.kind,
      startedAt: task.startedAt,
      progressPercent: task.progressPercent,
      completedAt: task.completedAt,
      result: task.result,
      error: task.error,
    };
  }

  /**
   * Resolve once the task has reached a terminal state
   */
  async waitFor(taskId: string): Promise<TaskStatusView> {
    this.tasks.require(taskId);
    await this.inFlight.get(taskId);
    return this.get(taskId);
  }

  /**
   * Await every in-flight worker
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()]);
    }
  }

  get activeCount(): number {
    return this.inFlight.size;
  }
}
