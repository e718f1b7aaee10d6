/**
 * Workflow Run Recorder
 *
 * Sole writer of one WorkflowRun record. Steps are appended strictly in
 * execution order, at most one step is pending at a time, timestamps never
 * go backwards, and once the overall completion is set the record is
 * frozen.
 *
 * @module @autopr/engine/run/workflow-run
 */

import {
  generateId,
  InvalidTransitionError,
  toErrorBody,
  type OverallCompletion,
  type Registry,
  type StepName,
  type WorkflowRun,
  type WorkflowStep,
} from '@autopr/core';

type RunAnnotations = Partial<Pick<WorkflowRun, 'branchName' | 'baseBranch' | 'commitSha' | 'prUrl' | 'prNumber'>>;

export class WorkflowRunRecorder {
  readonly id: string;
  private lastTimestamp = 0;

  constructor(
    private readonly runs: Registry<WorkflowRun>,
    requestId: string,
    plannedSteps: number,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.id = generateId('wf');
    this.runs.create({
      id: this.id,
      requestId,
      steps: [],
      plannedSteps,
      committedFiles: [],
      startedAt: this.now(),
    });
  }

  /**
   * Current time, clamped so recorded timestamps never decrease
   */
  private now(): string {
    const ms = Math.max(this.clock().getTime(), this.lastTimestamp);
    this.lastTimestamp = ms;
    return new Date(ms).toISOString();
  }

  get snapshot(): Readonly<WorkflowRun> {
    return this.runs.require(this.id);
  }

  get isFinished(): boolean {
    return this.snapshot.overallCompletion !== undefined;
  }

  get completedSteps(): number {
    return this.snapshot.steps.filter((s) => s.status === 'completed').length;
  }

  /**
   * round(completed / planned * 100), 100 once finished
   */
  get progressPercent(): number {
    const run = this.snapshot;
    if (run.overallCompletion !== undefined) return 100;
    if (run.plannedSteps === 0) return 0;
    return Math.round((this.completedSteps / run.plannedSteps) * 100);
  }

  // ===========================================================================
  // Mutations
  // ===========================================================================

  private write(updater: (run: Readonly<WorkflowRun>) => WorkflowRun): void {
    const current = this.snapshot;
    if (current.overallCompletion !== undefined) {
      throw new InvalidTransitionError('workflow run', current.overallCompletion, 'modified');
    }
    this.runs.update(this.id, updater);
  }

  private replaceLast(name: StepName, patch: (step: WorkflowStep) => WorkflowStep): void {
    this.write((run) => {
      const last = run.steps[run.steps.length - 1];
      if (!last || last.name !== name || last.status !== 'pending') {
        throw new InvalidTransitionError('workflow step', last ? `${last.name}:${last.status}` : 'none', name);
      }
      return { ...run, steps: [...run.steps.slice(0, -1), Object.freeze(patch(last))] };
    });
  }

  startStep(name: StepName): void {
    this.write((run) => {
      const last = run.steps[run.steps.length - 1];
      if (last?.status === 'pending') {
        throw new InvalidTransitionError('workflow step', `${last.name}:pending`, name);
      }
      const at = this.now();
      const step: WorkflowStep = { name, status: 'pending', startedAt: at, timestamp: at };
      return { ...run, steps: [...run.steps, Object.freeze(step)] };
    });
  }

  completeStep(name: StepName, result?: Record<string, unknown>): void {
    const at = this.now();
    this.replaceLast(name, (step) => ({ ...step, status: 'completed', result, completedAt: at, timestamp: at }));
  }

  failStep(name: StepName, error: unknown): void {
    const at = this.now();
    const body = toErrorBody(error);
    this.replaceLast(name, (step) => ({
      ...step,
      status: 'failed',
      errorMessage: body.message,
      error: { code: body.code, message: body.message, details: body.details },
      completedAt: at,
      timestamp: at,
    }));
  }

  annotate(fields: RunAnnotations): void {
    this.write((run) => ({ ...run, ...fields }));
  }

  addCommittedFiles(paths: readonly string[]): void {
    this.write((run) => ({ ...run, committedFiles: [...run.committedFiles, ...paths] }));
  }

  finish(completion: OverallCompletion): Readonly<WorkflowRun> {
    this.write((run) => ({ ...run, overallCompletion: completion, completedAt: this.now() }));
    return this.snapshot;
  }
}
