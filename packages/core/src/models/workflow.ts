/**
 * Workflow run and background task records.
 *
 * @module @autopr/core/models/workflow
 */

import type { ErrorBody } from '../reliability/error-response.js';

export const STEP_NAMES = [
  'AnalyzeRepository',
  'GenerateChanges',
  'ValidateChanges',
  'PrepareBranch',
  'CommitChanges',
  'CreatePullRequest',
  'MergePullRequest',
] as const;
export type StepName = (typeof STEP_NAMES)[number];

export type StepStatus = 'pending' | 'completed' | 'failed';

export interface StepError {
  code: ErrorBody['code'];
  message: string;
  details?: Record<string, unknown>;
}

export interface WorkflowStep {
  name: StepName;
  status: StepStatus;
  result?: Record<string, unknown>;
  errorMessage?: string;
  error?: StepError;
  startedAt: string;
  completedAt?: string;
  /** Time of the last status change */
  timestamp: string;
}

export type OverallCompletion = 'success' | 'partial' | 'failed';

export interface WorkflowRun {
  id: string;
  requestId: string;
  steps: readonly WorkflowStep[];
  /** Number of steps this run will attempt */
  plannedSteps: number;
  branchName?: string;
  baseBranch?: string;
  commitSha?: string;
  /** Files known to have landed on the remote branch, in commit order */
  committedFiles: readonly string[];
  prUrl?: string;
  prNumber?: number;
  overallCompletion?: OverallCompletion;
  startedAt: string;
  completedAt?: string;
}

export type TaskKind = 'pr_creation' | 'repository_analysis';
export type TaskStatus = 'processing' | 'completed' | 'failed';

export interface BackgroundTask {
  id: string;
  kind: TaskKind;
  status: TaskStatus;
  progressPercent: number;
  startedAt: string;
  completedAt?: string;
  /** Request id or locator the task works on */
  label?: string;
  result?: unknown;
  error?: ErrorBody;
}

/**
 * Poll view of a background task
 */
export interface TaskStatusView {
  taskId: string;
  status: TaskStatus;
  kind: TaskKind;
  startedAt: string;
  progressPercent: number;
  completedAt?: string;
  result?: unknown;
  error?: ErrorBody;
}

export interface TaskHandle {
  taskId: string;
  statusPollingLocation: string;
}
