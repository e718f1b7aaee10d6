/**
 * PR Workflow Orchestrator
 *
 * Runs one strictly sequential state machine per request:
 *
 * ```
 * AnalyzeRepository -> GenerateChanges -> ValidateChanges
 *   -> PrepareBranch -> CommitChanges -> CreatePullRequest [-> MergePullRequest]
 * ```
 *
 * The same machine backs the blocking call and the background call. Every
 * step is recorded on the run; the first failing step ends the run and is
 * reported with its classified error. Remote side effects that already
 * happened (branch, commits) are reported and left in place.
 *
 * @module @autopr/engine/orchestrator/pr-orchestrator
 */

import {
  buildCommitMessage,
  createLogger,
  DEFAULT_BASE_BRANCH,
  DEFAULT_BRANCH_PREFIX,
  DEFAULT_NAME_ATTEMPTS,
  deriveContext,
  formatRepositoryRef,
  generateId,
  generateUniqueBranchName,
  GenerationError,
  getCurrentContext,
  NameCollisionError,
  NameGenerationExhaustedError,
  NotFoundError,
  nowIso,
  parseRepositoryLocator,
  PartialCommitError,
  parseSubmission,
  Registry,
  runWithContextAsync,
  toErrorBody,
  validateBranchName,
  ValidationError,
  type AcceptedChange,
  type ChangeSetEntry,
  type CommitStrategy,
  type ErrorBody,
  type OverallCompletion,
  type PRRequest,
  type PRRequestStatus,
  type PRSubmission,
  type PRSubmissionInput,
  type RepositoryRef,
  type StepName,
  type TaskHandle,
  type TaskStatusView,
  type WorkflowRun,
} from '@autopr/core';
import type {
  BranchRef,
  FileChange,
  MergeMethod,
  PullRequestResult,
  RepositoryGateway,
} from '@autopr/integrations';
import { RepositoryAnalyzer, type RepositoryAnalysis } from '../analysis/repository-analyzer.js';
import {
  parseGenerationResult,
  type ChangeGenerator,
  type GenerationResult,
  type GenerationResultInput,
} from '../generation/change-generator.js';
import { WorkflowRunRecorder } from '../run/workflow-run.js';
import { validateTransition } from '../run/state-machine.js';
import { BackgroundTaskRunner, type ProgressReporter } from '../tasks/task-runner.js';
import { ChangeValidator, type ValidationFinding, type ValidationReport } from '../validation/change-validator.js';
import {
  buildPullRequestBody,
  failureNextSteps,
  processingNextSteps,
  successNextSteps,
  synthesizeTitle,
} from './pr-content.js';

const logger = createLogger('pr-orchestrator');

// =============================================================================
// Types
// =============================================================================

export interface OrchestratorSettings {
  /** Size ceiling per proposed file, in bytes */
  maxFileBytes: number;
  /** Prefix for generated branch names */
  branchPrefix: string;
  /** `tree` commits all files at once, `per-file` one contents-API call per file */
  commitStrategy: CommitStrategy;
  /** Host assumed for `owner/name` locators */
  defaultHost: string;
  mergeMethod: MergeMethod;
  /** Existence checks per generated name, and regeneration rounds after a lost race */
  maxNameAttempts: number;
}

export const DEFAULT_ORCHESTRATOR_SETTINGS: OrchestratorSettings = {
  maxFileBytes: 1024 * 1024,
  branchPrefix: DEFAULT_BRANCH_PREFIX,
  commitStrategy: 'tree',
  defaultHost: 'github.com',
  mergeMethod: 'squash',
  maxNameAttempts: DEFAULT_NAME_ATTEMPTS,
};

export interface PROrchestratorDeps {
  gateway: RepositoryGateway;
  generator: ChangeGenerator;
  settings?: Partial<OrchestratorSettings>;
  taskRunner?: BackgroundTaskRunner;
}

export interface WorkflowDetails {
  branchName?: string;
  baseBranch?: string;
  prTitle?: string;
  prDescription?: string;
  commitSha?: string;
  committedFiles: string[];
  nextSteps: string[];
}

export interface PRSubmissionResponse {
  requestId: string;
  workflowId: string;
  status: PRRequestStatus;
  message: string;
  prUrl?: string;
  prNumber?: number;
  overallCompletion?: OverallCompletion;
  workflowDetails: WorkflowDetails;
  warnings: ValidationFinding[];
  error?: ErrorBody;
}

export interface BackgroundSubmission extends TaskHandle {
  requestId: string;
  workflowId: string;
}

export interface RequestStatus {
  request: Readonly<PRRequest>;
  workflow: Readonly<WorkflowRun>;
  changeSet: readonly ChangeSetEntry[];
  progressPercent: number;
  nextSteps: string[];
}

/**
 * Working state of one run. Owned by the run; nothing else writes it.
 */
interface ActiveRun {
  requestId: string;
  repository: RepositoryRef;
  submission: PRSubmission;
  recorder: WorkflowRunRecorder;
  changeSet: readonly ChangeSetEntry[];
  warnings: ValidationFinding[];
  prTitle?: string;
  prDescription?: string;
  existingPr: boolean;
  merged: boolean;
  mergeError?: ErrorBody;
  failure?: unknown;
  /** Rendered `failure`, with the left-over branch, commit and files */
  failureBody?: ErrorBody;
  pollingLocation?: string;
  reportProgress?: ProgressReporter;
}

const CORE_STEPS = 6;

// =============================================================================
// Orchestrator
// =============================================================================

export class PROrchestrator {
  private readonly gateway: RepositoryGateway;
  private readonly generator: ChangeGenerator;
  private readonly settings: OrchestratorSettings;
  private readonly analyzer: RepositoryAnalyzer;
  private readonly validator: ChangeValidator;
  private readonly tasks: BackgroundTaskRunner;

  private readonly requests = new Registry<PRRequest>('PR request');
  private readonly workflowRuns = new Registry<WorkflowRun>('Workflow run');
  private readonly active = new Map<string, ActiveRun>();
  /** `host/owner/name:branch` of every branch this process has handed out */
  private readonly reservedBranches = new Set<string>();

  constructor(deps: PROrchestratorDeps) {
    this.gateway = deps.gateway;
    this.generator = deps.generator;
    this.settings = { ...DEFAULT_ORCHESTRATOR_SETTINGS, ...deps.settings };
    this.analyzer = new RepositoryAnalyzer(deps.gateway);
    this.validator = new ChangeValidator({ maxFileBytes: this.settings.maxFileBytes });
    this.tasks = deps.taskRunner ?? new BackgroundTaskRunner();
  }

  // ===========================================================================
  // Public API
  // ===========================================================================

  /**
   * Run a submission to a terminal state. Malformed input throws
   * ValidationError before anything is recorded; every later failure is
   * reported in the response.
   */
  async submit(input: PRSubmissionInput): Promise<PRSubmissionResponse> {
    const run = this.accept(input);
    return this.execute(run);
  }

  /**
   * Accept a submission and run it on a background worker
   */
  submitInBackground(input: PRSubmissionInput): BackgroundSubmission {
    const run = this.accept(input);
    const handle = this.tasks.submit(
      'pr_creation',
      async (reportProgress) => {
        run.reportProgress = reportProgress;
        const response = await this.execute(run);
        if (run.failure !== undefined) {
          throw run.failure;
        }
        return response;
      },
      {
        label: run.requestId,
        context: { requestId: run.requestId, workflowId: run.recorder.id },
        renderError: (error) => run.failureBody ?? toErrorBody(error),
      }
    );
    run.pollingLocation = handle.statusPollingLocation;

    return { ...handle, requestId: run.requestId, workflowId: run.recorder.id };
  }

  async analyzeRepository(locator: string): Promise<RepositoryAnalysis> {
    const repository = parseRepositoryLocator(locator, this.settings.defaultHost);
    return this.analyzer.analyze(repository);
  }

  analyzeRepositoryInBackground(locator: string): TaskHandle {
    const repository = parseRepositoryLocator(locator, this.settings.defaultHost);
    return this.tasks.submit('repository_analysis', () => this.analyzer.analyze(repository), {
      label: formatRepositoryRef(repository),
    });
  }

  getRequestStatus(requestId: string): RequestStatus {
    const request = this.requests.require(requestId);
    const run = this.requireRun(requestId);
    const response = this.respond(run);
    return {
      request,
      workflow: run.recorder.snapshot,
      changeSet: run.changeSet,
      progressPercent: run.recorder.progressPercent,
      nextSteps: response.workflowDetails.nextSteps,
    };
  }

  getTask(taskId: string): TaskStatusView {
    return this.tasks.get(taskId);
  }

  /**
   * Wait for every background worker to finish
   */
  async drain(): Promise<void> {
    await this.tasks.drain();
  }

  // ===========================================================================
  // Submission
  // ===========================================================================

  private accept(input: PRSubmissionInput): ActiveRun {
    const submission = parseSubmission(input);
    const repository = parseRepositoryLocator(submission.repositoryLocator, this.settings.defaultHost);

    const fixedBranch = submission.options.branchName;
    if (fixedBranch !== undefined) {
      const check = validateBranchName(fixedBranch);
      if (!check.valid) {
        throw new ValidationError(`Invalid branch name '${fixedBranch}': ${check.message}`, {
          fieldErrors: { 'options.branchName': check.message },
          context: { rule: check.rule },
        });
      }
    }

    const now = nowIso();
    const request = this.requests.create({
      id: generateId('req'),
      freeTextRequest: submission.freeTextRequest,
      repositoryLocator: submission.repositoryLocator,
      repository,
      options: submission.options,
      status: 'pending',
      createdAt: now,
      updatedAt: now,
    });

    const plannedSteps = CORE_STEPS + (submission.options.autoMerge ? 1 : 0);
    const run: ActiveRun = {
      requestId: request.id,
      repository,
      submission,
      recorder: new WorkflowRunRecorder(this.workflowRuns, request.id, plannedSteps),
      changeSet: [],
      warnings: [],
      existingPr: false,
      merged: false,
    };
    this.active.set(request.id, run);

    logger.info('PR request accepted', {
      requestId: request.id,
      workflowId: run.recorder.id,
      repository: formatRepositoryRef(repository),
      autoMerge: submission.options.autoMerge,
    });
    return run;
  }

  private requireRun(requestId: string): ActiveRun {
    const run = this.active.get(requestId);
    if (!run) {
      throw new NotFoundError(`PR request ${requestId} not found`, { resource: 'PR request', context: { requestId } });
    }
    return run;
  }

  private setStatus(run: ActiveRun, status: PRRequestStatus, patch: Partial<Pick<PRRequest, 'prUrl' | 'error'>> = {}): void {
    this.requests.update(run.requestId, (current) => {
      validateTransition(current.status, status);
      return { ...current, ...patch, status, updatedAt: nowIso() };
    });
  }

  private async execute(run: ActiveRun): Promise<PRSubmissionResponse> {
    const source = getCurrentContext()?.source ?? 'internal';
    const ctx = deriveContext(source, { requestId: run.requestId, workflowId: run.recorder.id });

    return runWithContextAsync(ctx, async () => {
      this.setStatus(run, 'processing');
      try {
        await this.runSteps(run);
      } catch (error) {
        return this.fail(run, error);
      }
      return this.complete(run);
    });
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private async step<T>(
    run: ActiveRun,
    name: StepName,
    fn: () => Promise<T>,
    describe: (result: T) => Record<string, unknown>
  ): Promise<T> {
    const started = Date.now();
    run.recorder.startStep(name);
    logger.stepStart(name);

    try {
      const result = await fn();
      run.recorder.completeStep(name, describe(result));
      logger.stepEnd(name, true, Date.now() - started);
      run.reportProgress?.(run.recorder.progressPercent);
      return result;
    } catch (error) {
      run.recorder.failStep(name, error);
      logger.stepEnd(name, false, Date.now() - started, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  private async runSteps(run: ActiveRun): Promise<void> {
    const { repository, submission } = run;
    const options = submission.options;

    const analysis = await this.step(run, 'AnalyzeRepository', () => this.analyzer.analyze(repository), (a) => ({
      defaultBranch: a.summary.defaultBranch,
      files: a.files.length,
      languages: a.languages.map((l) => l.name),
      frameworks: a.frameworks,
    }));

    const generation = await this.step(run, 'GenerateChanges', () => this.generate(run, analysis), (g) => ({
      changes: g.changes.length,
      summary: g.summary,
    }));

    const report = await this.step(run, 'ValidateChanges', async () => this.validateChanges(run, generation), (r) => ({
      verdict: r.verdict,
      accepted: r.accepted.length,
      warnings: r.warnings.length,
    }));

    const branch = await this.step(run, 'PrepareBranch', () => this.prepareBranch(run, analysis), (b) => ({
      branchName: b.name,
      baseBranch: run.recorder.snapshot.baseBranch,
      sha: b.sha,
    }));

    const commitSha = await this.step(
      run,
      'CommitChanges',
      () => this.commitChanges(run, branch.name, report.accepted, generation),
      (sha) => ({ commitSha: sha, files: run.recorder.snapshot.committedFiles.length, strategy: this.settings.commitStrategy })
    );

    const pr = await this.step(
      run,
      'CreatePullRequest',
      () => this.createPullRequest(run, branch.name, report, generation, commitSha),
      (p) => ({ prNumber: p.number, prUrl: p.url, existing: p.existing })
    );

    if (options.autoMerge) {
      try {
        await this.step(run, 'MergePullRequest', () => this.mergePullRequest(run, pr), (m) => ({ ...m }));
        run.merged = true;
      } catch (error) {
        run.mergeError = toErrorBody(error, { prNumber: pr.number });
        logger.warn('Automatic merge failed; pull request left open', {
          prNumber: pr.number,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private async generate(run: ActiveRun, analysis: RepositoryAnalysis): Promise<GenerationResult> {
    let raw: GenerationResultInput;
    try {
      raw = await this.generator.generate({
        requestId: run.requestId,
        freeTextRequest: run.submission.freeTextRequest,
        repository: analysis,
      });
    } catch (error) {
      if (error instanceof GenerationError) throw error;
      throw new GenerationError(
        `Change generator failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const result = parseGenerationResult(raw);
    if (result.changes.length === 0) {
      throw new GenerationError('Change generator proposed no changes', {
        context: result.summary ? { summary: result.summary } : undefined,
      });
    }
    return result;
  }

  private validateChanges(run: ActiveRun, generation: GenerationResult): ValidationReport {
    const report = this.validator.validate(run.requestId, generation.changes);
    run.changeSet = report.entries;
    run.warnings = report.warnings;

    if (report.verdict === 'invalid') {
      throw new ValidationError(`Change set rejected with ${report.violations.length} violation(s)`, {
        context: {
          violations: report.violations.map((v) => ({ filePath: v.filePath, rule: v.rule, message: v.message })),
        },
      });
    }
    return report;
  }

  // ===========================================================================
  // Branch
  // ===========================================================================

  private reservationKey(name: string, repository: RepositoryRef): string {
    return `${formatRepositoryRef(repository)}:${name}`;
  }

  /**
   * Explicit base must exist; otherwise `main`, falling back to the
   * repository's default branch
   */
  private async resolveBaseBranch(run: ActiveRun, analysis: RepositoryAnalysis): Promise<string> {
    const explicit = run.submission.options.baseBranch;
    if (explicit !== undefined) {
      if (!(await this.gateway.branchExists(run.repository, explicit))) {
        throw new NotFoundError(`Base branch '${explicit}' not found in ${run.repository.fullName}`, {
          resource: explicit,
        });
      }
      return explicit;
    }

    const defaultBranch = analysis.summary.defaultBranch;
    if (defaultBranch === DEFAULT_BASE_BRANCH) return defaultBranch;
    return (await this.gateway.branchExists(run.repository, DEFAULT_BASE_BRANCH)) ? DEFAULT_BASE_BRANCH : defaultBranch;
  }

  private async prepareBranch(run: ActiveRun, analysis: RepositoryAnalysis): Promise<BranchRef> {
    const { repository } = run;
    const baseBranch = await this.resolveBaseBranch(run, analysis);
    run.recorder.annotate({ baseBranch });

    const fixed = run.submission.options.branchName;
    if (fixed !== undefined) {
      const key = this.reservationKey(fixed, repository);
      if (this.reservedBranches.has(key) || (await this.gateway.branchExists(repository, fixed))) {
        throw new NameCollisionError(fixed, { callerFixed: true });
      }
      this.reservedBranches.add(key);
      try {
        const ref = await this.gateway.createBranch(repository, fixed, baseBranch);
        run.recorder.annotate({ branchName: ref.name });
        return ref;
      } catch (error) {
        if (error instanceof NameCollisionError) {
          throw new NameCollisionError(fixed, { callerFixed: true, cause: error });
        }
        throw error;
      }
    }

    const isTaken = async (name: string): Promise<boolean> =>
      this.reservedBranches.has(this.reservationKey(name, repository)) ||
      (await this.gateway.branchExists(repository, name));

    const tried: string[] = [];
    for (let round = 0; round < this.settings.maxNameAttempts; round++) {
      const name = await generateUniqueBranchName(run.submission.freeTextRequest, isTaken, {
        prefix: this.settings.branchPrefix,
        maxAttempts: this.settings.maxNameAttempts,
      });
      this.reservedBranches.add(this.reservationKey(name, repository));
      tried.push(name);

      try {
        const ref = await this.gateway.createBranch(repository, name, baseBranch);
        run.recorder.annotate({ branchName: ref.name });
        return ref;
      } catch (error) {
        if (!(error instanceof NameCollisionError)) throw error;
        logger.warn('Branch was taken between check and create; regenerating', { branchName: name });
      }
    }

    throw new NameGenerationExhaustedError(run.submission.freeTextRequest, tried);
  }

  // ===========================================================================
  // Commit
  // ===========================================================================

  private toFileChange(change: AcceptedChange): FileChange {
    if (change.operation === 'delete') {
      return { path: change.filePath, operation: 'delete' };
    }
    if (change.proposedContent === undefined) {
      throw new ValidationError(`'${change.filePath}' has no proposed content`, {
        context: { filePath: change.filePath },
      });
    }
    return { path: change.filePath, operation: change.operation, content: change.proposedContent };
  }

  private async commitChanges(
    run: ActiveRun,
    branch: string,
    accepted: readonly AcceptedChange[],
    generation: GenerationResult
  ): Promise<string> {
    const summary = generation.summary?.trim() || run.submission.freeTextRequest;
    const files = accepted.map((change) => this.toFileChange(change));

    if (this.settings.commitStrategy === 'tree') {
      const result = await this.gateway.commitFiles(run.repository, {
        branch,
        message: buildCommitMessage(summary, [...accepted]),
        files,
      });
      run.recorder.addCommittedFiles(result.files);
      run.recorder.annotate({ commitSha: result.sha });
      return result.sha;
    }

    const committed: string[] = [];
    let lastSha = '';
    for (const [index, file] of files.entries()) {
      const message = buildCommitMessage(summary, [{ filePath: file.path, operation: file.operation }]);
      try {
        const write =
          file.content === undefined
            ? await this.gateway.deleteFile(run.repository, { branch, path: file.path, message })
            : await this.gateway.updateFile(run.repository, { branch, path: file.path, content: file.content, message });
        committed.push(file.path);
        lastSha = write.commitSha;
        run.recorder.addCommittedFiles([file.path]);
        run.recorder.annotate({ commitSha: write.commitSha });
      } catch (error) {
        if (committed.length === 0) throw error;
        throw new PartialCommitError(
          branch,
          [...committed],
          file.path,
          files.slice(index + 1).map((f) => f.path),
          error
        );
      }
    }
    return lastSha;
  }

  // ===========================================================================
  // Pull request
  // ===========================================================================

  private async createPullRequest(
    run: ActiveRun,
    branch: string,
    report: ValidationReport,
    generation: GenerationResult,
    commitSha: string
  ): Promise<PullRequestResult> {
    const options = run.submission.options;
    const generatedTitle = generation.prTitle?.trim();
    const title = options.prTitle ?? (generatedTitle ? generatedTitle : synthesizeTitle(run.submission.freeTextRequest));
    const body =
      options.prDescription ??
      buildPullRequestBody({
        freeTextRequest: run.submission.freeTextRequest,
        summary: generation.prDescription ?? generation.summary,
        changes: report.accepted,
        warnings: report.warnings,
        commitSha,
      });
    run.prTitle = title;
    run.prDescription = body;

    const baseBranch = run.recorder.snapshot.baseBranch ?? DEFAULT_BASE_BRANCH;
    const pr = await this.gateway.createPullRequest(run.repository, { head: branch, base: baseBranch, title, body });

    run.existingPr = pr.existing;
    run.recorder.annotate({ prUrl: pr.url, prNumber: pr.number });
    this.setStatus(run, 'processing', { prUrl: pr.url });
    return pr;
  }

  private async mergePullRequest(run: ActiveRun, pr: PullRequestResult): Promise<{ sha?: string; method: MergeMethod }> {
    const result = await this.gateway.mergePullRequest(run.repository, pr.number, this.settings.mergeMethod);
    if (!result.merged) {
      throw new ValidationError(`Pull request #${pr.number} was not merged${result.message ? `: ${result.message}` : ''}`, {
        context: { prNumber: pr.number },
      });
    }
    return { sha: result.sha, method: this.settings.mergeMethod };
  }

  // ===========================================================================
  // Terminal states
  // ===========================================================================

  private complete(run: ActiveRun): PRSubmissionResponse {
    const completion: OverallCompletion = run.mergeError ? 'partial' : 'success';
    run.recorder.finish(completion);
    this.setStatus(run, 'completed');

    const snapshot = run.recorder.snapshot;
    logger.info('PR workflow completed', {
      overallCompletion: completion,
      prUrl: snapshot.prUrl,
      branchName: snapshot.branchName,
    });
    return this.respond(run);
  }

  private fail(run: ActiveRun, error: unknown): PRSubmissionResponse {
    const snapshot = run.recorder.snapshot;
    const failedStep = snapshot.steps.find((s) => s.status === 'failed')?.name;
    const body = toErrorBody(error, {
      requestId: run.requestId,
      workflowId: run.recorder.id,
      failedStep,
      branchName: snapshot.branchName,
      commitSha: snapshot.commitSha,
      committedFiles: [...snapshot.committedFiles],
    });

    run.failure = error;
    run.failureBody = body;
    run.recorder.finish('failed');
    this.setStatus(run, 'failed', { error: body });

    logger.error('PR workflow failed', error, { failedStep, code: body.code });
    return this.respond(run);
  }

  private respond(run: ActiveRun): PRSubmissionResponse {
    const request = this.requests.require(run.requestId);
    const workflow = run.recorder.snapshot;
    const committedFiles = [...workflow.committedFiles];

    let message: string;
    let nextSteps: string[];
    if (request.status === 'completed' && workflow.prUrl) {
      nextSteps = successNextSteps(workflow.prUrl, run.merged, run.existingPr);
      if (run.mergeError) {
        message = `Pull request opened at ${workflow.prUrl}; automatic merge failed`;
        nextSteps.push(`Automatic merge failed: ${run.mergeError.message}`, 'Merge the pull request manually');
      } else if (run.merged) {
        message = `Pull request created and merged: ${workflow.prUrl}`;
      } else {
        message = run.existingPr
          ? `Pull request already open: ${workflow.prUrl}`
          : `Pull request created: ${workflow.prUrl}`;
      }
    } else if (request.status === 'failed' && request.error) {
      const failedStep = workflow.steps.find((s) => s.status === 'failed')?.name;
      message = failedStep
        ? `PR workflow failed at ${failedStep}: ${request.error.message}`
        : `PR workflow failed: ${request.error.message}`;
      nextSteps = failureNextSteps(request.error, workflow);
    } else {
      message = 'PR workflow accepted and processing';
      nextSteps = processingNextSteps(run.requestId, run.pollingLocation);
    }

    return {
      requestId: run.requestId,
      workflowId: run.recorder.id,
      status: request.status,
      message,
      prUrl: request.prUrl,
      prNumber: workflow.prNumber,
      overallCompletion: workflow.overallCompletion,
      workflowDetails: {
        branchName: workflow.branchName,
        baseBranch: workflow.baseBranch,
        prTitle: run.prTitle,
        prDescription: run.prDescription,
        commitSha: workflow.commitSha,
        committedFiles,
        nextSteps,
      },
      warnings: [...run.warnings],
      error: request.error,
    };
  }
}
