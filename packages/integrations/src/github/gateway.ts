/**
 * Repository Gateway
 *
 * The only authenticated boundary to the remote version-control service.
 * Every implementation routes its remote calls through `callRemote`, so the
 * retry policy, the per-call timeout and the call logging behave the same
 * whichever backend is configured.
 *
 * @module @autopr/integrations/github/gateway
 */

import {
  createLogger,
  retry,
  type ChangeOperation,
  type RepositoryRef,
  type RetryPolicy,
} from '@autopr/core';

// =============================================================================
// Gateway Types
// =============================================================================

export type RepositoryVisibility = 'public' | 'private' | 'internal';

export interface RepositorySummary {
  fullName: string;
  description?: string;
  defaultBranch: string;
  visibility: RepositoryVisibility;
  topics: string[];
  htmlUrl: string;
  /** Bytes of source per language, as reported by the service */
  languages: Record<string, number>;
}

export interface RepositoryFile {
  path: string;
  type: 'file' | 'dir';
  size?: number;
  sha: string;
}

export interface FileListing {
  ref: string;
  files: RepositoryFile[];
  /** The service cut the listing short */
  truncated: boolean;
}

export interface FileContent {
  path: string;
  content: string;
  sha: string;
}

export interface BranchRef {
  name: string;
  sha: string;
}

/**
 * One file in a multi-file commit. `content` is required unless the
 * operation is a delete.
 */
export interface FileChange {
  path: string;
  operation: ChangeOperation;
  content?: string;
}

export interface CommitFilesInput {
  branch: string;
  message: string;
  files: FileChange[];
}

export interface CommitResult {
  sha: string;
  branch: string;
  /** Paths contained in the commit, in input order */
  files: string[];
}

export interface UpdateFileInput {
  branch: string;
  path: string;
  content: string;
  message: string;
  /** Current blob sha; looked up when omitted */
  sha?: string;
}

export interface DeleteFileInput {
  branch: string;
  path: string;
  message: string;
  sha?: string;
}

export interface FileWriteResult {
  path: string;
  commitSha: string;
}

export interface CreatePullRequestInput {
  head: string;
  base: string;
  title: string;
  body: string;
  draft?: boolean;
}

export interface PullRequestResult {
  number: number;
  url: string;
  /** An open PR for the same head and base was returned instead of a new one */
  existing: boolean;
}

export type MergeMethod = 'merge' | 'squash' | 'rebase';

export interface MergeResult {
  merged: boolean;
  sha?: string;
  message?: string;
}

// =============================================================================
// Gateway Contract
// =============================================================================

export interface RepositoryGateway {
  getRepositorySummary(repo: RepositoryRef): Promise<RepositorySummary>;

  /** Recursive listing of a ref, the default branch when omitted */
  listFiles(repo: RepositoryRef, ref?: string): Promise<FileListing>;

  /** Throws NotFoundError when the file does not exist at `ref` */
  getFileContent(repo: RepositoryRef, path: string, ref?: string): Promise<FileContent>;

  branchExists(repo: RepositoryRef, branch: string): Promise<boolean>;

  /** Throws NameCollisionError when `branch` already exists */
  createBranch(repo: RepositoryRef, branch: string, fromBranch: string): Promise<BranchRef>;

  /** All files land in one commit or the call fails as a unit */
  commitFiles(repo: RepositoryRef, input: CommitFilesInput): Promise<CommitResult>;

  updateFile(repo: RepositoryRef, input: UpdateFileInput): Promise<FileWriteResult>;

  deleteFile(repo: RepositoryRef, input: DeleteFileInput): Promise<FileWriteResult>;

  createPullRequest(repo: RepositoryRef, input: CreatePullRequestInput): Promise<PullRequestResult>;

  mergePullRequest(repo: RepositoryRef, prNumber: number, method?: MergeMethod): Promise<MergeResult>;
}

export type GatewayOperation = keyof RepositoryGateway;

// =============================================================================
// Shared call wrapper
// =============================================================================

export interface GatewayCallOptions {
  retryPolicy?: Partial<RetryPolicy>;
  /** Per-attempt timeout in ms */
  timeoutMs: number;
}

const logger = createLogger('repository-gateway');

/**
 * Run one remote call under the retry policy. `fn` receives a fresh abort
 * signal for every attempt and must throw taxonomy errors.
 */
export async function callRemote<T>(
  operation: string,
  repo: RepositoryRef,
  options: GatewayCallOptions,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const started = Date.now();
  let attempts = 0;
  try {
    const result = await retry(
      () => {
        attempts++;
        return fn(AbortSignal.timeout(options.timeoutMs));
      },
      options.retryPolicy,
      operation
    );
    logger.gatewayCall(operation, Date.now() - started, true, { repository: repo.fullName, attempts });
    return result;
  } catch (error) {
    logger.gatewayCall(operation, Date.now() - started, false, {
      repository: repo.fullName,
      attempts,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

export const DEFAULT_GATEWAY_TIMEOUT_MS = 15000;
