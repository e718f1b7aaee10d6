/**
 * In-memory Repository Gateway
 *
 * A complete in-process remote: seedable repositories with branches, files
 * and pull requests, plus failure injection and a per-attempt call log.
 * Backs the `memory` gateway backend and the workflow tests.
 *
 * Calls go through `callRemote` like the Octokit gateway, so injected
 * retryable failures exercise the real retry policy.
 *
 * @module @autopr/integrations/github/memory-gateway
 */

import { createHash } from 'crypto';
import {
  AutoPrError,
  NameCollisionError,
  NotFoundError,
  ValidationError,
  type AutoPrErrorCode,
  type RepositoryRef,
  type RetryPolicy,
} from '@autopr/core';
import {
  callRemote,
  DEFAULT_GATEWAY_TIMEOUT_MS,
  type BranchRef,
  type CommitFilesInput,
  type CommitResult,
  type CreatePullRequestInput,
  type DeleteFileInput,
  type FileContent,
  type FileListing,
  type FileWriteResult,
  type GatewayOperation,
  type MergeMethod,
  type MergeResult,
  type PullRequestResult,
  type RepositoryFile,
  type RepositoryGateway,
  type RepositorySummary,
  type RepositoryVisibility,
  type UpdateFileInput,
} from './gateway.js';

// =============================================================================
// Types
// =============================================================================

export interface SeedRepository {
  owner: string;
  name: string;
  host?: string;
  defaultBranch?: string;
  description?: string;
  visibility?: RepositoryVisibility;
  topics?: string[];
  languages?: Record<string, number>;
  /** Files on the default branch, path to content */
  files?: Record<string, string>;
  /** Extra branches created from the default branch */
  branches?: string[];
}

export interface InjectedFailure {
  operation: GatewayOperation;
  error: Error | (() => Error);
  /** Number of attempts that fail (default 1) */
  times?: number;
  /** Only attempts touching this path (file operations) or branch */
  target?: string;
}

export interface GatewayCallRecord {
  operation: GatewayOperation;
  repository: string;
  target?: string;
  outcome: 'ok' | 'error';
  errorCode?: AutoPrErrorCode;
}

export interface StoredPullRequest {
  number: number;
  url: string;
  head: string;
  base: string;
  title: string;
  body: string;
  draft: boolean;
  state: 'open' | 'merged';
}

export interface InMemoryGatewayConfig {
  retryPolicy?: Partial<RetryPolicy>;
  timeoutMs?: number;
}

interface StoredFile {
  content: string;
  sha: string;
}

interface StoredBranch {
  sha: string;
  files: Map<string, StoredFile>;
}

interface StoredRepository {
  ref: RepositoryRef;
  defaultBranch: string;
  description?: string;
  visibility: RepositoryVisibility;
  topics: string[];
  languages: Record<string, number>;
  branches: Map<string, StoredBranch>;
  pulls: StoredPullRequest[];
  commits: number;
}

// =============================================================================
// Helpers
// =============================================================================

function hashOf(...parts: string[]): string {
  return createHash('sha1').update(parts.join('\0')).digest('hex');
}

function repoKey(host: string, owner: string, name: string): string {
  return `${host}/${owner}/${name}`.toLowerCase();
}

function blob(content: string): StoredFile {
  return { content, sha: hashOf('blob', content) };
}

// =============================================================================
// Gateway
// =============================================================================

export class InMemoryRepositoryGateway implements RepositoryGateway {
  private readonly repositories = new Map<string, StoredRepository>();
  private failures: InjectedFailure[] = [];
  private readonly log: GatewayCallRecord[] = [];
  private readonly timeoutMs: number;

  constructor(private readonly config: InMemoryGatewayConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_GATEWAY_TIMEOUT_MS;
  }

  // ===========================================================================
  // Test and seeding surface
  // ===========================================================================

  seedRepository(seed: SeedRepository): RepositoryRef {
    const host = seed.host ?? 'github.com';
    const ref: RepositoryRef = { host, owner: seed.owner, name: seed.name, fullName: `${seed.owner}/${seed.name}` };
    const defaultBranch = seed.defaultBranch ?? 'main';

    const files = new Map<string, StoredFile>();
    for (const [path, content] of Object.entries(seed.files ?? {})) {
      files.set(path, blob(content));
    }
    const root: StoredBranch = { sha: hashOf('seed', ref.fullName, defaultBranch), files };

    const branches = new Map<string, StoredBranch>([[defaultBranch, root]]);
    for (const name of seed.branches ?? []) {
      branches.set(name, { sha: root.sha, files: new Map(files) });
    }

    this.repositories.set(repoKey(host, seed.owner, seed.name), {
      ref,
      defaultBranch,
      description: seed.description,
      visibility: seed.visibility ?? 'public',
      topics: seed.topics ?? [],
      languages: seed.languages ?? {},
      branches,
      pulls: [],
      commits: 0,
    });
    return ref;
  }

  injectFailure(failure: InjectedFailure): void {
    this.failures.push({ ...failure, times: failure.times ?? 1 });
  }

  /**
   * Every attempt made, including retried ones
   */
  get calls(): readonly GatewayCallRecord[] {
    return this.log;
  }

  callsTo(operation: GatewayOperation): GatewayCallRecord[] {
    return this.log.filter((c) => c.operation === operation);
  }

  branchFiles(fullName: string, branch: string, host = 'github.com'): Record<string, string> | undefined {
    const [owner = '', name = ''] = fullName.split('/');
    const stored = this.repositories.get(repoKey(host, owner, name))?.branches.get(branch);
    if (!stored) return undefined;
    return Object.fromEntries([...stored.files].map(([path, file]) => [path, file.content]));
  }

  pullRequests(fullName: string, host = 'github.com'): StoredPullRequest[] {
    const [owner = '', name = ''] = fullName.split('/');
    return [...(this.repositories.get(repoKey(host, owner, name))?.pulls ?? [])];
  }

  // ===========================================================================
  // Plumbing
  // ===========================================================================

  private call<T>(
    operation: GatewayOperation,
    repo: RepositoryRef,
    target: string | undefined,
    fn: (stored: StoredRepository) => T
  ): Promise<T> {
    return callRemote(
      operation,
      repo,
      { retryPolicy: this.config.retryPolicy, timeoutMs: this.timeoutMs },
      async () => {
        try {
          this.throwInjected(operation, target);
          const result = fn(this.resolve(repo));
          this.log.push({ operation, repository: repo.fullName, target, outcome: 'ok' });
          return result;
        } catch (error) {
          this.log.push({
            operation,
            repository: repo.fullName,
            target,
            outcome: 'error',
            errorCode: error instanceof AutoPrError ? error.code : undefined,
          });
          throw error;
        }
      }
    );
  }

  private throwInjected(operation: GatewayOperation, target: string | undefined): void {
    const index = this.failures.findIndex(
      (f) => f.operation === operation && (f.target === undefined || f.target === target)
    );
    if (index === -1) return;

    const failure = this.failures[index];
    const remaining = (failure.times ?? 1) - 1;
    if (remaining <= 0) {
      this.failures.splice(index, 1);
    } else {
      this.failures[index] = { ...failure, times: remaining };
    }
    throw typeof failure.error === 'function' ? failure.error() : failure.error;
  }

  private resolve(repo: RepositoryRef): StoredRepository {
    const stored = this.repositories.get(repoKey(repo.host, repo.owner, repo.name));
    if (!stored) {
      throw new NotFoundError(`Repository ${repo.fullName} not found`, { resource: repo.fullName });
    }
    return stored;
  }

  private branch(stored: StoredRepository, name: string): StoredBranch {
    const branch = stored.branches.get(name);
    if (!branch) {
      throw new NotFoundError(`Branch '${name}' not found in ${stored.ref.fullName}`, { resource: name });
    }
    return branch;
  }

  private advance(stored: StoredRepository, branch: StoredBranch, message: string): string {
    stored.commits++;
    branch.sha = hashOf('commit', branch.sha, message, String(stored.commits));
    return branch.sha;
  }

  // ===========================================================================
  // Read Operations
  // ===========================================================================

  getRepositorySummary(repo: RepositoryRef): Promise<RepositorySummary> {
    return this.call('getRepositorySummary', repo, undefined, (stored) => ({
      fullName: stored.ref.fullName,
      description: stored.description,
      defaultBranch: stored.defaultBranch,
      visibility: stored.visibility,
      topics: [...stored.topics],
      htmlUrl: `https://${stored.ref.host}/${stored.ref.fullName}`,
      languages: { ...stored.languages },
    }));
  }

  listFiles(repo: RepositoryRef, ref?: string): Promise<FileListing> {
    return this.call('listFiles', repo, ref, (stored) => {
      const treeRef = ref ?? stored.defaultBranch;
      const branch = this.branch(stored, treeRef);

      const dirs = new Set<string>();
      const files: RepositoryFile[] = [];
      for (const [path, file] of branch.files) {
        const parts = path.split('/');
        for (let i = 1; i < parts.length; i++) {
          dirs.add(parts.slice(0, i).join('/'));
        }
        files.push({ path, type: 'file', size: Buffer.byteLength(file.content), sha: file.sha });
      }
      for (const dir of dirs) {
        files.push({ path: dir, type: 'dir', sha: hashOf('tree', dir) });
      }
      files.sort((a, b) => a.path.localeCompare(b.path));

      return { ref: treeRef, files, truncated: false };
    });
  }

  getFileContent(repo: RepositoryRef, path: string, ref?: string): Promise<FileContent> {
    return this.call('getFileContent', repo, path, (stored) => {
      const file = this.branch(stored, ref ?? stored.defaultBranch).files.get(path);
      if (!file) {
        throw new NotFoundError(`'${path}' not found in ${stored.ref.fullName}`, { resource: path });
      }
      return { path, content: file.content, sha: file.sha };
    });
  }

  branchExists(repo: RepositoryRef, branch: string): Promise<boolean> {
    return this.call('branchExists', repo, branch, (stored) => stored.branches.has(branch));
  }

  // ===========================================================================
  // Write Operations
  // ===========================================================================

  createBranch(repo: RepositoryRef, branch: string, fromBranch: string): Promise<BranchRef> {
    return this.call('createBranch', repo, branch, (stored) => {
      const source = this.branch(stored, fromBranch);
      if (stored.branches.has(branch)) {
        throw new NameCollisionError(branch);
      }
      stored.branches.set(branch, { sha: source.sha, files: new Map(source.files) });
      return { name: branch, sha: source.sha };
    });
  }

  commitFiles(repo: RepositoryRef, input: CommitFilesInput): Promise<CommitResult> {
    return this.call('commitFiles', repo, input.branch, (stored) => {
      if (input.files.length === 0) {
        throw new ValidationError('A commit needs at least one file', { context: { branch: input.branch } });
      }
      const branch = this.branch(stored, input.branch);

      // Check everything before touching the branch
      for (const file of input.files) {
        if (file.operation === 'delete' && !branch.files.has(file.path)) {
          throw new ValidationError(`Cannot delete missing file '${file.path}'`, { context: { path: file.path } });
        }
        if (file.operation !== 'delete' && file.content === undefined) {
          throw new ValidationError(`No content for '${file.path}'`, { context: { path: file.path } });
        }
      }

      for (const file of input.files) {
        if (file.operation === 'delete') {
          branch.files.delete(file.path);
        } else {
          branch.files.set(file.path, blob(file.content ?? ''));
        }
      }

      return {
        sha: this.advance(stored, branch, input.message),
        branch: input.branch,
        files: input.files.map((f) => f.path),
      };
    });
  }

  updateFile(repo: RepositoryRef, input: UpdateFileInput): Promise<FileWriteResult> {
    return this.call('updateFile', repo, input.path, (stored) => {
      const branch = this.branch(stored, input.branch);
      const current = branch.files.get(input.path);
      if (input.sha !== undefined && current?.sha !== input.sha) {
        throw new ValidationError(`'${input.path}' does not match sha ${input.sha}`, {
          context: { path: input.path },
        });
      }
      branch.files.set(input.path, blob(input.content));
      return { path: input.path, commitSha: this.advance(stored, branch, input.message) };
    });
  }

  deleteFile(repo: RepositoryRef, input: DeleteFileInput): Promise<FileWriteResult> {
    return this.call('deleteFile', repo, input.path, (stored) => {
      const branch = this.branch(stored, input.branch);
      const current = branch.files.get(input.path);
      if (!current) {
        throw new NotFoundError(`'${input.path}' not found on '${input.branch}'`, { resource: input.path });
      }
      if (input.sha !== undefined && current.sha !== input.sha) {
        throw new ValidationError(`'${input.path}' does not match sha ${input.sha}`, {
          context: { path: input.path },
        });
      }
      branch.files.delete(input.path);
      return { path: input.path, commitSha: this.advance(stored, branch, input.message) };
    });
  }

  createPullRequest(repo: RepositoryRef, input: CreatePullRequestInput): Promise<PullRequestResult> {
    return this.call('createPullRequest', repo, input.head, (stored) => {
      for (const name of [input.head, input.base]) {
        if (!stored.branches.has(name)) {
          throw new ValidationError(`Branch '${name}' does not exist`, { context: { branch: name } });
        }
      }

      const open = stored.pulls.find((p) => p.state === 'open' && p.head === input.head && p.base === input.base);
      if (open) {
        return { number: open.number, url: open.url, existing: true };
      }

      const number = stored.pulls.length + 1;
      const url = `https://${stored.ref.host}/${stored.ref.fullName}/pull/${number}`;
      stored.pulls.push({
        number,
        url,
        head: input.head,
        base: input.base,
        title: input.title,
        body: input.body,
        draft: input.draft ?? false,
        state: 'open',
      });
      return { number, url, existing: false };
    });
  }

  mergePullRequest(repo: RepositoryRef, prNumber: number, method: MergeMethod = 'squash'): Promise<MergeResult> {
    return this.call('mergePullRequest', repo, String(prNumber), (stored) => {
      const pull = stored.pulls.find((p) => p.number === prNumber);
      if (!pull) {
        throw new NotFoundError(`Pull request #${prNumber} not found`, { resource: String(prNumber) });
      }
      if (pull.state !== 'open') {
        throw new ValidationError(`Pull request #${prNumber} is not mergeable`, { context: { prNumber } });
      }

      const head = this.branch(stored, pull.head);
      const base = this.branch(stored, pull.base);
      base.files = new Map(head.files);
      pull.state = 'merged';

      return {
        merged: true,
        sha: this.advance(stored, base, `${method} #${prNumber}`),
        message: 'Pull Request successfully merged',
      };
    });
  }
}

export function createInMemoryGateway(config?: InMemoryGatewayConfig): InMemoryRepositoryGateway {
  return new InMemoryRepositoryGateway(config);
}
