/**
 * Octokit Repository Gateway
 *
 * GitHub-backed implementation of the Repository Gateway. Octokit's retry
 * and throttling plugins are switched off: `callRemote` applies the one
 * retry policy, and every request carries its own abort signal.
 *
 * Multi-file commits go through the Git data API (blobs, tree, commit,
 * ref update) so the branch moves exactly once.
 *
 * @module @autopr/integrations/github/octokit-gateway
 */

import { Octokit } from 'octokit';
import {
  NameCollisionError,
  NotFoundError,
  ValidationError,
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
  type MergeMethod,
  type MergeResult,
  type PullRequestResult,
  type RepositoryFile,
  type RepositoryGateway,
  type RepositorySummary,
  type RepositoryVisibility,
  type UpdateFileInput,
} from './gateway.js';
import { classifyGitHubError, isUnprocessable } from './error-mapping.js';

/**
 * Octokit gateway configuration
 */
export interface OctokitGatewayConfig {
  token: string;
  /** Per-request timeout in ms */
  timeoutMs?: number;
  retryPolicy?: Partial<RetryPolicy>;
  userAgent?: string;
}

type TreeEntry = {
  path: string;
  mode: '100644';
  type: 'blob';
  sha: string | null;
};

/**
 * REST base URL for a host (GitHub Enterprise Server lives under /api/v3)
 */
export function apiBaseUrl(host: string): string {
  return host === 'github.com' ? 'https://api.github.com' : `https://${host}/api/v3`;
}

type ContentsData = Awaited<ReturnType<Octokit['rest']['repos']['getContent']>>['data'];

function asFile(path: string, data: ContentsData): FileContent | undefined {
  if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
    return undefined;
  }
  const content =
    data.encoding === 'base64' ? Buffer.from(data.content, 'base64').toString('utf-8') : data.content;
  return { path, content, sha: data.sha };
}

function toVisibility(visibility: string | undefined, isPrivate: boolean): RepositoryVisibility {
  if (visibility === 'public' || visibility === 'private' || visibility === 'internal') {
    return visibility;
  }
  return isPrivate ? 'private' : 'public';
}

export class OctokitRepositoryGateway implements RepositoryGateway {
  private readonly clients = new Map<string, Octokit>();
  private readonly timeoutMs: number;

  constructor(private readonly config: OctokitGatewayConfig) {
    if (!config.token) {
      throw new ValidationError('GitHub token required. Set GITHUB_TOKEN env var.', {
        fieldErrors: { GITHUB_TOKEN: 'Required' },
      });
    }
    this.timeoutMs = config.timeoutMs ?? DEFAULT_GATEWAY_TIMEOUT_MS;
  }

  // ===========================================================================
  // Plumbing
  // ===========================================================================

  private client(host: string): Octokit {
    let octokit = this.clients.get(host);
    if (!octokit) {
      octokit = new Octokit({
        auth: this.config.token,
        baseUrl: apiBaseUrl(host),
        userAgent: this.config.userAgent ?? 'autopr',
        retry: { enabled: false },
        throttle: {
          enabled: false,
          onRateLimit: () => false,
          onSecondaryRateLimit: () => false,
        },
      });
      this.clients.set(host, octokit);
    }
    return octokit;
  }

  /**
   * One retried remote call; raw Octokit errors are classified before the
   * retry policy sees them
   */
  private call<T>(
    operation: string,
    repo: RepositoryRef,
    fn: (octokit: Octokit, signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const octokit = this.client(repo.host);
    return callRemote(
      operation,
      repo,
      { retryPolicy: this.config.retryPolicy, timeoutMs: this.timeoutMs },
      async (signal) => {
        try {
          return await fn(octokit, signal);
        } catch (error) {
          throw classifyGitHubError(error, operation);
        }
      }
    );
  }

  /**
   * Unretried reads used inside a retried write, to tell whether an earlier
   * attempt landed before its response was lost
   */
  private async headSha(octokit: Octokit, repo: RepositoryRef, branch: string, signal: AbortSignal): Promise<string> {
    const { data } = await octokit.rest.git.getRef({
      owner: repo.owner,
      repo: repo.name,
      ref: `heads/${branch}`,
      request: { signal },
    });
    return data.object.sha;
  }

  private async peekFile(
    octokit: Octokit,
    repo: RepositoryRef,
    path: string,
    branch: string,
    signal: AbortSignal
  ): Promise<FileContent | undefined> {
    try {
      const { data } = await octokit.rest.repos.getContent({
        owner: repo.owner,
        repo: repo.name,
        path,
        ref: branch,
        request: { signal },
      });
      return asFile(path, data);
    } catch (error) {
      if (classifyGitHubError(error, 'peekFile') instanceof NotFoundError) return undefined;
      throw error;
    }
  }

  // ===========================================================================
  // Read Operations
  // ===========================================================================

  async getRepositorySummary(repo: RepositoryRef): Promise<RepositorySummary> {
    const { data } = await this.call('getRepositorySummary', repo, (octokit, signal) =>
      octokit.rest.repos.get({ owner: repo.owner, repo: repo.name, request: { signal } })
    );
    const { data: languages } = await this.call('getRepositorySummary.languages', repo, (octokit, signal) =>
      octokit.rest.repos.listLanguages({ owner: repo.owner, repo: repo.name, request: { signal } })
    );

    return {
      fullName: data.full_name,
      description: data.description ?? undefined,
      defaultBranch: data.default_branch,
      visibility: toVisibility(data.visibility, data.private),
      topics: data.topics ?? [],
      htmlUrl: data.html_url,
      languages,
    };
  }

  async listFiles(repo: RepositoryRef, ref?: string): Promise<FileListing> {
    const treeRef = ref ?? (await this.getRepositorySummary(repo)).defaultBranch;
    const { data } = await this.call('listFiles', repo, (octokit, signal) =>
      octokit.rest.git.getTree({
        owner: repo.owner,
        repo: repo.name,
        tree_sha: treeRef,
        recursive: 'true',
        request: { signal },
      })
    );

    const files: RepositoryFile[] = [];
    for (const item of data.tree) {
      if (!item.path || !item.sha) continue;
      if (item.type !== 'blob' && item.type !== 'tree') continue;
      files.push({
        path: item.path,
        type: item.type === 'blob' ? 'file' : 'dir',
        size: item.size,
        sha: item.sha,
      });
    }

    return { ref: treeRef, files, truncated: data.truncated };
  }

  async getFileContent(repo: RepositoryRef, path: string, ref?: string): Promise<FileContent> {
    const { data } = await this.call('getFileContent', repo, (octokit, signal) =>
      octokit.rest.repos.getContent({ owner: repo.owner, repo: repo.name, path, ref, request: { signal } })
    );

    const file = asFile(path, data);
    if (!file) {
      throw new NotFoundError(`'${path}' is not a file in ${repo.fullName}`, { resource: path });
    }
    return file;
  }

  async branchExists(repo: RepositoryRef, branch: string): Promise<boolean> {
    try {
      await this.getBranchSha(repo, branch, 'branchExists');
      return true;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return false;
      }
      throw error;
    }
  }

  private async getBranchSha(repo: RepositoryRef, branch: string, operation: string): Promise<string> {
    const { data } = await this.call(operation, repo, (octokit, signal) =>
      octokit.rest.git.getRef({ owner: repo.owner, repo: repo.name, ref: `heads/${branch}`, request: { signal } })
    );
    return data.object.sha;
  }

  // ===========================================================================
  // Write Operations
  // ===========================================================================

  async createBranch(repo: RepositoryRef, branch: string, fromBranch: string): Promise<BranchRef> {
    const sha = await this.getBranchSha(repo, fromBranch, 'createBranch.base');

    let attempt = 0;
    await this.call('createBranch', repo, async (octokit, signal) => {
      attempt += 1;
      try {
        await octokit.rest.git.createRef({
          owner: repo.owner,
          repo: repo.name,
          ref: `refs/heads/${branch}`,
          sha,
          request: { signal },
        });
      } catch (error) {
        if (!isUnprocessable(error, /reference already exists/i)) {
          throw error;
        }
        // A retry that finds the ref where an earlier attempt put it is ours
        if (attempt > 1 && (await this.headSha(octokit, repo, branch, signal)) === sha) {
          return;
        }
        throw new NameCollisionError(branch, { cause: error });
      }
    });

    return { name: branch, sha };
  }

  async commitFiles(repo: RepositoryRef, input: CommitFilesInput): Promise<CommitResult> {
    if (input.files.length === 0) {
      throw new ValidationError('A commit needs at least one file', { context: { branch: input.branch } });
    }

    const parentSha = await this.getBranchSha(repo, input.branch, 'commitFiles.ref');

    const tree: TreeEntry[] = await Promise.all(
      input.files.map(async (file): Promise<TreeEntry> => {
        if (file.operation === 'delete') {
          return { path: file.path, mode: '100644', type: 'blob', sha: null };
        }
        const { data } = await this.call('commitFiles.blob', repo, (octokit, signal) =>
          octokit.rest.git.createBlob({
            owner: repo.owner,
            repo: repo.name,
            content: Buffer.from(file.content ?? '').toString('base64'),
            encoding: 'base64',
            request: { signal },
          })
        );
        return { path: file.path, mode: '100644', type: 'blob', sha: data.sha };
      })
    );

    const { data: parentCommit } = await this.call('commitFiles.parent', repo, (octokit, signal) =>
      octokit.rest.git.getCommit({ owner: repo.owner, repo: repo.name, commit_sha: parentSha, request: { signal } })
    );

    const { data: newTree } = await this.call('commitFiles.tree', repo, (octokit, signal) =>
      octokit.rest.git.createTree({
        owner: repo.owner,
        repo: repo.name,
        base_tree: parentCommit.tree.sha,
        tree,
        request: { signal },
      })
    );

    const { data: commit } = await this.call('commitFiles.commit', repo, (octokit, signal) =>
      octokit.rest.git.createCommit({
        owner: repo.owner,
        repo: repo.name,
        message: input.message,
        tree: newTree.sha,
        parents: [parentSha],
        request: { signal },
      })
    );

    await this.call('commitFiles', repo, (octokit, signal) =>
      octokit.rest.git.updateRef({
        owner: repo.owner,
        repo: repo.name,
        ref: `heads/${input.branch}`,
        sha: commit.sha,
        request: { signal },
      })
    );

    return { sha: commit.sha, branch: input.branch, files: input.files.map((f) => f.path) };
  }

  private async currentBlobSha(repo: RepositoryRef, path: string, branch: string): Promise<string> {
    return (await this.getFileContent(repo, path, branch)).sha;
  }

  async updateFile(repo: RepositoryRef, input: UpdateFileInput): Promise<FileWriteResult> {
    let sha = input.sha;
    if (sha === undefined) {
      try {
        sha = await this.currentBlobSha(repo, input.path, input.branch);
      } catch (error) {
        // Absent file: the contents API creates it
        if (!(error instanceof NotFoundError)) throw error;
      }
    }

    let attempt = 0;
    const commitSha = await this.call('updateFile', repo, async (octokit, signal) => {
      attempt += 1;
      if (attempt > 1) {
        const current = await this.peekFile(octokit, repo, input.path, input.branch, signal);
        if (current?.content === input.content) {
          return this.headSha(octokit, repo, input.branch, signal);
        }
        sha = current?.sha;
      }
      const { data } = await octokit.rest.repos.createOrUpdateFileContents({
        owner: repo.owner,
        repo: repo.name,
        path: input.path,
        message: input.message,
        content: Buffer.from(input.content).toString('base64'),
        branch: input.branch,
        sha,
        request: { signal },
      });
      return data.commit.sha ?? '';
    });

    return { path: input.path, commitSha };
  }

  async deleteFile(repo: RepositoryRef, input: DeleteFileInput): Promise<FileWriteResult> {
    let sha = input.sha ?? (await this.currentBlobSha(repo, input.path, input.branch));

    let attempt = 0;
    const commitSha = await this.call('deleteFile', repo, async (octokit, signal) => {
      attempt += 1;
      if (attempt > 1) {
        const current = await this.peekFile(octokit, repo, input.path, input.branch, signal);
        if (!current) {
          return this.headSha(octokit, repo, input.branch, signal);
        }
        sha = current.sha;
      }
      const { data } = await octokit.rest.repos.deleteFile({
        owner: repo.owner,
        repo: repo.name,
        path: input.path,
        message: input.message,
        sha,
        branch: input.branch,
        request: { signal },
      });
      return data.commit.sha ?? '';
    });

    return { path: input.path, commitSha };
  }

  async createPullRequest(repo: RepositoryRef, input: CreatePullRequestInput): Promise<PullRequestResult> {
    // undefined: an open PR for this head and base already exists
    const created = await this.call('createPullRequest', repo, async (octokit, signal) => {
      try {
        const { data } = await octokit.rest.pulls.create({
          owner: repo.owner,
          repo: repo.name,
          title: input.title,
          body: input.body,
          head: input.head,
          base: input.base,
          draft: input.draft ?? false,
          request: { signal },
        });
        return { number: data.number, url: data.html_url, existing: false };
      } catch (error) {
        if (isUnprocessable(error, /a pull request already exists/i)) {
          return undefined;
        }
        throw error;
      }
    });

    if (created) return created;

    const { data: open } = await this.call('createPullRequest.existing', repo, (octokit, signal) =>
      octokit.rest.pulls.list({
        owner: repo.owner,
        repo: repo.name,
        head: `${repo.owner}:${input.head}`,
        base: input.base,
        state: 'open',
        request: { signal },
      })
    );

    const existing = open[0];
    if (!existing) {
      throw new NotFoundError(`Open pull request for ${input.head} could not be found`, { resource: input.head });
    }
    return { number: existing.number, url: existing.html_url, existing: true };
  }

  async mergePullRequest(repo: RepositoryRef, prNumber: number, method: MergeMethod = 'squash'): Promise<MergeResult> {
    const { data } = await this.call('mergePullRequest', repo, (octokit, signal) =>
      octokit.rest.pulls.merge({
        owner: repo.owner,
        repo: repo.name,
        pull_number: prNumber,
        merge_method: method,
        request: { signal },
      })
    );
    return { merged: data.merged, sha: data.sha, message: data.message };
  }
}

/**
 * Create an Octokit-backed gateway
 */
export function createOctokitGateway(config: OctokitGatewayConfig): OctokitRepositoryGateway {
  return new OctokitRepositoryGateway(config);
}
