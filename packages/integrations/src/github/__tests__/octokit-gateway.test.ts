/**
 * Octokit Gateway Tests
 *
 * All tests use mocked Octokit responses - no network calls.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  AuthenticationError,
  NameCollisionError,
  NotFoundError,
  TransientNetworkError,
  ValidationError,
  type RepositoryRef,
} from '@autopr/core';
import { OctokitRepositoryGateway, apiBaseUrl } from '../octokit-gateway.js';

const octokit = vi.hoisted(() => {
  const options: unknown[] = [];
  return {
    options,
    rest: {
      repos: {
        get: vi.fn(),
        listLanguages: vi.fn(),
        getContent: vi.fn(),
        createOrUpdateFileContents: vi.fn(),
        deleteFile: vi.fn(),
      },
      git: {
        getRef: vi.fn(),
        createRef: vi.fn(),
        getTree: vi.fn(),
        createBlob: vi.fn(),
        getCommit: vi.fn(),
        createTree: vi.fn(),
        createCommit: vi.fn(),
        updateRef: vi.fn(),
      },
      pulls: {
        create: vi.fn(),
        list: vi.fn(),
        merge: vi.fn(),
      },
    },
  };
});

vi.mock('octokit', () => ({
  Octokit: class {
    rest = octokit.rest;
    constructor(options: unknown) {
      octokit.options.push(options);
    }
  },
}));

function httpError(status: number, message: string, headers: Record<string, string> = {}): Error {
  return Object.assign(new Error(message), { status, response: { headers } });
}

function timeoutError(): Error {
  return Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
}

const base64 = (text: string) => Buffer.from(text).toString('base64');

const repo: RepositoryRef = { host: 'github.com', owner: 'example', name: 'demo', fullName: 'example/demo' };

describe('OctokitRepositoryGateway', () => {
  let gateway: OctokitRepositoryGateway;

  beforeEach(() => {
    octokit.options.length = 0;
    gateway = new OctokitRepositoryGateway({
      token: 'test-secret',
      retryPolicy: { sleep: async () => {} },
    });
  });

  describe('construction', () => {
    it('should require a token', () => {
      expect(() => new OctokitRepositoryGateway({ token: '' })).toThrow(ValidationError);
    });

    it('should disable Octokit retry and throttling', async () => {
      octokit.rest.git.getRef.mockResolvedValue({ data: { object: { sha: 'abc' } } });

      await gateway.branchExists(repo, 'main');

      expect(octokit.options).toHaveLength(1);
      expect(octokit.options[0]).toMatchObject({
        auth: 'test-secret',
        baseUrl: 'https://api.github.com',
        retry: { enabled: false },
        throttle: { enabled: false },
      });
    });

    it('should map enterprise hosts to the v3 API', () => {
      expect(apiBaseUrl('github.com')).toBe('https://api.github.com');
      expect(apiBaseUrl('ghe.example.com')).toBe('https://ghe.example.com/api/v3');
    });
  });

  describe('read operations', () => {
    it('should build a repository summary', async () => {
      octokit.rest.repos.get.mockResolvedValue({
        data: {
          full_name: 'example/demo',
          description: null,
          default_branch: 'trunk',
          visibility: 'private',
          private: true,
          topics: ['demo'],
          html_url: 'https://github.com/example/demo',
        },
      });
      octokit.rest.repos.listLanguages.mockResolvedValue({ data: { TypeScript: 1200, Shell: 40 } });

      const summary = await gateway.getRepositorySummary(repo);

      expect(summary).toEqual({
        fullName: 'example/demo',
        description: undefined,
        defaultBranch: 'trunk',
        visibility: 'private',
        topics: ['demo'],
        htmlUrl: 'https://github.com/example/demo',
        languages: { TypeScript: 1200, Shell: 40 },
      });
    });

    it('should list a recursive tree', async () => {
      octokit.rest.git.getTree.mockResolvedValue({
        data: {
          truncated: false,
          tree: [
            { path: 'src', type: 'tree', sha: 't1' },
            { path: 'src/index.ts', type: 'blob', sha: 'b1', size: 10 },
            { path: 'vendor/lib', type: 'commit', sha: 'c1' },
          ],
        },
      });

      const listing = await gateway.listFiles(repo, 'main');

      expect(octokit.rest.git.getTree).toHaveBeenCalledWith(
        expect.objectContaining({ tree_sha: 'main', recursive: 'true' })
      );
      expect(listing).toEqual({
        ref: 'main',
        truncated: false,
        files: [
          { path: 'src', type: 'dir', size: undefined, sha: 't1' },
          { path: 'src/index.ts', type: 'file', size: 10, sha: 'b1' },
        ],
      });
    });

    it('should decode base64 file content', async () => {
      octokit.rest.repos.getContent.mockResolvedValue({
        data: {
          type: 'file',
          encoding: 'base64',
          content: Buffer.from('hello\n').toString('base64'),
          sha: 'file-sha',
        },
      });

      const file = await gateway.getFileContent(repo, 'README.md', 'main');

      expect(file).toEqual({ path: 'README.md', content: 'hello\n', sha: 'file-sha' });
    });

    it('should treat a directory as not found', async () => {
      octokit.rest.repos.getContent.mockResolvedValue({ data: [] });

      await expect(gateway.getFileContent(repo, 'src')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should report a missing branch as absent', async () => {
      octokit.rest.git.getRef.mockRejectedValue(httpError(404, 'Not Found'));

      await expect(gateway.branchExists(repo, 'nope')).resolves.toBe(false);
      expect(octokit.rest.git.getRef).toHaveBeenCalledTimes(1);
    });
  });

  describe('createBranch', () => {
    it('should create the ref from the base sha', async () => {
      octokit.rest.git.getRef.mockResolvedValue({ data: { object: { sha: 'base-sha' } } });
      octokit.rest.git.createRef.mockResolvedValue({ data: { ref: 'refs/heads/feature' } });

      const branch = await gateway.createBranch(repo, 'feature', 'main');

      expect(branch).toEqual({ name: 'feature', sha: 'base-sha' });
      expect(octokit.rest.git.createRef).toHaveBeenCalledWith(
        expect.objectContaining({ ref: 'refs/heads/feature', sha: 'base-sha' })
      );
    });

    it('should raise a name collision without retrying', async () => {
      octokit.rest.git.getRef.mockResolvedValue({ data: { object: { sha: 'base-sha' } } });
      octokit.rest.git.createRef.mockRejectedValue(httpError(422, 'Reference already exists'));

      const error = await gateway.createBranch(repo, 'feature', 'main').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NameCollisionError);
      expect(octokit.rest.git.createRef).toHaveBeenCalledTimes(1);
    });
  });

  describe('createBranch after a lost response', () => {
    it('should accept the ref an earlier attempt created', async () => {
      octokit.rest.git.getRef.mockResolvedValue({ data: { object: { sha: 'base-sha' } } });
      octokit.rest.git.createRef
        .mockRejectedValueOnce(timeoutError())
        .mockRejectedValueOnce(httpError(422, 'Reference already exists'));

      const branch = await gateway.createBranch(repo, 'feature', 'main');

      expect(branch).toEqual({ name: 'feature', sha: 'base-sha' });
      expect(octokit.rest.git.createRef).toHaveBeenCalledTimes(2);
      expect(octokit.rest.git.getRef).toHaveBeenLastCalledWith(expect.objectContaining({ ref: 'heads/feature' }));
    });

    it('should still report a collision when the ref points elsewhere', async () => {
      octokit.rest.git.getRef
        .mockResolvedValueOnce({ data: { object: { sha: 'base-sha' } } })
        .mockResolvedValueOnce({ data: { object: { sha: 'someone-else' } } });
      octokit.rest.git.createRef
        .mockRejectedValueOnce(timeoutError())
        .mockRejectedValueOnce(httpError(422, 'Reference already exists'));

      const error = await gateway.createBranch(repo, 'feature', 'main').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NameCollisionError);
      expect(octokit.rest.git.createRef).toHaveBeenCalledTimes(2);
    });
  });

  describe('commitFiles', () => {
    it('should commit every file in one tree and move the ref once', async () => {
      octokit.rest.git.getRef.mockResolvedValue({ data: { object: { sha: 'parent-sha' } } });
      octokit.rest.git.createBlob.mockResolvedValue({ data: { sha: 'blob-sha' } });
      octokit.rest.git.getCommit.mockResolvedValue({ data: { tree: { sha: 'base-tree' } } });
      octokit.rest.git.createTree.mockResolvedValue({ data: { sha: 'new-tree' } });
      octokit.rest.git.createCommit.mockResolvedValue({ data: { sha: 'commit-sha' } });
      octokit.rest.git.updateRef.mockResolvedValue({ data: {} });

      const result = await gateway.commitFiles(repo, {
        branch: 'feature',
        message: 'Add hello.py',
        files: [
          { path: 'hello.py', operation: 'create', content: 'print("Hello World")\n' },
          { path: 'old.txt', operation: 'delete' },
        ],
      });

      expect(result).toEqual({ sha: 'commit-sha', branch: 'feature', files: ['hello.py', 'old.txt'] });
      expect(octokit.rest.git.createBlob).toHaveBeenCalledTimes(1);
      expect(octokit.rest.git.createTree).toHaveBeenCalledWith(
        expect.objectContaining({
          base_tree: 'base-tree',
          tree: [
            { path: 'hello.py', mode: '100644', type: 'blob', sha: 'blob-sha' },
            { path: 'old.txt', mode: '100644', type: 'blob', sha: null },
          ],
        })
      );
      expect(octokit.rest.git.createCommit).toHaveBeenCalledWith(
        expect.objectContaining({ message: 'Add hello.py', tree: 'new-tree', parents: ['parent-sha'] })
      );
      expect(octokit.rest.git.updateRef).toHaveBeenCalledTimes(1);
      expect(octokit.rest.git.updateRef).toHaveBeenCalledWith(
        expect.objectContaining({ ref: 'heads/feature', sha: 'commit-sha' })
      );
    });

    it('should reject an empty file list before any call', async () => {
      await expect(gateway.commitFiles(repo, { branch: 'feature', message: 'x', files: [] })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(octokit.rest.git.getRef).not.toHaveBeenCalled();
    });
  });

  describe('retry behaviour', () => {
    it('should retry a rate-limited PR creation twice and then succeed', async () => {
      const sleep = vi.fn(async (_ms: number) => {});
      gateway = new OctokitRepositoryGateway({ token: 'test-secret', retryPolicy: { sleep } });
      octokit.rest.pulls.create
        .mockRejectedValueOnce(httpError(429, 'Too Many Requests', { 'retry-after': '0' }))
        .mockRejectedValueOnce(httpError(429, 'Too Many Requests', { 'retry-after': '0' }))
        .mockResolvedValueOnce({ data: { number: 42, html_url: 'https://github.com/example/demo/pull/42' } });

      const pr = await gateway.createPullRequest(repo, {
        head: 'feature',
        base: 'main',
        title: 'Add hello.py',
        body: 'body',
      });

      expect(pr).toEqual({ number: 42, url: 'https://github.com/example/demo/pull/42', existing: false });
      expect(octokit.rest.pulls.create).toHaveBeenCalledTimes(3);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(sleep).toHaveBeenCalledWith(0);
    });

    it('should surface transient failures after the attempt bound', async () => {
      octokit.rest.git.getRef.mockRejectedValue(httpError(503, 'Service Unavailable'));

      await expect(gateway.branchExists(repo, 'main')).rejects.toBeInstanceOf(TransientNetworkError);
      expect(octokit.rest.git.getRef).toHaveBeenCalledTimes(3);
    });

    it('should never retry authentication failures', async () => {
      octokit.rest.git.getRef.mockRejectedValue(httpError(401, 'Bad credentials'));

      await expect(gateway.branchExists(repo, 'main')).rejects.toBeInstanceOf(AuthenticationError);
      expect(octokit.rest.git.getRef).toHaveBeenCalledTimes(1);
    });
  });

  describe('pull requests', () => {
    it('should return the open PR when one already exists', async () => {
      octokit.rest.pulls.create.mockRejectedValue(
        httpError(422, 'Validation Failed: A pull request already exists for example:feature.')
      );
      octokit.rest.pulls.list.mockResolvedValue({
        data: [{ number: 7, html_url: 'https://github.com/example/demo/pull/7' }],
      });

      const pr = await gateway.createPullRequest(repo, { head: 'feature', base: 'main', title: 't', body: 'b' });

      expect(pr).toEqual({ number: 7, url: 'https://github.com/example/demo/pull/7', existing: true });
      expect(octokit.rest.pulls.list).toHaveBeenCalledWith(
        expect.objectContaining({ head: 'example:feature', base: 'main', state: 'open' })
      );
    });

    it('should merge with the requested method', async () => {
      octokit.rest.pulls.merge.mockResolvedValue({ data: { merged: true, sha: 'merge-sha', message: 'merged' } });

      const result = await gateway.mergePullRequest(repo, 42, 'rebase');

      expect(result).toEqual({ merged: true, sha: 'merge-sha', message: 'merged' });
      expect(octokit.rest.pulls.merge).toHaveBeenCalledWith(
        expect.objectContaining({ pull_number: 42, merge_method: 'rebase' })
      );
    });
  });

  describe('contents API', () => {
    it('should look up the blob sha before updating', async () => {
      octokit.rest.repos.getContent.mockResolvedValue({
        data: { type: 'file', encoding: 'base64', content: '', sha: 'current-sha' },
      });
      octokit.rest.repos.createOrUpdateFileContents.mockResolvedValue({ data: { commit: { sha: 'c1' } } });

      const result = await gateway.updateFile(repo, {
        branch: 'feature',
        path: 'README.md',
        content: 'new',
        message: 'Update README.md',
      });

      expect(result).toEqual({ path: 'README.md', commitSha: 'c1' });
      expect(octokit.rest.repos.createOrUpdateFileContents).toHaveBeenCalledWith(
        expect.objectContaining({ sha: 'current-sha', content: Buffer.from('new').toString('base64') })
      );
    });

    it('should not rewrite a file whose update landed before a timeout', async () => {
      octokit.rest.repos.getContent
        .mockResolvedValueOnce({ data: { type: 'file', encoding: 'base64', content: base64('old'), sha: 'old-sha' } })
        .mockResolvedValueOnce({ data: { type: 'file', encoding: 'base64', content: base64('new'), sha: 'new-sha' } });
      octokit.rest.repos.createOrUpdateFileContents.mockRejectedValueOnce(timeoutError());
      octokit.rest.git.getRef.mockResolvedValue({ data: { object: { sha: 'head-sha' } } });

      const result = await gateway.updateFile(repo, {
        branch: 'feature',
        path: 'README.md',
        content: 'new',
        message: 'Update README.md',
      });

      expect(result).toEqual({ path: 'README.md', commitSha: 'head-sha' });
      expect(octokit.rest.repos.createOrUpdateFileContents).toHaveBeenCalledTimes(1);
    });

    it('should retry an update with the blob sha read again', async () => {
      octokit.rest.repos.getContent
        .mockResolvedValueOnce({ data: { type: 'file', encoding: 'base64', content: base64('old'), sha: 'old-sha' } })
        .mockResolvedValueOnce({ data: { type: 'file', encoding: 'base64', content: base64('other'), sha: 'moved-sha' } });
      octokit.rest.repos.createOrUpdateFileContents
        .mockRejectedValueOnce(timeoutError())
        .mockResolvedValueOnce({ data: { commit: { sha: 'c3' } } });

      const result = await gateway.updateFile(repo, {
        branch: 'feature',
        path: 'README.md',
        content: 'new',
        message: 'Update README.md',
      });

      expect(result).toEqual({ path: 'README.md', commitSha: 'c3' });
      expect(octokit.rest.repos.createOrUpdateFileContents).toHaveBeenLastCalledWith(
        expect.objectContaining({ sha: 'moved-sha' })
      );
    });

    it('should treat a file already gone on retry as deleted', async () => {
      octokit.rest.repos.getContent
        .mockResolvedValueOnce({ data: { type: 'file', encoding: 'base64', content: base64('bye'), sha: 'old-sha' } })
        .mockRejectedValueOnce(httpError(404, 'Not Found'));
      octokit.rest.repos.deleteFile.mockRejectedValueOnce(timeoutError());
      octokit.rest.git.getRef.mockResolvedValue({ data: { object: { sha: 'head-sha' } } });

      const result = await gateway.deleteFile(repo, { branch: 'feature', path: 'old.txt', message: 'Remove old.txt' });

      expect(result).toEqual({ path: 'old.txt', commitSha: 'head-sha' });
      expect(octokit.rest.repos.deleteFile).toHaveBeenCalledTimes(1);
      expect(octokit.rest.repos.deleteFile).toHaveBeenCalledWith(expect.objectContaining({ sha: 'old-sha' }));
    });

    it('should create a file that does not exist yet', async () => {
      octokit.rest.repos.getContent.mockRejectedValue(httpError(404, 'Not Found'));
      octokit.rest.repos.createOrUpdateFileContents.mockResolvedValue({ data: { commit: { sha: 'c2' } } });

      await gateway.updateFile(repo, { branch: 'feature', path: 'new.txt', content: 'x', message: 'Add new.txt' });

      expect(octokit.rest.repos.createOrUpdateFileContents).toHaveBeenCalledWith(
        expect.objectContaining({ path: 'new.txt', sha: undefined })
      );
    });
  });
});
