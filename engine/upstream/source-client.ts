// engine/upstream/source-client.ts — Source-control hosting client (GitHub REST via Octokit)

import { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import type {
  CommitDetail,
  CommitSummary,
  PullRequestSummary,
  RepoRef,
  RepositoryInfo,
} from '../types.js';
import {
  AuthInvalidError,
  CommitLensError,
  NotFoundError,
  RateLimitedError,
  SourceUnavailableError,
  errorMessage,
  isCommitLensError,
} from '../errors.js';
import { withTimeout } from '../util/async.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

// ─── Contract ────────────────────────────────────────────────────────────────

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ListCommitsOptions extends CallOptions {
  limit: number;
  branch?: string;
}

export interface PostedComment {
  id: number;
  url: string;
}

/**
 * Read access to a hosted repository plus PR comment posting.
 *
 * Failures reject with AuthInvalidError, NotFoundError, RateLimitedError,
 * SourceUnavailableError or UpstreamTimeoutError.
 */
export interface SourceClient {
  /** Most recent commits first, at most `limit` (no pagination). */
  listCommits(repo: RepoRef, options: ListCommitsOptions): Promise<CommitSummary[]>;
  getCommit(repo: RepoRef, sha: string, options?: CallOptions): Promise<CommitDetail>;
  getCommitDiff(repo: RepoRef, sha: string, options?: CallOptions): Promise<string>;
  commitExists(repo: RepoRef, sha: string, options?: CallOptions): Promise<boolean>;
  getPullRequest(repo: RepoRef, number: number, options?: CallOptions): Promise<PullRequestSummary>;
  getPullRequestDiff(repo: RepoRef, number: number, options?: CallOptions): Promise<string>;
  getRepository(repo: RepoRef, options?: CallOptions): Promise<RepositoryInfo>;
  /** Decoded README text, or null when the repository has none. */
  getReadme(repo: RepoRef, options?: CallOptions): Promise<string | null>;
  /** Every path in the tree at `ref`; directories end with `/`. */
  getFileTree(repo: RepoRef, ref: string, options?: CallOptions): Promise<string[]>;
  /** Decoded file text at `ref`, or null when the path is absent or not a file. */
  getFileContent(repo: RepoRef, path: string, ref: string, options?: CallOptions): Promise<string | null>;
  listBranches(repo: RepoRef, options?: CallOptions): Promise<string[]>;
  createPullRequestComment(repo: RepoRef, number: number, body: string, options?: CallOptions): Promise<PostedComment>;
}

// ─── Error Mapping ───────────────────────────────────────────────────────────

/**
 * Translate an Octokit failure into the engine's error taxonomy.
 */
export function mapSourceError(error: unknown, operation: string): CommitLensError {
  if (isCommitLensError(error)) return error;

  if (error instanceof RequestError) {
    const detail = `${operation} failed with HTTP ${error.status}: ${error.message}`;
    const remaining = error.response?.headers['x-ratelimit-remaining'];

    if (error.status === 401) return new AuthInvalidError(detail, error);
    if (error.status === 404 || error.status === 422) return new NotFoundError(detail, error);
    if (error.status === 429 || (error.status === 403 && String(remaining) === '0')) {
      return new RateLimitedError(detail, error);
    }
    return new SourceUnavailableError(detail, error);
  }

  return new SourceUnavailableError(`${operation} failed: ${errorMessage(error)}`, error);
}

// ─── GitHub Implementation ───────────────────────────────────────────────────

export interface GitHubSourceClientOptions {
  token?: string;
  baseUrl: string;
  timeoutMs: number;
  /** Pre-built client; tests pass one with a fake `fetch`. */
  octokit?: Octokit;
  logger?: Logger;
}

const DIFF_MEDIA_TYPE = 'application/vnd.github.diff';

export class GitHubSourceClient implements SourceClient {
  private readonly octokit: Octokit;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: GitHubSourceClientOptions) {
    this.octokit = options.octokit ?? new Octokit({
      auth: options.token,
      baseUrl: options.baseUrl,
      userAgent: 'commitlens',
    });
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  async listCommits(repo: RepoRef, options: ListCommitsOptions): Promise<CommitSummary[]> {
    const { data } = await this.call('list commits', options, signal =>
      this.octokit.repos.listCommits({
        owner: repo.owner,
        repo: repo.name,
        per_page: Math.min(Math.max(options.limit, 1), 100),
        ...(options.branch ? { sha: options.branch } : {}),
        request: { signal },
      }),
    );

    return data.slice(0, options.limit).map(item => ({
      sha: item.sha,
      message: item.commit.message,
      author: item.commit.author?.name ?? item.author?.login ?? 'unknown',
      date: item.commit.author?.date ?? '',
    }));
  }

  async getCommit(repo: RepoRef, sha: string, options: CallOptions = {}): Promise<CommitDetail> {
    const { data } = await this.call(`get commit ${sha}`, options, signal =>
      this.octokit.repos.getCommit({ owner: repo.owner, repo: repo.name, ref: sha, request: { signal } }),
    );

    return {
      sha: data.sha,
      message: data.commit.message,
      author: data.commit.author?.name ?? data.author?.login ?? 'unknown',
      date: data.commit.author?.date ?? '',
      parents: data.parents.map(parent => parent.sha),
      files: (data.files ?? []).map(file => ({
        filename: file.filename,
        ...(file.previous_filename ? { previousFilename: file.previous_filename } : {}),
        status: file.status,
        additions: file.additions,
        deletions: file.deletions,
      })),
    };
  }

  async getCommitDiff(repo: RepoRef, sha: string, options: CallOptions = {}): Promise<string> {
    const operation = `get diff of commit ${sha}`;
    const response = await this.call(operation, options, signal =>
      this.octokit.request('GET /repos/{owner}/{repo}/commits/{ref}', {
        owner: repo.owner,
        repo: repo.name,
        ref: sha,
        headers: { accept: DIFF_MEDIA_TYPE },
        request: { signal },
      }),
    );
    return expectText(response.data, operation);
  }

  async commitExists(repo: RepoRef, sha: string, options: CallOptions = {}): Promise<boolean> {
    try {
      await this.getCommit(repo, sha, options);
      return true;
    } catch (error) {
      if (isCommitLensError(error) && error.kind === 'NotFound') {
        this.logger.debug(`commit ${sha} not found in ${repo.owner}/${repo.name}`);
        return false;
      }
      throw error;
    }
  }

  async getPullRequest(repo: RepoRef, number: number, options: CallOptions = {}): Promise<PullRequestSummary> {
    const { data } = await this.call(`get pull request #${number}`, options, signal =>
      this.octokit.pulls.get({ owner: repo.owner, repo: repo.name, pull_number: number, request: { signal } }),
    );

    return {
      number: data.number,
      title: data.title,
      body: data.body ?? '',
      headSha: data.head.sha,
      headRef: data.head.ref,
      baseRef: data.base.ref,
      author: data.user?.login ?? 'unknown',
    };
  }

  async getPullRequestDiff(repo: RepoRef, number: number, options: CallOptions = {}): Promise<string> {
    const operation = `get diff of pull request #${number}`;
    const response = await this.call(operation, options, signal =>
      this.octokit.request('GET /repos/{owner}/{repo}/pulls/{pull_number}', {
        owner: repo.owner,
        repo: repo.name,
        pull_number: number,
        headers: { accept: DIFF_MEDIA_TYPE },
        request: { signal },
      }),
    );
    return expectText(response.data, operation);
  }

  async getRepository(repo: RepoRef, options: CallOptions = {}): Promise<RepositoryInfo> {
    const { data } = await this.call('get repository', options, signal =>
      this.octokit.repos.get({ owner: repo.owner, repo: repo.name, request: { signal } }),
    );

    return {
      fullName: data.full_name,
      description: data.description ?? null,
      defaultBranch: data.default_branch,
      language: data.language ?? null,
      stars: data.stargazers_count,
    };
  }

  async getReadme(repo: RepoRef, options: CallOptions = {}): Promise<string | null> {
    return this.orNullWhenMissing(async () => {
      const { data } = await this.call('get readme', options, signal =>
        this.octokit.repos.getReadme({ owner: repo.owner, repo: repo.name, request: { signal } }),
      );
      return Buffer.from(data.content, 'base64').toString('utf-8');
    });
  }

  async getFileTree(repo: RepoRef, ref: string, options: CallOptions = {}): Promise<string[]> {
    const { data } = await this.call(`get tree at ${ref}`, options, signal =>
      this.octokit.git.getTree({ owner: repo.owner, repo: repo.name, tree_sha: ref, recursive: '1', request: { signal } }),
    );

    const paths: string[] = [];
    for (const entry of data.tree) {
      if (!entry.path) continue;
      paths.push(entry.type === 'tree' ? `${entry.path}/` : entry.path);
    }
    return paths.sort();
  }

  async getFileContent(repo: RepoRef, path: string, ref: string, options: CallOptions = {}): Promise<string | null> {
    return this.orNullWhenMissing(async () => {
      const { data } = await this.call(`get ${path} at ${ref}`, options, signal =>
        this.octokit.repos.getContent({ owner: repo.owner, repo: repo.name, path, ref, request: { signal } }),
      );
      if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) return null;
      return Buffer.from(data.content, 'base64').toString('utf-8');
    });
  }

  async listBranches(repo: RepoRef, options: CallOptions = {}): Promise<string[]> {
    const { data } = await this.call('list branches', options, signal =>
      this.octokit.repos.listBranches({ owner: repo.owner, repo: repo.name, per_page: 100, request: { signal } }),
    );
    return data.map(branch => branch.name);
  }

  async createPullRequestComment(
    repo: RepoRef,
    number: number,
    body: string,
    options: CallOptions = {},
  ): Promise<PostedComment> {
    const { data } = await this.call(`comment on pull request #${number}`, options, signal =>
      this.octokit.issues.createComment({
        owner: repo.owner,
        repo: repo.name,
        issue_number: number,
        body,
        request: { signal },
      }),
    );
    return { id: data.id, url: data.html_url };
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private async call<T>(operation: string, options: CallOptions, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    try {
      return await withTimeout(`GitHub ${operation}`, this.timeoutMs, task, options.signal);
    } catch (error) {
      throw mapSourceError(error, operation);
    }
  }

  private async orNullWhenMissing<T>(task: () => Promise<T | null>): Promise<T | null> {
    try {
      return await task();
    } catch (error) {
      if (isCommitLensError(error) && error.kind === 'NotFound') return null;
      throw error;
    }
  }
}

function expectText(data: unknown, operation: string): string {
  if (typeof data !== 'string') {
    throw new SourceUnavailableError(`${operation} returned ${typeof data} instead of diff text`);
  }
  return data;
}
