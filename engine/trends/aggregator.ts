// engine/trends/aggregator.ts — Commit window classification and file/module activity ranking

import type {
  ActivityEntry,
  ClassifiedCommit,
  CommitCategory,
  CommitLensConfig,
  CommitSummary,
  FileActivity,
  RepoRef,
  TrendStatistics,
} from '../types.js';
import { ContextUnavailableError, errorMessage, isCommitLensError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CallOptions, SourceClient } from '../upstream/source-client.js';
import { repoId } from '../cache/analysis-key.js';
import { commitSubject } from '../context/describe.js';
import { moduleOf } from '../context/file-filters.js';
import type { CommitClassifier } from './classifier.js';

export type TrendSettings = CommitLensConfig['trends'];

export interface AggregateOptions extends CallOptions {
  branch?: string;
}

/**
 * Clamp a requested window size to 1..maxWindow. Non-integers round down.
 */
export function clampWindow(size: number, maxWindow: number): number {
  if (!Number.isFinite(size)) return maxWindow;
  return Math.min(Math.max(Math.floor(size), 1), maxWindow);
}

/**
 * Sort by count descending, then name ascending, and keep the first `topK`.
 */
export function rankActivity(counts: Map<string, number>, topK: number): ActivityEntry[] {
  return [...counts.entries()]
    .map(([name, count]) => ({ name, count }))
    .sort((a, b) => b.count - a.count || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, topK);
}

export function emptyCategoryCounts(): Record<CommitCategory, number> {
  return { feature: 0, fix: 0, perf: 0, refactor: 0, docs: 0, test: 0, other: 0 };
}

/**
 * Folds the N most recent commits of a repository into TrendStatistics.
 *
 * Classification runs in batches of `batchSize`; a failed batch, or a commit
 * the classifier leaves out, is counted as unclassified and never aborts the
 * window. Only a failure to list the commits fails the whole aggregation.
 */
export class TrendAggregator {
  private readonly source: SourceClient;
  private readonly classifier: CommitClassifier;
  private readonly settings: TrendSettings;
  private readonly logger: Logger;

  constructor(source: SourceClient, classifier: CommitClassifier, settings: TrendSettings, logger: Logger = silentLogger) {
    this.source = source;
    this.classifier = classifier;
    this.settings = settings;
    this.logger = logger;
  }

  async aggregate(repo: RepoRef, size: number, options: AggregateOptions = {}): Promise<TrendStatistics> {
    const commits = await this.listWindow(repo, size, options);
    return this.summarize(repo, commits, options);
  }

  /**
   * The `size` most recent commits (clamped to 1..maxWindow), newest first.
   * @throws {ContextUnavailableError} when the list cannot be fetched
   */
  async listWindow(repo: RepoRef, size: number, options: AggregateOptions = {}): Promise<CommitSummary[]> {
    const windowSize = clampWindow(size, this.settings.maxWindow);
    if (windowSize !== size) {
      this.logger.warning(`trend window ${size} is outside 1..${this.settings.maxWindow}; using ${windowSize}`);
    }

    try {
      return await this.source.listCommits(repo, { limit: windowSize, branch: options.branch, signal: options.signal });
    } catch (error) {
      if (isCommitLensError(error) && (error.kind === 'UpstreamTimeout' || error.kind === 'RequestCancelled')) {
        throw error;
      }
      throw new ContextUnavailableError(`Could not list commits of ${repoId(repo)}: ${errorMessage(error)}`, error);
    }
  }

  /** Classify a fetched window and rank its activity. Never fails on partial data. */
  async summarize(repo: RepoRef, commits: CommitSummary[], options: CallOptions = {}): Promise<TrendStatistics> {
    const classified = await this.classifyAll(commits, options);
    const activity = await this.collectActivity(repo, commits, options);

    const categories = emptyCategoryCounts();
    let unclassified = 0;
    for (const commit of classified) {
      if (commit.category === 'unclassified') unclassified++;
      else categories[commit.category]++;
    }
    if (unclassified > 0) {
      this.logger.warning(`${unclassified} of ${commits.length} commit(s) in ${repoId(repo)} could not be classified`);
    }

    return {
      repository: repoId(repo),
      windowSize: commits.length,
      commits: classified,
      categories,
      classified: commits.length - unclassified,
      unclassified,
      activity,
    };
  }

  /**
   * Count changed files and their top-level modules across the window.
   * Commits whose details cannot be fetched are left out of the counts.
   */
  async collectActivity(repo: RepoRef, commits: CommitSummary[], options: CallOptions = {}): Promise<FileActivity> {
    const files = new Map<string, number>();
    const modules = new Map<string, number>();

    for (const batch of chunk(commits, this.settings.batchSize)) {
      const details = await Promise.all(
        batch.map(commit =>
          this.source.getCommit(repo, commit.sha, options).catch((error: unknown) => {
            if (isCommitLensError(error) && error.kind === 'RequestCancelled') throw error;
            this.logger.debug(`skipping activity for ${commit.sha}: ${errorMessage(error)}`);
            return null;
          }),
        ),
      );

      for (const detail of details) {
        if (!detail) continue;
        for (const file of detail.files) {
          files.set(file.filename, (files.get(file.filename) ?? 0) + 1);
          const moduleName = moduleOf(file.filename);
          if (moduleName) modules.set(moduleName, (modules.get(moduleName) ?? 0) + 1);
        }
      }
    }

    return {
      modules: rankActivity(modules, this.settings.topK),
      files: rankActivity(files, this.settings.topK),
    };
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private async classifyAll(commits: CommitSummary[], options: CallOptions): Promise<ClassifiedCommit[]> {
    const categories = new Map<string, CommitCategory>();

    for (const batch of chunk(commits, this.settings.batchSize)) {
      try {
        const result = await this.classifier.classify(batch, options);
        for (const [sha, category] of result) categories.set(sha, category);
      } catch (error) {
        if (isCommitLensError(error) && error.kind === 'RequestCancelled') throw error;
        this.logger.warning(`classification of ${batch.length} commit(s) failed: ${errorMessage(error)}`);
      }
    }

    return commits.map(commit => ({
      sha: commit.sha,
      subject: commitSubject(commit.message),
      category: categories.get(commit.sha) ?? 'unclassified',
    }));
  }
}

function chunk<T>(items: T[], size: number): T[][] {
  const step = Math.max(1, size);
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += step) {
    chunks.push(items.slice(i, i + step));
  }
  return chunks;
}
