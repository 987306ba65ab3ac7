// engine/context/assembler.ts — Builds the minimal, budgeted context bundle for each request kind

import type {
  AnalysisRequest,
  ChatTarget,
  CommitDetail,
  CommitLensConfig,
  CommitSummary,
  ContextBundle,
  RepoRef,
  RepositoryInfo,
  TrendStatistics,
} from '../types.js';
import { ContextUnavailableError, errorMessage, isCommitLensError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CallOptions, SourceClient } from '../upstream/source-client.js';
import { assertNever } from '../util/assert-never.js';
import { BundleBuilder } from './bundle.js';
import type { FileDiff } from './diff-parser.js';
import { parseDiff, previousFilePaths } from './diff-parser.js';
import { PRIORITY_LOW, filePriority } from './file-filters.js';
import {
  fitTextToBudget,
  pruneDiffToBudget,
  pruneHistoryToBudget,
  pruneLinesToBudget,
  truncateText,
} from './token-pruner.js';
import {
  describeCommit,
  describePullRequest,
  describeRepository,
  formatCommitLine,
  renderActivity,
  renderStatistics,
  shortSha,
  topLevelEntries,
} from './describe.js';

export type ContextSettings = CommitLensConfig['context'];

type RequestOf<K extends AnalysisRequest['kind']> = Extract<AnalysisRequest, { kind: K }>;

interface OverviewData {
  info: RepositoryInfo;
  readme: string | null;
  tree: string[];
  commits: CommitSummary[];
}

/** Share of the budget left after the question that prior turns may take. */
const HISTORY_SHARE = 0.25;
const COMMIT_LIST_SHARE = 0.3;
const TREE_SHARE = 0.25;
const MAX_HOTSPOT_FILES = 5;
const MAX_HOTSPOT_CHARS = 5_000;

interface FileContentRequest {
  kind: 'previous-file' | 'hotspot';
  ref: string;
  label: (filePath: string) => string;
  maxCharsPerFile: number;
  maxTotalChars: number;
}

/**
 * Pulls raw data from the source client and packs it into a ContextBundle no
 * larger than `settings.tokenBudget`.
 *
 * Output is a pure function of the fetched data and the request: the same
 * target yields a byte-identical bundle (timestamps are never rendered).
 *
 * Failures: ContextUnavailableError when a required fetch fails (timeouts and
 * cancellations pass through unchanged), ContextTooLargeError when required
 * content cannot fit.
 */
export class ContextAssembler {
  private readonly source: SourceClient;
  private readonly settings: ContextSettings;
  private readonly logger: Logger;

  constructor(source: SourceClient, settings: ContextSettings, logger: Logger = silentLogger) {
    this.source = source;
    this.settings = settings;
    this.logger = logger;
  }

  async assemble(request: AnalysisRequest, options: CallOptions = {}): Promise<ContextBundle> {
    switch (request.kind) {
      case 'commit':
        return this.commitReview(request, options);
      case 'pull-request':
        return this.pullRequestReview(request, options);
      case 'trend':
        return buildTrendReport(request.repo, request.statistics, this.settings.tokenBudget);
      case 'tech-debt':
        return this.techDebt(request, options);
      case 'overview':
        return this.overview(request, options);
      case 'chat':
        return this.chatAnswer(request, options);
      default:
        return assertNever(request);
    }
  }

  // ─── Request Kinds ───────────────────────────────────────────────────────

  private async commitReview(request: RequestOf<'commit'>, options: CallOptions): Promise<ContextBundle> {
    const { detail, diffText } = await this.fetchCommit(request.repo, request.sha, options);

    const builder = new BundleBuilder('commit-review', this.settings.tokenBudget);
    builder.require('header', 'Commit', `Repository: ${repoLabel(request.repo)}\n${describeCommit(detail)}`);
    addDiff(builder, diffText);
    return builder.build();
  }

  private async pullRequestReview(request: RequestOf<'pull-request'>, options: CallOptions): Promise<ContextBundle> {
    const { repo, number } = request;
    const [pr, diffText] = await Promise.all([
      this.fetch(`pull request #${number}`, () => this.source.getPullRequest(repo, number, options)),
      this.fetch(`diff of pull request #${number}`, () => this.source.getPullRequestDiff(repo, number, options)),
    ]);

    const builder = new BundleBuilder('pull-request-review', this.settings.tokenBudget);
    builder.require('header', 'Pull request', describePullRequest(repo, pr));
    addDiff(builder, diffText);
    return builder.build();
  }

  private async overview(request: RequestOf<'overview'>, options: CallOptions): Promise<ContextBundle> {
    const data = await this.fetchOverview(request.repo, options);

    const builder = new BundleBuilder('overview', this.settings.tokenBudget);
    builder.require('header', 'Task', `Repository: ${repoLabel(request.repo)}`);
    this.addOverview(builder, data);
    return builder.build();
  }

  /**
   * Change activity plus the current contents of the most changed files.
   * A hotspot that no longer exists at `ref` is skipped.
   */
  private async techDebt(request: RequestOf<'tech-debt'>, options: CallOptions): Promise<ContextBundle> {
    const { repo, ref, activity } = request;
    const builder = new BundleBuilder('tech-debt', this.settings.tokenBudget);
    builder.require('header', 'Task', `Repository: ${repoLabel(repo)}\nAt commit: ${ref}`);

    const rendered = renderActivity(activity);
    if (!rendered) {
      builder.require('note', 'Hotspots', 'No file changes were found in the analysed commits.');
      return builder.build();
    }
    builder.require('statistics', 'Change activity', rendered);

    const paths = activity.files
      .map(entry => entry.name)
      .filter(filePath => filePriority(filePath) !== PRIORITY_LOW)
      .slice(0, MAX_HOTSPOT_FILES);
    await this.addFileContents(builder, repo, paths, {
      kind: 'hotspot',
      ref,
      label: filePath => `${filePath} at ${shortSha(ref)}`,
      maxCharsPerFile: MAX_HOTSPOT_CHARS,
      maxTotalChars: this.settings.maxTotalPreviousChars,
    }, options);
    return builder.build();
  }

  private async chatAnswer(request: RequestOf<'chat'>, options: CallOptions): Promise<ContextBundle> {
    const { repo, target } = request;
    const builder = new BundleBuilder('chat-answer', this.settings.tokenBudget);

    switch (target.mode) {
      case 'repository': {
        const data = await this.fetchOverview(repo, options);
        builder.require('header', 'Conversation', `Repository: ${repoLabel(repo)}\nMode: repository`);
        addQuestionAndHistory(builder, request);
        this.addOverview(builder, data);
        break;
      }
      case 'commit':
      case 'what-if': {
        const sha = contextSha(target);
        const { detail, diffText } = await this.fetchCommit(repo, sha, options);
        builder.require('header', 'Conversation', describeChatTarget(repo, target, detail));
        addQuestionAndHistory(builder, request);
        const files = addDiff(builder, diffText);
        await this.addPreviousFiles(builder, repo, detail, files, options);
        break;
      }
      default:
        return assertNever(target);
    }

    return builder.build();
  }

  // ─── Segment Helpers ─────────────────────────────────────────────────────

  private addOverview(builder: BundleBuilder, data: OverviewData): void {
    builder.require('overview', 'Repository', describeRepository(data.info));

    const commits = pruneLinesToBudget(
      data.commits.map(formatCommitLine),
      Math.floor(builder.available('Recent commits') * COMMIT_LIST_SHARE),
    );
    if (commits.text) builder.require('commit-list', 'Recent commits', commits.text);
    if (commits.dropped > 0) builder.drop(`commits:${commits.dropped}`);

    const tree = pruneLinesToBudget(
      topLevelEntries(data.tree),
      Math.floor(builder.available('Top-level tree') * TREE_SHARE),
    );
    if (tree.text) builder.require('overview', 'Top-level tree', tree.text);
    if (tree.dropped > 0) builder.drop(`tree:${tree.dropped}`);

    if (data.readme === null) return;
    const excerpt = fitTextToBudget(
      truncateText(data.readme.trim(), this.settings.maxReadmeChars),
      builder.available('README'),
    );
    if (excerpt === null) {
      builder.drop('readme');
      return;
    }
    builder.require('overview', 'README', excerpt);
  }

  /** Pre-change contents of files the commit touched, read at its first parent. */
  private async addPreviousFiles(
    builder: BundleBuilder,
    repo: RepoRef,
    detail: CommitDetail,
    files: FileDiff[],
    options: CallOptions,
  ): Promise<void> {
    const [parent] = detail.parents;
    if (!parent) return;

    const paths = previousFilePaths(files)
      .filter(filePath => filePriority(filePath) !== PRIORITY_LOW)
      .slice(0, this.settings.maxPreviousFiles);
    await this.addFileContents(builder, repo, paths, {
      kind: 'previous-file',
      ref: parent,
      label: filePath => `${filePath} before ${shortSha(parent)}`,
      maxCharsPerFile: this.settings.maxCharsPerPreviousFile,
      maxTotalChars: this.settings.maxTotalPreviousChars,
    }, options);
  }

  /**
   * File contents at `wanted.ref`, offered in `paths` order. Supplementary: a file
   * that cannot be fetched or does not fit is dropped as `<kind>:<path>`.
   */
  private async addFileContents(
    builder: BundleBuilder,
    repo: RepoRef,
    paths: string[],
    wanted: FileContentRequest,
    options: CallOptions,
  ): Promise<void> {
    if (paths.length === 0) return;

    const contents = await Promise.all(
      paths.map(filePath =>
        this.source.getFileContent(repo, filePath, wanted.ref, options).catch((error: unknown) => {
          if (isCommitLensError(error) && error.kind === 'RequestCancelled') throw error;
          this.logger.warning(`skipping ${filePath} at ${shortSha(wanted.ref)}: ${errorMessage(error)}`);
          return null;
        }),
      ),
    );

    let totalChars = 0;
    paths.forEach((filePath, index) => {
      const content = contents[index];
      const dropKey = `${wanted.kind}:${filePath}`;
      if (content === null || content === undefined) {
        builder.drop(dropKey);
        return;
      }
      const text = truncateText(content, wanted.maxCharsPerFile);
      if (totalChars + text.length > wanted.maxTotalChars) {
        builder.drop(dropKey);
        return;
      }
      if (builder.offer(wanted.kind, wanted.label(filePath), text, dropKey)) {
        totalChars += text.length;
      }
    });
  }

  // ─── Fetching ────────────────────────────────────────────────────────────

  private async fetchCommit(
    repo: RepoRef,
    sha: string,
    options: CallOptions,
  ): Promise<{ detail: CommitDetail; diffText: string }> {
    const [detail, diffText] = await Promise.all([
      this.fetch(`commit ${sha}`, () => this.source.getCommit(repo, sha, options)),
      this.fetch(`diff of commit ${sha}`, () => this.source.getCommitDiff(repo, sha, options)),
    ]);
    return { detail, diffText };
  }

  private async fetchOverview(repo: RepoRef, options: CallOptions): Promise<OverviewData> {
    const [info, readme, commits] = await Promise.all([
      this.fetch('repository metadata', () => this.source.getRepository(repo, options)),
      this.fetch('README', () => this.source.getReadme(repo, options)),
      this.fetch('recent commits', () =>
        this.source.listCommits(repo, { limit: this.settings.recentCommits, signal: options.signal }),
      ),
    ]);
    const tree = await this.fetch(`file tree at ${info.defaultBranch}`, () =>
      this.source.getFileTree(repo, info.defaultBranch, options),
    );
    return { info, readme, tree, commits };
  }

  private async fetch<T>(what: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (isCommitLensError(error) && (error.kind === 'UpstreamTimeout' || error.kind === 'RequestCancelled')) {
        throw error;
      }
      throw new ContextUnavailableError(`Could not fetch ${what}: ${errorMessage(error)}`, error);
    }
  }
}

// ─── Pure Builders ───────────────────────────────────────────────────────────

/**
 * Bundle for the trend narrative. Needs no upstream data beyond the statistics.
 */
export function buildTrendReport(repo: RepoRef, stats: TrendStatistics, budget: number): ContextBundle {
  const builder = new BundleBuilder('trend-report', budget);
  builder.require('header', 'Task', `Repository: ${repoLabel(repo)}`);
  builder.require('statistics', 'Statistics', renderStatistics(stats));

  const lines = stats.commits.map(commit => `${shortSha(commit.sha)} [${commit.category}] ${commit.subject}`);
  const commits = pruneLinesToBudget(lines, builder.available('Commits'));
  if (commits.text) builder.require('commit-list', 'Commits', commits.text);
  if (commits.dropped > 0) builder.drop(`commits:${commits.dropped}`);

  return builder.build();
}

/** The sha whose diff a chat turn is answered against. */
export function contextSha(target: Exclude<ChatTarget, { mode: 'repository' }>): string {
  return target.mode === 'what-if' ? target.hypotheticalSha ?? target.sha : target.sha;
}

function addQuestionAndHistory(builder: BundleBuilder, request: RequestOf<'chat'>): void {
  builder.require('question', 'Question', request.question);
  if (request.history.length === 0) return;

  const label = 'Conversation so far';
  const history = pruneHistoryToBudget(request.history, Math.floor(builder.available(label) * HISTORY_SHARE));
  if (history.kept > 0) builder.require('history', label, history.text);
  if (history.dropped > 0) builder.drop(`history:${history.dropped}`);
}

function addDiff(builder: BundleBuilder, diffText: string): FileDiff[] {
  const files = parseDiff(diffText);
  if (files.length === 0) {
    builder.require('note', 'Diff', 'No textual changes.');
    return files;
  }

  const pruned = pruneDiffToBudget(files, builder.available('Diff'));
  builder.require('diff', 'Diff', pruned.text);
  builder.drop(...pruned.droppedItems);
  return files;
}

function describeChatTarget(repo: RepoRef, target: ChatTarget, detail: CommitDetail): string {
  const lines = [`Repository: ${repoLabel(repo)}`, `Mode: ${target.mode}`];
  if (target.mode === 'what-if' && target.hypotheticalSha) {
    lines.push(`Persisted commit: ${target.sha}`, `Evaluating hypothetical commit: ${target.hypotheticalSha}`);
  }
  lines.push(describeCommit(detail));
  return lines.join('\n');
}

function repoLabel(repo: RepoRef): string {
  return `${repo.owner}/${repo.name}`;
}
