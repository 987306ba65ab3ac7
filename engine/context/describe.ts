// engine/context/describe.ts — Plain-text renderings of upstream records for context segments

import type {
  CommitDetail,
  CommitSummary,
  FileActivity,
  PullRequestSummary,
  RepoRef,
  RepositoryInfo,
  TrendStatistics,
} from '../types.js';
import { COMMIT_CATEGORIES } from '../types.js';
import { truncateText } from './token-pruner.js';

const MAX_MESSAGE_CHARS = 2_000;
const MAX_PR_BODY_CHARS = 4_000;

export function commitSubject(message: string): string {
  const [subject = ''] = message.split('\n', 1);
  return subject.trim();
}

export function shortSha(sha: string): string {
  return sha.slice(0, 7);
}

/** One line per commit: `abc1234 2024-05-01 author: subject`. */
export function formatCommitLine(commit: CommitSummary): string {
  return `${shortSha(commit.sha)} ${commit.date.slice(0, 10)} ${commit.author}: ${commitSubject(commit.message)}`;
}

export function describeCommit(commit: CommitDetail): string {
  return [
    `Commit: ${commit.sha}`,
    `Author: ${commit.author}`,
    `Date: ${commit.date}`,
    `Files changed: ${commit.files.length}`,
    '',
    truncateText(commit.message.trim(), MAX_MESSAGE_CHARS),
  ].join('\n');
}

export function describePullRequest(repo: RepoRef, pr: PullRequestSummary): string {
  const lines = [
    `Repository: ${repo.owner}/${repo.name}`,
    `Pull request: #${pr.number} ${pr.title}`,
    `Author: ${pr.author}`,
    `Branches: ${pr.headRef} -> ${pr.baseRef}`,
    `Head: ${pr.headSha}`,
  ];
  const body = pr.body.trim();
  if (body) lines.push('', truncateText(body, MAX_PR_BODY_CHARS));
  return lines.join('\n');
}

export function describeRepository(info: RepositoryInfo): string {
  return [
    `Name: ${info.fullName}`,
    `Description: ${info.description ?? '(none)'}`,
    `Default branch: ${info.defaultBranch}`,
    `Primary language: ${info.language ?? 'unknown'}`,
    `Stars: ${info.stars}`,
  ].join('\n');
}

/** Entries directly under the repository root (files and `dir/` entries). */
export function topLevelEntries(tree: string[]): string[] {
  return tree.filter(entry => !entry.replace(/\/$/, '').includes('/'));
}

export function renderStatistics(stats: TrendStatistics): string {
  const lines = [`Commits analysed: ${stats.windowSize}`, `Classified: ${stats.classified}`, `Unclassified: ${stats.unclassified}`, ''];

  lines.push('Categories:');
  for (const category of COMMIT_CATEGORIES) {
    lines.push(`- ${category}: ${stats.categories[category]}`);
  }

  const activity = renderActivity(stats.activity);
  if (activity) lines.push('', activity);

  return lines.join('\n');
}

/** Ranked module and file change counts; empty when nothing was counted. */
export function renderActivity(activity: FileActivity): string {
  const sections: string[] = [];
  if (activity.modules.length > 0) {
    sections.push(['Most active modules:', ...activity.modules.map(entry => `- ${entry.name}: ${entry.count}`)].join('\n'));
  }
  if (activity.files.length > 0) {
    sections.push(['Most changed files:', ...activity.files.map(entry => `- ${entry.name}: ${entry.count}`)].join('\n'));
  }
  return sections.join('\n\n');
}
