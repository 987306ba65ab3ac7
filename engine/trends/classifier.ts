// engine/trends/classifier.ts — Commit message classification: keyword heuristic or provider batches

import { z } from 'zod';
import type { CommitCategory, CommitSummary } from '../types.js';
import { COMMIT_CATEGORIES } from '../types.js';
import type { AnalysisProvider } from '../upstream/analysis-provider.js';
import type { CallOptions } from '../upstream/source-client.js';
import { BundleBuilder } from '../context/bundle.js';
import { commitSubject } from '../context/describe.js';
import { truncateText } from '../context/token-pruner.js';

/**
 * Assigns categories to a batch of commits, keyed by full sha.
 * A commit missing from the result counts as unclassified; a rejected promise
 * makes the whole batch unclassified.
 */
export interface CommitClassifier {
  classify(commits: CommitSummary[], options?: CallOptions): Promise<Map<string, CommitCategory>>;
}

// ─── Heuristic ───────────────────────────────────────────────────────────────

const CONVENTIONAL_PREFIX = /^(\w+)(\([^)]*\))?!?:/;

const CONVENTIONAL_TYPES = new Map<string, CommitCategory>([
  ['feat', 'feature'],
  ['feature', 'feature'],
  ['fix', 'fix'],
  ['bugfix', 'fix'],
  ['hotfix', 'fix'],
  ['perf', 'perf'],
  ['refactor', 'refactor'],
  ['style', 'refactor'],
  ['docs', 'docs'],
  ['doc', 'docs'],
  ['test', 'test'],
  ['tests', 'test'],
  ['chore', 'other'],
  ['build', 'other'],
  ['ci', 'other'],
  ['revert', 'other'],
]);

// Checked in order; the first match wins
const KEYWORD_RULES: Array<{ category: CommitCategory; pattern: RegExp }> = [
  { category: 'fix', pattern: /\b(fix|bug|hotfix|patch|resolve[sd]?)/ },
  { category: 'feature', pattern: /\b(feat|feature|add(s|ed)?|implement|introduce|support)/ },
  { category: 'perf', pattern: /\b(perf|performance|optimi[sz]e|speed ?up|faster)/ },
  { category: 'refactor', pattern: /\b(refactor|cleanup|clean up|restructure|rename|style|format)/ },
  { category: 'docs', pattern: /\b(docs?|documentation|readme|comment)/ },
  { category: 'test', pattern: /\b(tests?|spec|coverage)\b/ },
];

export function classifyMessage(message: string): CommitCategory {
  const subject = commitSubject(message).toLowerCase();

  const prefix = CONVENTIONAL_PREFIX.exec(subject);
  const conventional = prefix?.[1] ? CONVENTIONAL_TYPES.get(prefix[1]) : undefined;
  if (conventional) return conventional;

  for (const rule of KEYWORD_RULES) {
    if (rule.pattern.test(subject)) return rule.category;
  }
  return 'other';
}

export class HeuristicClassifier implements CommitClassifier {
  async classify(commits: CommitSummary[]): Promise<Map<string, CommitCategory>> {
    return new Map(commits.map(commit => [commit.sha, classifyMessage(commit.message)]));
  }
}

// ─── Provider ────────────────────────────────────────────────────────────────

const ClassificationResponseSchema = z.object({
  commits: z.array(z.object({ sha: z.string().min(1), category: z.string() })),
});

const MAX_SUBJECT_CHARS = 200;

function isCategory(value: string): value is CommitCategory {
  return COMMIT_CATEGORIES.some(category => category === value);
}

/**
 * Read the provider's JSON answer. Code fences are tolerated; shas may be
 * abbreviated (7+ characters). Unknown categories and unknown shas are ignored.
 *
 * @throws when the text is not JSON of the expected shape
 */
export function parseClassificationResponse(text: string, commits: CommitSummary[]): Map<string, CommitCategory> {
  const unfenced = text.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  const parsed = ClassificationResponseSchema.parse(JSON.parse(unfenced));

  const result = new Map<string, CommitCategory>();
  for (const entry of parsed.commits) {
    const category = entry.category.trim().toLowerCase();
    if (!isCategory(category)) continue;

    const sha = entry.sha.trim().toLowerCase();
    const commit = commits.find(candidate =>
      sha.length >= 7 ? candidate.sha.toLowerCase().startsWith(sha) : candidate.sha.toLowerCase() === sha,
    );
    if (commit) result.set(commit.sha, category);
  }
  return result;
}

export class ProviderClassifier implements CommitClassifier {
  private readonly provider: AnalysisProvider;
  private readonly tokenBudget: number;

  constructor(provider: AnalysisProvider, tokenBudget: number) {
    this.provider = provider;
    this.tokenBudget = tokenBudget;
  }

  async classify(commits: CommitSummary[], options: CallOptions = {}): Promise<Map<string, CommitCategory>> {
    if (commits.length === 0) return new Map();

    const builder = new BundleBuilder('trend-classification', this.tokenBudget);
    builder.require('header', 'Task', `Classify ${commits.length} commit(s).`);
    builder.require(
      'commit-list',
      'Commits',
      commits.map(commit => `${commit.sha} ${truncateText(commitSubject(commit.message), MAX_SUBJECT_CHARS)}`).join('\n'),
    );

    const answer = await this.provider.analyze(builder.build(), options);
    return parseClassificationResponse(answer, commits);
  }
}
