// engine/types.ts — Core type definitions for commitlens

// --- Configuration ---
export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

export interface CommitLensConfig {
  github: {
    baseUrl: string;
    timeoutMs: number;
  };
  provider: {
    baseUrl?: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
  context: {
    tokenBudget: number;
    recentCommits: number;
    maxPreviousFiles: number;
    maxCharsPerPreviousFile: number;
    maxTotalPreviousChars: number;
    maxReadmeChars: number;
  };
  cache: {
    backend: 'memory' | 'file';
    directory: string;
    ttlSeconds: number;
    maxEntryBytes: number;
    maxAgeDays: number;
  };
  conversation: {
    maxTurns: number;
    ttlSeconds: number;
  };
  trends: {
    defaultWindow: number;
    maxWindow: number;
    batchSize: number;
    topK: number;
    classifier: 'provider' | 'heuristic';
  };
  logging: {
    level: LogLevel;
  };
}

// --- Repository & Upstream Data ---
export interface RepoRef {
  owner: string;
  name: string;
}

export interface CommitSummary {
  sha: string;
  message: string;
  author: string;
  date: string;
}

export interface CommitFile {
  filename: string;
  previousFilename?: string;
  status: string;
  additions: number;
  deletions: number;
}

export interface CommitDetail extends CommitSummary {
  parents: string[];
  files: CommitFile[];
}

export interface PullRequestSummary {
  number: number;
  title: string;
  body: string;
  headSha: string;
  headRef: string;
  baseRef: string;
  author: string;
}

export interface RepositoryInfo {
  fullName: string;
  description: string | null;
  defaultBranch: string;
  language: string | null;
  stars: number;
}

// --- Analysis Keys ---
export type AnalysisMode = 'commit' | 'pull-request' | 'trend' | 'tech-debt' | 'chat' | 'overview';

export interface AnalysisKey {
  readonly repository: string;
  readonly mode: AnalysisMode;
  readonly target: string | null;
  readonly fingerprint: string;
  readonly id: string;
}

// --- Context ---
export type TaskKind =
  | 'commit-review'
  | 'pull-request-review'
  | 'trend-report'
  | 'trend-classification'
  | 'tech-debt'
  | 'overview'
  | 'chat-answer';

export type SegmentKind =
  | 'header'
  | 'overview'
  | 'commit-list'
  | 'diff'
  | 'previous-file'
  | 'hotspot'
  | 'statistics'
  | 'history'
  | 'note'
  | 'question';

export interface ContextSegment {
  kind: SegmentKind;
  label: string;
  text: string;
}

export interface ContextBundle {
  task: TaskKind;
  segments: ContextSegment[];
  budget: number;
  tokenEstimate: number;
  droppedItems: string[];
}

// --- Conversations ---
export type ChatMode = 'repository' | 'commit' | 'what-if';

export type ChatTarget =
  | { mode: 'repository' }
  | { mode: 'commit'; sha: string }
  | { mode: 'what-if'; sha: string; hypotheticalSha?: string };

export interface ConversationScope {
  repo: RepoRef;
  mode: ChatMode;
  target: string | null;
}

export type TurnRole = 'user' | 'assistant';

export interface Turn {
  role: TurnRole;
  text: string;
  timestamp: string;
  targetOverride?: string;
}

export type ConversationState = 'EMPTY' | 'ACTIVE';

export interface ConversationHistory {
  scope: ConversationScope;
  state: ConversationState;
  turns: Turn[];
}

// --- Requests ---
export type AnalysisRequest =
  | { kind: 'commit'; repo: RepoRef; sha: string }
  | { kind: 'pull-request'; repo: RepoRef; number: number }
  | { kind: 'trend'; repo: RepoRef; statistics: TrendStatistics }
  | { kind: 'tech-debt'; repo: RepoRef; ref: string; activity: FileActivity }
  | { kind: 'overview'; repo: RepoRef }
  | { kind: 'chat'; repo: RepoRef; target: ChatTarget; question: string; history: Turn[] };

// --- Trends ---
export const COMMIT_CATEGORIES = [
  'feature',
  'fix',
  'perf',
  'refactor',
  'docs',
  'test',
  'other',
] as const;

export type CommitCategory = (typeof COMMIT_CATEGORIES)[number];

export interface ClassifiedCommit {
  sha: string;
  subject: string;
  category: CommitCategory | 'unclassified';
}

export interface ActivityEntry {
  name: string;
  count: number;
}

/** Change counts per file and per top-level module, ranked. */
export interface FileActivity {
  modules: ActivityEntry[];
  files: ActivityEntry[];
}

export interface TrendStatistics {
  repository: string;
  windowSize: number;
  commits: ClassifiedCommit[];
  categories: Record<CommitCategory, number>;
  classified: number;
  unclassified: number;
  activity: FileActivity;
}

// --- Cache ---
export interface CacheEntry {
  key: string;
  value: string;
  ttlSeconds: number;
  createdAt: number;
}
