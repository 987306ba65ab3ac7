// engine/index.ts — Top-level orchestrator: wires source -> context -> cache -> provider -> conversation

import type {
  AnalysisKey,
  AnalysisRequest,
  ChatTarget,
  CommitLensConfig,
  ConversationHistory,
  ConversationScope,
  RepoRef,
  Turn,
} from './types.js';
import type { CacheStore } from './cache/cache-store.js';
import { MemoryCacheStore } from './cache/cache-store.js';
import { FileCacheStore } from './cache/file-cache-store.js';
import { computeAnalysisKey, keyForBundle } from './cache/analysis-key.js';
import { CacheOrchestrator, jsonCodec, textCodec } from './cache/orchestrator.js';
import type { CacheStats, ResolveSource } from './cache/orchestrator.js';
import { ContextAssembler, contextSha } from './context/assembler.js';
import { ConversationManager } from './conversation/manager.js';
import { TrendAggregator } from './trends/aggregator.js';
import type { CommitClassifier } from './trends/classifier.js';
import { HeuristicClassifier, ProviderClassifier } from './trends/classifier.js';
import { TechDebtReportSchema, TrendReportSchema } from './trends/schema.js';
import type { TechDebtReport, TrendReport } from './trends/schema.js';
import type { AnalysisProvider } from './upstream/analysis-provider.js';
import { RetryingAnalysisProvider } from './upstream/analysis-provider.js';
import type { PostedComment, SourceClient } from './upstream/source-client.js';
import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import { ContextUnavailableError, errorMessage, isCommitLensError } from './errors.js';
import { throwIfCancelled } from './util/async.js';
import { assertNever } from './util/assert-never.js';

// Re-export types that callers need
export type * from './types.js';
export type { CacheStore, CacheStats, ResolveSource, TrendReport, TechDebtReport, PostedComment, SourceClient, AnalysisProvider, Logger };
export * from './errors.js';
export { loadConfig, resolveConfigPath, validateConfig, applyEnvOverrides, DEFAULT_CONFIG } from './config.js';
export { createLogger } from './logger.js';
export { MemoryCacheStore } from './cache/cache-store.js';
export { FileCacheStore } from './cache/file-cache-store.js';
export { GitHubSourceClient } from './upstream/source-client.js';
export { OpenAIAnalysisProvider, RetryingAnalysisProvider } from './upstream/analysis-provider.js';
export { HeuristicClassifier, ProviderClassifier } from './trends/classifier.js';

// ---- Public Types ----

export interface EngineDependencies {
  source: SourceClient;
  /** Raw provider; the engine adds bounded retry from `config.provider`. */
  provider: AnalysisProvider;
  /** Defaults to the store selected by `config.cache.backend`. */
  store?: CacheStore;
  classifier?: CommitClassifier;
  logger?: Logger;
  now?: () => number;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

export interface AnalysisOptions extends OperationOptions {
  /** Discard any stored result for the target and compute it again. */
  refresh?: boolean;
}

export interface TrendOptions extends AnalysisOptions {
  branch?: string;
}

export interface AnalysisResult {
  key: AnalysisKey;
  markdown: string;
  source: ResolveSource;
  tokenEstimate: number;
  droppedItems: string[];
}

export interface ReviewResult extends AnalysisResult {
  comment: PostedComment;
}

export interface TrendResult {
  key: AnalysisKey;
  report: TrendReport;
  source: ResolveSource;
}

export interface TechDebtResult {
  key: AnalysisKey;
  report: TechDebtReport;
  source: ResolveSource;
}

export interface ChatRequest {
  repo: RepoRef;
  target: ChatTarget;
  question: string;
}

export interface ChatResult {
  key: AnalysisKey;
  answer: string;
  source: ResolveSource;
  history: ConversationHistory;
}

export interface CommitLensEngine {
  analyzeCommit(repo: RepoRef, sha: string, options?: AnalysisOptions): Promise<AnalysisResult>;
  analyzePullRequest(repo: RepoRef, number: number, options?: AnalysisOptions): Promise<AnalysisResult>;
  /** Analyze the pull request, then post the analysis as a PR comment. */
  reviewPullRequest(repo: RepoRef, number: number, options?: AnalysisOptions): Promise<ReviewResult>;
  analyzeTrends(repo: RepoRef, size?: number, options?: TrendOptions): Promise<TrendResult>;
  /** Review the most frequently changed files of the last `trends.maxWindow` commits for technical debt. */
  analyzeTechDebt(repo: RepoRef, options?: TrendOptions): Promise<TechDebtResult>;
  analyzeOverview(repo: RepoRef, options?: AnalysisOptions): Promise<AnalysisResult>;
  chat(request: ChatRequest, options?: OperationOptions): Promise<ChatResult>;
  getHistory(scope: ConversationScope, options?: OperationOptions): Promise<ConversationHistory>;
  resetConversation(scope: ConversationScope, options?: OperationOptions): Promise<void>;
  /** Clear the turns of every conversation held by the cache store. */
  resetAllConversations(options?: OperationOptions): Promise<void>;
  stats(): CacheStats;
  /** Close the cache store, flushing pending writes. The engine is unusable afterwards. */
  shutdown(): Promise<void>;
}

// ---- Helpers ----

/**
 * Store selected by `config.cache.backend`. Starts empty (memory) or reuses
 * the directory's existing entries (file).
 */
export function createCacheStore(cache: CommitLensConfig['cache'], now?: () => number): CacheStore {
  return cache.backend === 'file'
    ? new FileCacheStore(cache.directory, { now })
    : new MemoryCacheStore({ now });
}

/** The conversation scope a chat target belongs to; what-if turns share the persisted target's scope. */
export function scopeFor(repo: RepoRef, target: ChatTarget): ConversationScope {
  switch (target.mode) {
    case 'repository':
      return { repo, mode: 'repository', target: null };
    case 'commit':
      return { repo, mode: 'commit', target: target.sha };
    case 'what-if':
      return { repo, mode: 'what-if', target: target.sha };
    default:
      return assertNever(target);
  }
}

const PR_COMMENT_HEADER = '## commitlens review';

// ---- Engine ----

/**
 * Build an engine. Every shared resource (cache store, conversation state) is
 * owned by the returned instance; nothing is kept at module level.
 */
export function createEngine(config: CommitLensConfig, deps: EngineDependencies): CommitLensEngine {
  const logger = deps.logger ?? createLogger('commitlens', { level: config.logging.level });
  const now = deps.now ?? Date.now;
  const store = deps.store ?? createCacheStore(config.cache, now);

  const provider = new RetryingAnalysisProvider(
    deps.provider,
    { maxRetries: config.provider.maxRetries, baseDelayMs: config.provider.retryBaseDelayMs },
    logger.child('provider'),
  );
  const classifier = deps.classifier ?? (
    config.trends.classifier === 'heuristic'
      ? new HeuristicClassifier()
      : new ProviderClassifier(provider, config.context.tokenBudget)
  );

  const orchestrator = new CacheOrchestrator(store, {
    ttlSeconds: config.cache.ttlSeconds,
    maxEntryBytes: config.cache.maxEntryBytes,
    now,
    logger: logger.child('cache'),
  });
  const assembler = new ContextAssembler(deps.source, config.context, logger.child('context'));
  const conversations = new ConversationManager(store, deps.source, {
    maxTurns: config.conversation.maxTurns,
    ttlSeconds: config.conversation.ttlSeconds,
    logger: logger.child('conversation'),
  });
  const trends = new TrendAggregator(deps.source, classifier, config.trends, logger.child('trends'));
  const trendCodec = jsonCodec(TrendReportSchema);
  const techDebtCodec = jsonCodec(TechDebtReportSchema);

  const analyze = async (
    repo: RepoRef,
    request: AnalysisRequest,
    mode: 'commit' | 'pull-request' | 'overview',
    target: string | number | null,
    options: AnalysisOptions,
  ): Promise<AnalysisResult> => {
    throwIfCancelled(options.signal);
    const bundle = await assembler.assemble(request, options);
    const key = keyForBundle(repo, mode, target, bundle);
    if (options.refresh) await orchestrator.invalidate(key);
    // The shared computation is not tied to any one caller's signal
    const resolved = await orchestrator.resolveDetailed(key, () => provider.analyze(bundle), textCodec, {
      signal: options.signal,
    });
    return {
      key,
      markdown: resolved.value,
      source: resolved.source,
      tokenEstimate: bundle.tokenEstimate,
      droppedItems: bundle.droppedItems,
    };
  };

  const engine: CommitLensEngine = {
    analyzeCommit(repo, sha, options = {}) {
      return analyze(repo, { kind: 'commit', repo, sha }, 'commit', sha, options);
    },

    analyzePullRequest(repo, number, options = {}) {
      return analyze(repo, { kind: 'pull-request', repo, number }, 'pull-request', number, options);
    },

    async reviewPullRequest(repo, number, options = {}) {
      const analysis = await engine.analyzePullRequest(repo, number, options);
      throwIfCancelled(options.signal);
      const comment = await deps.source.createPullRequestComment(
        repo,
        number,
        `${PR_COMMENT_HEADER}\n\n${analysis.markdown}`,
        options,
      );
      logger.info(`posted review of ${repo.owner}/${repo.name}#${number}: ${comment.url}`);
      return { ...analysis, comment };
    },

    async analyzeTrends(repo, size = config.trends.defaultWindow, options = {}) {
      throwIfCancelled(options.signal);
      const commits = await trends.listWindow(repo, size, options);
      const key = computeAnalysisKey(
        repo,
        'trend',
        options.branch ?? null,
        [`classifier:${config.trends.classifier}`, ...commits.map(commit => `${commit.sha}\n${commit.message}`)].join('\n'),
      );
      if (options.refresh) await orchestrator.invalidate(key);

      const resolved = await orchestrator.resolveDetailed(
        key,
        async (): Promise<TrendReport> => {
          const statistics = await trends.summarize(repo, commits);
          const bundle = await assembler.assemble({ kind: 'trend', repo, statistics });
          const narrative = await provider.analyze(bundle).catch((error: unknown) => {
            logger.warning(`trend narrative for ${statistics.repository} unavailable: ${errorMessage(error)}`);
            return null;
          });
          return { statistics, narrative };
        },
        trendCodec,
        // A report without its narrative is served once and recomputed next time
        { signal: options.signal, shouldStore: report => report.narrative !== null },
      );

      return { key, report: resolved.value, source: resolved.source };
    },

    async analyzeTechDebt(repo, options = {}) {
      throwIfCancelled(options.signal);
      const commits = await trends.listWindow(repo, config.trends.maxWindow, options);
      const [latest] = commits;
      if (!latest) {
        throw new ContextUnavailableError(`${repo.owner}/${repo.name} has no commits to analyze`);
      }
      // Keyed on the branch head: a new commit means a new report
      const key = computeAnalysisKey(
        repo,
        'tech-debt',
        latest.sha,
        [`branch:${options.branch ?? ''}`, `window:${commits.length}`, `top:${config.trends.topK}`].join('\n'),
      );
      if (options.refresh) await orchestrator.invalidate(key);

      const resolved = await orchestrator.resolveDetailed(
        key,
        async (): Promise<TechDebtReport> => {
          const activity = await trends.collectActivity(repo, commits);
          const bundle = await assembler.assemble({ kind: 'tech-debt', repo, ref: latest.sha, activity });
          const markdown = await provider.analyze(bundle);
          return { commit: latest.sha, windowSize: commits.length, activity, markdown, droppedItems: bundle.droppedItems };
        },
        techDebtCodec,
        { signal: options.signal },
      );

      return { key, report: resolved.value, source: resolved.source };
    },

    analyzeOverview(repo, options = {}) {
      return analyze(repo, { kind: 'overview', repo }, 'overview', null, options);
    },

    async chat(request, options = {}) {
      throwIfCancelled(options.signal);
      const { repo, target, question } = request;
      const scope = scopeFor(repo, target);
      const override = target.mode === 'what-if' ? target.hypotheticalSha : undefined;

      await conversations.checkScope(scope, override ? [override] : [], options);
      const history = await conversations.getHistory(scope);
      const bundle = await assembler.assemble(
        { kind: 'chat', repo, target, question, history: history.turns },
        options,
      );
      const key = keyForBundle(repo, 'chat', target.mode === 'repository' ? null : contextSha(target), bundle);
      const resolved = await orchestrator.resolveDetailed(key, () => provider.analyze(bundle), textCodec, {
        signal: options.signal,
      });

      const timestamp = new Date(now()).toISOString();
      const extra: Pick<Turn, 'targetOverride'> = override ? { targetOverride: override } : {};
      const updated = await conversations.appendTurns(
        scope,
        [
          { role: 'user', text: question, timestamp, ...extra },
          { role: 'assistant', text: resolved.value, timestamp, ...extra },
        ],
        options,
      );

      return { key, answer: resolved.value, source: resolved.source, history: updated };
    },

    async getHistory(scope, options = {}) {
      throwIfCancelled(options.signal);
      return conversations.getHistory(scope);
    },

    async resetConversation(scope, options = {}) {
      throwIfCancelled(options.signal);
      await conversations.reset(scope);
    },

    async resetAllConversations(options = {}) {
      throwIfCancelled(options.signal);
      await conversations.resetAll();
    },

    stats() {
      return orchestrator.stats();
    },

    async shutdown() {
      try {
        await store.close();
      } catch (error) {
        if (!isCommitLensError(error)) throw error;
        logger.warning(`cache store did not close cleanly: ${error.message}`);
      }
    },
  };

  return engine;
}
