#!/usr/bin/env node
// engine/cli.ts — CLI entry point for commitlens

import { createEngine, createCacheStore, scopeFor } from './index.js';
import type { CommitLensEngine } from './index.js';
import type { CommitLensConfig } from './types.js';
import { DEFAULT_CONFIG, applyEnvOverrides, loadConfig, resolveConfigPath } from './config.js';
import { FileCacheStore } from './cache/file-cache-store.js';
import { GitHubSourceClient } from './upstream/source-client.js';
import { OpenAIAnalysisProvider } from './upstream/analysis-provider.js';
import { createLogger } from './logger.js';
import { isCommitLensError } from './errors.js';
import { UsageError, chatTargetFrom, parseArgs, parsePullNumber, parseRepo, resetTargetFrom } from './cli-args.js';
import type { CliArgs } from './cli-args.js';

const USAGE = `
commitlens — Cached, context-aware commit, PR and repository analysis

Usage:
  commitlens <command> <owner/name> [arguments] [options]

Commands:
  commit   <owner/name> <sha>        Review a single commit
  pr       <owner/name> <number>     Review a pull request
  review   <owner/name> <number>     Review a pull request and post the review as a comment
  trends   <owner/name>              Classify recent commits and describe development trends
  debt     <owner/name>              Review the most frequently changed files for technical debt
  overview <owner/name>              Summarize the repository
  chat     <owner/name> <question>   Ask a question (repository, commit or what-if conversation)
  history  <owner/name>              Print a conversation's turns
  reset    <owner/name>              Clear a conversation
  reset    --all                     Clear every stored conversation

Options:
  --config <path>          Path to .commitlens.json
                           (auto-detects from cwd or ~/.commitlens/config.json if omitted)
  --size <n>               Trend window size (default from config, at most trends.maxWindow)
  --branch <name>          Branch for the trend and tech-debt window
  --commit <sha>           Chat/history/reset: commit conversation
  --what-if <sha>          Chat/history/reset: what-if conversation anchored at <sha>
  --hypothetical <sha>     Chat: evaluate this commit in place of the what-if anchor for one turn
  --refresh                Ignore a cached analysis and compute it again
  --all                    Reset: clear every conversation
  --json                   Print the full result as JSON
  --help                   Show this help message

Environment:
  GITHUB_TOKEN             Token for the GitHub API
  OPENAI_API_KEY           Key for the analysis provider
  CACHE_TTL_SECONDS, COMMITLENS_CACHE_DIR, COMMITLENS_TOKEN_BUDGET,
  COMMITLENS_MODEL, COMMITLENS_LOG_LEVEL override the config file

Examples:
  commitlens commit octo/widgets 4f2a9c1
  commitlens trends octo/widgets --size 100 --json
  commitlens debt octo/widgets --branch main --refresh
  commitlens chat octo/widgets "Why was the cache layer split?" --commit 4f2a9c1
  commitlens chat octo/widgets "Would this version break the API?" --what-if 4f2a9c1 --hypothetical 9b7e3d0
`.trim();

function resolveConfig(configPath: string | undefined): CommitLensConfig {
  const resolved = configPath ?? resolveConfigPath(process.cwd());
  const base = resolved ? loadConfig(resolved) : DEFAULT_CONFIG;
  return applyEnvOverrides(base, process.env);
}

function print(args: CliArgs, markdown: string, result: unknown): void {
  console.log(args.json ? JSON.stringify(result, null, 2) : markdown);
}

async function run(engine: CommitLensEngine, args: CliArgs): Promise<void> {
  if (args.command === 'reset' && resetTargetFrom(args) === 'all') {
    await engine.resetAllConversations();
    print(args, 'All conversations cleared.', { reset: 'all' });
    return;
  }

  const [repoArg, subject] = args.positionals;
  const repo = parseRepo(repoArg);
  const analysisOptions = { refresh: args.refresh };

  switch (args.command) {
    case 'commit': {
      if (!subject) throw new UsageError('commit needs a sha');
      const result = await engine.analyzeCommit(repo, subject, analysisOptions);
      print(args, result.markdown, result);
      break;
    }

    case 'pr': {
      const result = await engine.analyzePullRequest(repo, parsePullNumber(subject), analysisOptions);
      print(args, result.markdown, result);
      break;
    }

    case 'review': {
      const result = await engine.reviewPullRequest(repo, parsePullNumber(subject), analysisOptions);
      print(args, `${result.markdown}\n\nPosted: ${result.comment.url}`, result);
      break;
    }

    case 'trends': {
      const result = await engine.analyzeTrends(repo, args.size, { ...analysisOptions, branch: args.branch });
      const narrative = result.report.narrative ?? '(trend narrative unavailable)';
      print(args, narrative, result);
      break;
    }

    case 'debt': {
      const result = await engine.analyzeTechDebt(repo, { ...analysisOptions, branch: args.branch });
      print(args, result.report.markdown, result);
      break;
    }

    case 'overview': {
      const result = await engine.analyzeOverview(repo, analysisOptions);
      print(args, result.markdown, result);
      break;
    }

    case 'chat': {
      if (!subject) throw new UsageError('chat needs a question');
      const result = await engine.chat({ repo, target: chatTargetFrom(args), question: subject });
      print(args, result.answer, result);
      break;
    }

    case 'history': {
      const history = await engine.getHistory(scopeFor(repo, chatTargetFrom(args)));
      const text = history.turns.map(turn => `[${turn.timestamp}] ${turn.role}: ${turn.text}`).join('\n\n');
      print(args, text || '(no turns)', history);
      break;
    }

    case 'reset': {
      await engine.resetConversation(scopeFor(repo, chatTargetFrom(args)));
      print(args, 'Conversation cleared.', { reset: true });
      break;
    }

    default:
      throw new UsageError(`Unknown command: ${args.command ?? ''}`);
  }
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const args = parseArgs(argv);

  if (argv.length === 0 || args.help || !args.command) {
    console.log(USAGE);
    return;
  }

  const config = resolveConfig(args.configPath);
  const logger = createLogger('commitlens', { level: config.logging.level });
  const store = createCacheStore(config.cache);
  if (store instanceof FileCacheStore) {
    const removed = await store.pruneOld(config.cache.maxAgeDays);
    if (removed > 0) logger.debug(`pruned ${removed} stale cache file(s)`);
  }

  const engine = createEngine(config, {
    source: new GitHubSourceClient({
      token: process.env.GITHUB_TOKEN,
      baseUrl: config.github.baseUrl,
      timeoutMs: config.github.timeoutMs,
      logger: logger.child('github'),
    }),
    provider: new OpenAIAnalysisProvider({
      apiKey: process.env.OPENAI_API_KEY,
      baseUrl: config.provider.baseUrl,
      model: config.provider.model,
      timeoutMs: config.provider.timeoutMs,
      logger: logger.child('openai'),
    }),
    store,
    logger,
  });

  try {
    await run(engine, args);
  } finally {
    await engine.shutdown();
  }
}

main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(`Error: ${error.message}`);
    console.error('');
    console.log(USAGE);
  } else if (isCommitLensError(error)) {
    console.error(`${error.kind}: ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
});
