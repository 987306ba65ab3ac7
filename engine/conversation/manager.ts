// engine/conversation/manager.ts — Per-scope ordered turn histories with preconditions and a per-scope lock

import type { ConversationHistory, ConversationScope, Turn } from '../types.js';
import type { CacheStore } from '../cache/cache-store.js';
import { repoId } from '../cache/analysis-key.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { InvalidScopePreconditionError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CallOptions, SourceClient } from '../upstream/source-client.js';
import { ConversationStore, conversationKey } from './store.js';

export interface ConversationManagerOptions {
  maxTurns: number;
  ttlSeconds: number;
  /** Commit shas remembered as existing; the least recently used are forgotten first. */
  maxKnownCommits?: number;
  logger?: Logger;
}

/**
 * Owns every conversation scope's history.
 *
 * States: EMPTY (no turns stored) and ACTIVE (one or more). Appends for one
 * scope are serialized; different scopes never wait on each other. Histories
 * keep at most the newest `maxTurns` turns and always start on a user turn, so
 * trimming never leaves an answer without its question.
 *
 * Preconditions: `commit` and `what-if` scopes need a target commit that
 * exists upstream, and a turn's `targetOverride` (what-if only) must exist too.
 * Commit shas are immutable, so a sha found once is not looked up again.
 */
export class ConversationManager {
  private readonly store: ConversationStore;
  private readonly source: SourceClient;
  private readonly maxTurns: number;
  private readonly logger: Logger;
  private readonly mutex = new KeyedMutex();
  private knownCommits = new Set<string>();
  private readonly maxKnownCommits: number;

  constructor(cache: CacheStore, source: SourceClient, options: ConversationManagerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.store = new ConversationStore(cache, options.ttlSeconds, this.logger);
    this.source = source;
    this.maxTurns = options.maxTurns;
    this.maxKnownCommits = options.maxKnownCommits ?? 1_000;
  }

  /**
   * Append one turn and return the full ordered history.
   * @throws {InvalidScopePreconditionError}
   */
  async appendTurn(scope: ConversationScope, turn: Turn, options: CallOptions = {}): Promise<ConversationHistory> {
    return this.appendTurns(scope, [turn], options);
  }

  /**
   * Append turns as one atomic step: concurrent appends to the same scope never
   * interleave inside the batch.
   * @throws {InvalidScopePreconditionError}
   */
  async appendTurns(scope: ConversationScope, turns: Turn[], options: CallOptions = {}): Promise<ConversationHistory> {
    const overrides = turns.flatMap(turn => (turn.targetOverride ? [turn.targetOverride] : []));
    await this.checkScope(scope, overrides, options);

    return this.mutex.runExclusive(conversationKey(scope), async () => {
      const existing = await this.store.load(scope);
      const next = [...existing, ...turns];
      const trimmed = trimTurns(next, this.maxTurns);
      if (trimmed.length < next.length) {
        this.logger.debug(`trimmed ${next.length - trimmed.length} old turn(s) from ${conversationKey(scope)}`);
      }
      await this.store.save(scope, trimmed);
      return toHistory(scope, trimmed);
    });
  }

  async getHistory(scope: ConversationScope): Promise<ConversationHistory> {
    return toHistory(scope, await this.store.load(scope));
  }

  /** Clear the scope's turns; it returns to EMPTY. */
  async reset(scope: ConversationScope): Promise<void> {
    await this.mutex.runExclusive(conversationKey(scope), () => this.store.clear(scope));
  }

  /** Clear every scope's turns. Appends already holding a scope's lock may still land. */
  async resetAll(): Promise<void> {
    await this.store.clearAll();
  }

  /**
   * Verify the scope's target and any per-turn overrides.
   * @throws {InvalidScopePreconditionError}
   */
  async checkScope(scope: ConversationScope, overrides: string[] = [], options: CallOptions = {}): Promise<void> {
    if (scope.mode === 'repository') {
      if (overrides.length > 0) {
        throw new InvalidScopePreconditionError('Hypothetical commits are only allowed in what-if conversations');
      }
      return;
    }

    if (!scope.target) {
      throw new InvalidScopePreconditionError(`A ${scope.mode} conversation needs a target commit`);
    }
    if (scope.mode === 'commit' && overrides.length > 0) {
      throw new InvalidScopePreconditionError('Hypothetical commits are only allowed in what-if conversations');
    }

    await this.requireCommit(scope, scope.target, 'target', options);
    for (const sha of overrides) {
      await this.requireCommit(scope, sha, 'hypothetical', options);
    }
  }

  private async requireCommit(
    scope: ConversationScope,
    sha: string,
    role: 'target' | 'hypothetical',
    options: CallOptions,
  ): Promise<void> {
    const id = `${repoId(scope.repo)}@${sha}`;
    if (this.knownCommits.delete(id)) {
      this.knownCommits.add(id);
      return;
    }

    if (!(await this.source.commitExists(scope.repo, sha, options))) {
      throw new InvalidScopePreconditionError(`The ${role} commit ${sha} does not exist in ${repoId(scope.repo)}`);
    }
    this.knownCommits.add(id);
    while (this.knownCommits.size > this.maxKnownCommits) {
      const oldest = this.knownCommits.values().next();
      if (oldest.done) break;
      this.knownCommits.delete(oldest.value);
    }
  }
}

/** The newest `maxTurns` turns, minus a leading assistant turn whose question was cut. */
export function trimTurns(turns: Turn[], maxTurns: number): Turn[] {
  if (turns.length <= maxTurns) return turns;
  const kept = turns.slice(turns.length - maxTurns);
  return kept[0]?.role === 'assistant' ? kept.slice(1) : kept;
}

function toHistory(scope: ConversationScope, turns: Turn[]): ConversationHistory {
  return { scope, state: turns.length === 0 ? 'EMPTY' : 'ACTIVE', turns };
}
