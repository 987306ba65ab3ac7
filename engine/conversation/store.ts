// engine/conversation/store.ts — Persisted turn histories, one cache entry per conversation scope

import { z } from 'zod';
import type { ConversationScope, Turn } from '../types.js';
import type { CacheStore } from '../cache/cache-store.js';
import { repoId } from '../cache/analysis-key.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { errorMessage } from '../errors.js';

export const CONVERSATION_NAMESPACE = 'conversation';

const TurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  text: z.string(),
  timestamp: z.string(),
  targetOverride: z.string().optional(),
});

const StoredHistorySchema = z.object({
  version: z.literal(1),
  turns: z.array(TurnSchema),
});

type StoredHistory = z.infer<typeof StoredHistorySchema>;

/**
 * Storage key for a scope. Every field of the scope is part of the key, so two
 * scopes never read or overwrite each other's turns.
 */
export function conversationKey(scope: ConversationScope): string {
  return `${CONVERSATION_NAMESPACE}:${repoId(scope.repo)}:${scope.mode}:${scope.target ?? '-'}`;
}

/**
 * Reads and writes turn lists through a CacheStore. Entries expire after
 * `ttlSeconds` without a write, which is how idle scopes are reclaimed.
 *
 * Store failures propagate (CacheUnavailableError): unlike analysis results,
 * a history cannot be recomputed.
 */
export class ConversationStore {
  private readonly store: CacheStore;
  private readonly ttlSeconds: number;
  private readonly logger: Logger;

  constructor(store: CacheStore, ttlSeconds: number, logger: Logger = silentLogger) {
    this.store = store;
    this.ttlSeconds = ttlSeconds;
    this.logger = logger;
  }

  async load(scope: ConversationScope): Promise<Turn[]> {
    const key = conversationKey(scope);
    const entry = await this.store.get(key);
    if (entry === null) return [];

    try {
      return StoredHistorySchema.parse(JSON.parse(entry.value)).turns;
    } catch (error) {
      this.logger.warning(`discarding unreadable history ${key}: ${errorMessage(error)}`);
      return [];
    }
  }

  async save(scope: ConversationScope, turns: Turn[]): Promise<void> {
    const stored: StoredHistory = { version: 1, turns };
    await this.store.set(conversationKey(scope), JSON.stringify(stored), this.ttlSeconds);
  }

  async clear(scope: ConversationScope): Promise<void> {
    await this.store.delete(conversationKey(scope));
  }

  async clearAll(): Promise<void> {
    await this.store.clearNamespace(CONVERSATION_NAMESPACE);
  }
}
