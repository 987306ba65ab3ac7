// engine/cache/cache-store.ts — Key-value store contract and the in-memory implementation

import type { CacheEntry } from '../types.js';

/**
 * Key-value store with per-entry TTL.
 *
 * Implementations report outages by rejecting with CacheUnavailableError;
 * a missing or expired key is `null`, never an error.
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  has(key: string): Promise<boolean>;
  /** Remove every entry whose key starts with `<namespace>:`. */
  clearNamespace(namespace: string): Promise<void>;
  /** Flush pending writes and release resources. The store is unusable afterwards. */
  close(): Promise<void>;
}

export interface MemoryCacheStoreOptions {
  now?: () => number;
  /** Oldest entries are evicted once this many are held. */
  maxEntries?: number;
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return entry.createdAt + entry.ttlSeconds * 1000 <= now;
}

/**
 * Process-local store backed by a Map. Starts empty; `close()` drops everything.
 */
export class MemoryCacheStore implements CacheStore {
  private entries = new Map<string, CacheEntry>();
  private readonly now: () => number;
  private readonly maxEntries: number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxEntries = options.maxEntries ?? 10_000;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (isExpired(entry, this.now())) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    // Re-inserting moves the key to the end of the Map's iteration order
    this.entries.delete(key);
    this.entries.set(key, { key, value, ttlSeconds, createdAt: this.now() });
    this.evict();
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  async clearNamespace(namespace: string): Promise<void> {
    const prefix = `${namespace}:`;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) this.entries.delete(key);
    }
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private evict(): void {
    if (this.entries.size <= this.maxEntries) return;

    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (isExpired(entry, now)) this.entries.delete(key);
    }
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}
