// engine/cache/file-cache-store.ts — Disk-backed cache store: one JSON file per key

import * as fs from 'fs/promises';
import * as path from 'path';
import * as crypto from 'crypto';
import { z } from 'zod';
import type { CacheEntry } from '../types.js';
import type { CacheStore } from './cache-store.js';
import { isExpired } from './cache-store.js';
import { CacheUnavailableError } from '../errors.js';

const CacheEntrySchema = z.object({
  key: z.string(),
  value: z.string(),
  ttlSeconds: z.number(),
  createdAt: z.number(),
});

/**
 * Cache store persisted under a directory.
 *
 * Structure on disk:
 *   <directory>/<namespace>/<sha256(key)>.json
 *
 * The namespace is the key's first `:`-separated segment (e.g. `analysis`,
 * `conversation`) so whole families of entries can be cleared together.
 * Writes go to a temp file and are renamed into place.
 */
export class FileCacheStore implements CacheStore {
  private readonly directory: string;
  private readonly now: () => number;
  private pending = new Set<Promise<void>>();
  private closed = false;

  constructor(directory: string, options: { now?: () => number } = {}) {
    this.directory = directory;
    this.now = options.now ?? Date.now;
  }

  // ─── CacheStore ──────────────────────────────────────────────────────────

  async get(key: string): Promise<CacheEntry | null> {
    this.assertOpen();
    const raw = await this.readFile(this.entryPath(key));
    if (raw === null) return null;

    let entry: CacheEntry;
    try {
      entry = CacheEntrySchema.parse(JSON.parse(raw));
    } catch {
      // Corrupt or foreign file: treat as a miss and let the next write replace it
      return null;
    }

    if (entry.key !== key || isExpired(entry, this.now())) return null;
    return entry;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertOpen();
    const entry: CacheEntry = { key, value, ttlSeconds, createdAt: this.now() };
    const write = this.writeEntry(key, entry);
    this.pending.add(write);
    try {
      await write;
    } finally {
      this.pending.delete(write);
    }
  }

  async delete(key: string): Promise<void> {
    this.assertOpen();
    try {
      await fs.rm(this.entryPath(key), { force: true });
    } catch (error) {
      throw new CacheUnavailableError(`Failed to delete cache entry ${key}`, error);
    }
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== null;
  }

  /** Removes the namespace's directory; keys without a `:` live under `default`. */
  async clearNamespace(namespace: string): Promise<void> {
    this.assertOpen();
    try {
      await fs.rm(path.join(this.directory, sanitize(namespace)), { recursive: true, force: true });
    } catch (error) {
      throw new CacheUnavailableError(`Failed to clear cache namespace ${namespace}`, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    await Promise.allSettled([...this.pending]);
    this.closed = true;
  }

  // ─── Maintenance ─────────────────────────────────────────────────────────

  /**
   * Remove entry files whose mtime is older than maxAgeDays, then drop
   * namespaces left empty. Returns the number of files removed.
   */
  async pruneOld(maxAgeDays: number): Promise<number> {
    const cutoff = this.now() - maxAgeDays * 24 * 60 * 60 * 1000;
    let removed = 0;

    let namespaces: string[];
    try {
      namespaces = await fs.readdir(this.directory);
    } catch {
      return 0;
    }

    for (const namespace of namespaces) {
      const dir = path.join(this.directory, namespace);
      const files = await fs.readdir(dir).catch(() => []);
      for (const file of files) {
        const fullPath = path.join(dir, file);
        const stat = await fs.stat(fullPath).catch(() => null);
        if (stat?.isFile() && stat.mtimeMs < cutoff) {
          await fs.rm(fullPath, { force: true });
          removed++;
        }
      }
      const remaining = await fs.readdir(dir).catch(() => null);
      if (remaining !== null && remaining.length === 0) {
        await fs.rmdir(dir).catch(() => undefined);
      }
    }

    return removed;
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private entryPath(key: string): string {
    const separator = key.indexOf(':');
    const namespace = separator === -1 ? 'default' : key.slice(0, separator);
    const digest = crypto.createHash('sha256').update(key).digest('hex');
    return path.join(this.directory, sanitize(namespace), `${digest}.json`);
  }

  private async readFile(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new CacheUnavailableError(`Failed to read cache file ${filePath}`, error);
    }
  }

  private async writeEntry(key: string, entry: CacheEntry): Promise<void> {
    const target = this.entryPath(key);
    const temp = `${target}.${process.pid}.${crypto.randomUUID()}.tmp`;
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(temp, JSON.stringify(entry), 'utf-8');
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch(() => undefined);
      throw new CacheUnavailableError(`Failed to write cache entry ${key}`, error);
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new CacheUnavailableError('Cache store has been closed');
  }
}

/**
 * Replace path separators and special characters with dashes.
 */
function sanitize(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '-');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
