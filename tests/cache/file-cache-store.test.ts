import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { FileCacheStore } from '../../engine/cache/file-cache-store.js';
import { CacheUnavailableError } from '../../engine/errors.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'commitlens-cache-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('FileCacheStore', () => {
  it('persists entries across store instances', async () => {
    const first = new FileCacheStore(tmpDir, { now: () => 5_000 });
    await first.set('analysis:commit:octo/widgets:abc:f00', 'review text', 60);
    await first.close();

    const second = new FileCacheStore(tmpDir, { now: () => 6_000 });
    expect(await second.get('analysis:commit:octo/widgets:abc:f00')).toEqual({
      key: 'analysis:commit:octo/widgets:abc:f00',
      value: 'review text',
      ttlSeconds: 60,
      createdAt: 5_000,
    });
  });

  it('stores entries under a directory named for the key namespace', async () => {
    const store = new FileCacheStore(tmpDir);
    await store.set('conversation:octo/widgets:commit:abc', '{}', 60);

    const files = fs.readdirSync(path.join(tmpDir, 'conversation'));
    expect(files).toHaveLength(1);
    expect(files[0]).toMatch(/^[0-9a-f]{64}\.json$/);
  });

  it('returns null for missing and expired entries', async () => {
    let now = 0;
    const store = new FileCacheStore(tmpDir, { now: () => now });
    expect(await store.get('analysis:missing')).toBeNull();

    await store.set('analysis:a', 'v', 1);
    now = 1_000;
    expect(await store.has('analysis:a')).toBe(false);
  });

  it('treats a corrupt file as a miss', async () => {
    const store = new FileCacheStore(tmpDir);
    await store.set('analysis:a', 'v', 60);

    const dir = path.join(tmpDir, 'analysis');
    const [file] = fs.readdirSync(dir);
    fs.writeFileSync(path.join(dir, file ?? ''), '{not json');

    expect(await store.get('analysis:a')).toBeNull();
  });

  it('deletes entries and clears namespaces', async () => {
    const store = new FileCacheStore(tmpDir);
    await store.set('analysis:a', '1', 60);
    await store.set('analysis:b', '2', 60);
    await store.set('conversation:c', '3', 60);

    await store.delete('analysis:a');
    expect(await store.has('analysis:a')).toBe(false);

    await store.clearNamespace('analysis');
    expect(await store.has('analysis:b')).toBe(false);
    expect(await store.has('conversation:c')).toBe(true);
  });

  it('pruneOld removes files older than the cutoff and empty namespaces', async () => {
    const writer = new FileCacheStore(tmpDir);
    await writer.set('analysis:a', '1', 60);
    await writer.set('analysis:b', '2', 60);

    const eightDaysLater = Date.now() + 8 * 24 * 60 * 60 * 1000;
    const pruner = new FileCacheStore(tmpDir, { now: () => eightDaysLater });

    expect(await pruner.pruneOld(7)).toBe(2);
    expect(fs.existsSync(path.join(tmpDir, 'analysis'))).toBe(false);
  });

  it('pruneOld returns 0 when the directory does not exist', async () => {
    const store = new FileCacheStore(path.join(tmpDir, 'nowhere'));
    expect(await store.pruneOld(7)).toBe(0);
  });

  it('rejects use after close with CacheUnavailableError', async () => {
    const store = new FileCacheStore(tmpDir);
    await store.close();
    await expect(store.get('analysis:a')).rejects.toBeInstanceOf(CacheUnavailableError);
    await expect(store.set('analysis:a', 'v', 60)).rejects.toBeInstanceOf(CacheUnavailableError);
  });

  it('reports write failures as CacheUnavailableError', async () => {
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const store = new FileCacheStore(blocker);

    await expect(store.set('analysis:a', 'v', 60)).rejects.toBeInstanceOf(CacheUnavailableError);
  });
});
