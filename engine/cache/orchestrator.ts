// engine/cache/orchestrator.ts — Cached, coalesced resolution of expensive analysis calls

import type { z } from 'zod';
import type { AnalysisKey, CacheEntry } from '../types.js';
import type { CacheStore } from './cache-store.js';
import { isExpired } from './cache-store.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { errorMessage } from '../errors.js';
import { waitWithSignal } from '../util/async.js';

// ─── Codecs ──────────────────────────────────────────────────────────────────

/**
 * Serializes results for the cache store. `decode` throws on values it does
 * not recognise; the orchestrator treats that as a miss.
 */
export interface ValueCodec<T> {
  encode(value: T): string;
  decode(raw: string): T;
}

export const textCodec: ValueCodec<string> = {
  encode: value => value,
  decode: raw => raw,
};

export function jsonCodec<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): ValueCodec<T> {
  return {
    encode: value => JSON.stringify(value),
    decode: raw => schema.parse(JSON.parse(raw)),
  };
}

// ─── Public Types ────────────────────────────────────────────────────────────

export interface OrchestratorOptions {
  ttlSeconds: number;
  /** Encoded results larger than this are returned but never stored. */
  maxEntryBytes: number;
  now?: () => number;
  logger?: Logger;
}

export interface ResolveOptions<T> {
  /** Abandons this caller's wait only; the shared computation keeps running. */
  signal?: AbortSignal;
  ttlSeconds?: number;
  /** Return false to serve a computed value without storing it (e.g. a degraded result). */
  shouldStore?: (value: T) => boolean;
}

export type ResolveSource = 'cache' | 'computed' | 'coalesced';

export interface Resolved<T> {
  key: AnalysisKey;
  value: T;
  source: ResolveSource;
}

export interface CacheStats {
  hits: number;
  misses: number;
  coalesced: number;
  uncacheable: number;
  storeErrors: number;
  inFlight: number;
}

interface FlightResult {
  encoded: string;
  source: 'cache' | 'computed';
}

// ─── Orchestrator ────────────────────────────────────────────────────────────

/**
 * Serves analysis results from the cache store and guarantees at most one
 * in-flight computation per key.
 *
 * The first caller for a key starts a flight (store lookup, then compute on
 * miss); every concurrent caller for the same key joins that flight and
 * receives the same value or the same failure. Failures are never stored, so
 * the next call after a failed flight computes again.
 *
 * The store is an optimisation: read and write failures are logged and the
 * request proceeds as a miss.
 */
export class CacheOrchestrator {
  private readonly store: CacheStore;
  private readonly ttlSeconds: number;
  private readonly maxEntryBytes: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private inFlight = new Map<string, Promise<FlightResult>>();
  private counters = { hits: 0, misses: 0, coalesced: 0, uncacheable: 0, storeErrors: 0 };

  constructor(store: CacheStore, options: OrchestratorOptions) {
    this.store = store;
    this.ttlSeconds = options.ttlSeconds;
    this.maxEntryBytes = options.maxEntryBytes;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  async resolve<T>(
    key: AnalysisKey,
    compute: () => Promise<T>,
    codec: ValueCodec<T>,
    options: ResolveOptions<T> = {},
  ): Promise<T> {
    const resolved = await this.resolveDetailed(key, compute, codec, options);
    return resolved.value;
  }

  async resolveDetailed<T>(
    key: AnalysisKey,
    compute: () => Promise<T>,
    codec: ValueCodec<T>,
    options: ResolveOptions<T> = {},
  ): Promise<Resolved<T>> {
    const existing = this.inFlight.get(key.id);
    if (existing) {
      this.counters.coalesced++;
      this.logger.debug(`joining in-flight computation for ${key.id}`);
      const result = await waitWithSignal(existing, options.signal);
      return { key, value: codec.decode(result.encoded), source: 'coalesced' };
    }

    const flight = this.fly(key, compute, codec, options);
    this.inFlight.set(key.id, flight);
    const release = () => {
      if (this.inFlight.get(key.id) === flight) this.inFlight.delete(key.id);
    };
    // Registered before any waiter so the slot is freed first; also keeps a
    // flight whose waiters all cancelled from surfacing as an unhandled rejection.
    void flight.then(release, release);

    const result = await waitWithSignal(flight, options.signal);
    return { key, value: codec.decode(result.encoded), source: result.source };
  }

  /** Drop the stored result for `key`; an in-flight computation is unaffected. */
  async invalidate(key: AnalysisKey): Promise<void> {
    try {
      await this.store.delete(key.id);
    } catch (error) {
      this.counters.storeErrors++;
      this.logger.warning(`cache delete failed for ${key.id}: ${errorMessage(error)}`);
    }
  }

  stats(): CacheStats {
    return { ...this.counters, inFlight: this.inFlight.size };
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private async fly<T>(
    key: AnalysisKey,
    compute: () => Promise<T>,
    codec: ValueCodec<T>,
    options: ResolveOptions<T>,
  ): Promise<FlightResult> {
    const cached = await this.lookup(key, codec);
    if (cached !== null) {
      this.counters.hits++;
      this.logger.debug(`cache hit ${key.id}`);
      return { encoded: cached, source: 'cache' };
    }

    this.counters.misses++;
    this.logger.debug(`cache miss ${key.id}`);

    const value = await compute();
    const encoded = codec.encode(value);
    const bytes = Buffer.byteLength(encoded, 'utf-8');

    if (options.shouldStore && !options.shouldStore(value)) {
      this.logger.debug(`result for ${key.id} marked not storable; serving uncached`);
    } else if (bytes > this.maxEntryBytes) {
      this.counters.uncacheable++;
      this.logger.info(`result for ${key.id} is ${bytes} bytes (limit ${this.maxEntryBytes}); serving uncached`);
    } else {
      await this.store.set(key.id, encoded, options.ttlSeconds ?? this.ttlSeconds).catch((error: unknown) => {
        this.counters.storeErrors++;
        this.logger.warning(`cache write failed for ${key.id}, continuing uncached: ${errorMessage(error)}`);
      });
    }

    return { encoded, source: 'computed' };
  }

  private async lookup<T>(key: AnalysisKey, codec: ValueCodec<T>): Promise<string | null> {
    let entry: CacheEntry | null;
    try {
      entry = await this.store.get(key.id);
    } catch (error) {
      this.counters.storeErrors++;
      this.logger.warning(`cache read failed for ${key.id}, computing directly: ${errorMessage(error)}`);
      return null;
    }

    if (entry === null || isExpired(entry, this.now())) return null;

    try {
      codec.decode(entry.value);
    } catch (error) {
      this.logger.warning(`discarding undecodable cache entry ${key.id}: ${errorMessage(error)}`);
      return null;
    }

    return entry.value;
  }
}
