import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import type { CommitLensConfig, LogLevel } from './types.js';

export const DEFAULT_CONFIG: CommitLensConfig = {
  github: {
    baseUrl: 'https://api.github.com',
    timeoutMs: 30_000,
  },
  provider: {
    model: 'gpt-4o-mini',
    timeoutMs: 90_000,
    maxRetries: 2,
    retryBaseDelayMs: 500,
  },
  context: {
    tokenBudget: 12_000,
    recentCommits: 20,
    maxPreviousFiles: 7,
    maxCharsPerPreviousFile: 4_000,
    maxTotalPreviousChars: 25_000,
    maxReadmeChars: 10_000,
  },
  cache: {
    backend: 'memory',
    directory: path.join(os.homedir(), '.commitlens', 'cache'),
    ttlSeconds: 3_600,
    maxEntryBytes: 256 * 1024,
    maxAgeDays: 7,
  },
  conversation: {
    maxTurns: 20,
    ttlSeconds: 3_600,
  },
  trends: {
    defaultWindow: 50,
    maxWindow: 100,
    batchSize: 10,
    topK: 10,
    classifier: 'provider',
  },
  logging: {
    level: 'info',
  },
};

const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;

const positiveInt = z.number().int().positive();

const ConfigFileSchema = z
  .object({
    github: z.object({ baseUrl: z.string().url(), timeoutMs: positiveInt }).partial(),
    provider: z
      .object({
        baseUrl: z.string().url(),
        model: z.string().min(1),
        timeoutMs: positiveInt,
        maxRetries: z.number().int().min(0).max(10),
        retryBaseDelayMs: z.number().int().min(0),
      })
      .partial(),
    context: z
      .object({
        tokenBudget: positiveInt,
        recentCommits: positiveInt,
        maxPreviousFiles: z.number().int().min(0),
        maxCharsPerPreviousFile: positiveInt,
        maxTotalPreviousChars: positiveInt,
        maxReadmeChars: positiveInt,
      })
      .partial(),
    cache: z
      .object({
        backend: z.enum(['memory', 'file']),
        directory: z.string().min(1),
        ttlSeconds: positiveInt,
        maxEntryBytes: positiveInt,
        maxAgeDays: positiveInt,
      })
      .partial(),
    conversation: z.object({ maxTurns: positiveInt, ttlSeconds: positiveInt }).partial(),
    trends: z
      .object({
        defaultWindow: positiveInt,
        maxWindow: positiveInt.max(100),
        batchSize: positiveInt,
        topK: positiveInt,
        classifier: z.enum(['provider', 'heuristic']),
      })
      .partial(),
    logging: z.object({ level: z.enum(LOG_LEVELS) }).partial(),
  })
  .partial()
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function resolveConfigPath(cwd: string, homeDir: string = os.homedir()): string | null {
  const localPath = path.join(cwd, '.commitlens.json');
  if (fs.existsSync(localPath)) return localPath;

  const globalPath = path.join(homeDir, '.commitlens', 'config.json');
  if (fs.existsSync(globalPath)) return globalPath;

  return null;
}

function checkConfig(raw: unknown): { data: ConfigFile | null; errors: string[] } {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      data: null,
      errors: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }

  const errors: string[] = [];
  const window = parsed.data.trends?.defaultWindow ?? DEFAULT_CONFIG.trends.defaultWindow;
  const max = parsed.data.trends?.maxWindow ?? DEFAULT_CONFIG.trends.maxWindow;
  if (window > max) {
    errors.push(`trends.defaultWindow: must not exceed trends.maxWindow (${max})`);
  }

  return { data: errors.length === 0 ? parsed.data : null, errors };
}

export function validateConfig(raw: unknown): { valid: boolean; errors: string[] } {
  const { errors } = checkConfig(raw);
  return { valid: errors.length === 0, errors };
}

export function mergeConfig(file: ConfigFile): CommitLensConfig {
  return {
    github: { ...DEFAULT_CONFIG.github, ...file.github },
    provider: { ...DEFAULT_CONFIG.provider, ...file.provider },
    context: { ...DEFAULT_CONFIG.context, ...file.context },
    cache: { ...DEFAULT_CONFIG.cache, ...file.cache },
    conversation: { ...DEFAULT_CONFIG.conversation, ...file.conversation },
    trends: { ...DEFAULT_CONFIG.trends, ...file.trends },
    logging: { ...DEFAULT_CONFIG.logging, ...file.logging },
  };
}

export function loadConfig(configPath: string): CommitLensConfig {
  const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const { data, errors } = checkConfig(raw);

  if (!data) {
    throw new Error(
      `Invalid commitlens config:\n${errors.join('\n')}`,
    );
  }

  return mergeConfig(data);
}

function readPositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Overlay environment variables onto a loaded config.
 * Malformed numeric values are ignored rather than rejected.
 */
export function applyEnvOverrides(
  config: CommitLensConfig,
  env: Record<string, string | undefined>,
): CommitLensConfig {
  const ttlSeconds = readPositiveInt(env.CACHE_TTL_SECONDS);
  const tokenBudget = readPositiveInt(env.COMMITLENS_TOKEN_BUDGET);
  const cacheDir = env.COMMITLENS_CACHE_DIR;
  const model = env.COMMITLENS_MODEL;
  const level = env.COMMITLENS_LOG_LEVEL;

  return {
    ...config,
    provider: { ...config.provider, ...(model ? { model } : {}) },
    context: { ...config.context, ...(tokenBudget ? { tokenBudget } : {}) },
    cache: {
      ...config.cache,
      ...(ttlSeconds ? { ttlSeconds } : {}),
      ...(cacheDir ? { directory: cacheDir, backend: 'file' as const } : {}),
    },
    logging: { level: isLogLevel(level) ? level : config.logging.level },
  };
}
