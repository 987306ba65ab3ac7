import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadConfig, resolveConfigPath, validateConfig, applyEnvOverrides, DEFAULT_CONFIG } from '../engine/config.js';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

describe('config', () => {
  const tmpDir = path.join(os.tmpdir(), 'commitlens-test-config');
  const fakeHome = path.join(os.tmpdir(), 'commitlens-test-fake-home');

  beforeEach(() => { fs.mkdirSync(tmpDir, { recursive: true }); });
  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    fs.rmSync(fakeHome, { recursive: true, force: true });
  });

  it('resolveConfigPath finds local .commitlens.json first', () => {
    const localConfig = path.join(tmpDir, '.commitlens.json');
    fs.writeFileSync(localConfig, '{}');
    const result = resolveConfigPath(tmpDir, fakeHome);
    expect(result).toBe(localConfig);
  });

  it('resolveConfigPath falls back to the home directory config', () => {
    const globalConfig = path.join(fakeHome, '.commitlens', 'config.json');
    fs.mkdirSync(path.dirname(globalConfig), { recursive: true });
    fs.writeFileSync(globalConfig, '{}');
    expect(resolveConfigPath(tmpDir, fakeHome)).toBe(globalConfig);
  });

  it('resolveConfigPath returns null if no config found', () => {
    // A fake homeDir keeps a real ~/.commitlens/config.json out of the test
    expect(resolveConfigPath(tmpDir, fakeHome)).toBeNull();
  });

  it('validateConfig accepts an empty object', () => {
    expect(validateConfig({})).toEqual({ valid: true, errors: [] });
  });

  it('validateConfig accepts a partial valid config', () => {
    const result = validateConfig({
      context: { tokenBudget: 8000 },
      cache: { backend: 'file', directory: '/tmp/commitlens' },
      trends: { classifier: 'heuristic' },
    });
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
  });

  it('validateConfig rejects a non-positive token budget', () => {
    const result = validateConfig({ context: { tokenBudget: 0 } });
    expect(result.valid).toBe(false);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatch(/^context\.tokenBudget: /);
  });

  it('validateConfig rejects a trend window above 100', () => {
    const result = validateConfig({ trends: { maxWindow: 150 } });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^trends\.maxWindow: /);
  });

  it('validateConfig rejects a default window larger than the maximum', () => {
    const result = validateConfig({ trends: { defaultWindow: 80, maxWindow: 60 } });
    expect(result.valid).toBe(false);
    expect(result.errors).toContain('trends.defaultWindow: must not exceed trends.maxWindow (60)');
  });

  it('validateConfig rejects unknown top-level keys', () => {
    const result = validateConfig({ repos: [] });
    expect(result.valid).toBe(false);
  });

  it('validateConfig rejects an unknown cache backend', () => {
    const result = validateConfig({ cache: { backend: 'redis' } });
    expect(result.valid).toBe(false);
    expect(result.errors[0]).toMatch(/^cache\.backend: /);
  });

  it('loadConfig merges with defaults', () => {
    const configPath = path.join(tmpDir, '.commitlens.json');
    fs.writeFileSync(configPath, JSON.stringify({
      provider: { model: 'gpt-4o' },
      conversation: { maxTurns: 6 },
    }));
    const config = loadConfig(configPath);
    expect(config.provider.model).toBe('gpt-4o');
    expect(config.provider.timeoutMs).toBe(DEFAULT_CONFIG.provider.timeoutMs);
    expect(config.conversation.maxTurns).toBe(6);
    expect(config.conversation.ttlSeconds).toBe(DEFAULT_CONFIG.conversation.ttlSeconds);
    expect(config.context.tokenBudget).toBe(DEFAULT_CONFIG.context.tokenBudget);
  });

  it('loadConfig throws on invalid config', () => {
    const configPath = path.join(tmpDir, '.commitlens.json');
    fs.writeFileSync(configPath, JSON.stringify({ cache: { ttlSeconds: -5 } }));
    expect(() => loadConfig(configPath)).toThrow(/Invalid commitlens config:\ncache\.ttlSeconds: /);
  });

  it('DEFAULT_CONFIG keeps the trend window within 1..100', () => {
    expect(DEFAULT_CONFIG.trends.defaultWindow).toBe(50);
    expect(DEFAULT_CONFIG.trends.maxWindow).toBe(100);
  });
});

describe('applyEnvOverrides', () => {
  it('overrides the TTL, budget, model and log level', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      CACHE_TTL_SECONDS: '120',
      COMMITLENS_TOKEN_BUDGET: '4000',
      COMMITLENS_MODEL: 'gpt-4o',
      COMMITLENS_LOG_LEVEL: 'debug',
    });
    expect(config.cache.ttlSeconds).toBe(120);
    expect(config.context.tokenBudget).toBe(4000);
    expect(config.provider.model).toBe('gpt-4o');
    expect(config.logging.level).toBe('debug');
  });

  it('switches to the file backend when a cache directory is given', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, { COMMITLENS_CACHE_DIR: '/var/cache/commitlens' });
    expect(config.cache.backend).toBe('file');
    expect(config.cache.directory).toBe('/var/cache/commitlens');
  });

  it('ignores malformed values', () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, {
      CACHE_TTL_SECONDS: 'soon',
      COMMITLENS_TOKEN_BUDGET: '-1',
      COMMITLENS_LOG_LEVEL: 'verbose',
    });
    expect(config.cache.ttlSeconds).toBe(DEFAULT_CONFIG.cache.ttlSeconds);
    expect(config.context.tokenBudget).toBe(DEFAULT_CONFIG.context.tokenBudget);
    expect(config.logging.level).toBe(DEFAULT_CONFIG.logging.level);
  });

  it('does not mutate the input config', () => {
    applyEnvOverrides(DEFAULT_CONFIG, { CACHE_TTL_SECONDS: '5' });
    expect(DEFAULT_CONFIG.cache.ttlSeconds).toBe(3600);
  });
});
