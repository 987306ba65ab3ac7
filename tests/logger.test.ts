import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, silentLogger } from '../engine/logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes namespaced lines with the level to the sink', () => {
    const lines: string[] = [];
    const logger = createLogger('commitlens', { sink: line => lines.push(line) });

    logger.info('cache hit', { key: 'k1' });
    logger.error(new Error('boom'));

    expect(lines).toEqual([
      '[commitlens] [INFO] cache hit {"key":"k1"}',
      '[commitlens] [ERROR] Error: boom',
    ]);
  });

  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('commitlens', { level: 'warning', sink: line => lines.push(line) });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warning('shown');

    expect(lines).toEqual(['[commitlens] [WARNING] shown']);
  });

  it('defaults to the info level', () => {
    const lines: string[] = [];
    const logger = createLogger('commitlens', { sink: line => lines.push(line) });

    logger.debug('hidden');
    logger.info('shown');

    expect(lines).toEqual(['[commitlens] [INFO] shown']);
  });

  it('child loggers extend the namespace and share the sink and level', () => {
    const lines: string[] = [];
    const logger = createLogger('commitlens', { level: 'debug', sink: line => lines.push(line) });

    logger.child('github').debug('GET /repos');

    expect(lines).toEqual(['[commitlens:github] [DEBUG] GET /repos']);
  });

  it('sends output to stderr when no sink is given', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('commitlens');

    logger.info('started');
    logger.warning('slow');

    expect(error).toHaveBeenCalledWith('[commitlens]', '[INFO]', 'started');
    expect(warn).toHaveBeenCalledWith('[commitlens]', 'slow');
    expect(log).not.toHaveBeenCalled();
  });

  it('silentLogger discards everything', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    silentLogger.error('nothing');
    silentLogger.child('x').warning('nothing');
    expect(error).not.toHaveBeenCalled();
  });
});
