// engine/logger.ts — Namespaced console logger with a level threshold and an optional line sink

import type { LogLevel } from './types.js';

export type { LogLevel };

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warning: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (namespace: string) => Logger;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives every emitted line instead of the console. */
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

function formatArgs(args: unknown[]): string {
  return args.map(arg => {
    if (typeof arg === 'string') return arg;
    if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }).join(' ');
}

export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const prefix = `[${namespace}]`;
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink;

  const emit = (level: LogLevel, args: unknown[]): void => {
    if (LEVEL_ORDER[level] < threshold) return;

    if (sink) {
      sink(`${prefix} [${level.toUpperCase()}] ${formatArgs(args)}`);
      return;
    }

    // stdout carries command results, so all log output goes to stderr
    if (level === 'warning') {
      console.warn(prefix, ...args);
    } else {
      console.error(prefix, `[${level.toUpperCase()}]`, ...args);
    }
  };

  return {
    debug: (...args: unknown[]) => emit('debug', args),
    info: (...args: unknown[]) => emit('info', args),
    warning: (...args: unknown[]) => emit('warning', args),
    error: (...args: unknown[]) => emit('error', args),
    child: (child: string) => createLogger(`${namespace}:${child}`, options),
  };
}

/** Logger that discards everything; the default when callers inject none. */
export const silentLogger: Logger = createLogger('silent', { sink: () => undefined });
