// engine/cli-args.ts — Argument parsing for the commitlens CLI

import type { ChatTarget, RepoRef } from './types.js';

export interface CliArgs {
  command: string | undefined;
  positionals: string[];
  configPath: string | undefined;
  branch: string | undefined;
  size: number | undefined;
  commit: string | undefined;
  whatIf: string | undefined;
  hypothetical: string | undefined;
  json: boolean;
  refresh: boolean;
  all: boolean;
  help: boolean;
}

const VALUE_FLAGS = ['--config', '--branch', '--size', '--commit', '--what-if', '--hypothetical'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some(flag => flag === arg);
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    command: undefined,
    positionals: [],
    configPath: undefined,
    branch: undefined,
    size: undefined,
    commit: undefined,
    whatIf: undefined,
    hypothetical: undefined,
    json: false,
    refresh: false,
    all: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--help' || arg === '-h') {
      args.help = true;
      continue;
    }
    if (arg === '--json') {
      args.json = true;
      continue;
    }
    if (arg === '--refresh') {
      args.refresh = true;
      continue;
    }
    if (arg === '--all') {
      args.all = true;
      continue;
    }

    if (isValueFlag(arg)) {
      const value = argv[i + 1];
      if (value === undefined) throw new UsageError(`${arg} needs a value`);
      i++; // skip next arg
      switch (arg) {
        case '--config': args.configPath = value; break;
        case '--branch': args.branch = value; break;
        case '--commit': args.commit = value; break;
        case '--what-if': args.whatIf = value; break;
        case '--hypothetical': args.hypothetical = value; break;
        case '--size': {
          const size = Number(value);
          if (!Number.isInteger(size) || size < 1) throw new UsageError(`--size must be a positive integer, got "${value}"`);
          args.size = size;
          break;
        }
      }
      continue;
    }

    if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);

    // First positional argument is the command
    if (!args.command) {
      args.command = arg;
    } else {
      args.positionals.push(arg);
    }
  }

  return args;
}

export function parseRepo(value: string | undefined): RepoRef {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(value ?? '');
  if (!match?.[1] || !match[2]) {
    throw new UsageError(`Expected a repository as owner/name, got "${value ?? ''}"`);
  }
  return { owner: match[1], name: match[2] };
}

export function parsePullNumber(value: string | undefined): number {
  const number = Number(value);
  if (!Number.isInteger(number) || number < 1) {
    throw new UsageError(`Expected a pull request number, got "${value ?? ''}"`);
  }
  return number;
}

/**
 * Chat target from `--commit` / `--what-if` (+ `--hypothetical`); repository mode otherwise.
 */
export function chatTargetFrom(args: Pick<CliArgs, 'commit' | 'whatIf' | 'hypothetical'>): ChatTarget {
  if (args.commit && args.whatIf) throw new UsageError('Use either --commit or --what-if, not both');
  if (args.hypothetical && !args.whatIf) throw new UsageError('--hypothetical needs --what-if <sha>');

  if (args.whatIf) {
    return args.hypothetical
      ? { mode: 'what-if', sha: args.whatIf, hypotheticalSha: args.hypothetical }
      : { mode: 'what-if', sha: args.whatIf };
  }
  if (args.commit) return { mode: 'commit', sha: args.commit };
  return { mode: 'repository' };
}

/** What `reset` clears: every conversation with `--all`, otherwise the one chat target. */
export function resetTargetFrom(args: Pick<CliArgs, 'all' | 'commit' | 'whatIf' | 'hypothetical'>): ChatTarget | 'all' {
  if (!args.all) return chatTargetFrom(args);
  if (args.commit || args.whatIf || args.hypothetical) {
    throw new UsageError('--all clears every conversation and takes no --commit, --what-if or --hypothetical');
  }
  return 'all';
}
