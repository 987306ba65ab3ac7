// engine/context/file-filters.ts — Classify changed paths by how useful they are to a reviewer

import * as path from 'path';

const LOCK_FILES = new Set([
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
  'bun.lockb',
  'composer.lock',
  'Gemfile.lock',
  'Cargo.lock',
  'poetry.lock',
  'Pipfile.lock',
  'go.sum',
  'mix.lock',
  'Podfile.lock',
]);

const BINARY_EXTENSIONS = new Set([
  '.png', '.jpg', '.jpeg', '.gif', '.webp', '.ico', '.bmp', '.avif',
  '.mp4', '.mov', '.webm', '.pdf', '.zip', '.tar', '.gz', '.7z',
  '.exe', '.dll', '.so', '.dylib', '.wasm', '.ttf', '.otf', '.woff', '.woff2',
]);

const GENERATED_DIRS = ['dist/', 'build/', 'vendor/', 'node_modules/', '__generated__/', 'coverage/'];

/** Lower is dropped first when a diff has to be cut down. */
export type FilePriority = 0 | 1 | 2;

export const PRIORITY_LOW: FilePriority = 0;
export const PRIORITY_NORMAL: FilePriority = 1;
export const PRIORITY_SOURCE: FilePriority = 2;

export function isLockFile(filePath: string): boolean {
  return LOCK_FILES.has(path.posix.basename(filePath)) || filePath.endsWith('.lock');
}

export function isBinaryPath(filePath: string): boolean {
  return BINARY_EXTENSIONS.has(path.posix.extname(filePath).toLowerCase());
}

/**
 * Build output, vendored code, minified bundles, snapshots and source maps.
 */
export function isGeneratedPath(filePath: string): boolean {
  const normalized = filePath.replace(/\\/g, '/');
  if (GENERATED_DIRS.some(dir => normalized.startsWith(dir) || normalized.includes(`/${dir}`))) {
    return true;
  }
  return (
    normalized.endsWith('.min.js') ||
    normalized.endsWith('.min.css') ||
    normalized.endsWith('.map') ||
    normalized.endsWith('.snap') ||
    normalized.includes('.generated.') ||
    normalized.endsWith('.pb.go')
  );
}

export function filePriority(filePath: string): FilePriority {
  if (isLockFile(filePath) || isBinaryPath(filePath) || isGeneratedPath(filePath)) {
    return PRIORITY_LOW;
  }
  const ext = path.posix.extname(filePath).toLowerCase();
  if (['.md', '.txt', '.rst', '.json', '.yaml', '.yml', '.toml', '.csv'].includes(ext)) {
    return PRIORITY_NORMAL;
  }
  return PRIORITY_SOURCE;
}

/**
 * Module name used for activity ranking: the top-level directory, or the file
 * itself when it sits at the repository root.
 */
export function moduleOf(filePath: string): string {
  const [first] = filePath.split('/');
  return first ?? filePath;
}
