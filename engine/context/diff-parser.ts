// engine/context/diff-parser.ts — Split unified git diffs into per-file sections and hunks

import { filePriority } from './file-filters.js';
import type { FilePriority } from './file-filters.js';

export interface FileDiff {
  /** Path after the change (`b/` side); the old path for deletions. */
  path: string;
  /** Path before the change (`a/` side), or null when the file was added. */
  previousPath: string | null;
  /** `diff --git` line through the line before the first hunk. */
  header: string;
  hunks: string[];
  additions: number;
  deletions: number;
  binary: boolean;
  priority: FilePriority;
}

const FILE_HEADER_PREFIX = 'diff --git ';

const C_ESCAPES = new Map<string, number>([
  ['a', 7], ['b', 8], ['t', 9], ['n', 10], ['v', 11], ['f', 12], ['r', 13], ['"', 34], ['\\', 92],
]);

/**
 * Read a C-style quoted path starting at `start` (the opening quote), as git
 * writes names with non-ASCII or control characters. Octal escapes are UTF-8 bytes.
 */
export function readQuotedPath(text: string, start = 0): { value: string; end: number } | null {
  if (text[start] !== '"') return null;
  const bytes: number[] = [];

  for (let i = start + 1; i < text.length; i++) {
    const ch = String.fromCodePoint(text.codePointAt(i) ?? 0);
    if (ch === '"') return { value: Buffer.from(bytes).toString('utf-8'), end: i + 1 };
    if (ch !== '\\') {
      bytes.push(...Buffer.from(ch, 'utf-8'));
      i += ch.length - 1;
      continue;
    }

    const octal = /^[0-7]{1,3}/.exec(text.slice(i + 1, i + 4));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += octal[0].length;
      continue;
    }
    const next = text[i + 1] ?? '';
    bytes.push(C_ESCAPES.get(next) ?? next.charCodeAt(0));
    i++;
  }
  return null;
}

function stripSide(value: string, side: 'a/' | 'b/'): string {
  return value.startsWith(side) ? value.slice(side.length) : value;
}

/**
 * Paths named on a `diff --git` line. Bare paths may contain spaces, so the
 * split is taken where both halves name the same file; renames are settled
 * later by the `rename`/`---`/`+++` lines.
 */
function parseHeaderPaths(rest: string): { before: string; after: string } {
  if (rest.startsWith('"')) {
    const first = readQuotedPath(rest);
    if (first) {
      const tail = rest.slice(first.end).trimStart();
      const second = readQuotedPath(tail);
      return { before: stripSide(first.value, 'a/'), after: stripSide(second ? second.value : tail, 'b/') };
    }
  }

  const quotedAfter = rest.indexOf(' "b/');
  if (quotedAfter >= 0) {
    const second = readQuotedPath(rest, quotedAfter + 1);
    if (second) return { before: stripSide(rest.slice(0, quotedAfter), 'a/'), after: stripSide(second.value, 'b/') };
  }

  const splits: number[] = [];
  for (let at = rest.indexOf(' b/'); at >= 0; at = rest.indexOf(' b/', at + 1)) splits.push(at);
  for (const at of splits) {
    const before = stripSide(rest.slice(0, at), 'a/');
    const after = stripSide(rest.slice(at + 1), 'b/');
    if (before === after) return { before, after };
  }

  const last = splits[splits.length - 1];
  if (last === undefined) {
    const only = stripSide(rest, 'a/');
    return { before: only, after: only };
  }
  return { before: stripSide(rest.slice(0, last), 'a/'), after: stripSide(rest.slice(last + 1), 'b/') };
}

/** Path of a `---`/`+++`/`rename` line; null for /dev/null. Git appends a tab after names with spaces. */
function markerPath(raw: string, side: 'a/' | 'b/' | null): string | null {
  if (raw === '/dev/null') return null;
  const quoted = readQuotedPath(raw);
  const value = quoted ? quoted.value : raw.replace(/\t.*$/, '');
  return side ? stripSide(value, side) : value;
}

/**
 * Parse a unified diff as produced by `git diff` / the hosting API's diff media type.
 * Text before the first `diff --git` line is ignored.
 */
export function parseDiff(diffText: string): FileDiff[] {
  const files: FileDiff[] = [];
  const lines = diffText.split('\n');

  let current: { path: string; previousPath: string | null; headerLines: string[]; hunks: string[][] } | null = null;
  let addedFile = false;

  const flush = () => {
    if (!current) return;
    let additions = 0;
    let deletions = 0;
    for (const hunk of current.hunks) {
      for (const line of hunk.slice(1)) {
        if (line.startsWith('+')) additions++;
        else if (line.startsWith('-')) deletions++;
      }
    }
    const header = current.headerLines.join('\n');
    files.push({
      path: current.path,
      previousPath: addedFile ? null : current.previousPath,
      header,
      hunks: current.hunks.map(h => h.join('\n')),
      additions,
      deletions,
      binary: header.includes('Binary files ') || header.includes('GIT binary patch'),
      priority: filePriority(current.path),
    });
    current = null;
  };

  for (const line of lines) {
    // Hunk lines start with a space, +, - or \, so this is always a new file
    if (line.startsWith(FILE_HEADER_PREFIX)) {
      flush();
      addedFile = false;
      const { before, after } = parseHeaderPaths(line.slice(FILE_HEADER_PREFIX.length));
      current = { path: after, previousPath: before, headerLines: [line], hunks: [] };
      continue;
    }
    if (!current) continue;

    if (line.startsWith('@@')) {
      current.hunks.push([line]);
      continue;
    }

    const openHunk = current.hunks[current.hunks.length - 1];
    if (openHunk) {
      openHunk.push(line);
      continue;
    }

    if (line.startsWith('new file mode')) {
      addedFile = true;
    } else if (line.startsWith('--- ')) {
      const before = markerPath(line.slice(4), 'a/');
      if (before === null) addedFile = true;
      else current.previousPath = before;
    } else if (line.startsWith('+++ ')) {
      const after = markerPath(line.slice(4), 'b/');
      if (after !== null) current.path = after;
    } else if (line.startsWith('rename from ')) {
      current.previousPath = markerPath(line.slice('rename from '.length), null) ?? current.previousPath;
    } else if (line.startsWith('rename to ')) {
      current.path = markerPath(line.slice('rename to '.length), null) ?? current.path;
    }
    current.headerLines.push(line);
  }
  flush();

  return files;
}

/**
 * Paths that existed before the change (the `a/` side), i.e. files modified,
 * renamed or deleted by the diff. Sorted, without duplicates.
 */
export function previousFilePaths(files: FileDiff[]): string[] {
  const paths = new Set<string>();
  for (const file of files) {
    if (file.previousPath !== null && file.previousPath !== '/dev/null') {
      paths.add(file.previousPath);
    }
  }
  return [...paths].sort();
}

export function renderFileDiff(file: FileDiff, hunkCount: number = file.hunks.length): string {
  return [file.header, ...file.hunks.slice(0, hunkCount)].join('\n');
}

export function churn(file: FileDiff): number {
  return file.additions + file.deletions;
}
