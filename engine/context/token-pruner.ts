// engine/context/token-pruner.ts — Priority-ranked trimming of diffs, histories and lists to a token budget

import type { Turn } from '../types.js';
import { ContextTooLargeError } from '../errors.js';
import type { FileDiff } from './diff-parser.js';
import { churn, renderFileDiff } from './diff-parser.js';
import { PRIORITY_LOW } from './file-filters.js';

// ─── Public Types ────────────────────────────────────────────────────────────

export interface PrunedDiff {
  text: string;
  droppedItems: string[];
  tokenEstimate: number;
}

export interface PrunedHistory {
  text: string;
  kept: number;
  dropped: number;
  tokenEstimate: number;
}

/** Tokens set aside for the "omitted files" note when a diff is cut. */
export const NOTE_RESERVE_TOKENS = 32;

const CHARS_PER_TOKEN = 4;

// ─── Token Estimation ────────────────────────────────────────────────────────

/**
 * Estimate token count for a string using the ~4 chars/token heuristic.
 */
export function estimateTokens(content: string): number {
  if (content.length === 0) return 0;
  return Math.ceil(content.length / CHARS_PER_TOKEN);
}

// ─── Diff Pruner ─────────────────────────────────────────────────────────────

/**
 * Ordering used when a diff must be cut: source before docs/config before
 * generated/lock/binary files, then highest churn first, then path.
 */
export function compareForRetention(a: FileDiff, b: FileDiff): number {
  if (a.priority !== b.priority) return b.priority - a.priority;
  const churnDelta = churn(b) - churn(a);
  if (churnDelta !== 0) return churnDelta;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Fit a parsed diff into `budget` tokens.
 *
 * Strategy:
 * 1. If the whole diff fits, return it untouched
 * 2. Otherwise walk files in retention order, including each whole file that fits
 * 3. A file that does not fit is cut at hunk boundaries (header + leading hunks)
 *    when at least one hunk fits; binary files are never cut
 * 4. Failing that, the first hunk is cut at a line boundary. The first file kept
 *    may be cut down to its header; later files need a changed line and must
 *    not be low priority
 * 5. Everything else is dropped and named in a trailing note
 * 6. Included files are emitted in their original diff order
 *
 * The result depends only on the diff and the budget.
 *
 * @throws {ContextTooLargeError} if not even one file header fits
 */
export function pruneDiffToBudget(files: FileDiff[], budget: number): PrunedDiff {
  if (files.length === 0) {
    return { text: '', droppedItems: [], tokenEstimate: 0 };
  }

  const full = files.map(file => renderFileDiff(file)).join('\n');
  if (estimateTokens(full) <= budget) {
    return { text: full, droppedItems: [], tokenEstimate: estimateTokens(full) };
  }

  let remainingChars = (budget - NOTE_RESERVE_TOKENS) * CHARS_PER_TOKEN;
  const included = new Map<FileDiff, string>();
  const droppedItems: string[] = [];
  const omittedPaths: string[] = [];

  for (const file of [...files].sort(compareForRetention)) {
    const whole = renderFileDiff(file);
    if (whole.length + 1 <= remainingChars) {
      included.set(file, whole);
      remainingChars -= whole.length + 1;
      continue;
    }

    const partial = file.binary ? null : fitHunks(file, remainingChars);
    if (partial !== null) {
      included.set(file, partial.text);
      remainingChars -= partial.text.length + 1;
      droppedItems.push(`hunks:${file.path}:${file.hunks.length - partial.hunkCount}`);
      continue;
    }

    const minLines = included.size === 0 ? 0 : file.priority === PRIORITY_LOW ? null : 2;
    const excerpt = file.binary || minLines === null ? null : fitLines(file, remainingChars, minLines);
    if (excerpt !== null) {
      included.set(file, excerpt.text);
      remainingChars -= excerpt.text.length + 1;
      droppedItems.push(`lines:${file.path}:${excerpt.droppedLines}`);
      continue;
    }

    droppedItems.push(`file:${file.path}`);
    omittedPaths.push(file.path);
  }

  if (included.size === 0) {
    throw new ContextTooLargeError(
      `Diff of ${files.length} file(s) does not fit a budget of ${budget} tokens`,
      budget,
      estimateTokens(full),
    );
  }

  const parts = files.filter(file => included.has(file)).map(file => included.get(file) ?? '');
  if (omittedPaths.length > 0) {
    const note = `[omitted ${omittedPaths.length} file(s) to fit the context budget: ${omittedPaths.join(', ')}]`;
    parts.push(note.slice(0, NOTE_RESERVE_TOKENS * CHARS_PER_TOKEN - 1));
  }

  const text = parts.join('\n');
  return { text, droppedItems, tokenEstimate: estimateTokens(text) };
}

function fitHunks(file: FileDiff, remainingChars: number): { text: string; hunkCount: number } | null {
  for (let count = file.hunks.length - 1; count >= 1; count--) {
    const text = `${renderFileDiff(file, count)}\n[... ${file.hunks.length - count} more hunk(s) truncated]`;
    if (text.length + 1 <= remainingChars) {
      return { text, hunkCount: count };
    }
  }
  return null;
}

/**
 * Header plus the leading lines of the file's hunks, cut at a line boundary.
 * `minLines` counts kept hunk lines, the `@@` line included.
 */
function fitLines(
  file: FileDiff,
  remainingChars: number,
  minLines: number,
): { text: string; droppedLines: number } | null {
  const lines = file.hunks.flatMap(hunk => hunk.split('\n'));
  let usedChars = file.header.length;
  let kept: number | null = null;

  for (let count = 0; count < lines.length; count++) {
    if (count > 0) usedChars += (lines[count - 1] ?? '').length + 1;
    if (count < minLines) continue;
    const marker = `[... ${lines.length - count} more line(s) truncated]`;
    if (usedChars + 1 + marker.length + 1 > remainingChars) break;
    kept = count;
  }

  if (kept === null) return null;
  const droppedLines = lines.length - kept;
  const text = [file.header, ...lines.slice(0, kept), `[... ${droppedLines} more line(s) truncated]`].join('\n');
  return { text, droppedLines };
}

// ─── History Pruner ──────────────────────────────────────────────────────────

export function renderTurn(turn: Turn): string {
  const role = turn.role === 'user' ? 'User' : 'Assistant';
  const override = turn.targetOverride ? ` (hypothetical ${turn.targetOverride.slice(0, 7)})` : '';
  return `${role}${override}: ${turn.text}`;
}

/**
 * Keep the newest turns that fit `budget` tokens, preserving their order.
 */
export function pruneHistoryToBudget(turns: Turn[], budget: number): PrunedHistory {
  const kept: string[] = [];
  let usedChars = 0;
  const limitChars = budget * CHARS_PER_TOKEN;

  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (!turn) continue;
    const rendered = renderTurn(turn);
    if (usedChars + rendered.length + 1 > limitChars) break;
    kept.unshift(rendered);
    usedChars += rendered.length + 1;
  }

  const text = kept.join('\n');
  return { text, kept: kept.length, dropped: turns.length - kept.length, tokenEstimate: estimateTokens(text) };
}

// ─── Text Helpers ────────────────────────────────────────────────────────────

/**
 * Keep leading lines while they fit `budget` tokens.
 */
export function pruneLinesToBudget(lines: string[], budget: number): { text: string; dropped: number } {
  const kept: string[] = [];
  let usedChars = 0;
  const limitChars = budget * CHARS_PER_TOKEN;

  for (const line of lines) {
    if (usedChars + line.length + 1 > limitChars) break;
    kept.push(line);
    usedChars += line.length + 1;
  }

  return { text: kept.join('\n'), dropped: lines.length - kept.length };
}

export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return `${text.slice(0, maxChars)}\n[... truncated ${text.length - maxChars} chars]`;
}

/**
 * Cut `text` so its estimate fits `budget` tokens, marking the cut.
 * Returns null when not even a marked excerpt fits.
 */
export function fitTextToBudget(text: string, budget: number): string | null {
  if (estimateTokens(text) <= budget) return text;
  // Room for the "[... truncated N chars]" marker
  const keep = budget * CHARS_PER_TOKEN - 48;
  if (keep <= 0) return null;
  return truncateText(text, keep);
}
