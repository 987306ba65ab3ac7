// engine/cache/analysis-key.ts — Content-addressed cache keys for analysis results

import * as crypto from 'crypto';
import type { AnalysisKey, AnalysisMode, ContextBundle, RepoRef } from '../types.js';
import { renderBundle } from '../context/bundle.js';

export function repoId(repo: RepoRef): string {
  return `${repo.owner}/${repo.name}`;
}

export function fingerprint(content: string): string {
  return crypto.createHash('sha256').update(content, 'utf-8').digest('hex');
}

/**
 * Build the key for an analysis over `content`.
 * Pure: the same repository, mode, target and content always yield an equal key.
 */
export function computeAnalysisKey(
  repo: RepoRef,
  mode: AnalysisMode,
  target: string | number | null,
  content: string,
): AnalysisKey {
  const repository = repoId(repo);
  const normalizedTarget = target === null ? null : String(target);
  const digest = fingerprint(content);

  return Object.freeze({
    repository,
    mode,
    target: normalizedTarget,
    fingerprint: digest,
    id: `analysis:${mode}:${repository}:${normalizedTarget ?? '-'}:${digest}`,
  });
}

/**
 * Key for the analysis of an assembled bundle. The bundle's task kind is part of
 * the hashed content so two tasks over the same segments never share a result.
 */
export function keyForBundle(
  repo: RepoRef,
  mode: AnalysisMode,
  target: string | number | null,
  bundle: ContextBundle,
): AnalysisKey {
  return computeAnalysisKey(repo, mode, target, `${bundle.task}\n${renderBundle(bundle)}`);
}
