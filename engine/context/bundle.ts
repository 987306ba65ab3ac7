// engine/context/bundle.ts — Budget-tracked construction and canonical rendering of context bundles

import type { ContextBundle, ContextSegment, SegmentKind, TaskKind } from '../types.js';
import { ContextTooLargeError } from '../errors.js';
import { estimateTokens } from './token-pruner.js';

/** Render position of each segment kind; allocation order is up to the assembler. */
const SEGMENT_ORDER: Record<SegmentKind, number> = {
  header: 0,
  overview: 1,
  statistics: 2,
  'commit-list': 3,
  diff: 4,
  note: 5,
  'previous-file': 6,
  hotspot: 7,
  history: 8,
  question: 9,
};

/**
 * Canonical text form of a bundle. This is what the provider receives and what
 * the analysis fingerprint is computed over.
 */
export function renderBundle(bundle: Pick<ContextBundle, 'segments'>): string {
  return bundle.segments.map(segment => `### ${segment.label}\n${segment.text}`).join('\n\n');
}

/**
 * Accumulates segments against a token budget.
 *
 * Each segment is charged its own estimate plus its heading and separator, so
 * the rendered bundle never estimates above the charged total.
 */
export class BundleBuilder {
  readonly task: TaskKind;
  readonly budget: number;
  private segments: ContextSegment[] = [];
  private dropped: string[] = [];
  private used = 0;

  constructor(task: TaskKind, budget: number) {
    this.task = task;
    this.budget = budget;
  }

  get remaining(): number {
    return this.budget - this.used;
  }

  /** Tokens left for the body of a segment labelled `label`. */
  available(label: string): number {
    return Math.max(0, this.remaining - overhead(label));
  }

  /**
   * Add a segment that must be present.
   * @throws {ContextTooLargeError} when it does not fit the remaining budget
   */
  require(kind: SegmentKind, label: string, text: string): void {
    const cost = overhead(label) + estimateTokens(text);
    if (cost > this.remaining) {
      throw new ContextTooLargeError(
        `Required ${kind} segment "${label}" needs ${cost} tokens but only ${this.remaining} of ${this.budget} remain`,
        this.budget,
        this.used + cost,
      );
    }
    this.push(kind, label, text, cost);
  }

  /** Add a segment if it fits; otherwise record `dropKey` and return false. */
  offer(kind: SegmentKind, label: string, text: string, dropKey: string): boolean {
    const cost = overhead(label) + estimateTokens(text);
    if (cost > this.remaining) {
      this.dropped.push(dropKey);
      return false;
    }
    this.push(kind, label, text, cost);
    return true;
  }

  drop(...items: string[]): void {
    this.dropped.push(...items);
  }

  build(): ContextBundle {
    const segments = this.segments
      .map((segment, index) => ({ segment, index }))
      .sort((a, b) => SEGMENT_ORDER[a.segment.kind] - SEGMENT_ORDER[b.segment.kind] || a.index - b.index)
      .map(({ segment }) => segment);

    return {
      task: this.task,
      segments,
      budget: this.budget,
      tokenEstimate: estimateTokens(renderBundle({ segments })),
      droppedItems: [...this.dropped],
    };
  }

  private push(kind: SegmentKind, label: string, text: string, cost: number): void {
    this.segments.push({ kind, label, text });
    this.used += cost;
  }
}

function overhead(label: string): number {
  // "### label\n" plus the blank-line separator
  return estimateTokens(`### ${label}\n`) + 1;
}
