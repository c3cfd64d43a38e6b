/**
 * ADJACENT SPAN MERGER
 *
 * Joins same-label spans that touch or sit within `maxGap` characters of
 * each other ("John" + "Smith" → "John Smith"). Merged text is re-read from
 * the source; the score is the running average over merged pieces.
 */

import type { MergeStats, Span } from "../schemas/schemas";
import { appLogger } from "./appLogger";

export const DEFAULT_MAX_GAP = 1;

export interface MergeOptions {
  readonly maxGap?: number;
}

export interface MergeOutcome {
  readonly spans: Span[];
  readonly stats: MergeStats;
}

export function canMerge(current: Span, next: Span, maxGap: number = DEFAULT_MAX_GAP): boolean {
  return current.label === next.label && next.start <= current.end + maxGap;
}

const countByLabel = (spans: ReadonlyArray<Span>): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const span of spans) {
    counts[span.label] = (counts[span.label] ?? 0) + 1;
  }
  return counts;
};

export function getMergeStats(original: ReadonlyArray<Span>, merged: ReadonlyArray<Span>): MergeStats {
  const entitiesMerged = original.length - merged.length;
  return {
    originalCount: original.length,
    mergedCount: merged.length,
    entitiesMerged,
    reductionPercentage: original.length > 0 ? (entitiesMerged / original.length) * 100 : 0,
    originalByLabel: countByLabel(original),
    mergedByLabel: countByLabel(merged),
  };
}

interface Candidate {
  span: Span;
  count: number;
}

export function mergeAdjacent(spans: ReadonlyArray<Span>, source: string, options: MergeOptions = {}): MergeOutcome {
  if (spans.length === 0) {
    return { spans: [], stats: getMergeStats([], []) };
  }

  const maxGap = options.maxGap ?? DEFAULT_MAX_GAP;
  const sorted = [...spans].sort((a, b) => a.start - b.start);
  const merged: Span[] = [];
  let current: Candidate = { span: sorted[0], count: 1 };

  for (const next of sorted.slice(1)) {
    if (canMerge(current.span, next, maxGap)) {
      const end = Math.max(current.span.end, next.end);
      current = {
        span: {
          label: current.span.label,
          text: source.slice(current.span.start, end).trim(),
          start: current.span.start,
          end,
          score: (current.span.score * current.count + next.score) / (current.count + 1),
        },
        count: current.count + 1,
      };
    } else {
      merged.push(current.span);
      current = { span: next, count: 1 };
    }
  }
  merged.push(current.span);

  const stats = getMergeStats(spans, merged);
  if (stats.entitiesMerged > 0) {
    appLogger.debug("Adjacent spans merged", {
      originalCount: stats.originalCount,
      mergedCount: stats.mergedCount,
    });
  }

  return { spans: merged, stats };
}
