import type { Span } from "../schemas/schemas";

export interface SpanPlan {
  /** Applicable spans, descending by start */
  readonly planned: Span[];
  readonly skipped: number;
}

/**
 * Choose the spans a right-to-left substitution can apply: in range and
 * not overlapping a span already chosen. Walking from the end keeps every
 * earlier offset valid while the text is rewritten.
 */
export function planSubstitutions(text: string, spans: ReadonlyArray<Span>): SpanPlan {
  const descending = [...spans].sort((a, b) => b.start - a.start || b.end - a.end);
  const planned: Span[] = [];
  let boundary = text.length;
  let skipped = 0;

  for (const span of descending) {
    const inRange = span.start >= 0 && span.start < span.end && span.end <= text.length;
    if (!inRange || span.end > boundary) {
      skipped++;
      continue;
    }
    planned.push(span);
    boundary = span.start;
  }

  return { planned, skipped };
}

export const spliceText = (text: string, start: number, end: number, insert: string): string =>
  text.slice(0, start) + insert + text.slice(end);
