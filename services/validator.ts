/**
 * SPAN VALIDATOR
 *
 * Per-span checks, in order: confidence, position, text consistency.
 * Each rejection is a ValidationFailure value counted in the stats; nothing
 * is thrown. Accepted spans are cleaned (authoritative text from the source,
 * label lower-cased and trimmed).
 *
 * Overlap resolution is greedy over detected pairs, consulting the removed
 * set before acting on a pair.
 */

import type { OverlapStrategy, Span, ValidationRates, ValidationStats } from "../schemas/schemas";
import { appLogger } from "./appLogger";
import { ValidationFailure } from "./errors";

export const DEFAULT_MAX_SPAN_LENGTH = 200;

// ============================================================================
// PER-SPAN CHECK
// ============================================================================

export type SpanCheck =
  | { readonly _tag: "Accepted"; readonly span: Span }
  | { readonly _tag: "Rejected"; readonly failure: ValidationFailure };

export interface ValidateOptions {
  readonly minConfidence: number;
  readonly maxSpanLength?: number;
  /** When false only the confidence check runs */
  readonly strict?: boolean;
}

const normalizeWhitespace = (value: string): string => value.trim().replace(/\s+/g, " ");

const positionValid = (span: Span, source: string, maxSpanLength: number): boolean =>
  Number.isInteger(span.start) &&
  Number.isInteger(span.end) &&
  span.start >= 0 &&
  span.start < span.end &&
  span.end <= source.length &&
  span.end - span.start <= maxSpanLength;

/**
 * Stored text must match the source slice exactly, case-insensitively,
 * or as a substring in either direction (after whitespace normalization).
 */
export const textConsistent = (span: Span, source: string): boolean => {
  const stored = normalizeWhitespace(span.text);
  const actual = normalizeWhitespace(source.slice(span.start, span.end));

  if (stored === actual) return true;
  if (stored.toLowerCase() === actual.toLowerCase()) return true;
  return actual.includes(stored) || stored.includes(actual);
};

const reject = (span: Span, reason: ValidationFailure["reason"]): SpanCheck => ({
  _tag: "Rejected",
  failure: new ValidationFailure({
    reason,
    label: span.label,
    start: span.start,
    end: span.end,
    score: span.score,
  }),
});

export function checkSpan(span: Span, source: string, options: ValidateOptions): SpanCheck {
  const maxSpanLength = options.maxSpanLength ?? DEFAULT_MAX_SPAN_LENGTH;
  const strict = options.strict ?? true;

  if (!Number.isFinite(span.score) || span.score < options.minConfidence) {
    return reject(span, "confidence");
  }

  if (strict) {
    if (!positionValid(span, source, maxSpanLength)) return reject(span, "position");
    if (!textConsistent(span, source)) return reject(span, "text_mismatch");
  }

  return {
    _tag: "Accepted",
    span: {
      label: span.label.toLowerCase().trim(),
      text: strict ? source.slice(span.start, span.end).trim() : span.text,
      start: span.start,
      end: span.end,
      score: Number(span.score),
    },
  };
}

// ============================================================================
// BATCH VALIDATION
// ============================================================================

export interface ValidationOutcome {
  readonly spans: Span[];
  readonly stats: ValidationStats;
  readonly rejections: ValidationFailure[];
}

export function validateSpans(
  spans: ReadonlyArray<Span>,
  source: string,
  options: ValidateOptions
): ValidationOutcome {
  const valid: Span[] = [];
  const rejections: ValidationFailure[] = [];

  for (const span of spans) {
    const check = checkSpan(span, source, options);
    if (check._tag === "Accepted") {
      valid.push(check.span);
    } else {
      rejections.push(check.failure);
    }
  }

  const countReason = (reason: ValidationFailure["reason"]) =>
    rejections.filter((r) => r.reason === reason).length;

  const stats: ValidationStats = {
    totalEntities: spans.length,
    confidenceFiltered: countReason("confidence"),
    positionInvalid: countReason("position"),
    textMismatch: countReason("text_mismatch"),
    validEntities: valid.length,
  };

  if (spans.length > 0) {
    appLogger.debug("Validation complete", { ...stats, minConfidence: options.minConfidence });
  }

  return { spans: valid, stats, rejections };
}

export function getValidationRates(stats: ValidationStats): ValidationRates {
  const total = stats.totalEntities;
  const rate = (n: number) => (total > 0 ? n / total : 0);

  return {
    ...stats,
    confidenceFilterRate: rate(stats.confidenceFiltered),
    positionInvalidRate: rate(stats.positionInvalid),
    textMismatchRate: rate(stats.textMismatch),
    validationSuccessRate: rate(stats.validEntities),
  };
}

// ============================================================================
// OVERLAPS
// ============================================================================

export const spansOverlap = (a: Span, b: Span): boolean => !(a.end <= b.start || b.end <= a.start);

/**
 * Every overlapping index pair (i < j), in input order.
 */
export function detectOverlaps(spans: ReadonlyArray<Span>): Array<readonly [number, number]> {
  const pairs: Array<readonly [number, number]> = [];
  for (let i = 0; i < spans.length; i++) {
    for (let j = i + 1; j < spans.length; j++) {
      if (spansOverlap(spans[i], spans[j])) pairs.push([i, j]);
    }
  }
  return pairs;
}

const loserOf = (strategy: OverlapStrategy, i: number, j: number, a: Span, b: Span): number => {
  switch (strategy) {
    case "highest_confidence":
      return b.score > a.score ? i : j;
    case "longest":
      return b.end - b.start > a.end - a.start ? i : j;
    case "first":
      return j;
  }
};

/**
 * Drop spans until no two survivors overlap. On a tie the second span of
 * the pair is dropped.
 */
export function resolveOverlaps(spans: ReadonlyArray<Span>, strategy: OverlapStrategy): Span[] {
  const pairs = detectOverlaps(spans);
  if (pairs.length === 0) return [...spans];

  const removed = new Set<number>();
  for (const [i, j] of pairs) {
    if (removed.has(i) || removed.has(j)) continue;
    removed.add(loserOf(strategy, i, j, spans[i], spans[j]));
  }

  const resolved = spans.filter((_, index) => !removed.has(index));
  appLogger.debug("Overlaps resolved", {
    strategy,
    pairs: pairs.length,
    before: spans.length,
    after: resolved.length,
  });
  return resolved;
}
