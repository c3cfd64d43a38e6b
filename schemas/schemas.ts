/**
 * GLOBAL SCHEMAS - SINGLE SOURCE OF TRUTH
 *
 * Every span, detail record and result type in the pipeline derives from
 * these Effect Schemas. Runtime validation IS the type system.
 *
 * Philosophy:
 * - Schemas define both types AND validation
 * - Parse, don't validate
 * - Spans are immutable values once past the validator
 * - Results are plain JSON-serializable records
 */

import { Schema as S, pipe } from "effect";

/**
 * Literal version tag carried by every top-level result.
 */
export const RESULT_VERSION = "1.0.0" as const;

// ============================================================================
// SPANS
// ============================================================================

/**
 * SPAN (labeled, scored character range into the source text)
 *
 * OCaml equivalent:
 * type span = {
 *   label: string;
 *   text: string;
 *   start: int;
 *   end_: int;
 *   score: float;
 * }
 *
 * Invariant: 0 <= start < end
 */
export const SpanSchema = pipe(
  S.Struct({
    label: S.String,
    text: S.String,
    start: pipe(S.Int, S.greaterThanOrEqualTo(0)),
    end: pipe(S.Int, S.greaterThanOrEqualTo(0)),
    score: pipe(S.Number, S.greaterThanOrEqualTo(0), S.lessThanOrEqualTo(1)),
  }),
  S.filter((span) => span.start < span.end, {
    message: () => "Span start must be strictly before span end",
  })
);
export type Span = S.Schema.Type<typeof SpanSchema>;

export const decodeSpan = S.decodeUnknownEither(SpanSchema);
export const decodeSpans = S.decodeUnknownEither(S.Array(SpanSchema));

/**
 * Raw labeler output. `text` is optional: stages fill it from the source
 * when the labeler does not report it.
 */
export interface LabeledSpan {
  readonly start: number;
  readonly end: number;
  readonly label: string;
  readonly score: number;
  readonly text?: string;
}

// ============================================================================
// TEXT CHUNKS
// ============================================================================

/**
 * CHUNK (word-aligned substring with its absolute offset)
 */
export const ChunkSchema = S.Struct({
  text: S.String,
  offset: pipe(S.Int, S.greaterThanOrEqualTo(0)),
});
export type Chunk = S.Schema.Type<typeof ChunkSchema>;

export const ChunkInfoSchema = S.Struct({
  totalChunks: S.Int,
  totalCharacters: S.Int,
  averageChunkSize: S.Number,
  minChunkSize: S.Int,
  maxChunkSize: S.Int,
  totalWords: S.Int,
  averageWordsPerChunk: S.Number,
});
export type ChunkInfo = S.Schema.Type<typeof ChunkInfoSchema>;

// ============================================================================
// VALIDATION & OVERLAPS
// ============================================================================

/**
 * OVERLAP STRATEGY (Variant Type)
 *
 * OCaml equivalent:
 * type overlap_strategy = Highest_confidence | Longest | First
 */
export const OverlapStrategySchema = S.Literal("highest_confidence", "longest", "first");
export type OverlapStrategy = S.Schema.Type<typeof OverlapStrategySchema>;

export const RejectionReasonSchema = S.Literal("confidence", "position", "text_mismatch");
export type RejectionReason = S.Schema.Type<typeof RejectionReasonSchema>;

export const ValidationStatsSchema = S.Struct({
  totalEntities: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  confidenceFiltered: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  positionInvalid: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  textMismatch: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  validEntities: pipe(S.Int, S.greaterThanOrEqualTo(0)),
});
export type ValidationStats = S.Schema.Type<typeof ValidationStatsSchema>;

export interface ValidationRates extends ValidationStats {
  readonly confidenceFilterRate: number;
  readonly positionInvalidRate: number;
  readonly textMismatchRate: number;
  readonly validationSuccessRate: number;
}

// ============================================================================
// MERGING
// ============================================================================

export const MergeStatsSchema = S.Struct({
  originalCount: S.Int,
  mergedCount: S.Int,
  entitiesMerged: S.Int,
  reductionPercentage: S.Number,
  originalByLabel: S.Record({ key: S.String, value: S.Int }),
  mergedByLabel: S.Record({ key: S.String, value: S.Int }),
});
export type MergeStats = S.Schema.Type<typeof MergeStatsSchema>;

// ============================================================================
// REDACTION
// ============================================================================

/**
 * REDACTION DETAIL (one applied placeholder substitution)
 */
export const RedactionDetailSchema = S.Struct({
  label: S.String,
  original: S.String,
  placeholder: S.String,
  start: S.Int,
  end: S.Int,
  score: S.Number,
  redactionId: S.String,
});
export type RedactionDetail = S.Schema.Type<typeof RedactionDetailSchema>;

export const RedactionInfoSchema = S.Struct({
  entitiesProcessed: S.Int,
  redactionsApplied: S.Int,
  skipped: S.Int,
  formatUsed: S.String,
  numbered: S.Boolean,
  consistentIds: S.Boolean,
  uniqueEntities: S.Int,
});
export type RedactionInfo = S.Schema.Type<typeof RedactionInfoSchema>;

export const ReIdentificationMapSchema = S.Record({ key: S.String, value: S.String });
export type ReIdentificationMap = S.Schema.Type<typeof ReIdentificationMapSchema>;

// ============================================================================
// REPLACEMENT
// ============================================================================

/**
 * STRATEGY NAME (closed set of replacement strategies)
 *
 * OCaml equivalent:
 * type strategy = Synthetic | Country | Date | Default
 */
export const StrategyNameSchema = S.Literal("synthetic", "country", "date", "default");
export type StrategyName = S.Schema.Type<typeof StrategyNameSchema>;

export type StrategyTag = StrategyName | `${StrategyName}_cached` | "user_data";

/**
 * REPLACEMENT DETAIL (one applied synthetic/user-data substitution)
 */
export interface ReplacementDetail {
  readonly label: string;
  readonly original: string;
  readonly replacement: string;
  readonly start: number;
  readonly end: number;
  readonly score: number;
  readonly strategyUsed: StrategyTag;
}

export interface ReplacementInfo {
  readonly entitiesProcessed: number;
  readonly replacementsApplied: number;
  readonly consistencyEnabled: boolean;
  readonly strategiesUsed: Readonly<Record<string, number>>;
  readonly strategyFailures: number;
  readonly skipped: number;
  readonly uniqueReplacements: number;
}

export type ReplacementMap = Record<string, string>;

/**
 * Caller-supplied replacement values: a literal, or a list to pick from.
 */
export const UserValuesSchema = S.Record({
  key: S.String,
  value: S.Union(S.String, S.Array(S.String)),
});
export type UserValues = S.Schema.Type<typeof UserValuesSchema>;
