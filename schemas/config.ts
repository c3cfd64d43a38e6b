/**
 * PIPELINE CONFIGURATION SCHEMA
 *
 * Three option groups (extraction, redaction, replacement), each with
 * defaults. Callers pass partial overrides per group; the merged value is
 * decoded against these schemas before anything is constructed.
 */

import { Schema as S, pipe } from "effect";
import { OverlapStrategySchema, StrategyNameSchema } from "./schemas";

const Probability = pipe(S.Number, S.greaterThanOrEqualTo(0), S.lessThanOrEqualTo(1));
const PositiveInt = pipe(S.Int, S.greaterThanOrEqualTo(1));

// ============================================================================
// EXTRACTION
// ============================================================================

export const PassThresholdsSchema = S.Struct({
  first: Probability,
  subsequent: Probability,
});
export type PassThresholds = S.Schema.Type<typeof PassThresholdsSchema>;

export const ParallelModeSchema = S.Union(S.Literal("auto"), S.Boolean);
export type ParallelMode = S.Schema.Type<typeof ParallelModeSchema>;

export const ExtractionConfigSchema = S.Struct({
  labels: pipe(S.Array(pipe(S.String, S.minLength(1))), S.minItems(1)),
  minConfidence: Probability,
  maxPasses: PositiveInt,
  passThresholds: PassThresholdsSchema,
  chunkSize: PositiveInt, // words per chunk
  workerCount: PositiveInt,
  useParallel: ParallelModeSchema,
  mergeEntities: S.Boolean,
  maxGap: pipe(S.Int, S.greaterThanOrEqualTo(0)),
  enableValidation: S.Boolean,
  strictValidation: S.Boolean,
  maxSpanLength: PositiveInt,
  resolveOverlaps: S.Boolean,
  overlapStrategy: OverlapStrategySchema,
  useCache: S.Boolean,
  cacheSize: PositiveInt,
});
export type ExtractionConfig = S.Schema.Type<typeof ExtractionConfigSchema>;

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  labels: ["person", "date", "location", "organization"],
  minConfidence: 0.3,
  maxPasses: 2,
  passThresholds: { first: 0.5, subsequent: 0.3 },
  chunkSize: 600,
  workerCount: 4,
  useParallel: "auto",
  mergeEntities: true,
  maxGap: 1,
  enableValidation: true,
  strictValidation: true,
  maxSpanLength: 200,
  resolveOverlaps: true,
  overlapStrategy: "highest_confidence",
  useCache: true,
  cacheSize: 128,
};

// ============================================================================
// REDACTION
// ============================================================================

export const RedactionConfigSchema = S.Struct({
  placeholderFormat: pipe(S.String, S.minLength(1)),
  numbered: S.Boolean,
  consistentIds: S.Boolean,
});
export type RedactionConfig = S.Schema.Type<typeof RedactionConfigSchema>;

export const DEFAULT_REDACTION_CONFIG: RedactionConfig = {
  placeholderFormat: "#{id}_{label}_REDACTED",
  numbered: true,
  consistentIds: true,
};

// ============================================================================
// REPLACEMENT
// ============================================================================

export const ReplacementConfigSchema = S.Struct({
  locale: pipe(S.String, S.minLength(1)),
  ensureConsistency: S.Boolean,
  strategyOverrides: S.Record({ key: S.String, value: StrategyNameSchema }),
});
export type ReplacementConfig = S.Schema.Type<typeof ReplacementConfigSchema>;

export const DEFAULT_REPLACEMENT_CONFIG: ReplacementConfig = {
  locale: "en_US",
  ensureConsistency: true,
  strategyOverrides: {},
};

// ============================================================================
// WHOLE PIPELINE
// ============================================================================

export const AnonymizerConfigSchema = S.Struct({
  extraction: ExtractionConfigSchema,
  redaction: RedactionConfigSchema,
  replacement: ReplacementConfigSchema,
});
export type AnonymizerConfig = S.Schema.Type<typeof AnonymizerConfigSchema>;

export const DEFAULT_ANONYMIZER_CONFIG: AnonymizerConfig = {
  extraction: DEFAULT_EXTRACTION_CONFIG,
  redaction: DEFAULT_REDACTION_CONFIG,
  replacement: DEFAULT_REPLACEMENT_CONFIG,
};

/**
 * Partial overrides accepted at construction time.
 */
export interface AnonymizerConfigInput {
  readonly extraction?: Partial<Omit<ExtractionConfig, "passThresholds">> & {
    readonly passThresholds?: Partial<PassThresholds>;
  };
  readonly redaction?: Partial<RedactionConfig>;
  readonly replacement?: Partial<ReplacementConfig>;
}
