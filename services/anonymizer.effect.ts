/**
 * ANONYMIZER CONTEXT (Effect-TS)
 *
 * One explicit context per configuration: validated options, the extraction
 * cache, the redactor identity maps and the replacer consistency cache.
 * Built by a scoped Layer; releasing the scope clears every cache.
 *
 * Data flow:
 *   text → (parallel dispatch | cached multi-pass) → validate → resolve
 *   overlaps → merge → redact | replace
 *
 * OCaml equivalent:
 * module type ANONYMIZER = sig
 *   val extract : string -> extract_options -> (extraction_result, config_error) Effect.t
 *   val redact : string -> redact_options -> (redaction_outcome, config_error) Effect.t
 *   val replace : string -> replace_options -> (replacement_outcome, config_error) Effect.t
 * end
 */

import { Clock, Context, Effect, Layer, type Scope } from "effect";
import {
  type AnonymizerConfig,
  type AnonymizerConfigInput,
  type ExtractionConfig,
} from "../schemas/config";
import {
  RESULT_VERSION,
  type MergeStats,
  type Span,
  type UserValues,
  type ValidationRates,
} from "../schemas/schemas";
import { countWords } from "./chunker";
import { resolveAnonymizerConfig, resolveExtractionConfig } from "./config";
import { type ConfigurationError, ErrorCollector, InputError, type ServiceErrorJSON } from "./errors";
import {
  type ExtractionCache,
  type ExtractionCacheStats,
  makeExtractionCache,
} from "./extractionCache.effect";
import { Labeler, type LabelerInfo } from "./labeler";
import { LexiconLabelerLive } from "./lexiconLabeler";
import { mergeAdjacent } from "./merger";
import { type MultiPassResult, type StopReason, extractMultiPass } from "./multiPassExtractor.effect";
import { dispatchParallel, shouldUseParallel } from "./parallelDispatcher.effect";
import { EntityRedactor, type RedactOptions, type RedactionResult, type RedactionStats } from "./redactor";
import {
  EntityReplacer,
  type EntityReplacerDeps,
  type ReplaceOptions,
  type ReplacementResult,
  type ReplacementStats,
} from "./replacer";
import { getValidationRates, resolveOverlaps, validateSpans } from "./validator";

// ============================================================================
// RESULT TYPES
// ============================================================================

export type ExtractionMethod = "parallel" | "multi-pass" | "none";

export interface ProcessingInfo {
  readonly textLength: number;
  readonly processingTimeMs: number;
  readonly methodUsed: ExtractionMethod;
  readonly passesCompleted: number;
  readonly stopReason?: StopReason;
  readonly chunkCount?: number;
  readonly failedChunks?: number;
  readonly rawEntities: number;
  readonly entitiesFound: number;
  readonly mergeApplied: boolean;
  readonly cacheUsed: boolean;
  readonly validationApplied: boolean;
  readonly overlapResolutionApplied: boolean;
  readonly validationStats?: ValidationRates;
  readonly mergeStats?: MergeStats;
  readonly cacheStats?: ExtractionCacheStats;
  readonly minConfidenceUsed: number;
  readonly labelsProcessed: ReadonlyArray<string>;
  readonly wordCount: number;
  readonly autoParallelTriggered: boolean;
  readonly warnings: ServiceErrorJSON[];
  readonly error?: string;
}

export interface ExtractionResult {
  readonly version: typeof RESULT_VERSION;
  readonly entities: Span[];
  readonly processingInfo: ProcessingInfo;
}

export type ExtractOptions = Partial<ExtractionConfig>;

export interface RedactionOutcome extends RedactionResult {
  readonly version: typeof RESULT_VERSION;
  readonly entities: Span[];
  readonly processingInfo: ProcessingInfo;
}

export interface ReplacementOutcome extends ReplacementResult {
  readonly version: typeof RESULT_VERSION;
  readonly entities: Span[];
  readonly processingInfo: ProcessingInfo;
}

export interface BatchRedactionOutcome {
  readonly version: typeof RESULT_VERSION;
  readonly results: RedactionOutcome[];
}

export interface RedactCallOptions {
  readonly extraction?: ExtractOptions;
  readonly redaction?: RedactOptions;
}

export interface ReplaceCallOptions {
  readonly extraction?: ExtractOptions;
  readonly replacement?: ReplaceOptions;
}

export interface SystemInfo {
  readonly version: typeof RESULT_VERSION;
  readonly labeler: LabelerInfo;
  readonly config: AnonymizerConfig;
  readonly cacheStats: ExtractionCacheStats;
  readonly redactionStats: RedactionStats;
  readonly replacementStats: ReplacementStats;
}

// ============================================================================
// SERVICE
// ============================================================================

export interface Anonymizer {
  readonly config: AnonymizerConfig;
  readonly extract: (text: string, options?: ExtractOptions) => Effect.Effect<ExtractionResult, ConfigurationError>;
  readonly redact: (text: string, options?: RedactCallOptions) => Effect.Effect<RedactionOutcome, ConfigurationError>;
  readonly replace: (
    text: string,
    options?: ReplaceCallOptions
  ) => Effect.Effect<ReplacementOutcome, ConfigurationError>;
  readonly replaceWithData: (
    text: string,
    userValues: UserValues,
    options?: ReplaceCallOptions
  ) => Effect.Effect<ReplacementOutcome, ConfigurationError | InputError>;
  readonly redactBatch: (
    texts: ReadonlyArray<string>,
    options?: RedactCallOptions
  ) => Effect.Effect<BatchRedactionOutcome, ConfigurationError | InputError>;
  readonly systemInfo: () => Effect.Effect<SystemInfo>;
  readonly clearCache: () => Effect.Effect<void>;
}

export const Anonymizer = Context.GenericTag<Anonymizer>("Anonymizer");

const sameThresholds = (a: ExtractionConfig, b: ExtractionConfig): boolean =>
  a.passThresholds.first === b.passThresholds.first &&
  a.passThresholds.subsequent === b.passThresholds.subsequent;

const emptyExtraction = (text: string, config: ExtractionConfig, warnings: ServiceErrorJSON[]): ExtractionResult => ({
  version: RESULT_VERSION,
  entities: [],
  processingInfo: {
    textLength: text.length,
    processingTimeMs: 0,
    methodUsed: "none",
    passesCompleted: 0,
    rawEntities: 0,
    entitiesFound: 0,
    mergeApplied: false,
    cacheUsed: false,
    validationApplied: false,
    overlapResolutionApplied: false,
    minConfidenceUsed: config.minConfidence,
    labelsProcessed: config.labels,
    wordCount: 0,
    autoParallelTriggered: false,
    warnings,
    error: "Empty or invalid input text",
  },
});

/**
 * Build an anonymizer context. Fails with ConfigurationError when the
 * merged configuration does not decode or the replacement locale is unknown.
 */
export const makeAnonymizer = (
  overrides: AnonymizerConfigInput = {},
  deps: EntityReplacerDeps = {}
): Effect.Effect<Anonymizer, ConfigurationError, Labeler | Scope.Scope> =>
  Effect.gen(function* (_) {
    const config = yield* _(resolveAnonymizerConfig(overrides));
    const labeler = yield* _(Labeler);
    const replacer = yield* _(EntityReplacer.make(config.replacement, deps));
    const redactor = new EntityRedactor(config.redaction);

    const cache: ExtractionCache<MultiPassResult> = yield* _(
      makeExtractionCache(config.extraction.cacheSize, (text, labels, maxPasses) =>
        extractMultiPass(text, labels, { maxPasses, thresholds: config.extraction.passThresholds })
      )
    );

    yield* _(
      Effect.addFinalizer(() =>
        Effect.gen(function* (_) {
          yield* _(cache.clear());
          redactor.clearHistory();
          replacer.clearCache();
          yield* _(Effect.logDebug("Anonymizer released, caches cleared"));
        })
      )
    );

    const runMultiPass = (text: string, options: ExtractionConfig, cacheUsed: boolean) =>
      Effect.gen(function* (_) {
        if (!cacheUsed) {
          return yield* _(
            extractMultiPass(text, options.labels, {
              maxPasses: options.maxPasses,
              thresholds: options.passThresholds,
            }).pipe(Effect.provideService(Labeler, labeler))
          );
        }
        const result = yield* _(cache.get(text, options.labels, options.maxPasses));
        if (result.stopReason === "labeler_error") {
          yield* _(cache.invalidate(text, options.labels, options.maxPasses));
        }
        return result;
      });

    const extract = (text: string, options: ExtractOptions = {}) =>
      Effect.gen(function* (_) {
        const resolved = yield* _(resolveExtractionConfig(config.extraction, options));
        const errors = new ErrorCollector();

        if (!text || text.trim().length === 0) {
          const error = new InputError({ message: "Empty or invalid input text", operation: "extract" });
          errors.add(error);
          yield* _(Effect.logWarning(error.message).pipe(Effect.annotateLogs({ operation: error.operation })));
          return emptyExtraction(text, resolved, errors.toJSON());
        }

        const startedAt = yield* _(Clock.currentTimeMillis);
        const parallel = shouldUseParallel(text, resolved.chunkSize, resolved.useParallel);
        const cacheUsed = !parallel && resolved.useCache && sameThresholds(resolved, config.extraction);

        yield* _(
          Effect.logInfo("Starting extraction").pipe(
            Effect.annotateLogs({
              textLength: text.length,
              labels: resolved.labels.join(","),
              method: parallel ? "parallel" : "multi-pass",
            })
          )
        );

        let raw: ReadonlyArray<Span>;
        let passesCompleted: number;
        let stopReason: StopReason | undefined;
        let chunkCount: number | undefined;
        let failedChunks: number | undefined;

        if (parallel) {
          const dispatched = yield* _(
            dispatchParallel(text, {
              maxWordsPerChunk: resolved.chunkSize,
              workerCount: resolved.workerCount,
              labels: resolved.labels,
              threshold: resolved.minConfidence,
            }).pipe(Effect.provideService(Labeler, labeler))
          );
          errors.addAll(dispatched.failedChunks);
          raw = dispatched.spans;
          passesCompleted = 1;
          chunkCount = dispatched.chunkCount;
          failedChunks = dispatched.failedChunks.length;
        } else {
          const multiPass = yield* _(runMultiPass(text, resolved, cacheUsed));
          if (multiPass.error) errors.add(multiPass.error);
          raw = multiPass.spans;
          passesCompleted = multiPass.passesCompleted;
          stopReason = multiPass.stopReason;
        }

        let entities: Span[] = [...raw];
        let validationStats: ValidationRates | undefined;
        if (resolved.enableValidation && entities.length > 0) {
          const validated = validateSpans(entities, text, {
            minConfidence: resolved.minConfidence,
            maxSpanLength: resolved.maxSpanLength,
            strict: resolved.strictValidation,
          });
          errors.addAll(validated.rejections);
          validationStats = getValidationRates(validated.stats);
          entities = resolved.resolveOverlaps
            ? resolveOverlaps(validated.spans, resolved.overlapStrategy)
            : validated.spans;
        }

        let mergeStats: MergeStats | undefined;
        if (resolved.mergeEntities && entities.length > 0) {
          const merged = mergeAdjacent(entities, text, { maxGap: resolved.maxGap });
          entities = merged.spans;
          mergeStats = merged.stats;
        }

        const cacheStats = resolved.useCache ? yield* _(cache.stats()) : undefined;
        const finishedAt = yield* _(Clock.currentTimeMillis);

        yield* _(
          Effect.logInfo("Extraction complete").pipe(
            Effect.annotateLogs({
              entities: entities.length,
              passesCompleted,
              warnings: errors.count(),
              durationMs: finishedAt - startedAt,
            })
          )
        );

        const processingInfo: ProcessingInfo = {
          textLength: text.length,
          processingTimeMs: finishedAt - startedAt,
          methodUsed: parallel ? "parallel" : "multi-pass",
          passesCompleted,
          ...(stopReason !== undefined ? { stopReason } : {}),
          ...(chunkCount !== undefined ? { chunkCount } : {}),
          ...(failedChunks !== undefined ? { failedChunks } : {}),
          rawEntities: raw.length,
          entitiesFound: entities.length,
          mergeApplied: resolved.mergeEntities,
          cacheUsed,
          validationApplied: resolved.enableValidation,
          overlapResolutionApplied: resolved.enableValidation && resolved.resolveOverlaps,
          ...(validationStats ? { validationStats } : {}),
          ...(mergeStats ? { mergeStats } : {}),
          ...(cacheStats ? { cacheStats } : {}),
          minConfidenceUsed: resolved.minConfidence,
          labelsProcessed: resolved.labels,
          wordCount: countWords(text),
          autoParallelTriggered: parallel,
          warnings: errors.toJSON(),
        };

        return { version: RESULT_VERSION, entities, processingInfo } satisfies ExtractionResult;
      });

    const redact = (text: string, options: RedactCallOptions = {}) =>
      Effect.gen(function* (_) {
        const extraction = yield* _(extract(text, options.extraction));
        const redaction = redactor.redact(text, extraction.entities, options.redaction);
        return {
          ...redaction,
          version: RESULT_VERSION,
          entities: extraction.entities,
          processingInfo: extraction.processingInfo,
        } satisfies RedactionOutcome;
      });

    const replace = (text: string, options: ReplaceCallOptions = {}) =>
      Effect.gen(function* (_) {
        const extraction = yield* _(extract(text, options.extraction));
        const replacement = replacer.replace(text, extraction.entities, options.replacement);
        return {
          ...replacement,
          version: RESULT_VERSION,
          entities: extraction.entities,
          processingInfo: extraction.processingInfo,
        } satisfies ReplacementOutcome;
      });

    const replaceWithData = (text: string, userValues: UserValues, options: ReplaceCallOptions = {}) =>
      Effect.gen(function* (_) {
        if (Object.keys(userValues).length === 0) {
          return yield* _(
            Effect.fail(
              new InputError({ message: "At least one label must have user values", operation: "replaceWithData" })
            )
          );
        }
        const extraction = yield* _(extract(text, options.extraction));
        const replacement = replacer.replaceWithUserData(text, extraction.entities, userValues, {
          ensureConsistency: options.replacement?.ensureConsistency,
        });
        return {
          ...replacement,
          version: RESULT_VERSION,
          entities: extraction.entities,
          processingInfo: extraction.processingInfo,
        } satisfies ReplacementOutcome;
      });

    const redactBatch = (texts: ReadonlyArray<string>, options: RedactCallOptions = {}) =>
      Effect.gen(function* (_) {
        const extractions = yield* _(Effect.forEach(texts, (text) => extract(text, options.extraction)));
        const redactions = yield* _(
          redactor.batchRedact(
            texts,
            extractions.map((e) => e.entities),
            options.redaction
          )
        );
        const results = redactions.map(
          (redaction, i): RedactionOutcome => ({
            ...redaction,
            version: RESULT_VERSION,
            entities: extractions[i].entities,
            processingInfo: extractions[i].processingInfo,
          })
        );
        return { version: RESULT_VERSION, results } satisfies BatchRedactionOutcome;
      });

    const systemInfo = () =>
      Effect.gen(function* (_) {
        const cacheStats = yield* _(cache.stats());
        return {
          version: RESULT_VERSION,
          labeler: labeler.describe(),
          config,
          cacheStats,
          redactionStats: redactor.getRedactionStats(),
          replacementStats: replacer.getReplacementStats(),
        } satisfies SystemInfo;
      });

    const clearCache = () =>
      Effect.gen(function* (_) {
        yield* _(cache.clear());
        yield* _(Effect.logInfo("Extraction cache cleared"));
      });

    return Anonymizer.of({
      config,
      extract,
      redact,
      replace,
      replaceWithData,
      redactBatch,
      systemInfo,
      clearCache,
    });
  });

/**
 * Scoped layer over any Labeler layer the caller provides.
 */
export const AnonymizerLive = (
  overrides: AnonymizerConfigInput = {},
  deps: EntityReplacerDeps = {}
): Layer.Layer<Anonymizer, ConfigurationError, Labeler> => Layer.scoped(Anonymizer, makeAnonymizer(overrides, deps));

/**
 * Anonymizer backed by the bundled lexicon labeler.
 */
export const AnonymizerDefault = (
  overrides: AnonymizerConfigInput = {},
  deps: EntityReplacerDeps = {}
): Layer.Layer<Anonymizer, ConfigurationError> =>
  AnonymizerLive(overrides, deps).pipe(Layer.provide(LexiconLabelerLive));
