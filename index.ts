/**
 * Public entry point.
 *
 * Effect users provide `AnonymizerLive(config)` over their own `Labeler`
 * layer (or `AnonymizerDefault(config)` for the bundled lexicon) and use the
 * `Anonymizer` tag. Promise users call `withAnonymizer`.
 */

import { Effect } from "effect";
import type { AnonymizerConfigInput } from "./schemas/config";
import { Anonymizer, AnonymizerDefault } from "./services/anonymizer.effect";
import type { EntityReplacerDeps } from "./services/replacer";
import { runPromiseOrThrow } from "./services/runtime";

/**
 * Run `use` against a fresh anonymizer backed by the bundled lexicon.
 * The context is released, and its caches cleared, when the promise settles.
 *
 * @example
 * const result = await withAnonymizer({}, (a) => a.redact("John Smith lives in Paris."));
 */
export const withAnonymizer = <A, E>(
  config: AnonymizerConfigInput,
  use: (anonymizer: Anonymizer) => Effect.Effect<A, E>,
  deps: EntityReplacerDeps = {}
): Promise<A> =>
  runPromiseOrThrow(Effect.flatMap(Anonymizer, use).pipe(Effect.provide(AnonymizerDefault(config, deps))));

export {
  Anonymizer,
  AnonymizerDefault,
  AnonymizerLive,
  makeAnonymizer,
  type BatchRedactionOutcome,
  type ExtractOptions,
  type ExtractionMethod,
  type ExtractionResult,
  type ProcessingInfo,
  type RedactCallOptions,
  type RedactionOutcome,
  type ReplaceCallOptions,
  type ReplacementOutcome,
  type SystemInfo,
} from "./services/anonymizer.effect";
export { Labeler, fromImplementation, makeLabelerLayer, type LabelerImplementation, type LabelerInfo } from "./services/labeler";
export {
  LexiconLabelerLive,
  lexiconLabelerLayer,
  loadLexicon,
  makeLexiconLabeler,
  type Lexicon,
} from "./services/lexiconLabeler";
export {
  ChunkFailure,
  ConfigurationError,
  ErrorCollector,
  InputError,
  LabelerError,
  StrategyFailure,
  ValidationFailure,
  type ServiceError,
} from "./services/errors";
export { runPromise, runPromiseOrThrow, runSync, AppLayer } from "./services/runtime";
export { chunkText, countWords, estimateChunkCount, getChunkInfo, validateChunks } from "./services/chunker";
export { extractMultiPass, type MultiPassOptions, type MultiPassResult } from "./services/multiPassExtractor.effect";
export { dispatchParallel, shouldUseParallel } from "./services/parallelDispatcher.effect";
export { makeExtractionCache, type ExtractionCacheStats } from "./services/extractionCache.effect";
export { detectOverlaps, getValidationRates, resolveOverlaps, validateSpans } from "./services/validator";
export { mergeAdjacent, getMergeStats } from "./services/merger";
export { EntityRedactor, type RedactOptions, type RedactionResult } from "./services/redactor";
export { EntityReplacer, type ReplaceOptions, type ReplacementResult } from "./services/replacer";
export { makeFakerGenerator, type SyntheticGenerator } from "./services/syntheticGenerator";
export { reidentify, extractPlaceholders, type AnonymizedText } from "./schemas/anonymized";
export * from "./schemas/schemas";
export {
  DEFAULT_ANONYMIZER_CONFIG,
  type AnonymizerConfig,
  type AnonymizerConfigInput,
  type ExtractionConfig,
  type RedactionConfig,
  type ReplacementConfig,
} from "./schemas/config";
