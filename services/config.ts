/**
 * CONFIGURATION RESOLUTION
 *
 * Merges caller overrides over the defaults and decodes the result with
 * Effect Schema. Anything that does not decode is a ConfigurationError.
 */

import { Effect, Either, ParseResult, Schema as S, pipe } from "effect";
import {
  AnonymizerConfigSchema,
  DEFAULT_ANONYMIZER_CONFIG,
  ExtractionConfigSchema,
  type AnonymizerConfig,
  type AnonymizerConfigInput,
  type ExtractionConfig,
} from "../schemas/config";
import { ConfigurationError } from "./errors";

const decodeAnonymizerConfig = S.decodeUnknownEither(AnonymizerConfigSchema);
const decodeExtractionConfig = S.decodeUnknownEither(ExtractionConfigSchema);

/**
 * Drop keys explicitly set to undefined so they fall back to defaults.
 */
const definedOnly = (overrides: object | undefined): Record<string, unknown> => {
  if (!overrides) return {};
  return Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
};

/**
 * Merge per-group overrides (no validation).
 */
export const mergeAnonymizerConfig = (overrides: AnonymizerConfigInput = {}): unknown => {
  return {
    extraction: {
      ...DEFAULT_ANONYMIZER_CONFIG.extraction,
      ...definedOnly(overrides.extraction),
      passThresholds: {
        ...DEFAULT_ANONYMIZER_CONFIG.extraction.passThresholds,
        ...definedOnly(overrides.extraction?.passThresholds),
      },
    },
    redaction: { ...DEFAULT_ANONYMIZER_CONFIG.redaction, ...definedOnly(overrides.redaction) },
    replacement: { ...DEFAULT_ANONYMIZER_CONFIG.replacement, ...definedOnly(overrides.replacement) },
  };
};

const toConfigurationError = (error: ParseResult.ParseError, prefix: string): ConfigurationError => {
  const issues = ParseResult.ArrayFormatter.formatErrorSync(error);
  const path = issues.length > 0 ? issues[0].path.map(String).join(".") : "";
  const field = [prefix, path].filter((part) => part.length > 0).join(".") || "config";

  return new ConfigurationError({
    message: `Invalid configuration: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
    field,
    suggestion: `Check the value of "${field}" against the documented option types`,
    cause: error,
  });
};

/**
 * Resolve the full pipeline configuration.
 *
 * @example
 * const config = yield* _(resolveAnonymizerConfig({ extraction: { maxPasses: 3 } }));
 */
export const resolveAnonymizerConfig = (
  overrides: AnonymizerConfigInput = {}
): Effect.Effect<AnonymizerConfig, ConfigurationError> =>
  Either.match(decodeAnonymizerConfig(mergeAnonymizerConfig(overrides)), {
    onLeft: (error) => Effect.fail(toConfigurationError(error, "")),
    onRight: (config) => Effect.succeed(config),
  });

/**
 * Apply per-call extraction options over an already resolved base.
 */
export const resolveExtractionConfig = (
  base: ExtractionConfig,
  overrides: Partial<ExtractionConfig> = {}
): Either.Either<ExtractionConfig, ConfigurationError> =>
  pipe(
    decodeExtractionConfig({ ...base, ...definedOnly(overrides) }),
    Either.mapLeft((error) => toConfigurationError(error, "extraction"))
  );
