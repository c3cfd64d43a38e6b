/**
 * EFFECT RUNTIME - CENTRALIZED RUNTIME CONFIGURATION
 *
 * Provides a unified way to run pipeline Effects with:
 * - Structured JSON logging (annotations redacted like appLogger)
 * - Minimum log level from ANONYMIZER_LOG_LEVEL
 * - Result-object helpers so callers never see a rejected promise
 *
 * OCaml equivalent:
 * module Runtime : sig
 *   val run_promise : 'a Effect.t -> ('a, error) result Promise.t
 *   val run_sync : 'a Effect.t -> 'a
 * end
 */

import { Effect, HashMap, Layer, Logger, LogLevel } from "effect";
import { redactLogValue } from "./appLogger";

// ============================================================================
// RUNTIME CONFIGURATION
// ============================================================================

/**
 * Structured logger. Annotations are flattened into the entry and run
 * through the same redaction as appLogger, so entity text stays out.
 */
const AppLogger = Logger.make(({ logLevel, message, annotations }) => {
  const logEntry = {
    timestamp: new Date().toISOString(),
    level: logLevel.label,
    message: redactLogValue(Array.isArray(message) && message.length === 1 ? message[0] : message),
    ...(HashMap.size(annotations) > 0
      ? { annotations: redactLogValue(Object.fromEntries(HashMap.toEntries(annotations))) }
      : {}),
  };

  if (logLevel.label === "ERROR" || logLevel.label === "FATAL") {
    console.error(JSON.stringify(logEntry));
  } else if (logLevel.label === "WARN") {
    console.warn(JSON.stringify(logEntry));
  } else if (logLevel.label === "INFO") {
    console.info(JSON.stringify(logEntry));
  } else {
    console.log(JSON.stringify(logEntry));
  }
});

/**
 * Resolve the minimum log level.
 *
 * Accepts either the tag ("Warning") or the label ("WARN"), any case.
 * Falls back to Info, or Warning when NODE_ENV=production.
 */
export const resolveLogLevel = (configured?: string, nodeEnv?: string): LogLevel.LogLevel => {
  if (configured) {
    const wanted = configured.trim().toUpperCase();
    const match = LogLevel.allLevels.find(
      (level) => level.label === wanted || level._tag.toUpperCase() === wanted
    );
    if (match) return match;
  }
  return nodeEnv === "production" ? LogLevel.Warning : LogLevel.Info;
};

/**
 * Base runtime layer: custom logger + level filter
 */
const AppLayer = Layer.merge(
  Logger.replace(Logger.defaultLogger, AppLogger),
  Logger.minimumLogLevel(resolveLogLevel(process.env.ANONYMIZER_LOG_LEVEL, process.env.NODE_ENV))
);

// ============================================================================
// RUNTIME HELPERS
// ============================================================================

export type RunResult<A, E> = { success: true; data: A } | { success: false; error: E };

/**
 * Run Effect as Promise with error handling
 *
 * @example
 * const result = await runPromise(anonymizer.redact(text));
 * if (result.success) {
 *   console.log(result.data.anonymizedText);
 * } else {
 *   console.error(result.error.toJSON());
 * }
 */
export const runPromise = <A, E>(effect: Effect.Effect<A, E, never>): Promise<RunResult<A, E>> => {
  return Effect.runPromise(
    effect.pipe(
      Effect.provide(AppLayer),
      Effect.map((data) => ({ success: true as const, data })),
      Effect.catchAll((error) => Effect.succeed({ success: false as const, error }))
    )
  );
};

/**
 * Run Effect as Promise, rejecting when it fails
 */
export const runPromiseOrThrow = <A, E>(effect: Effect.Effect<A, E, never>): Promise<A> => {
  return Effect.runPromise(effect.pipe(Effect.provide(AppLayer)));
};

/**
 * Run Effect synchronously (for pure computations)
 *
 * CAUTION: Will throw if the Effect is asynchronous
 */
export const runSync = <A>(effect: Effect.Effect<A, never, never>): A => {
  return Effect.runSync(effect.pipe(Effect.provide(AppLayer)));
};

export { AppLayer, AppLogger };
