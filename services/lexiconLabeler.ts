/**
 * LEXICON LABELER - IN-PROCESS DEFAULT LABELER
 *
 * Labels text from a JSON lexicon of regex patterns and term lists, each
 * entry scored. The lexicon is read and Schema-validated when the layer is
 * built; a missing or malformed lexicon is a ConfigurationError.
 *
 * Model-backed labelers plug in through makeLabelerLayer instead.
 */

import { readFile } from "node:fs/promises";
import { Effect, Either, Layer, ParseResult, Schema as S, pipe } from "effect";
import type { LabeledSpan } from "../schemas/schemas";
import { ConfigurationError, describeCause } from "./errors";
import { Labeler } from "./labeler";

// ============================================================================
// LEXICON SCHEMA
// ============================================================================

const NonEmptyString = pipe(S.String, S.minLength(1));
const Score = pipe(S.Number, S.greaterThanOrEqualTo(0), S.lessThanOrEqualTo(1));

const PatternEntrySchema = S.Struct({
  label: NonEmptyString,
  kind: S.Literal("pattern"),
  pattern: NonEmptyString,
  flags: S.optional(S.String),
  score: Score,
});

const TermsEntrySchema = S.Struct({
  label: NonEmptyString,
  kind: S.Literal("terms"),
  terms: pipe(S.Array(NonEmptyString), S.minItems(1)),
  caseSensitive: S.optional(S.Boolean),
  score: Score,
});

export const LexiconSchema = S.Struct({
  name: NonEmptyString,
  entries: S.Array(S.Union(PatternEntrySchema, TermsEntrySchema)),
});
export type Lexicon = S.Schema.Type<typeof LexiconSchema>;
type LexiconEntry = Lexicon["entries"][number];

export const DEFAULT_LEXICON_URL = new URL("../data/lexicon.json", import.meta.url);

// ============================================================================
// COMPILATION
// ============================================================================

interface CompiledEntry {
  readonly label: string;
  readonly score: number;
  readonly regex: RegExp;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const entrySource = (entry: LexiconEntry): { source: string; flags: string } => {
  if (entry.kind === "pattern") {
    const flags = entry.flags ?? "";
    return { source: entry.pattern, flags: flags.includes("g") ? flags : `${flags}g` };
  }
  // Longest first so "New York" wins over a shorter prefix term.
  const alternation = [...entry.terms]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join("|");
  return { source: `\\b(?:${alternation})\\b`, flags: entry.caseSensitive === false ? "gi" : "g" };
};

const compileEntry = (entry: LexiconEntry, index: number): Either.Either<CompiledEntry, ConfigurationError> => {
  const { source, flags } = entrySource(entry);
  return Either.try({
    try: () => ({ label: entry.label.toLowerCase(), score: entry.score, regex: new RegExp(source, flags) }),
    catch: (cause) =>
      new ConfigurationError({
        message: `Lexicon entry ${index} (${entry.label}) has an invalid pattern: ${describeCause(cause)}`,
        field: `entries.${index}`,
        suggestion: "Fix the regular expression in the lexicon file",
        cause,
      }),
  });
};

// ============================================================================
// LABELER
// ============================================================================

const labelWith = (
  compiled: ReadonlyArray<CompiledEntry>,
  text: string,
  labels: ReadonlyArray<string>,
  threshold: number
): LabeledSpan[] => {
  const wanted = new Set(labels.map((l) => l.toLowerCase()));
  const best = new Map<string, LabeledSpan>();

  for (const entry of compiled) {
    if (!wanted.has(entry.label) || entry.score < threshold) continue;

    for (const match of text.matchAll(entry.regex)) {
      if (match[0].length === 0) continue;
      const start = match.index ?? 0;
      const end = start + match[0].length;
      const key = `${start}:${end}:${entry.label}`;
      const existing = best.get(key);
      if (!existing || existing.score < entry.score) {
        best.set(key, { start, end, label: entry.label, score: entry.score, text: match[0] });
      }
    }
  }

  return [...best.values()].sort((a, b) => a.start - b.start || a.end - b.end);
};

/**
 * Build a Labeler from an already decoded lexicon.
 */
export const makeLexiconLabeler = (lexicon: Lexicon): Effect.Effect<Labeler, ConfigurationError> =>
  Effect.gen(function* (_) {
    const compiled = yield* _(Effect.all(lexicon.entries.map((entry, i) => compileEntry(entry, i))));
    const labels = [...new Set(compiled.map((c) => c.label))];

    return Labeler.of({
      label: (text, requested, threshold) => Effect.sync(() => labelWith(compiled, text, requested, threshold)),
      describe: () => ({ name: lexicon.name, kind: "lexicon", labels }),
    });
  });

/**
 * Decode a parsed JSON value as a lexicon.
 */
export const decodeLexicon = (input: unknown): Either.Either<Lexicon, ConfigurationError> =>
  pipe(
    S.decodeUnknownEither(LexiconSchema)(input),
    Either.mapLeft(
      (error) =>
        new ConfigurationError({
          message: `Malformed lexicon: ${ParseResult.TreeFormatter.formatErrorSync(error)}`,
          field: "lexicon",
          suggestion: "Each entry needs label, kind (pattern|terms), score and a pattern or terms list",
          cause: error,
        })
    )
  );

/**
 * Read, parse and decode a lexicon file.
 */
export const loadLexicon = (location: string | URL = DEFAULT_LEXICON_URL): Effect.Effect<Lexicon, ConfigurationError> =>
  Effect.gen(function* (_) {
    const raw = yield* _(
      Effect.tryPromise({
        try: () => readFile(location, "utf8"),
        catch: (cause) =>
          new ConfigurationError({
            message: `Lexicon could not be read from ${String(location)}: ${describeCause(cause)}`,
            field: "lexicon",
            suggestion: "Check that the lexicon file exists and is readable",
            cause,
          }),
      })
    );

    const parsed = yield* _(
      Either.try({
        try: (): unknown => JSON.parse(raw),
        catch: (cause) =>
          new ConfigurationError({
            message: `Lexicon is not valid JSON: ${describeCause(cause)}`,
            field: "lexicon",
            suggestion: "Fix the JSON syntax of the lexicon file",
            cause,
          }),
      })
    );

    return yield* _(decodeLexicon(parsed));
  });

/**
 * Labeler layer backed by a lexicon file.
 */
export const lexiconLabelerLayer = (location: string | URL = DEFAULT_LEXICON_URL): Layer.Layer<Labeler, ConfigurationError> =>
  Layer.effect(Labeler, pipe(loadLexicon(location), Effect.flatMap(makeLexiconLabeler)));

/**
 * Default Live labeler
 */
export const LexiconLabelerLive = lexiconLabelerLayer();
