/**
 * MULTI-PASS MASKING EXTRACTOR (Effect-TS)
 *
 * Runs the Labeler repeatedly over a working copy of the text. Pass 0 uses a
 * strict threshold, later passes a looser one. After each pass the newly
 * found spans are overwritten with blanks of the same length, so later
 * passes cannot re-detect them and every offset stays valid for the
 * original text.
 *
 * OCaml equivalent:
 * type stop_reason = Max_passes | No_new_spans | Labeler_error
 * val extract_multi_pass : string -> string list -> options -> (result, never, labeler) Effect.t
 */

import { Effect, Either } from "effect";
import type { PassThresholds } from "../schemas/config";
import type { Span } from "../schemas/schemas";
import type { LabelerError } from "./errors";
import { Labeler } from "./labeler";

export type StopReason = "max_passes" | "no_new_spans" | "labeler_error";

export interface MultiPassOptions {
  readonly maxPasses: number;
  readonly thresholds: PassThresholds;
}

export interface MultiPassResult {
  readonly spans: ReadonlyArray<Span>;
  /** Labeler calls that returned successfully */
  readonly passesCompleted: number;
  readonly stopReason: StopReason;
  readonly error?: LabelerError;
}

export const DEFAULT_MULTI_PASS_OPTIONS: MultiPassOptions = {
  maxPasses: 2,
  thresholds: { first: 0.5, subsequent: 0.3 },
};

export const thresholdForPass = (pass: number, thresholds: PassThresholds): number =>
  pass === 0 ? thresholds.first : thresholds.subsequent;

/**
 * Extract spans with iterative masking.
 *
 * A failing Labeler call ends the loop; spans from earlier passes are kept.
 */
export const extractMultiPass = (
  text: string,
  labels: ReadonlyArray<string>,
  options: MultiPassOptions = DEFAULT_MULTI_PASS_OPTIONS
): Effect.Effect<MultiPassResult, never, Labeler> =>
  Effect.gen(function* (_) {
    if (!text || text.trim().length === 0) {
      return { spans: [], passesCompleted: 0, stopReason: "no_new_spans" } satisfies MultiPassResult;
    }

    const labeler = yield* _(Labeler);
    const processedLabels = labels.map((l) => l.toLowerCase());

    const working = text.split("");
    const seen = new Set<string>();
    const found: Span[] = [];
    let passesCompleted = 0;
    let stopReason: StopReason = "max_passes";
    let failure: LabelerError | undefined;

    for (let pass = 0; pass < options.maxPasses; pass++) {
      const threshold = thresholdForPass(pass, options.thresholds);
      const outcome = yield* _(Effect.either(labeler.label(working.join(""), processedLabels, threshold)));

      if (Either.isLeft(outcome)) {
        failure = outcome.left;
        stopReason = "labeler_error";
        yield* _(
          Effect.logWarning("Labeler failed, keeping spans from earlier passes").pipe(
            Effect.annotateLogs({ pass: pass + 1, error: outcome.left.message })
          )
        );
        break;
      }
      passesCompleted++;

      const fresh = outcome.right.filter((span) => {
        const key = `${span.start}:${span.end}`;
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });

      yield* _(
        Effect.logDebug("Pass finished").pipe(
          Effect.annotateLogs({ pass: pass + 1, threshold, returned: outcome.right.length, fresh: fresh.length })
        )
      );

      if (fresh.length === 0) {
        stopReason = "no_new_spans";
        break;
      }

      for (const span of fresh) {
        found.push({
          label: span.label,
          text: text.slice(span.start, span.end),
          start: span.start,
          end: span.end,
          score: span.score,
        });
        for (let i = Math.max(0, span.start); i < Math.min(span.end, working.length); i++) {
          working[i] = " ";
        }
      }
    }

    const spans = [...found].sort((a, b) => a.start - b.start);

    yield* _(
      Effect.logInfo("Multi-pass extraction complete").pipe(
        Effect.annotateLogs({ spans: spans.length, passesCompleted, stopReason })
      )
    );

    return failure
      ? { spans, passesCompleted, stopReason, error: failure }
      : { spans, passesCompleted, stopReason };
  });
