/**
 * LABELER SERVICE - EFFECT-TS DEPENDENCY INJECTION
 *
 * The zero-shot span labeler is an external capability: given text, a set of
 * labels and a score threshold, it returns scored character spans. Pipeline
 * stages depend on the `Labeler` tag and never on a concrete model.
 *
 * OCaml equivalent:
 * module type LABELER = sig
 *   val label : string -> string list -> float -> (labeled_span list, labeler_error) result
 *   val describe : unit -> labeler_info
 * end
 */

import { Context, Effect, Layer } from "effect";
import type { LabeledSpan } from "../schemas/schemas";
import { LabelerError, describeCause } from "./errors";

export interface LabelerInfo {
  readonly name: string;
  readonly kind: string;
  readonly labels: ReadonlyArray<string>;
}

/**
 * Labeler service interface
 */
export interface Labeler {
  readonly label: (
    text: string,
    labels: ReadonlyArray<string>,
    threshold: number
  ) => Effect.Effect<ReadonlyArray<LabeledSpan>, LabelerError, never>;

  readonly describe: () => LabelerInfo;
}

/**
 * Labeler service tag (for dependency injection)
 */
export const Labeler = Context.GenericTag<Labeler>("Labeler");

/**
 * Plain (non-Effect) labeler, e.g. a wrapper around a model runtime.
 * May return synchronously or a Promise; throwing is allowed.
 */
export interface LabelerImplementation {
  readonly name: string;
  readonly kind?: string;
  readonly labels?: ReadonlyArray<string>;
  label(
    text: string,
    labels: ReadonlyArray<string>,
    threshold: number
  ): ReadonlyArray<LabeledSpan> | Promise<ReadonlyArray<LabeledSpan>>;
}

/**
 * Adapt a plain implementation to the Effect service. Thrown errors and
 * rejected promises become LabelerError.
 */
export const fromImplementation = (impl: LabelerImplementation): Labeler =>
  Labeler.of({
    label: (text, labels, threshold) =>
      Effect.tryPromise({
        try: async () => impl.label(text, labels, threshold),
        catch: (cause) =>
          new LabelerError({
            message: `Labeler "${impl.name}" failed: ${describeCause(cause)}`,
            labelerName: impl.name,
            textLength: text.length,
            cause,
          }),
      }),
    describe: () => ({
      name: impl.name,
      kind: impl.kind ?? "external",
      labels: impl.labels ?? [],
    }),
  });

export const makeLabelerLayer = (impl: LabelerImplementation): Layer.Layer<Labeler> =>
  Layer.succeed(Labeler, fromImplementation(impl));
