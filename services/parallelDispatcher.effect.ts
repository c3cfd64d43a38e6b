/**
 * PARALLEL CHUNK DISPATCHER (Effect-TS)
 *
 * Fork-join over word-aligned chunks: one labeling task per chunk, at most
 * `workerCount` in flight. Each task shifts its spans by the chunk offset.
 * A failed task is recorded as a ChunkFailure and contributes nothing;
 * it never cancels its siblings.
 */

import { Effect, Either } from "effect";
import type { ParallelMode } from "../schemas/config";
import type { Chunk, Span } from "../schemas/schemas";
import { chunkText, countWords } from "./chunker";
import { ChunkFailure } from "./errors";
import { Labeler } from "./labeler";

export interface DispatchOptions {
  readonly maxWordsPerChunk: number;
  readonly workerCount: number;
  readonly labels: ReadonlyArray<string>;
  readonly threshold: number;
}

export interface DispatchResult {
  readonly spans: ReadonlyArray<Span>;
  readonly chunkCount: number;
  readonly succeededChunks: number;
  readonly failedChunks: ReadonlyArray<ChunkFailure>;
}

/**
 * "auto": parallel only when the text does not fit in one chunk.
 */
export const shouldUseParallel = (text: string, chunkSize: number, mode: ParallelMode = "auto"): boolean =>
  mode === "auto" ? countWords(text) > chunkSize : mode;

const labelChunk = (
  labeler: Labeler,
  chunk: Chunk,
  index: number,
  options: DispatchOptions
): Effect.Effect<Either.Either<Span[], ChunkFailure>> =>
  labeler.label(chunk.text, options.labels, options.threshold).pipe(
    Effect.map((spans) =>
      spans.map(
        (span): Span => ({
          label: span.label,
          text: chunk.text.slice(span.start, span.end),
          start: span.start + chunk.offset,
          end: span.end + chunk.offset,
          score: span.score,
        })
      )
    ),
    Effect.mapError(
      (error) => new ChunkFailure({ chunkIndex: index, offset: chunk.offset, reason: error.message })
    ),
    Effect.either
  );

/**
 * Label every chunk with bounded concurrency and merge the results.
 *
 * Output is sorted by start; the sort is stable so chunk order breaks ties.
 */
export const dispatchParallel = (
  text: string,
  options: DispatchOptions
): Effect.Effect<DispatchResult, never, Labeler> =>
  Effect.gen(function* (_) {
    const chunks = chunkText(text, options.maxWordsPerChunk);
    if (chunks.length === 0) {
      return { spans: [], chunkCount: 0, succeededChunks: 0, failedChunks: [] } satisfies DispatchResult;
    }

    const labeler = yield* _(Labeler);
    const labels = options.labels.map((l) => l.toLowerCase());

    yield* _(
      Effect.logInfo("Dispatching chunks").pipe(
        Effect.annotateLogs({ chunks: chunks.length, workers: options.workerCount })
      )
    );

    const outcomes = yield* _(
      Effect.forEach(chunks, (chunk, index) => labelChunk(labeler, chunk, index, { ...options, labels }), {
        concurrency: Math.max(1, options.workerCount),
      })
    );

    const spans: Span[] = [];
    const failedChunks: ChunkFailure[] = [];
    for (const outcome of outcomes) {
      if (Either.isRight(outcome)) {
        spans.push(...outcome.right);
      } else {
        failedChunks.push(outcome.left);
        yield* _(
          Effect.logWarning("Chunk failed, its spans are omitted").pipe(
            Effect.annotateLogs({ chunkIndex: outcome.left.chunkIndex, offset: outcome.left.offset })
          )
        );
      }
    }

    spans.sort((a, b) => a.start - b.start);

    return {
      spans,
      chunkCount: chunks.length,
      succeededChunks: chunks.length - failedChunks.length,
      failedChunks,
    };
  });
