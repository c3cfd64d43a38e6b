/**
 * SERVICE-LEVEL ERROR SYSTEM (Effect-TS)
 *
 * Errors are values, not exceptions. Composable, type-safe, structured.
 *
 * Philosophy:
 * - Errors are part of the type signature (Effect<A, E, R>)
 * - Per-chunk, per-span and per-strategy failures are recorded, never thrown
 * - Only configuration problems surface as fatal errors
 * - Original entity text never goes into an error payload
 */

import { Data } from "effect";
import type { RejectionReason } from "../schemas/schemas";

/**
 * INPUT ERROR - Empty or blank input text, or mismatched batch input
 *
 * Non-fatal: the pipeline short-circuits to an empty result.
 */
export class InputError extends Data.TaggedError("InputError")<{
  readonly message: string;
  readonly operation: string;
}> {
  get recoverable(): boolean {
    return true;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      operation: this.operation,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CONFIGURATION ERROR - Malformed options or a missing labeler resource
 *
 * Raised while constructing the pipeline. Nothing can run without it fixed.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly field: string;
  readonly suggestion: string;
  readonly cause?: unknown;
}> {
  get recoverable(): boolean {
    return false;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      field: this.field,
      suggestion: this.suggestion,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * LABELER ERROR - A labeling call failed
 */
export class LabelerError extends Data.TaggedError("LabelerError")<{
  readonly message: string;
  readonly labelerName: string;
  readonly textLength: number;
  readonly cause?: unknown;
}> {
  get recoverable(): boolean {
    return true;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      labelerName: this.labelerName,
      textLength: this.textLength,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * CHUNK FAILURE - One parallel task failed
 *
 * Isolated: its spans are left out, sibling chunks carry on.
 */
export class ChunkFailure extends Data.TaggedError("ChunkFailure")<{
  readonly chunkIndex: number;
  readonly offset: number;
  readonly reason: string;
}> {
  get recoverable(): boolean {
    return true;
  }

  get message(): string {
    return `Chunk ${this.chunkIndex} at offset ${this.offset} failed: ${this.reason}`;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      chunkIndex: this.chunkIndex,
      offset: this.offset,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * VALIDATION FAILURE - A span failed the confidence, position or text check
 */
export class ValidationFailure extends Data.TaggedError("ValidationFailure")<{
  readonly reason: RejectionReason;
  readonly label: string;
  readonly start: number;
  readonly end: number;
  readonly score: number;
}> {
  get recoverable(): boolean {
    return true;
  }

  get message(): string {
    return `Span ${this.label}[${this.start},${this.end}) rejected: ${this.reason}`;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      reason: this.reason,
      label: this.label,
      start: this.start,
      end: this.end,
      score: this.score,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * STRATEGY FAILURE - A replacement strategy threw
 *
 * The replacer falls through to the next candidate strategy.
 */
export class StrategyFailure extends Data.TaggedError("StrategyFailure")<{
  readonly strategy: string;
  readonly label: string;
  readonly reason: string;
}> {
  get recoverable(): boolean {
    return true;
  }

  get message(): string {
    return `Strategy "${this.strategy}" failed for label ${this.label}: ${this.reason}`;
  }

  toJSON() {
    return {
      _tag: this._tag,
      message: this.message,
      strategy: this.strategy,
      label: this.label,
      reason: this.reason,
      recoverable: this.recoverable,
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Union of all service errors (for type safety)
 */
export type ServiceError =
  | InputError
  | ConfigurationError
  | LabelerError
  | ChunkFailure
  | ValidationFailure
  | StrategyFailure;

export type ServiceErrorJSON = ReturnType<ServiceError["toJSON"]>;

/**
 * Error Collector (for accumulating errors during one run)
 *
 * Used when processing continues despite errors (graceful degradation)
 */
export class ErrorCollector {
  private errors: ServiceError[] = [];

  add(error: ServiceError): void {
    this.errors.push(error);
  }

  addAll(errors: ReadonlyArray<ServiceError>): void {
    this.errors.push(...errors);
  }

  getAll(): ServiceError[] {
    return [...this.errors];
  }

  count(): number {
    return this.errors.length;
  }

  countByTag(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const error of this.errors) {
      counts[error._tag] = (counts[error._tag] ?? 0) + 1;
    }
    return counts;
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  hasUnrecoverableErrors(): boolean {
    return this.errors.some((e) => !e.recoverable);
  }

  clear(): void {
    this.errors = [];
  }

  toJSON(): ServiceErrorJSON[] {
    return this.errors.map((e) => e.toJSON());
  }
}

/**
 * Render an unknown thrown value as a short reason string
 */
export const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
