/**
 * REPLACEMENT STRATEGY INTERFACE
 *
 * Closed set of strategies (synthetic | country | date | default) behind one
 * capability: `canHandle(label)` and `generate(span) → Option<string>`.
 * `Option.none()` means "no opinion, try the next strategy". A throw is
 * caught by the replacer and recorded as a StrategyFailure.
 */

import type { Option } from "effect";
import type { Span, StrategyName } from "../../schemas/schemas";

export interface ReplacementStrategy {
  readonly name: StrategyName;
  canHandle(label: string): boolean;
  generate(span: Span): Option.Option<string>;
}

/**
 * Uniform [0, 1) source. Injected so tests can pin the output.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Integer in [min, max] inclusive.
 */
export const randomInt = (random: RandomSource, min: number, max: number): number =>
  min + Math.floor(random() * (max - min + 1));

export const pickOne = <T>(random: RandomSource, items: ReadonlyArray<T>): T =>
  items[Math.min(items.length - 1, Math.floor(random() * items.length))];
