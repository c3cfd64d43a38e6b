/**
 * EXTRACTION CACHE (Effect Cache)
 *
 * LRU-bounded cache in front of extraction, keyed by text, sorted label set
 * and pass count. Effect's Cache runs one lookup per key; concurrent gets of
 * the same key wait on that lookup instead of starting another.
 */

import { Cache, Data, Duration, Effect, Ref } from "effect";

const LABEL_SEPARATOR = "\u001f";

class ExtractionKey extends Data.Class<{
  readonly text: string;
  readonly labels: string;
  readonly maxPasses: number;
}> {}

export type CacheEfficiency = "High" | "Medium" | "Low";

export interface ExtractionCacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly size: number;
  readonly capacity: number;
  readonly totalRequests: number;
  readonly hitRatePercentage: number;
  readonly missRatePercentage: number;
  readonly efficiency: CacheEfficiency;
}

export interface ExtractionCache<A> {
  readonly get: (text: string, labels: ReadonlyArray<string>, maxPasses: number) => Effect.Effect<A>;
  /** Drop one entry, e.g. a result cut short by a labeler failure */
  readonly invalidate: (text: string, labels: ReadonlyArray<string>, maxPasses: number) => Effect.Effect<void>;
  readonly stats: () => Effect.Effect<ExtractionCacheStats>;
  readonly clear: () => Effect.Effect<void>;
}

export type ExtractionLookup<A, R> = (
  text: string,
  labels: ReadonlyArray<string>,
  maxPasses: number
) => Effect.Effect<A, never, R>;

const round2 = (value: number): number => Math.round(value * 100) / 100;

export const efficiencyBand = (hitRatePercentage: number): CacheEfficiency =>
  hitRatePercentage > 70 ? "High" : hitRatePercentage > 40 ? "Medium" : "Low";

/**
 * Canonical label set for keying: lower-cased, de-duplicated, sorted.
 */
export const normalizeLabels = (labels: ReadonlyArray<string>): string[] =>
  [...new Set(labels.map((l) => l.toLowerCase()))].sort();

export const makeExtractionCache = <A, R>(
  capacity: number,
  lookup: ExtractionLookup<A, R>
): Effect.Effect<ExtractionCache<A>, never, R> =>
  Effect.gen(function* (_) {
    const cache = yield* _(
      Cache.make({
        capacity,
        timeToLive: Duration.infinity,
        lookup: (key: ExtractionKey) => lookup(key.text, key.labels.split(LABEL_SEPARATOR), key.maxPasses),
      })
    );

    // Cache counters are cumulative; clear() moves the baseline instead.
    const baseline = yield* _(Ref.make({ hits: 0, misses: 0 }));

    const keyFor = (text: string, labels: ReadonlyArray<string>, maxPasses: number) =>
      new ExtractionKey({ text, labels: normalizeLabels(labels).join(LABEL_SEPARATOR), maxPasses });

    const get = (text: string, labels: ReadonlyArray<string>, maxPasses: number) =>
      cache.get(keyFor(text, labels, maxPasses));

    const invalidate = (text: string, labels: ReadonlyArray<string>, maxPasses: number) =>
      cache.invalidate(keyFor(text, labels, maxPasses));

    const stats = () =>
      Effect.gen(function* (_) {
        const raw = yield* _(cache.cacheStats);
        const base = yield* _(Ref.get(baseline));
        const hits = raw.hits - base.hits;
        const misses = raw.misses - base.misses;
        const totalRequests = hits + misses;
        const hitRate = totalRequests > 0 ? (hits / totalRequests) * 100 : 0;
        const missRate = totalRequests > 0 ? (misses / totalRequests) * 100 : 0;

        return {
          hits,
          misses,
          size: raw.size,
          capacity,
          totalRequests,
          hitRatePercentage: round2(hitRate),
          missRatePercentage: round2(missRate),
          efficiency: efficiencyBand(hitRate),
        } satisfies ExtractionCacheStats;
      });

    const clear = () =>
      Effect.gen(function* (_) {
        yield* _(cache.invalidateAll);
        const raw = yield* _(cache.cacheStats);
        yield* _(Ref.set(baseline, { hits: raw.hits, misses: raw.misses }));
      });

    return { get, invalidate, stats, clear };
  });
