/**
 * ENTITY REPLACER
 *
 * Swaps spans for realistic synthetic values. Each label has an ordered
 * strategy chain; the first strategy that can handle the label and returns
 * a non-empty value different from the original wins, with the default
 * strategy as the final fallback.
 *
 * With consistency on, the instance caches (label, original) → value so
 * the same entity always gets the same replacement, across calls, until
 * clearCache().
 */

import { Either, Option } from "effect";
import { markAsAnonymized, type AnonymizedText } from "../schemas/anonymized";
import { DEFAULT_REPLACEMENT_CONFIG, type ReplacementConfig } from "../schemas/config";
import type {
  ReplacementDetail,
  ReplacementInfo,
  ReplacementMap,
  Span,
  StrategyName,
  StrategyTag,
  UserValues,
} from "../schemas/schemas";
import { appLogger } from "./appLogger";
import { type ConfigurationError, StrategyFailure, describeCause } from "./errors";
import { planSubstitutions, spliceText } from "./spanPlanning";
import { type StrategySet, makeStrategySet, strategyChainFor } from "./strategies";
import type { CountryData } from "./strategies/countryStrategy";
import { type RandomSource, defaultRandom, pickOne } from "./strategies/types";
import { type SyntheticGenerator, makeFakerGenerator } from "./syntheticGenerator";

export interface ReplacementResult {
  readonly anonymizedText: AnonymizedText;
  readonly replacements: ReplacementDetail[];
  readonly replacementInfo: ReplacementInfo;
  readonly replacementMap: ReplacementMap;
  readonly failures: StrategyFailure[];
}

export interface ReplaceOptions {
  readonly ensureConsistency?: boolean;
  readonly strategyOverrides?: Readonly<Record<string, StrategyName>>;
}

export interface ReplacementStats {
  readonly cacheSize: number;
  readonly consistencyEnabled: boolean;
  readonly locale: string;
  readonly cachedStrategies: Record<string, number>;
  readonly availableStrategies: StrategyName[];
}

export interface EntityReplacerDeps {
  readonly generator?: SyntheticGenerator;
  readonly random?: RandomSource;
  readonly countryData?: CountryData;
  readonly now?: () => Date;
}

interface CachedReplacement {
  readonly value: string;
  readonly strategy: StrategyName;
}

interface Resolved {
  readonly value: string;
  readonly tag: StrategyTag;
}

const cacheKey = (label: string, original: string): string => `${label}\u0000${original}`;

const emptyResult = (text: string, consistencyEnabled: boolean): ReplacementResult => ({
  anonymizedText: markAsAnonymized(text),
  replacements: [],
  replacementInfo: {
    entitiesProcessed: 0,
    replacementsApplied: 0,
    consistencyEnabled,
    strategiesUsed: {},
    strategyFailures: 0,
    skipped: 0,
    uniqueReplacements: 0,
  },
  replacementMap: {},
  failures: [],
});

const countTags = (details: ReadonlyArray<ReplacementDetail>): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const detail of details) {
    counts[detail.strategyUsed] = (counts[detail.strategyUsed] ?? 0) + 1;
  }
  return counts;
};

export class EntityReplacer {
  private readonly cache = new Map<string, CachedReplacement>();

  constructor(
    private readonly strategies: StrategySet,
    private readonly defaults: ReplacementConfig = DEFAULT_REPLACEMENT_CONFIG,
    private readonly random: RandomSource = defaultRandom
  ) {}

  /**
   * Build a replacer with the Faker-backed generator for `config.locale`
   * unless a generator is supplied.
   */
  static make(
    config: ReplacementConfig = DEFAULT_REPLACEMENT_CONFIG,
    deps: EntityReplacerDeps = {}
  ): Either.Either<EntityReplacer, ConfigurationError> {
    const generator: Either.Either<SyntheticGenerator, ConfigurationError> = deps.generator
      ? Either.right(deps.generator)
      : makeFakerGenerator(config.locale);
    return Either.map(
      generator,
      (g) =>
        new EntityReplacer(
          makeStrategySet({ generator: g, random: deps.random, countryData: deps.countryData, now: deps.now }),
          config,
          deps.random
        )
    );
  }

  private runStrategy(name: StrategyName, span: Span, failures: StrategyFailure[]): Option.Option<string> {
    const strategy = this.strategies[name];
    const outcome = Either.try({
      try: () => strategy.generate(span),
      catch: (cause) => new StrategyFailure({ strategy: name, label: span.label, reason: describeCause(cause) }),
    });
    if (Either.isLeft(outcome)) {
      failures.push(outcome.left);
      appLogger.warn("Replacement strategy failed", { strategy: name, label: span.label });
      return Option.none();
    }
    return outcome.right;
  }

  private resolve(
    span: Span,
    consistency: boolean,
    override: StrategyName | undefined,
    failures: StrategyFailure[]
  ): Option.Option<Resolved> {
    const key = cacheKey(span.label, span.text);
    if (consistency) {
      const cached = this.cache.get(key);
      if (cached) return Option.some<Resolved>({ value: cached.value, tag: `${cached.strategy}_cached` });
    }

    const remember = (value: string, strategy: StrategyName): Option.Option<Resolved> => {
      if (consistency) this.cache.set(key, { value, strategy });
      return Option.some<Resolved>({ value, tag: strategy });
    };

    for (const name of strategyChainFor(span.label, override)) {
      if (!this.strategies[name].canHandle(span.label)) continue;
      const value = this.runStrategy(name, span, failures);
      if (Option.isSome(value) && value.value.length > 0 && value.value !== span.text) {
        return remember(value.value, name);
      }
    }

    // Default is accepted whatever it returns.
    const fallback = this.runStrategy("default", span, failures);
    return Option.isSome(fallback) ? remember(fallback.value, "default") : Option.none();
  }

  replace(text: string, spans: ReadonlyArray<Span>, options: ReplaceOptions = {}): ReplacementResult {
    const consistency = options.ensureConsistency ?? this.defaults.ensureConsistency;
    const overrides = options.strategyOverrides ?? this.defaults.strategyOverrides;

    if (spans.length === 0) return emptyResult(text, consistency);

    const { planned, skipped } = planSubstitutions(text, spans);
    const failures: StrategyFailure[] = [];
    const details: ReplacementDetail[] = [];
    const replacementMap: ReplacementMap = {};
    let replaced = text;

    for (const span of planned) {
      const label = span.label.toLowerCase();
      const original = span.text;
      const resolved = this.resolve({ ...span, label }, consistency, overrides[label], failures);

      if (Option.isNone(resolved) || resolved.value.value === original) continue;

      replaced = spliceText(replaced, span.start, span.end, resolved.value.value);
      details.push({
        label,
        original,
        replacement: resolved.value.value,
        start: span.start,
        end: span.end,
        score: span.score,
        strategyUsed: resolved.value.tag,
      });
      replacementMap[original] = resolved.value.value;
    }

    details.sort((a, b) => a.start - b.start);
    appLogger.debug("Replacement complete", {
      applied: details.length,
      skipped,
      strategyFailures: failures.length,
    });

    return {
      anonymizedText: markAsAnonymized(replaced),
      replacements: details,
      replacementInfo: {
        entitiesProcessed: spans.length,
        replacementsApplied: details.length,
        consistencyEnabled: consistency,
        strategiesUsed: countTags(details),
        strategyFailures: failures.length,
        skipped,
        uniqueReplacements: new Set(details.map((d) => d.replacement)).size,
      },
      replacementMap,
      failures,
    };
  }

  /**
   * Replace with caller-supplied values per label. A list value is sampled
   * uniformly. Labels missing from `userValues` stay untouched. The
   * consistency cache here lives for this call only.
   */
  replaceWithUserData(
    text: string,
    spans: ReadonlyArray<Span>,
    userValues: UserValues,
    options: Pick<ReplaceOptions, "ensureConsistency"> = {}
  ): ReplacementResult {
    const consistency = options.ensureConsistency ?? this.defaults.ensureConsistency;
    const values = new Map(Object.entries(userValues).map(([label, value]) => [label.toLowerCase(), value]));

    if (spans.length === 0 || values.size === 0) return emptyResult(text, consistency);

    const select = (value: string | ReadonlyArray<string>): string =>
      typeof value === "string" ? value : value.length > 0 ? pickOne(this.random, value) : "";

    const { planned, skipped } = planSubstitutions(text, spans);
    const callCache = new Map<string, string>();
    const details: ReplacementDetail[] = [];
    const replacementMap: ReplacementMap = {};
    let replaced = text;

    for (const span of planned) {
      const label = span.label.toLowerCase();
      const supplied = values.get(label);
      if (supplied === undefined) continue;

      const original = span.text;
      const key = cacheKey(label, original);
      const cached = consistency ? callCache.get(key) : undefined;
      const replacement = cached ?? select(supplied);
      if (consistency && cached === undefined) callCache.set(key, replacement);
      if (replacement.length === 0) continue;

      replaced = spliceText(replaced, span.start, span.end, replacement);
      details.push({
        label,
        original,
        replacement,
        start: span.start,
        end: span.end,
        score: span.score,
        strategyUsed: "user_data",
      });
      replacementMap[original] = replacement;
    }

    details.sort((a, b) => a.start - b.start);

    return {
      anonymizedText: markAsAnonymized(replaced),
      replacements: details,
      replacementInfo: {
        entitiesProcessed: spans.length,
        replacementsApplied: details.length,
        consistencyEnabled: consistency,
        strategiesUsed: countTags(details),
        strategyFailures: 0,
        skipped,
        uniqueReplacements: new Set(details.map((d) => d.replacement)).size,
      },
      replacementMap,
      failures: [],
    };
  }

  clearCache(): void {
    this.cache.clear();
  }

  getReplacementStats(): ReplacementStats {
    const cachedStrategies: Record<string, number> = {};
    for (const { strategy } of this.cache.values()) {
      cachedStrategies[strategy] = (cachedStrategies[strategy] ?? 0) + 1;
    }

    return {
      cacheSize: this.cache.size,
      consistencyEnabled: this.defaults.ensureConsistency,
      locale: this.defaults.locale,
      cachedStrategies,
      availableStrategies: ["synthetic", "country", "date", "default"],
    };
  }
}
