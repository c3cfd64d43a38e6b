import type { SyntheticCategory, SyntheticGenerator } from "../services/syntheticGenerator";
import type { RandomSource } from "../services/strategies/types";

/**
 * Deterministic generator: `<category>-<n>` with a per-category counter,
 * and a fixed date for every range.
 */
export const countingGenerator = (fixedDate: Date = new Date(2001, 4, 9)): SyntheticGenerator => {
  const counters = new Map<SyntheticCategory, number>();
  return {
    locale: "en_US",
    generate: (category) => {
      const next = (counters.get(category) ?? 0) + 1;
      counters.set(category, next);
      return `${category}-${next}`;
    },
    dateBetween: () => fixedDate,
  };
};

/**
 * Always returns the same value, whatever the category.
 */
export const constantGenerator = (value: string): SyntheticGenerator => ({
  locale: "en_US",
  generate: () => value,
  dateBetween: (from) => from,
});

/**
 * Replays `values` in order, cycling.
 */
export const sequenceRandom = (values: ReadonlyArray<number>): RandomSource => {
  let i = 0;
  return () => {
    const value = values[i % values.length];
    i++;
    return value;
  };
};

/**
 * Like countingGenerator, but each date range answers with the next of
 * `dates`, cycling.
 */
export const dateSequenceGenerator = (dates: ReadonlyArray<Date>): SyntheticGenerator => {
  const base = countingGenerator();
  let i = 0;
  return {
    ...base,
    dateBetween: () => {
      const date = dates[i % dates.length];
      i++;
      return date;
    },
  };
};
