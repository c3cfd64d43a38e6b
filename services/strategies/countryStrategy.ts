import { Option } from "effect";
import countryData from "../../data/countries.json";
import type { Span } from "../../schemas/schemas";
import { defaultRandom, pickOne, type RandomSource, type ReplacementStrategy } from "./types";

export interface CountryData {
  readonly countries: ReadonlyArray<string>;
  readonly demonyms: Readonly<Record<string, string>>;
  /** Lower-case fragments that mark text as country-like */
  readonly indicators: ReadonlyArray<string>;
}

export const DEFAULT_COUNTRY_DATA: CountryData = countryData;

const SUPPORTED_LABELS = new Set(["country", "location", "nationality", "place"]);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const demonymFor = (country: string, data: CountryData = DEFAULT_COUNTRY_DATA): string =>
  data.demonyms[country] ?? `${country}n`;

export const isCountryLike = (text: string, data: CountryData = DEFAULT_COUNTRY_DATA): boolean => {
  const lower = text.trim().toLowerCase();
  if (data.countries.some((c) => c.toLowerCase() === lower)) return true;
  // Whole-word match so "uk" does not fire inside "Duke".
  return data.indicators.some((indicator) => new RegExp(`\\b${escapeRegExp(indicator)}\\b`).test(lower));
};

export interface CountryStrategyOptions {
  readonly data?: CountryData;
  readonly random?: RandomSource;
}

/**
 * Country-like text becomes a different country; a generic location
 * becomes any country; a nationality becomes a random demonym.
 */
export const makeCountryStrategy = (options: CountryStrategyOptions = {}): ReplacementStrategy => {
  const data = options.data ?? DEFAULT_COUNTRY_DATA;
  const random = options.random ?? defaultRandom;

  return {
    name: "country",
    canHandle: (label) => SUPPORTED_LABELS.has(label.toLowerCase()),
    generate: (span: Span) => {
      if (data.countries.length === 0) return Option.none();

      const original = span.text.trim();
      const label = span.label.toLowerCase();

      if (isCountryLike(original, data)) {
        const others = data.countries.filter((c) => c.toLowerCase() !== original.toLowerCase());
        return others.length > 0 ? Option.some(pickOne(random, others)) : Option.none();
      }
      if (label === "location") {
        return Option.some(pickOne(random, data.countries));
      }
      if (label === "nationality") {
        return Option.some(demonymFor(pickOne(random, data.countries), data));
      }
      return Option.none();
    },
  };
};
