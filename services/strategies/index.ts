import type { StrategyName } from "../../schemas/schemas";
import type { SyntheticGenerator } from "../syntheticGenerator";
import { makeCountryStrategy, type CountryData } from "./countryStrategy";
import { makeDateStrategy } from "./dateStrategy";
import { makeDefaultStrategy } from "./defaultStrategy";
import { makeSyntheticStrategy } from "./syntheticStrategy";
import type { RandomSource, ReplacementStrategy } from "./types";

export type StrategySet = Readonly<Record<StrategyName, ReplacementStrategy>>;

export interface StrategySetOptions {
  readonly generator: SyntheticGenerator;
  readonly random?: RandomSource;
  readonly countryData?: CountryData;
  readonly now?: () => Date;
}

export const makeStrategySet = (options: StrategySetOptions): StrategySet => ({
  synthetic: makeSyntheticStrategy(options.generator),
  country: makeCountryStrategy({ data: options.countryData, random: options.random }),
  date: makeDateStrategy({ generator: options.generator, random: options.random, now: options.now }),
  default: makeDefaultStrategy({ random: options.random }),
});

const SYNTHETIC_CHAIN: ReadonlyArray<StrategyName> = ["synthetic", "default"];
const LOCATION_CHAIN: ReadonlyArray<StrategyName> = ["country", "synthetic", "default"];
const DATE_CHAIN: ReadonlyArray<StrategyName> = ["date", "synthetic", "default"];
const COUNTRY_CHAIN: ReadonlyArray<StrategyName> = ["country", "default"];

const CHAINS: Readonly<Record<string, ReadonlyArray<StrategyName>>> = {
  person: SYNTHETIC_CHAIN,
  name: SYNTHETIC_CHAIN,
  first_name: SYNTHETIC_CHAIN,
  last_name: SYNTHETIC_CHAIN,
  organization: SYNTHETIC_CHAIN,
  company: SYNTHETIC_CHAIN,
  email: SYNTHETIC_CHAIN,
  phone: SYNTHETIC_CHAIN,
  address: SYNTHETIC_CHAIN,
  age: SYNTHETIC_CHAIN,
  city: SYNTHETIC_CHAIN,
  state: SYNTHETIC_CHAIN,
  job: SYNTHETIC_CHAIN,
  profession: SYNTHETIC_CHAIN,
  location: LOCATION_CHAIN,
  date: DATE_CHAIN,
  time: DATE_CHAIN,
  birthday: DATE_CHAIN,
  dob: DATE_CHAIN,
  date_of_birth: DATE_CHAIN,
  nationality: COUNTRY_CHAIN,
  country: COUNTRY_CHAIN,
};

/**
 * Ordered candidates for a label. An override takes the whole chain;
 * default is always last.
 */
export const strategyChainFor = (label: string, override?: StrategyName): ReadonlyArray<StrategyName> => {
  const chain = override ? [override] : CHAINS[label.toLowerCase()] ?? SYNTHETIC_CHAIN;
  return chain.includes("default") ? chain : [...chain, "default"];
};

export { makeCountryStrategy, isCountryLike, demonymFor, DEFAULT_COUNTRY_DATA } from "./countryStrategy";
export type { CountryData } from "./countryStrategy";
export { makeDateStrategy, detectDateFormat, DATE_FORMATS } from "./dateStrategy";
export { makeDefaultStrategy, preserveStructure, redactedMarker } from "./defaultStrategy";
export { makeSyntheticStrategy, syntheticCategoryFor } from "./syntheticStrategy";
export type { RandomSource, ReplacementStrategy } from "./types";
