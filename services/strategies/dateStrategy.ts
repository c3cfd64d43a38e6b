/**
 * DATE STRATEGY
 *
 * Recognises the original's format and answers in the same one:
 *
 *   MM/DD/YYYY   01/02/2020
 *   MM-DD-YYYY   01-02-2020
 *   YYYY-MM-DD   2020-01-02
 *   DD Month YYYY  2 January 2020
 *   Month DD, YYYY January 2, 2020
 *   YYYY         2020
 *
 * Unrecognised text gets YYYY-MM-DD.
 */

import { format, subYears } from "date-fns";
import { Option } from "effect";
import type { Span } from "../../schemas/schemas";
import type { SyntheticGenerator } from "../syntheticGenerator";
import { defaultRandom, randomInt, type RandomSource, type ReplacementStrategy } from "./types";

const MONTHS = "January|February|March|April|May|June|July|August|September|October|November|December";

export interface DateFormat {
  readonly name: string;
  readonly pattern: RegExp;
  /** date-fns format string */
  readonly output: string;
}

export const DATE_FORMATS: ReadonlyArray<DateFormat> = [
  { name: "MM/DD/YYYY", pattern: /^\d{1,2}\/\d{1,2}\/\d{4}$/, output: "MM/dd/yyyy" },
  { name: "MM-DD-YYYY", pattern: /^\d{1,2}-\d{1,2}-\d{4}$/, output: "MM-dd-yyyy" },
  { name: "YYYY-MM-DD", pattern: /^\d{4}-\d{1,2}-\d{1,2}$/, output: "yyyy-MM-dd" },
  { name: "DD Month YYYY", pattern: new RegExp(`^\\d{1,2}\\s+(?:${MONTHS})\\s+\\d{4}$`, "i"), output: "dd MMMM yyyy" },
  { name: "Month DD, YYYY", pattern: new RegExp(`^(?:${MONTHS})\\s+\\d{1,2},?\\s+\\d{4}$`, "i"), output: "MMMM dd, yyyy" },
  { name: "YYYY", pattern: /^\d{4}$/, output: "yyyy" },
];

const FALLBACK_OUTPUT = "yyyy-MM-dd";

const SUPPORTED_LABELS = new Set([
  "date",
  "time",
  "datetime",
  "day",
  "month",
  "year",
  "birthday",
  "dob",
  "date_of_birth",
]);

const BIRTHDAY_LABELS = new Set(["birthday", "dob", "date_of_birth"]);

export const detectDateFormat = (text: string): DateFormat | undefined =>
  DATE_FORMATS.find((f) => f.pattern.test(text.trim()));

export interface DateStrategyOptions {
  readonly generator?: SyntheticGenerator;
  readonly random?: RandomSource;
  readonly now?: () => Date;
}

export const makeDateStrategy = (options: DateStrategyOptions = {}): ReplacementStrategy => {
  const random = options.random ?? defaultRandom;
  const now = options.now ?? (() => new Date());

  const randomBetween = (from: Date, to: Date): Date =>
    new Date(from.getTime() + Math.floor(random() * (to.getTime() - from.getTime())));

  const pickDate = (label: string): Date => {
    const today = now();
    if (BIRTHDAY_LABELS.has(label)) {
      const from = subYears(today, 80);
      const to = subYears(today, 18);
      return options.generator ? options.generator.dateBetween(from, to) : randomBetween(from, to);
    }
    if (options.generator) {
      return options.generator.dateBetween(subYears(today, 30), today);
    }
    // Day capped at 28 so every month is valid.
    return new Date(randomInt(random, 1990, 2023), randomInt(random, 0, 11), randomInt(random, 1, 28));
  };

  return {
    name: "date",
    canHandle: (label) => SUPPORTED_LABELS.has(label.toLowerCase()),
    generate: (span: Span) => {
      const detected = detectDateFormat(span.text);
      const date = pickDate(span.label.toLowerCase());
      return Option.some(format(date, detected?.output ?? FALLBACK_OUTPUT));
    },
  };
};
