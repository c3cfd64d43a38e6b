import { Option } from "effect";
import type { Span } from "../../schemas/schemas";
import { defaultRandom, pickOne, randomInt, type RandomSource, type ReplacementStrategy } from "./types";

const DIGITS = "0123456789";
const UPPER = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const LOWER = "abcdefghijklmnopqrstuvwxyz";
const EMAIL_DOMAINS = ["example.com", "test.org", "sample.net", "demo.co"];
const USERNAME_PREFIXES = ["user", "demo", "test", "sample"];

const randomChars = (random: RandomSource, alphabet: string, length: number): string =>
  Array.from({ length }, () => pickOne(random, alphabet.split(""))).join("");

const labelGenerators = (random: RandomSource): Readonly<Record<string, () => string>> => ({
  email: () => `${randomChars(random, LOWER, randomInt(random, 5, 10))}@${pickOne(random, EMAIL_DOMAINS)}`,
  phone: () =>
    `(${randomInt(random, 200, 999)}) ${randomInt(random, 200, 999)}-${randomInt(random, 1000, 9999)}`,
  ssn: () => `${randomInt(random, 100, 999)}-${randomInt(random, 10, 99)}-${randomInt(random, 1000, 9999)}`,
  id: () => `${randomChars(random, UPPER, 2)}${randomChars(random, DIGITS, 6)}`,
  number: () => String(randomInt(random, 100000, 999999)),
  code: () => randomChars(random, UPPER + DIGITS, 8),
  username: () => `${pickOne(random, USERNAME_PREFIXES)}${randomInt(random, 100, 9999)}`,
});

const ALPHABETS = [DIGITS, UPPER, LOWER];
const MAX_ATTEMPTS = 5;
const hasAlphanumeric = (text: string): boolean => /[\p{L}\p{Nd}]/u.test(text);

const scramble = (original: string, random: RandomSource): string =>
  Array.from(original)
    .map((char) => {
      if (/\p{Nd}/u.test(char)) return randomChars(random, DIGITS, 1);
      if (/\p{Lu}/u.test(char)) return randomChars(random, UPPER, 1);
      if (/\p{L}/u.test(char)) return randomChars(random, LOWER, 1);
      return char;
    })
    .join("");

/**
 * Step the first ASCII letter or digit to the next one in its alphabet.
 */
const shiftFirst = (value: string): string => {
  const chars = Array.from(value);
  const index = chars.findIndex((char) => ALPHABETS.some((alphabet) => alphabet.includes(char)));
  if (index === -1) return value;
  const alphabet = ALPHABETS.find((a) => a.includes(chars[index])) ?? DIGITS;
  chars[index] = alphabet[(alphabet.indexOf(chars[index]) + 1) % alphabet.length];
  return chars.join("");
};

/**
 * Keep the character classes of the original: digit → digit,
 * letter → letter of the same case, everything else unchanged.
 * Text with a letter or digit never comes back unchanged.
 */
export const preserveStructure = (original: string, random: RandomSource = defaultRandom): string => {
  if (!hasAlphanumeric(original)) return original;
  for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
    const candidate = scramble(original, random);
    if (candidate !== original) return candidate;
  }
  return shiftFirst(original);
};

export const redactedMarker = (label: string): string => `[${label.toUpperCase()}_REDACTED]`;

export interface DefaultStrategyOptions {
  readonly random?: RandomSource;
}

/**
 * Final fallback. Always produces a value.
 */
export const makeDefaultStrategy = (options: DefaultStrategyOptions = {}): ReplacementStrategy => {
  const random = options.random ?? defaultRandom;
  const generators = labelGenerators(random);

  return {
    name: "default",
    canHandle: () => true,
    generate: (span: Span) => {
      const label = span.label.toLowerCase();
      const generator = generators[label];
      if (generator) return Option.some(generator());
      if (!hasAlphanumeric(span.text)) return Option.some(redactedMarker(label));
      return Option.some(preserveStructure(span.text, random));
    },
  };
};
