/**
 * SYNTHETIC VALUE GENERATOR
 *
 * Locale-aware source of realistic fake values, keyed by semantic category.
 * The default implementation is backed by @faker-js/faker with its own
 * Faker instance, so seeding one generator never affects another.
 */

import { Faker, allLocales, base, en } from "@faker-js/faker";
import { Either } from "effect";
import { ConfigurationError } from "./errors";

export type SyntheticCategory =
  | "name"
  | "first_name"
  | "last_name"
  | "email"
  | "phone"
  | "address"
  | "company"
  | "city"
  | "state"
  | "country"
  | "job"
  | "age";

export interface SyntheticGenerator {
  readonly locale: string;
  generate(category: SyntheticCategory): string;
  dateBetween(from: Date, to: Date): Date;
}

type FakerLocale = keyof typeof allLocales;

const isFakerLocale = (locale: string): locale is FakerLocale => Object.hasOwn(allLocales, locale);

/**
 * Faker locale ids use underscores ("en_US", "de_AT"); accept "en-US" too.
 */
const normalizeLocale = (locale: string): string => locale.trim().replace("-", "_");

export interface FakerGeneratorOptions {
  readonly seed?: number;
}

export const makeFakerGenerator = (
  locale: string,
  options: FakerGeneratorOptions = {}
): Either.Either<SyntheticGenerator, ConfigurationError> => {
  const normalized = normalizeLocale(locale);
  if (!isFakerLocale(normalized)) {
    return Either.left(
      new ConfigurationError({
        message: `Unknown locale "${locale}"`,
        field: "replacement.locale",
        suggestion: "Use a Faker locale id such as en_US, en_GB, de or fr",
      })
    );
  }

  const faker = new Faker({ locale: [allLocales[normalized], en, base] });
  if (options.seed !== undefined) {
    faker.seed(options.seed);
  }

  const generate = (category: SyntheticCategory): string => {
    switch (category) {
      case "name":
        return faker.person.fullName();
      case "first_name":
        return faker.person.firstName();
      case "last_name":
        return faker.person.lastName();
      case "email":
        return faker.internet.email();
      case "phone":
        return faker.phone.number();
      case "address":
        return `${faker.location.streetAddress()}, ${faker.location.city()}`;
      case "company":
        return faker.company.name();
      case "city":
        return faker.location.city();
      case "state":
        return faker.location.state();
      case "country":
        return faker.location.country();
      case "job":
        return faker.person.jobTitle();
      case "age":
        return String(faker.number.int({ min: 18, max: 80 }));
    }
  };

  return Either.right({
    locale: normalized,
    generate,
    dateBetween: (from, to) => faker.date.between({ from, to }),
  });
};
