import { Option } from "effect";
import type { Span } from "../../schemas/schemas";
import type { SyntheticCategory, SyntheticGenerator } from "../syntheticGenerator";
import type { ReplacementStrategy } from "./types";

const CATEGORY_BY_LABEL: Readonly<Record<string, SyntheticCategory>> = {
  person: "name",
  name: "name",
  first_name: "first_name",
  last_name: "last_name",
  email: "email",
  phone: "phone",
  address: "address",
  company: "company",
  organization: "company",
  city: "city",
  state: "state",
  country: "country",
  age: "age",
  job: "job",
  profession: "job",
};

export const MAX_SYNTHETIC_RETRIES = 3;

export const syntheticCategoryFor = (label: string): SyntheticCategory | undefined =>
  CATEGORY_BY_LABEL[label.toLowerCase()];

/**
 * Realistic values from the synthetic generator. Regenerates up to three
 * times when the value comes back equal to the original.
 */
export const makeSyntheticStrategy = (generator: SyntheticGenerator): ReplacementStrategy => ({
  name: "synthetic",
  canHandle: (label) => syntheticCategoryFor(label) !== undefined,
  generate: (span: Span) => {
    const category = syntheticCategoryFor(span.label);
    if (category === undefined) return Option.none();

    let value = generator.generate(category);
    for (let attempt = 0; attempt < MAX_SYNTHETIC_RETRIES && value === span.text; attempt++) {
      value = generator.generate(category);
    }
    return Option.some(value);
  },
});
