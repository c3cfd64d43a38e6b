import { describe, it, expect } from 'vitest';
import { Either, Option } from 'effect';
import type { Span } from '../schemas/schemas';
import {
  demonymFor,
  detectDateFormat,
  isCountryLike,
  makeCountryStrategy,
  makeDateStrategy,
  makeDefaultStrategy,
  makeSyntheticStrategy,
  preserveStructure,
  redactedMarker,
  strategyChainFor,
  syntheticCategoryFor,
} from '../services/strategies';
import { makeFakerGenerator } from '../services/syntheticGenerator';
import { constantGenerator, countingGenerator } from './fakeGenerator';

const span = (label: string, text: string): Span => ({ label, text, start: 0, end: text.length, score: 0.9 });
const zero = () => 0;
const value = (option: Option.Option<string>): string | undefined => Option.getOrUndefined(option);

describe('Replacement strategies', () => {
  describe('chains', () => {
    it('orders candidates per label and always ends with default', () => {
      expect(strategyChainFor('location')).toEqual(['country', 'synthetic', 'default']);
      expect(strategyChainFor('Nationality')).toEqual(['country', 'default']);
      expect(strategyChainFor('dob')).toEqual(['date', 'synthetic', 'default']);
      expect(strategyChainFor('something_else')).toEqual(['synthetic', 'default']);
      expect(strategyChainFor('person', 'date')).toEqual(['date', 'default']);
      expect(strategyChainFor('person', 'default')).toEqual(['default']);
    });
  });

  describe('synthetic', () => {
    it('maps labels to generator categories', () => {
      expect(syntheticCategoryFor('Organization')).toBe('company');
      expect(syntheticCategoryFor('profession')).toBe('job');
      expect(syntheticCategoryFor('location')).toBeUndefined();
    });

    it('asks the generator for the mapped category', () => {
      const strategy = makeSyntheticStrategy(countingGenerator());
      expect(strategy.canHandle('person')).toBe(true);
      expect(value(strategy.generate(span('person', 'Ann')))).toBe('name-1');
      expect(value(strategy.generate(span('organization', 'Test Widget Corp')))).toBe('company-1');
    });

    it('gives up after retries when the value keeps matching the original', () => {
      const strategy = makeSyntheticStrategy(constantGenerator('Ann'));
      expect(value(strategy.generate(span('person', 'Ann')))).toBe('Ann');
    });
  });

  describe('country', () => {
    it('recognises country-like text by whole words', () => {
      expect(isCountryLike('France')).toBe(true);
      expect(isCountryLike('the UK office')).toBe(true);
      expect(isCountryLike('Duke')).toBe(false);
      expect(isCountryLike('Paris')).toBe(false);
    });

    it('swaps a country for a different one', () => {
      const strategy = makeCountryStrategy({ random: zero });
      expect(value(strategy.generate(span('country', 'France')))).toBe('United States');
      expect(value(strategy.generate(span('country', 'United States')))).toBe('Canada');
    });

    it('turns a generic location into a country and a nationality into a demonym', () => {
      const strategy = makeCountryStrategy({ random: zero });
      expect(value(strategy.generate(span('location', 'Paris')))).toBe('United States');
      expect(value(strategy.generate(span('nationality', 'French')))).toBe('American');
    });

    it('has no opinion on other place names', () => {
      const strategy = makeCountryStrategy({ random: zero });
      expect(Option.isNone(strategy.generate(span('place', 'Main Street')))).toBe(true);
    });

    it('falls back to an "n" suffix for unknown demonyms', () => {
      const data = { countries: ['Atlantis'], demonyms: {}, indicators: [] };
      expect(demonymFor('Atlantis', data)).toBe('Atlantisn');
      expect(value(makeCountryStrategy({ data, random: zero }).generate(span('nationality', 'Elvish')))).toBe(
        'Atlantisn'
      );
    });
  });

  describe('date', () => {
    it('detects supported formats', () => {
      expect(detectDateFormat('03/15/2020')?.name).toBe('MM/DD/YYYY');
      expect(detectDateFormat('03-15-2020')?.name).toBe('MM-DD-YYYY');
      expect(detectDateFormat('2020-03-15')?.name).toBe('YYYY-MM-DD');
      expect(detectDateFormat('15 March 2020')?.name).toBe('DD Month YYYY');
      expect(detectDateFormat('March 15, 2020')?.name).toBe('Month DD, YYYY');
      expect(detectDateFormat('2020')?.name).toBe('YYYY');
      expect(detectDateFormat('next Tuesday')).toBeUndefined();
    });

    it('answers in the format of the original', () => {
      const strategy = makeDateStrategy({ generator: countingGenerator(new Date(2001, 4, 9)) });
      expect(value(strategy.generate(span('date', '03/15/2020')))).toBe('05/09/2001');
      expect(value(strategy.generate(span('date', 'March 15, 2020')))).toBe('May 09, 2001');
      expect(value(strategy.generate(span('date', '15 March 2020')))).toBe('09 May 2001');
      expect(value(strategy.generate(span('date', '2020')))).toBe('2001');
      expect(value(strategy.generate(span('date', 'sometime')))).toBe('2001-05-09');
    });

    it('places birthdays 18 to 80 years back', () => {
      const strategy = makeDateStrategy({ random: zero, now: () => new Date(2024, 5, 1) });
      expect(value(strategy.generate(span('birthday', '06/01/1990')))).toBe('06/01/1944');
    });

    it('draws from 1990 to 2023 without a generator', () => {
      const strategy = makeDateStrategy({ random: zero });
      expect(value(strategy.generate(span('date', 'n/a')))).toBe('1990-01-01');
    });
  });

  describe('default', () => {
    const strategy = makeDefaultStrategy({ random: zero });

    it('has a generator for common identifiers', () => {
      expect(value(strategy.generate(span('email', 'a@b.invalid')))).toBe('aaaaa@example.com');
      expect(value(strategy.generate(span('phone', '555-010-0000')))).toBe('(200) 200-1000');
      expect(value(strategy.generate(span('ssn', '000-12-0001')))).toBe('100-10-1000');
    });

    it('preserves the character classes of anything else', () => {
      expect(preserveStructure('Ab-12', zero)).toBe('Aa-00');
      expect(value(strategy.generate(span('misc', 'X9 z')))).toBe('A0 a');
    });

    it('never hands back the original when it has letters or digits', () => {
      expect(preserveStructure('A', zero)).toBe('B');
      expect(preserveStructure('a0', zero)).toBe('b0');
      expect(preserveStructure('9', zero)).toBe('0');
      expect(value(strategy.generate(span('misc', 'a')))).toBe('b');
    });

    it('marks text without letters or digits as redacted', () => {
      expect(redactedMarker('misc')).toBe('[MISC_REDACTED]');
      expect(value(strategy.generate(span('misc', '---')))).toBe('[MISC_REDACTED]');
    });
  });

  describe('faker generator', () => {
    it('rejects an unknown locale', () => {
      const result = makeFakerGenerator('xx_XX');
      expect(Either.isLeft(result) && result.left.field).toBe('replacement.locale');
    });

    it('accepts hyphenated locale ids', () => {
      const result = makeFakerGenerator('en-US');
      expect(Either.isRight(result) && result.right.locale).toBe('en_US');
    });

    it('repeats its output for the same seed', () => {
      const a = makeFakerGenerator('en_US', { seed: 7 });
      const b = makeFakerGenerator('en_US', { seed: 7 });
      expect(Either.isRight(a) && Either.isRight(b)).toBe(true);
      if (Either.isRight(a) && Either.isRight(b)) {
        expect(a.right.generate('name')).toBe(b.right.generate('name'));
        expect(a.right.generate('company')).toBe(b.right.generate('company'));
      }
    });
  });
});
