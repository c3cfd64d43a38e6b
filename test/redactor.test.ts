import { describe, it, expect } from 'vitest';
import { Effect, Either } from 'effect';
import type { Span } from '../schemas/schemas';
import { countPlaceholdersByLabel, extractPlaceholders, reidentify } from '../schemas/anonymized';
import { EntityRedactor } from '../services/redactor';
import { TEST_TEXTS } from '../services/testConstants';

const span = (text: string, start: number, end: number, label: string, score = 0.9): Span => ({
  label,
  text: text.slice(start, end),
  start,
  end,
  score,
});

const repeatedPersonSpans = (): Span[] => {
  const text = TEST_TEXTS.REPEATED_PERSON;
  return [span(text, 0, 10, 'person'), span(text, 15, 25, 'person'), span(text, 35, 40, 'location')];
};

describe('Entity redactor', () => {
  it('gives the same entity the same placeholder', () => {
    const redactor = new EntityRedactor();
    const result = redactor.redact(TEST_TEXTS.REPEATED_PERSON, repeatedPersonSpans());

    expect(result.anonymizedText).toBe('#1_PERSON_REDACTED met #1_PERSON_REDACTED again in #1_LOCATION_REDACTED.');
    expect(result.reIdentificationMap).toEqual({
      '#1_PERSON_REDACTED': 'John Smith',
      '#1_LOCATION_REDACTED': 'Paris',
    });
    expect(result.redactionInfo).toEqual({
      entitiesProcessed: 3,
      redactionsApplied: 3,
      skipped: 0,
      formatUsed: '#{id}_{label}_REDACTED',
      numbered: true,
      consistentIds: true,
      uniqueEntities: 2,
    });
    expect(result.replacements.map((d) => d.start)).toEqual([0, 15, 35]);
    expect(result.replacements[0]).toEqual({
      label: 'PERSON',
      original: 'John Smith',
      placeholder: '#1_PERSON_REDACTED',
      start: 0,
      end: 10,
      score: 0.9,
      redactionId: '1',
    });
  });

  it('identifies a padded detection by its cleaned text', () => {
    const text = 'John met John today.';
    const padded: Span = { label: 'person', text: 'John', start: 0, end: 5, score: 0.9 };
    const result = new EntityRedactor().redact(text, [padded, span(text, 9, 13, 'person')]);

    expect(result.anonymizedText).toBe('#1_PERSON_REDACTEDmet #1_PERSON_REDACTED today.');
    expect(result.replacements.map((d) => d.redactionId)).toEqual(['1', '1']);
    expect(result.reIdentificationMap).toEqual({ '#1_PERSON_REDACTED': 'John' });
    expect(result.redactionInfo.uniqueEntities).toBe(1);
  });

  it('numbers distinct entities in reading order', () => {
    const text = TEST_TEXTS.TWO_PEOPLE;
    const result = new EntityRedactor().redact(text, [
      span(text, 34, 40, 'location'),
      span(text, 18, 28, 'person'),
      span(text, 0, 10, 'person'),
    ]);
    expect(result.anonymizedText).toBe('#1_PERSON_REDACTED called #2_PERSON_REDACTED from #1_LOCATION_REDACTED.');
  });

  it('keeps ids across calls until the history is cleared', () => {
    const redactor = new EntityRedactor();
    redactor.redact(TEST_TEXTS.TWO_PEOPLE, [
      span(TEST_TEXTS.TWO_PEOPLE, 0, 10, 'person'),
      span(TEST_TEXTS.TWO_PEOPLE, 18, 28, 'person'),
    ]);

    const again = redactor.redact('Mary Smith', [span('Mary Smith', 0, 10, 'person')]);
    expect(again.anonymizedText).toBe('#2_PERSON_REDACTED');

    redactor.clearHistory();
    const fresh = redactor.redact('Mary Smith', [span('Mary Smith', 0, 10, 'person')]);
    expect(fresh.anonymizedText).toBe('#1_PERSON_REDACTED');
  });

  it('restores the original text from the re-identification map', () => {
    const result = new EntityRedactor().redact(TEST_TEXTS.REPEATED_PERSON, repeatedPersonSpans());
    expect(reidentify(result.anonymizedText, result.reIdentificationMap)).toBe(TEST_TEXTS.REPEATED_PERSON);
    expect(extractPlaceholders(result.anonymizedText)).toEqual([
      '#1_PERSON_REDACTED',
      '#1_PERSON_REDACTED',
      '#1_LOCATION_REDACTED',
    ]);
    expect(countPlaceholdersByLabel(result.anonymizedText)).toEqual({ PERSON: 2, LOCATION: 1 });
  });

  it('hands out a new id per occurrence without consistent ids', () => {
    const result = new EntityRedactor().redact(TEST_TEXTS.REPEATED_PERSON, repeatedPersonSpans(), {
      consistentIds: false,
    });
    expect(result.anonymizedText).toBe('#1_PERSON_REDACTED met #2_PERSON_REDACTED again in #1_LOCATION_REDACTED.');
  });

  it('uses static markers when numbering is off', () => {
    const result = new EntityRedactor().redact(TEST_TEXTS.REPEATED_PERSON, repeatedPersonSpans(), {
      numbered: false,
    });
    expect(result.anonymizedText).toBe('PERSON_REDACTED met PERSON_REDACTED again in LOCATION_REDACTED.');
    expect(result.replacements[0].redactionId).toBe('PERSON_STATIC');
  });

  it('fills a custom template', () => {
    const result = new EntityRedactor({ placeholderFormat: '<{label}:{id}>', numbered: true, consistentIds: true }).redact(
      'Ann and Bob',
      [span('Ann and Bob', 0, 3, 'person'), span('Ann and Bob', 8, 11, 'person')]
    );
    expect(result.anonymizedText).toBe('<PERSON:1> and <PERSON:2>');
    expect(result.redactionInfo.formatUsed).toBe('<{label}:{id}>');
  });

  it('ignores an option passed as undefined', () => {
    const result = new EntityRedactor().redact('Ann', [span('Ann', 0, 3, 'person')], { numbered: undefined });
    expect(result.anonymizedText).toBe('#1_PERSON_REDACTED');
  });

  it('skips overlapping and out-of-range spans', () => {
    const text = 'Test Widget Corp hired Ann';
    const result = new EntityRedactor().redact(text, [
      span(text, 0, 16, 'organization'),
      span(text, 12, 22, 'person'),
      { label: 'person', text: 'ghost', start: 20, end: 99, score: 0.9 },
      span(text, 23, 26, 'person'),
    ]);
    expect(result.redactionInfo.skipped).toBe(2);
    expect(result.anonymizedText).toBe('Test Widget #1_PERSON_REDACTED #2_PERSON_REDACTED');
  });

  it('returns the text unchanged without spans', () => {
    const result = new EntityRedactor().redact('nothing here', []);
    expect(result.anonymizedText).toBe('nothing here');
    expect(result.replacements).toEqual([]);
  });

  describe('batchRedact', () => {
    it('numbers entities consistently across the batch', async () => {
      const texts = ['Mary Smith', 'John Smith and Mary Smith'];
      const redactor = new EntityRedactor();
      const results = await Effect.runPromise(
        redactor.batchRedact(texts, [
          [span(texts[0], 0, 10, 'person')],
          [span(texts[1], 15, 25, 'person'), span(texts[1], 0, 10, 'person')],
        ])
      );

      expect(results.map((r) => r.anonymizedText)).toEqual([
        '#1_PERSON_REDACTED',
        '#2_PERSON_REDACTED and #1_PERSON_REDACTED',
      ]);
      expect(redactor.getRedactionStats()).toEqual({
        totalUniqueEntities: 2,
        labelsProcessed: 1,
        totalRedactions: 3,
        labelStatistics: { PERSON: { uniqueEntities: 2, maxIdUsed: 2 } },
        defaultFormat: '#{id}_{label}_REDACTED',
      });
    });

    it('numbers a padded detection with its cleaned text', async () => {
      const text = 'John met John today.';
      const padded: Span = { label: 'person', text: 'John', start: 0, end: 5, score: 0.9 };
      const redactor = new EntityRedactor();
      const [result] = await Effect.runPromise(redactor.batchRedact([text], [[padded, span(text, 9, 13, 'person')]]));

      expect(result.anonymizedText).toBe('#1_PERSON_REDACTEDmet #1_PERSON_REDACTED today.');
      expect(redactor.getRedactionStats().totalUniqueEntities).toBe(1);
    });

    it('fails when texts and span lists differ in length', async () => {
      const result = await Effect.runPromise(Effect.either(new EntityRedactor().batchRedact(['a', 'b'], [[]])));
      expect(Either.isLeft(result) && result.left._tag).toBe('InputError');
    });
  });
});
