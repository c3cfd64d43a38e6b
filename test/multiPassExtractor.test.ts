import { describe, it, expect } from 'vitest';
import { Effect } from 'effect';
import {
  DEFAULT_MULTI_PASS_OPTIONS,
  extractMultiPass,
  thresholdForPass,
} from '../services/multiPassExtractor.effect';
import { scriptedLabeler, termLabeler } from './fakeLabeler';

/**
 * MULTI-PASS EXTRACTION TESTS
 *
 * The labeler is scripted per call, so each test states exactly what every
 * pass sees and returns.
 */

describe('Multi-pass extractor', () => {
  it('uses the strict threshold first and the loose one afterwards', () => {
    expect(thresholdForPass(0, { first: 0.5, subsequent: 0.3 })).toBe(0.5);
    expect(thresholdForPass(1, { first: 0.5, subsequent: 0.3 })).toBe(0.3);
    expect(thresholdForPass(4, { first: 0.5, subsequent: 0.3 })).toBe(0.3);
  });

  it('masks found spans before the next pass', async () => {
    const text = 'Ann met Bob';
    const fake = scriptedLabeler([
      [{ start: 0, end: 3, label: 'person', score: 0.9 }],
      [{ start: 8, end: 11, label: 'person', score: 0.4 }],
    ]);

    const result = await Effect.runPromise(
      extractMultiPass(text, ['PERSON'], DEFAULT_MULTI_PASS_OPTIONS).pipe(Effect.provide(fake.layer))
    );

    expect(fake.calls.map((c) => c.text)).toEqual(['Ann met Bob', '    met Bob']);
    expect(fake.calls.map((c) => c.threshold)).toEqual([0.5, 0.3]);
    expect(fake.calls[0].labels).toEqual(['person']);
    expect(result.spans).toEqual([
      { label: 'person', text: 'Ann', start: 0, end: 3, score: 0.9 },
      { label: 'person', text: 'Bob', start: 8, end: 11, score: 0.4 },
    ]);
    expect(result.passesCompleted).toBe(2);
    expect(result.stopReason).toBe('max_passes');
  });

  it('stops early when a pass finds nothing new', async () => {
    const fake = scriptedLabeler([
      [{ start: 0, end: 3, label: 'person', score: 0.9 }],
      [{ start: 0, end: 3, label: 'person', score: 0.9 }],
    ]);

    const result = await Effect.runPromise(
      extractMultiPass('Ann is here', ['person'], { maxPasses: 5, thresholds: { first: 0.5, subsequent: 0.3 } }).pipe(
        Effect.provide(fake.layer)
      )
    );

    expect(fake.calls).toHaveLength(2);
    expect(result.spans).toHaveLength(1);
    expect(result.passesCompleted).toBe(2);
    expect(result.stopReason).toBe('no_new_spans');
  });

  it('keeps earlier spans when a later pass fails', async () => {
    const fake = scriptedLabeler([[{ start: 0, end: 3, label: 'person', score: 0.9 }], new Error('model crashed')]);

    const result = await Effect.runPromise(
      extractMultiPass('Ann is here', ['person']).pipe(Effect.provide(fake.layer))
    );

    expect(result.spans).toEqual([{ label: 'person', text: 'Ann', start: 0, end: 3, score: 0.9 }]);
    expect(result.passesCompleted).toBe(1);
    expect(result.stopReason).toBe('labeler_error');
    expect(result.error?.message).toBe('model crashed');
  });

  it('never calls the labeler for blank text', async () => {
    const fake = scriptedLabeler([]);
    const result = await Effect.runPromise(extractMultiPass('   ', ['person']).pipe(Effect.provide(fake.layer)));
    expect(fake.calls).toHaveLength(0);
    expect(result).toEqual({ spans: [], passesCompleted: 0, stopReason: 'no_new_spans' });
  });

  it('never reports the same range twice', async () => {
    const fake = termLabeler({ Ann: { label: 'person', score: 0.9 }, Oslo: { label: 'location', score: 0.9 } });
    const result = await Effect.runPromise(
      extractMultiPass('Ann left Oslo. Ann came back.', ['person', 'location'], {
        maxPasses: 3,
        thresholds: { first: 0.5, subsequent: 0.3 },
      }).pipe(Effect.provide(fake.layer))
    );

    const keys = result.spans.map((s) => `${s.start}:${s.end}`);
    expect(new Set(keys).size).toBe(keys.length);
    expect(result.spans.map((s) => s.text)).toEqual(['Ann', 'Oslo', 'Ann']);
    expect(result.stopReason).toBe('no_new_spans');
  });
});
