import { describe, it, expect } from 'vitest';
import type { Span } from '../schemas/schemas';
import { canMerge, getMergeStats, mergeAdjacent } from '../services/merger';

const span = (start: number, end: number, label: string, score: number, text = ''): Span => ({
  label,
  text,
  start,
  end,
  score,
});

describe('Span merger', () => {
  it('joins same-label spans separated by one character', () => {
    const source = 'John Smith arrived.';
    const { spans, stats } = mergeAdjacent(
      [span(0, 4, 'person', 0.8, 'John'), span(5, 10, 'person', 0.6, 'Smith')],
      source
    );

    expect(spans).toHaveLength(1);
    expect(spans[0].label).toBe('person');
    expect(spans[0].text).toBe('John Smith');
    expect(spans[0].start).toBe(0);
    expect(spans[0].end).toBe(10);
    expect(spans[0].score).toBeCloseTo(0.7, 10);
    expect(stats.entitiesMerged).toBe(1);
    expect(stats.reductionPercentage).toBe(50);
  });

  it('averages scores over every merged member', () => {
    const source = 'a b c';
    const { spans } = mergeAdjacent(
      [span(0, 1, 'x', 0.9), span(2, 3, 'x', 0.6), span(4, 5, 'x', 0.3)],
      source
    );
    expect(spans).toHaveLength(1);
    expect(spans[0].score).toBeCloseTo(0.6, 10);
    expect(spans[0].text).toBe('a b c');
  });

  it('does not merge different labels or wider gaps', () => {
    const source = 'Paris  France';
    const differentLabel = mergeAdjacent([span(0, 5, 'location', 0.9), span(6, 12, 'country', 0.9)], source);
    const wideGap = mergeAdjacent([span(0, 5, 'location', 0.9), span(7, 13, 'location', 0.9)], source);
    expect(differentLabel.spans).toHaveLength(2);
    expect(wideGap.spans).toHaveLength(2);
  });

  it('honours a larger gap', () => {
    const source = 'Paris  France';
    const { spans } = mergeAdjacent([span(0, 5, 'location', 0.9), span(7, 13, 'location', 0.9)], source, {
      maxGap: 2,
    });
    expect(spans).toEqual([span(0, 13, 'location', 0.9, 'Paris  France')]);
  });

  it('keeps the furthest end when a span is contained in the previous one', () => {
    const source = 'New York City';
    const { spans } = mergeAdjacent([span(0, 13, 'location', 0.8), span(4, 8, 'location', 0.8)], source);
    expect(spans).toHaveLength(1);
    expect(spans[0].end).toBe(13);
  });

  it('sorts by start before merging', () => {
    const source = 'John Smith';
    const { spans } = mergeAdjacent([span(5, 10, 'person', 0.5), span(0, 4, 'person', 0.5)], source);
    expect(spans).toEqual([span(0, 10, 'person', 0.5, 'John Smith')]);
  });

  it('returns nothing for no spans', () => {
    expect(mergeAdjacent([], 'text').spans).toEqual([]);
  });

  it('compares labels exactly', () => {
    expect(canMerge(span(0, 4, 'person', 1), span(5, 9, 'Person', 1))).toBe(false);
  });

  it('counts spans per label before and after', () => {
    const original = [span(0, 1, 'a', 1), span(2, 3, 'a', 1), span(5, 6, 'b', 1)];
    const merged = [span(0, 3, 'a', 1), span(5, 6, 'b', 1)];
    expect(getMergeStats(original, merged)).toEqual({
      originalCount: 3,
      mergedCount: 2,
      entitiesMerged: 1,
      reductionPercentage: (1 / 3) * 100,
      originalByLabel: { a: 2, b: 1 },
      mergedByLabel: { a: 1, b: 1 },
    });
  });
});
