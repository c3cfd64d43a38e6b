import { describe, it, expect } from 'vitest';
import {
  DEFAULT_MAX_WORDS,
  chunkText,
  countWords,
  estimateChunkCount,
  getChunkInfo,
  validateChunks,
} from '../services/chunker';
import { fillerWords } from '../services/testConstants';

describe('Chunker', () => {
  describe('chunkText', () => {
    it('returns no chunks for empty or blank text', () => {
      expect(chunkText('')).toEqual([]);
      expect(chunkText('  \n\t ')).toEqual([]);
    });

    it('keeps short text in a single chunk', () => {
      expect(chunkText('one two three', 5)).toEqual([{ text: 'one two three', offset: 0 }]);
    });

    it('splits on word boundaries and records absolute offsets', () => {
      const text = 'alpha beta gamma delta epsilon';
      expect(chunkText(text, 2)).toEqual([
        { text: 'alpha beta', offset: 0 },
        { text: 'gamma delta', offset: 11 },
        { text: 'epsilon', offset: 23 },
      ]);
    });

    it('preserves the whitespace between words inside a chunk', () => {
      const text = '  first\n\nsecond   third  ';
      const chunks = chunkText(text, 2);
      expect(chunks).toEqual([
        { text: 'first\n\nsecond', offset: 2 },
        { text: 'third', offset: 18 },
      ]);
    });

    it('always yields chunks that are exact slices of the source', () => {
      const text = `${fillerWords(25)}\n ${fillerWords(13)}`;
      const chunks = chunkText(text, 7);
      for (const chunk of chunks) {
        expect(text.slice(chunk.offset, chunk.offset + chunk.text.length)).toBe(chunk.text);
      }
      expect(validateChunks(chunks, text)).toBe(true);
    });

    it('falls back to the default size for invalid chunk sizes', () => {
      const text = fillerWords(DEFAULT_MAX_WORDS + 1);
      expect(chunkText(text, 0)).toHaveLength(2);
      expect(chunkText(text, -3)).toHaveLength(2);
      expect(chunkText(text, 2.5)).toHaveLength(2);
    });
  });

  describe('validateChunks', () => {
    it('rejects an empty chunk list', () => {
      expect(validateChunks([], 'text')).toBe(false);
    });

    it('rejects a chunk whose text does not match the source at its offset', () => {
      expect(validateChunks([{ text: 'beta', offset: 0 }], 'alpha beta')).toBe(false);
    });

    it('rejects a chunk running past the end of the source', () => {
      expect(validateChunks([{ text: 'beta', offset: 8 }], 'alpha beta')).toBe(false);
    });
  });

  describe('counting helpers', () => {
    it('counts whitespace-separated words', () => {
      expect(countWords('')).toBe(0);
      expect(countWords(' a  b\tc\nd ')).toBe(4);
    });

    it('estimates the chunk count without chunking', () => {
      expect(estimateChunkCount('', 3)).toBe(0);
      expect(estimateChunkCount(fillerWords(7), 3)).toBe(3);
      expect(estimateChunkCount(fillerWords(6), 3)).toBe(2);
    });

    it('summarises chunk sizes', () => {
      const info = getChunkInfo([
        { text: 'ab cd', offset: 0 },
        { text: 'efg', offset: 6 },
      ]);
      expect(info).toEqual({
        totalChunks: 2,
        totalCharacters: 8,
        averageChunkSize: 4,
        minChunkSize: 3,
        maxChunkSize: 5,
        totalWords: 3,
        averageWordsPerChunk: 1.5,
      });
    });

    it('reports zeros for no chunks', () => {
      expect(getChunkInfo([]).totalChunks).toBe(0);
      expect(getChunkInfo([]).averageWordsPerChunk).toBe(0);
    });
  });
});
