/**
 * WORD-ALIGNED TEXT CHUNKER
 *
 * Splits text into chunks of at most N words. A word is a maximal run of
 * non-whitespace characters. Each chunk is the exact source substring from
 * its first word's start to its last word's end, so
 * `text.slice(offset, offset + chunk.text.length) === chunk.text` always holds.
 */

import type { Chunk, ChunkInfo } from "../schemas/schemas";
import { appLogger } from "./appLogger";

export const DEFAULT_MAX_WORDS = 600;

interface WordBounds {
  readonly start: number;
  readonly end: number;
}

const findWords = (text: string): WordBounds[] => {
  const words: WordBounds[] = [];
  for (const match of text.matchAll(/\S+/g)) {
    const start = match.index ?? 0;
    words.push({ start, end: start + match[0].length });
  }
  return words;
};

const normalizeMaxWords = (maxWords: number): number => {
  if (Number.isInteger(maxWords) && maxWords > 0) return maxWords;
  appLogger.warn("Invalid chunk size, falling back to default", {
    requested: maxWords,
    fallback: DEFAULT_MAX_WORDS,
  });
  return DEFAULT_MAX_WORDS;
};

/**
 * Split text into word-aligned chunks with absolute offsets.
 * Blank input yields no chunks.
 */
export function chunkText(text: string, maxWords: number = DEFAULT_MAX_WORDS): Chunk[] {
  if (!text || text.trim().length === 0) return [];

  const size = normalizeMaxWords(maxWords);
  const words = findWords(text);
  const chunks: Chunk[] = [];

  for (let i = 0; i < words.length; i += size) {
    const first = words[i];
    const last = words[Math.min(i + size, words.length) - 1];
    chunks.push({ text: text.slice(first.start, last.end), offset: first.start });
  }

  return chunks;
}

/**
 * Check that every chunk is the exact slice of `original` at its offset.
 */
export function validateChunks(chunks: ReadonlyArray<Chunk>, original: string): boolean {
  if (chunks.length === 0 || original.length === 0) return false;

  return chunks.every(
    (chunk) =>
      chunk.offset >= 0 &&
      chunk.offset + chunk.text.length <= original.length &&
      original.slice(chunk.offset, chunk.offset + chunk.text.length) === chunk.text
  );
}

export function countWords(text: string): number {
  return text.match(/\S+/g)?.length ?? 0;
}

/**
 * Number of chunks chunkText would produce, without building them.
 */
export function estimateChunkCount(text: string, maxWords: number = DEFAULT_MAX_WORDS): number {
  const words = countWords(text);
  if (words === 0) return 0;
  return Math.ceil(words / normalizeMaxWords(maxWords));
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

export function getChunkInfo(chunks: ReadonlyArray<Chunk>): ChunkInfo {
  if (chunks.length === 0) {
    return {
      totalChunks: 0,
      totalCharacters: 0,
      averageChunkSize: 0,
      minChunkSize: 0,
      maxChunkSize: 0,
      totalWords: 0,
      averageWordsPerChunk: 0,
    };
  }

  const sizes = chunks.map((c) => c.text.length);
  const totalCharacters = sizes.reduce((sum, n) => sum + n, 0);
  const totalWords = chunks.reduce((sum, c) => sum + countWords(c.text), 0);

  return {
    totalChunks: chunks.length,
    totalCharacters,
    averageChunkSize: round2(totalCharacters / chunks.length),
    minChunkSize: Math.min(...sizes),
    maxChunkSize: Math.max(...sizes),
    totalWords,
    averageWordsPerChunk: round2(totalWords / chunks.length),
  };
}
