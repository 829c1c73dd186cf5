import path from 'node:path';

import type { Chunk, SourceDocument } from '../rag/schema';
import { normalizePages, type NormalizeOptions } from './normalize';

export type ChunkOptions = {
  maxWords?: number;
  overlapWords?: number;
  minWords?: number;
  sentenceBoundary?: RegExp;
};

export type DocumentChunkOptions = ChunkOptions & NormalizeOptions & {
  /** Pages with fewer words than this are not chunked at all. */
  minEntryWords?: number;
};

export const DEFAULT_MAX_WORDS = 250;
export const DEFAULT_OVERLAP_WORDS = 100;
export const DEFAULT_MIN_WORDS = 40;
export const DEFAULT_MIN_ENTRY_WORDS = 50;

// sentence enders plus the clause punctuation legal texts lean on
export const DEFAULT_SENTENCE_BOUNDARY = /(?<=[.?!;:\n])\s+/;

const words = (text: string): string[] => text.split(/\s+/).filter(Boolean);

export const countWords = (text: string): number => words(text).length;

export const splitSentences = (text: string, boundary: RegExp = DEFAULT_SENTENCE_BOUNDARY): string[] =>
  text
    .replace(/\r/g, ' ')
    .trim()
    .split(boundary)
    .map((sentence) => sentence.trim())
    .filter(Boolean);

/**
 * Packs sentences into chunks of at most `maxWords` words. Each new chunk is
 * seeded with the last `overlapWords` words of the previous one. A sentence is
 * never split, so a single over-long sentence becomes an over-long chunk.
 */
export const chunkText = (
  text: string,
  {
    maxWords = DEFAULT_MAX_WORDS,
    overlapWords = DEFAULT_OVERLAP_WORDS,
    minWords = DEFAULT_MIN_WORDS,
    sentenceBoundary = DEFAULT_SENTENCE_BOUNDARY,
  }: ChunkOptions = {},
): string[] => {
  const chunks: string[] = [];
  let buffer: string[] = [];
  let bufferWords = 0;

  for (const sentence of splitSentences(text, sentenceBoundary)) {
    const sentenceWords = countWords(sentence);

    if (buffer.length && bufferWords + sentenceWords > maxWords) {
      const closed = buffer.join(' ').trim();
      chunks.push(closed);

      if (overlapWords > 0) {
        const tail = words(closed).slice(-overlapWords).join(' ');
        buffer = [tail];
        bufferWords = countWords(tail);
      } else {
        buffer = [];
        bufferWords = 0;
      }
    }

    buffer.push(sentence);
    bufferWords += sentenceWords;
  }

  if (buffer.length) {
    chunks.push(buffer.join(' ').trim());
  }

  return chunks.filter((chunk) => countWords(chunk) >= minWords);
};

export const documentBaseName = (sourceFile: string): string => path.parse(sourceFile).name;

export const chunkDocument = (document: SourceDocument, options: DocumentChunkOptions = {}): Chunk[] => {
  const { minEntryWords = DEFAULT_MIN_ENTRY_WORDS } = options;
  const base = documentBaseName(document.sourceFile);
  const pages = normalizePages(document.pages, options);
  const chunks: Chunk[] = [];

  pages.forEach((pageText, entryIndex) => {
    const text = pageText.trim();

    if (!text || countWords(text) < minEntryWords) {
      console.debug(`[INGEST] Skipping page ${entryIndex + 1} of ${document.sourceFile} (too short).`);
      return;
    }

    chunkText(text, options).forEach((chunk, chunkIndex) => {
      chunks.push({
        id: `${base}-${entryIndex}-${chunkIndex}`,
        sourceFile: document.sourceFile,
        page: entryIndex + 1,
        text: chunk,
        wordCount: countWords(chunk),
      });
    });
  });

  return chunks;
};
