// src/academic/chunks.ts
// Sentence-aligned, character-bounded chunks across a document's pages.
// The budget is a soft ceiling: a sentence longer than it becomes its own chunk.

import { countWords } from '../pdf/utils';
import type { Chunk } from './types';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export function splitSentences(text: string): string[] {
  return String(text ?? '')
    .split(SENTENCE_BOUNDARY)
    .map((s) => s.trim())
    .filter(Boolean);
}

export function chunkPages(
  pages: ReadonlyArray<{ pageIndex: number; text: string }>,
  opts: { chunkSize: number }
): Chunk[] {
  const chunks: Chunk[] = [];
  if (!pages.length) return chunks;

  let buf = '';
  let pageStart = pages[0].pageIndex;
  let currentPage = pageStart;
  // Page of the last sentence in the buffer.
  let lastPage = pageStart;

  const emit = (pageEnd: number) => {
    chunks.push({
      chunkId: chunks.length,
      text: buf,
      pageStart,
      pageEnd,
      wordCount: countWords(buf),
    });
  };

  for (const page of pages) {
    currentPage = page.pageIndex;
    for (const sentence of splitSentences(page.text)) {
      if (!buf) {
        buf = sentence;
        pageStart = currentPage;
      } else if (buf.length + 1 + sentence.length > opts.chunkSize) {
        // +1 for the joining space.
        emit(currentPage);
        buf = sentence;
        pageStart = currentPage;
      } else {
        buf = `${buf} ${sentence}`;
      }
      lastPage = currentPage;
    }
  }

  if (buf) emit(lastPage);
  return chunks;
}
