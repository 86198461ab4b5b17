// src/academic/page-processor.ts
// One page's blocks -> reading order -> math isolation -> normalization.

import { sortBlocksReadingOrder } from '../pdf/reading-order';
import type { TextBlock } from '../pdf/types';
import { isolateMathFormulas } from './math';
import { normalizeAcademicText } from './normalize';
import type { AcademicDocumentText, ProcessedPage } from './types';

export function processPageBlocks(pageIndex: number, blocks: readonly TextBlock[]): ProcessedPage {
  const mathFormulas: string[] = [];
  const parts: string[] = [];

  for (const block of sortBlocksReadingOrder(blocks)) {
    const isolated = isolateMathFormulas(block.text, { startAt: mathFormulas.length });
    mathFormulas.push(...isolated.formulas);
    const cleaned = normalizeAcademicText(isolated.text);
    if (cleaned) parts.push(cleaned);
  }

  return {
    pageIndex,
    processedText: parts.join('\n\n'),
    mathFormulas,
    blockCount: blocks.length,
  };
}

export function assembleDocumentText(pages: readonly ProcessedPage[]): AcademicDocumentText {
  return {
    fullText: pages.map((p) => p.processedText).join('\n\n').trim(),
    pages: [...pages],
    totalPages: pages.length,
  };
}
