// src/pdf/reading-order.ts
// Reading order for one page's blocks. Two-column pages are detected from block
// left edges only: blocks starting in the left third and blocks starting in the
// right third. Three or more columns fall back to plain top-to-bottom order.

import type { TextBlock } from './types';
import { stableSortBy } from './utils';

export type PageLayout = 'single-column' | 'two-column';

export function detectPageLayout(blocks: readonly TextBlock[]): PageLayout {
  if (!blocks.length) return 'single-column';
  const pageWidth = Math.max(...blocks.map((b) => b.bbox.x1));
  const hasLeft = blocks.some((b) => b.bbox.x0 < pageWidth / 3);
  const hasRight = blocks.some((b) => b.bbox.x0 > (2 * pageWidth) / 3);
  return hasLeft && hasRight ? 'two-column' : 'single-column';
}

function mergeColumnsByTop(left: TextBlock[], right: TextBlock[]): TextBlock[] {
  const out: TextBlock[] = [];
  let li = 0;
  let ri = 0;
  while (li < left.length && ri < right.length) {
    // Left column wins ties.
    if (left[li].bbox.y0 <= right[ri].bbox.y0) out.push(left[li++]);
    else out.push(right[ri++]);
  }
  out.push(...left.slice(li), ...right.slice(ri));
  return out;
}

export function sortBlocksReadingOrder(blocks: readonly TextBlock[]): TextBlock[] {
  if (!blocks.length) return [];

  const byTop = (b: TextBlock) => b.bbox.y0;
  if (detectPageLayout(blocks) === 'single-column') return stableSortBy(blocks, byTop);

  // Blocks starting in the middle band go to the nearer column.
  const pageWidth = Math.max(...blocks.map((b) => b.bbox.x1));
  const left = blocks.filter((b) => b.bbox.x0 < pageWidth / 2);
  const right = blocks.filter((b) => b.bbox.x0 >= pageWidth / 2);

  return mergeColumnsByTop(stableSortBy(left, byTop), stableSortBy(right, byTop));
}
