// src/pdf/utils.ts
// Small, deterministic helpers shared by the engine and the structuring pipeline.

import type { PdfBBox } from './types';

export function bboxUnion(a: PdfBBox, b: PdfBBox): PdfBBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

export function median(sortedAsc: number[]): number {
  if (!sortedAsc.length) return 0;
  const n = sortedAsc.length;
  const mid = Math.floor(n / 2);
  return n % 2 ? sortedAsc[mid] : (sortedAsc[mid - 1] + sortedAsc[mid]) / 2;
}

export function percentile(sortedAsc: number[], p01: number): number {
  if (!sortedAsc.length) return 0;
  const p = Math.max(0, Math.min(1, p01));
  const idx = (sortedAsc.length - 1) * p;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sortedAsc[lo];
  const w = idx - lo;
  return sortedAsc[lo] * (1 - w) + sortedAsc[hi] * w;
}

export function stableSortBy<T>(arr: readonly T[], key: (t: T) => number): T[] {
  return arr
    .map((v, i) => ({ v, i, k: key(v) }))
    .sort((a, b) => (a.k - b.k) || (a.i - b.i))
    .map((o) => o.v);
}

// Whitespace-token count, the word count used by every report.
export function countWords(text: string): number {
  const s = String(text ?? '').trim();
  if (!s) return 0;
  return s.split(/\s+/).length;
}
