// src/pdf/extract.ts
// Deterministic conversion of PDF.js text content into geometric text items.
//
// - Coordinates are flipped to a top-left origin, in page units.
// - Items are ordered top-to-bottom, then left-to-right.

import { percentile, stableSortBy } from './utils';
import type { PdfPageRaw, PdfTextContentLike, PdfTextItem } from './types';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null;
}

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function parseTransform(t: unknown): [number, number, number, number, number, number] {
  const tr: unknown[] = Array.isArray(t) ? t : [];
  return [asNum(tr[0]), asNum(tr[1]), asNum(tr[2]), asNum(tr[3]), asNum(tr[4]), asNum(tr[5])];
}

export function parsePageTextItems(
  pageIndex: number,
  viewport: { width: number; height: number },
  content: PdfTextContentLike
): PdfPageRaw {
  const rawItems: unknown[] = Array.isArray(content.items) ? content.items : [];

  const pageW = asNum(viewport.width, 1) || 1;
  const pageH = asNum(viewport.height, 1) || 1;

  const parsed: PdfTextItem[] = [];
  const fontSizes: number[] = [];

  for (const raw of rawItems) {
    // Marked-content entries carry no `str`.
    if (!isRecord(raw) || typeof raw.str !== 'string') continue;
    const s = raw.str;
    if (!s.trim()) continue;

    const [a, b, c, d, x, y] = parseTransform(raw.transform);
    const fontSize = Math.max(Math.hypot(a, b), Math.hypot(c, d), 0);
    if (Number.isFinite(fontSize) && fontSize > 0) fontSizes.push(fontSize);

    const w = Math.max(0, asNum(raw.width, 0));
    const h = asNum(raw.height, 0) > 0 ? asNum(raw.height, 0) : fontSize;

    // PDF origin is bottom-left, so invert y.
    parsed.push({
      pageIndex,
      str: s,
      x0: x,
      x1: x + w,
      y0: pageH - (y + h),
      y1: pageH - y,
      fontSize,
    });
  }

  const sortedFonts = fontSizes.sort((m, n) => m - n);
  const bodyFontSize = percentile(sortedFonts, 0.5);

  return {
    pageIndex,
    width: pageW,
    height: pageH,
    bodyFontSize,
    items: stableSortBy(parsed, (p) => (p.y0 * 10_000) + p.x0),
  };
}

// ---- Line-building parameter estimates (proportional to the body font size)

export function estimateSpaceThreshold(bodyFontSize: number): number {
  // Insert a space between adjacent items when their x-gap exceeds this.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 2.5;
  return Math.min(10, Math.max(1.5, bodyFontSize * 0.33));
}

export function estimateLineYTolerance(bodyFontSize: number): number {
  // Items whose vertical midpoints are this close sit on the same line.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 3.5;
  return Math.min(12, Math.max(2, bodyFontSize * 0.45));
}

export function estimateColumnGap(bodyFontSize: number): number {
  // A horizontal gap this wide inside one baseline separates two columns.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 24;
  return Math.max(12, bodyFontSize * 2.2);
}
