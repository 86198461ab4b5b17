// src/pdf/lines.ts
// Convert raw text items into ordered line segments.
// A baseline that crosses a wide horizontal gap is split, so the two halves of a
// two-column page never merge into one line.

import type { PdfLine, PdfTextItem } from './types';
import { bboxUnion, median, stableSortBy } from './utils';
import { estimateColumnGap, estimateLineYTolerance, estimateSpaceThreshold } from './extract';

type LineBuilderOpts = {
  bodyFontSize: number;
};

function mkBBoxFromItem(it: PdfTextItem) {
  return { x0: it.x0, y0: it.y0, x1: it.x1, y1: it.y1 };
}

function mergeLineText(itemsSortedX: PdfTextItem[], spaceGap: number): string {
  let out = '';
  let prevX1 = Number.NEGATIVE_INFINITY;

  for (const it of itemsSortedX) {
    const s = String(it.str ?? '').replace(/\s+/g, ' ');
    if (!s.trim()) continue;

    const gap = it.x0 - prevX1;
    const needSpace = out.length > 0 && !/\s$/.test(out) && !/^\s/.test(s) && gap > spaceGap;
    if (needSpace) out += ' ';
    out += s;
    prevX1 = Math.max(prevX1, it.x1);
  }

  return out.replace(/\s+/g, ' ').trim();
}

function splitAtColumnGaps(itemsSortedX: PdfTextItem[], columnGap: number): PdfTextItem[][] {
  const segments: PdfTextItem[][] = [];
  let current: PdfTextItem[] = [];
  let prevX1 = Number.NEGATIVE_INFINITY;
  for (const it of itemsSortedX) {
    if (current.length && it.x0 - prevX1 > columnGap) {
      segments.push(current);
      current = [];
      prevX1 = Number.NEGATIVE_INFINITY;
    }
    current.push(it);
    prevX1 = Math.max(prevX1, it.x1);
  }
  if (current.length) segments.push(current);
  return segments;
}

export function buildLines(pageIndex: number, items: PdfTextItem[], opts: LineBuilderOpts): PdfLine[] {
  if (!items.length) return [];

  const yTol = estimateLineYTolerance(opts.bodyFontSize);
  const spaceGap = estimateSpaceThreshold(opts.bodyFontSize);
  const columnGap = estimateColumnGap(opts.bodyFontSize);

  const sorted = stableSortBy(items, (it) => (it.y0 * 10_000) + it.x0);

  type LineAcc = {
    items: PdfTextItem[];
    yMid: number;
  };

  const rows: LineAcc[] = [];

  for (const it of sorted) {
    const yMid = (it.y0 + it.y1) / 2;
    // Deterministic placement: first matching row by insertion order.
    const row = rows.find((r) => Math.abs(r.yMid - yMid) <= yTol);
    if (row) {
      row.items.push(it);
      row.yMid = (row.yMid + yMid) / 2;
    } else {
      rows.push({ items: [it], yMid });
    }
  }

  const out: PdfLine[] = [];
  for (const row of rows) {
    const itemsX = stableSortBy(row.items, (it) => it.x0);
    for (const segment of splitAtColumnGaps(itemsX, columnGap)) {
      const text = mergeLineText(segment, spaceGap);
      if (!text) continue;

      let bb = mkBBoxFromItem(segment[0]);
      for (let i = 1; i < segment.length; i++) bb = bboxUnion(bb, mkBBoxFromItem(segment[i]));

      const fonts = segment.map((it) => it.fontSize).filter((n) => Number.isFinite(n) && n > 0).sort((a, b) => a - b);

      out.push({
        pageIndex,
        items: segment,
        text,
        bbox: bb,
        yMid: row.yMid,
        fontSize: fonts.length ? median(fonts) : 0,
      });
    }
  }

  // Order lines top-to-bottom, then left-to-right.
  return out.sort((a, b) => a.yMid - b.yMid || a.bbox.x0 - b.bbox.x0);
}
