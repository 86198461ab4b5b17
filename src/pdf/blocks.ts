// src/pdf/blocks.ts
// Group line segments into positioned text blocks.
// A line joins the most recent block whose last line overlaps it horizontally,
// sits just above it, and shares its font size. Blocks keep creation order.

import type { PdfBBox, PdfLine, TextBlock } from './types';
import { bboxUnion } from './utils';

type BlockBuildOpts = {
  bodyFontSize: number;
};

export function estimateBlockGap(bodyFontSize: number): number {
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 6;
  return Math.max(2, bodyFontSize * 0.8);
}

function overlapsHorizontally(a: PdfBBox, b: PdfBBox): boolean {
  return Math.min(a.x1, b.x1) - Math.max(a.x0, b.x0) > 0;
}

export function buildTextBlocks(pageIndex: number, lines: PdfLine[], opts: BlockBuildOpts): TextBlock[] {
  if (!lines.length) return [];

  const maxGap = estimateBlockGap(opts.bodyFontSize);
  const maxFontJump = Math.max(0.8, opts.bodyFontSize * 0.22);

  type BlockAcc = { lines: PdfLine[]; bbox: PdfBBox };
  const acc: BlockAcc[] = [];

  for (const ln of lines) {
    let target: BlockAcc | undefined;
    for (let i = acc.length - 1; i >= 0; i--) {
      const last = acc[i].lines[acc[i].lines.length - 1];
      if (!overlapsHorizontally(last.bbox, ln.bbox)) continue;
      const gap = ln.bbox.y0 - last.bbox.y1;
      // Font discontinuity (headings, captions) starts a new block.
      const fontJump = Math.abs(ln.fontSize - last.fontSize) > maxFontJump;
      if (gap <= maxGap && !fontJump) target = acc[i];
      break;
    }

    if (target) {
      target.lines.push(ln);
      target.bbox = bboxUnion(target.bbox, ln.bbox);
    } else {
      acc.push({ lines: [ln], bbox: { ...ln.bbox } });
    }
  }

  return acc.map((b, blockIndex) => ({
    text: b.lines.map((l) => l.text).join('\n'),
    bbox: b.bbox,
    blockIndex,
    pageIndex,
  }));
}
