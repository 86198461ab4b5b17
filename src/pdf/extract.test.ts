import { describe, expect, it } from 'vitest';
import { estimateColumnGap, estimateLineYTolerance, estimateSpaceThreshold, parsePageTextItems } from './extract';

const viewport = { width: 600, height: 800 };

describe('parsePageTextItems', () => {
  it('flips coordinates to a top-left origin', () => {
    const raw = parsePageTextItems(0, viewport, {
      items: [{ str: 'Hello', transform: [12, 0, 0, 12, 100, 700], width: 40, height: 0 }],
    });

    expect(raw.bodyFontSize).toBe(12);
    expect(raw.items).toEqual([{ pageIndex: 0, str: 'Hello', x0: 100, x1: 140, y0: 88, y1: 100, fontSize: 12 }]);
  });

  it('skips marked content and blank strings', () => {
    const raw = parsePageTextItems(2, viewport, {
      items: [
        { type: 'beginMarkedContent' },
        { str: '   ', transform: [10, 0, 0, 10, 0, 0], width: 5, height: 10 },
        { str: 'kept', transform: [10, 0, 0, 10, 50, 600], width: 20, height: 10 },
      ],
    });

    expect(raw.items.map((i) => i.str)).toEqual(['kept']);
    expect(raw.pageIndex).toBe(2);
  });

  it('orders items top to bottom, then left to right', () => {
    const item = (str: string, x: number, y: number) => ({ str, transform: [10, 0, 0, 10, x, y], width: 10, height: 10 });
    const raw = parsePageTextItems(0, viewport, {
      items: [item('low', 50, 100), item('right', 300, 700), item('left', 50, 700)],
    });

    expect(raw.items.map((i) => i.str)).toEqual(['left', 'right', 'low']);
  });

  it('tolerates missing content', () => {
    expect(parsePageTextItems(0, viewport, {}).items).toEqual([]);
  });
});

describe('layout estimates', () => {
  it('scale with the body font and fall back without one', () => {
    expect(estimateSpaceThreshold(10)).toBeCloseTo(3.3);
    expect(estimateSpaceThreshold(0)).toBe(2.5);
    expect(estimateLineYTolerance(10)).toBeCloseTo(4.5);
    expect(estimateLineYTolerance(100)).toBe(12);
    expect(estimateColumnGap(10)).toBeCloseTo(22);
    expect(estimateColumnGap(Number.NaN)).toBe(24);
  });
});
