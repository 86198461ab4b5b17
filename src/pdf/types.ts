// src/pdf/types.ts
// Data model for the document engine: positioned text items, lines and blocks.
// Coordinates are PDF page units with a top-left origin (y grows downwards).

export type PdfBBox = {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
};

export type PdfTextItem = {
  pageIndex: number;
  str: string;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
  fontSize: number;
};

export type PdfLine = {
  pageIndex: number;
  items: PdfTextItem[];
  text: string;
  bbox: PdfBBox;
  yMid: number;
  fontSize: number;
};

/** One positioned run of text as the engine reports it. Immutable. */
export type TextBlock = {
  text: string;
  bbox: PdfBBox;
  blockIndex: number;
  pageIndex: number;
};

export type PdfPageRaw = {
  pageIndex: number;
  width: number;
  height: number;
  bodyFontSize: number;
  items: PdfTextItem[];
};

// ---- Minimal PDF.js-like surface types
// Kept tiny so the engine can run against PDF.js proxies or a stand-in
// without coupling the rest of the pipeline to a particular PDF.js build.

export type PdfTextContentLike = {
  items?: unknown;
};

export type PdfPageLike = {
  getViewport: (opts: { scale: number }) => { width: number; height: number };
  getTextContent: () => Promise<PdfTextContentLike>;
};

export type PdfDocLike = {
  numPages: number;
  getPage: (pageNum: number) => Promise<PdfPageLike>;
  destroy?: () => Promise<void>;
};

export type DocumentHandle = {
  pageCount: number;
};

/**
 * The boundary the structuring pipeline consumes. Page indexes are 0-based.
 * Implementations throw `DocumentNotFoundError` for a missing file or
 * an out-of-range page.
 */
export interface DocumentEngine {
  getRawText(path: string, pageIndex?: number): Promise<string>;
  getPageBlocks(path: string, pageIndex: number): Promise<TextBlock[]>;
  getDocument(path: string): Promise<DocumentHandle>;
}
