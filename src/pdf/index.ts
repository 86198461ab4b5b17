// src/pdf/index.ts
// Public entrypoints for the document engine.

export type {
  DocumentEngine,
  DocumentHandle,
  PdfBBox,
  PdfDocLike,
  PdfLine,
  PdfPageLike,
  PdfTextItem,
  TextBlock,
} from './types';

export { DocumentNotFoundError, type DocumentNotFoundCode } from './errors';
export { PdfDocumentEngine, type PdfDocumentLoader } from './engine';
export { createPdfjsEngine, loadPdfDocument } from './pdfjs';
export { detectPageLayout, sortBlocksReadingOrder, type PageLayout } from './reading-order';
