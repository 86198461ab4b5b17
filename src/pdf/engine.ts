// src/pdf/engine.ts
// Document engine over PDF.js-like documents: text items -> lines -> blocks.
// Loading is delegated to an injected loader and shared through a DocumentCache.

import { DocumentCache } from '../services/document-cache';
import { buildTextBlocks } from './blocks';
import { DocumentNotFoundError } from './errors';
import { parsePageTextItems } from './extract';
import { buildLines } from './lines';
import type { DocumentEngine, DocumentHandle, PdfDocLike, PdfLine, PdfPageRaw, TextBlock } from './types';

export type PdfDocumentLoader = (path: string) => Promise<PdfDocLike>;

export class PdfDocumentEngine implements DocumentEngine {
  private readonly loader: PdfDocumentLoader;
  private readonly cache: DocumentCache<PdfDocLike>;

  constructor(loader: PdfDocumentLoader, cache: DocumentCache<PdfDocLike> = new DocumentCache<PdfDocLike>()) {
    this.loader = loader;
    this.cache = cache;
  }

  async getDocument(path: string): Promise<DocumentHandle> {
    const doc = await this.loadDocument(path);
    return { pageCount: doc.numPages };
  }

  async getPageBlocks(path: string, pageIndex: number): Promise<TextBlock[]> {
    const { raw, lines } = await this.readLines(path, pageIndex);
    return buildTextBlocks(pageIndex, lines, { bodyFontSize: raw.bodyFontSize });
  }

  async getRawText(path: string, pageIndex?: number): Promise<string> {
    if (pageIndex !== undefined) return this.pageRawText(path, pageIndex);

    const doc = await this.loadDocument(path);
    const pages: string[] = [];
    for (let i = 0; i < doc.numPages; i++) {
      pages.push(await this.pageRawText(path, i));
    }
    return pages.join('\n\n').trim();
  }

  /** Disposes every cached document. */
  async close(): Promise<void> {
    await this.cache.clear(async (doc) => {
      if (doc.destroy) await doc.destroy();
    });
  }

  // Blank line between blocks, so paragraph scans see one block at a time.
  private async pageRawText(path: string, pageIndex: number): Promise<string> {
    const blocks = await this.getPageBlocks(path, pageIndex);
    return blocks.map((b) => b.text).join('\n\n');
  }

  private loadDocument(path: string): Promise<PdfDocLike> {
    return this.cache.get(path, async (key) => {
      try {
        return await this.loader(key);
      } catch (err) {
        if (!(err instanceof DocumentNotFoundError)) {
          console.error('[academic-reader][engine] failed to load document', { path: key, err });
        }
        throw err;
      }
    });
  }

  private async readPage(path: string, pageIndex: number): Promise<PdfPageRaw> {
    const doc = await this.loadDocument(path);
    if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= doc.numPages) {
      throw new DocumentNotFoundError('page_out_of_range', path, pageIndex);
    }
    const page = await doc.getPage(pageIndex + 1);
    const content = await page.getTextContent();
    return parsePageTextItems(pageIndex, page.getViewport({ scale: 1 }), content);
  }

  private async readLines(path: string, pageIndex: number): Promise<{ raw: PdfPageRaw; lines: PdfLine[] }> {
    const raw = await this.readPage(path, pageIndex);
    const lines = buildLines(pageIndex, raw.items, { bodyFontSize: raw.bodyFontSize });
    return { raw, lines };
  }
}
