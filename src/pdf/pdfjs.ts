// src/pdf/pdfjs.ts
// PDF.js-backed loader for the document engine (Node, legacy build, no worker thread).

import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { DocumentCache } from '../services/document-cache';
import { PdfDocumentEngine } from './engine';
import { DocumentNotFoundError } from './errors';
import type { PdfDocLike } from './types';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function loadPdfDocument(path: string): Promise<PdfDocLike> {
  let data: Uint8Array;
  try {
    data = new Uint8Array(await readFile(path));
  } catch (err) {
    if (isMissingFile(err)) throw new DocumentNotFoundError('file_missing', path);
    throw err;
  }

  const loadingTask = getDocument({
    data,
    isEvalSupported: false,
    useSystemFonts: true,
    verbosity: 0,
  });
  return await loadingTask.promise;
}

export function createPdfjsEngine(cache: DocumentCache<PdfDocLike> = new DocumentCache<PdfDocLike>()): PdfDocumentEngine {
  return new PdfDocumentEngine(loadPdfDocument, cache);
}
