// src/pdf/errors.ts

export type DocumentNotFoundCode = 'file_missing' | 'page_out_of_range';

/**
 * Raised at the engine boundary when a file or page does not exist.
 * Never retried; callers see it unchanged.
 */
export class DocumentNotFoundError extends Error {
  readonly code: DocumentNotFoundCode;
  readonly path: string;
  readonly pageIndex?: number;

  constructor(code: DocumentNotFoundCode, path: string, pageIndex?: number) {
    super(
      code === 'file_missing'
        ? `PDF file not found: ${path}`
        : `Page ${pageIndex} not found in PDF: ${path}`
    );
    this.name = 'DocumentNotFoundError';
    this.code = code;
    this.path = path;
    this.pageIndex = pageIndex;
  }
}
