import { describe, expect, it } from 'vitest';
import { AcademicReader } from './academic-reader';
import { PdfDocumentEngine } from './pdf/engine';
import { DocumentNotFoundError } from './pdf/errors';
import type { DocumentEngine, DocumentHandle, PdfDocLike, TextBlock } from './pdf/types';
import { DEFAULT_SETTINGS } from './types';

const RAW_TEXT = [
  'A Study of Things',
  'Abstract',
  'We study how things work (Smith, 2020) and why [1].',
  'Introduction',
  'Things matter (Smith, 2020). Others disagree (Lee & Park, 2019).',
  'Methods',
  'We measured things [2].',
  'Results',
  'Things worked.',
  'References',
  '[1] Smith, A. (2020). Things. Journal of Things, 5, 1-10.',
  '[2] Lee, K., & Park, J. (2012). Other things. Review, 2(1), 3-9.',
].join('\n');

function block(text: string, y0: number): TextBlock {
  return { text, bbox: { x0: 50, y0, x1: 550, y1: y0 + 20 }, blockIndex: 0, pageIndex: 0 };
}

/** In-memory engine serving one document. */
class FakeEngine implements DocumentEngine {
  constructor(
    private readonly path: string,
    private readonly rawText: string,
    private readonly pages: TextBlock[][]
  ) {}

  private ensure(path: string) {
    if (path !== this.path) throw new DocumentNotFoundError('file_missing', path);
  }

  async getRawText(path: string): Promise<string> {
    this.ensure(path);
    return this.rawText;
  }

  async getPageBlocks(path: string, pageIndex: number): Promise<TextBlock[]> {
    this.ensure(path);
    const blocks = this.pages[pageIndex];
    if (!blocks) throw new DocumentNotFoundError('page_out_of_range', path, pageIndex);
    return blocks;
  }

  async getDocument(path: string): Promise<DocumentHandle> {
    this.ensure(path);
    return { pageCount: this.pages.length };
  }
}

const engine = new FakeEngine('paper.pdf', RAW_TEXT, [
  [block('First sentence here. Second one.', 100)],
  [block('Third sentence.', 100)],
]);
const reader = new AcademicReader(engine);

describe('AcademicReader', () => {
  it('detects sections from the raw text', async () => {
    const detection = await reader.detectSections('paper.pdf');

    expect(detection.sectionsFound).toEqual(['abstract', 'introduction', 'methods', 'results', 'references']);
    expect(detection.totalSections).toBe(5);
  });

  it('reads the abstract section', async () => {
    expect(await reader.extractAbstract('paper.pdf')).toEqual({
      abstract: 'We study how things work (Smith, 2020) and why [1].',
      wordCount: 10,
      found: true,
    });
  });

  it('truncates key sections to the configured word limit', async () => {
    const shortReader = new AcademicReader(engine, { ...DEFAULT_SETTINGS, keySectionWordLimit: 5 });

    expect(await shortReader.extractKeySections('paper.pdf')).toEqual({
      abstract: 'We study how things work... [truncated]',
      introduction: 'Things matter (Smith, 2020). Others... [truncated]',
      methods: 'We measured things [2].',
      results: 'Things worked.',
    });
  });

  it('extracts citations and references', async () => {
    const data = await reader.extractCitations('paper.pdf');

    expect(data.inTextCitations.map((c) => c.citationText)).toEqual([
      '(Smith, 2020)',
      '[1]',
      '(Lee & Park, 2019)',
      '[2]',
    ]);
    expect(data.citationStyle).toBe('mixed');
    expect(data.references.map((r) => [r.referenceNumber, r.year, r.journal])).toEqual([
      [1, '2020', 'Journal of Things'],
      [2, '2012', 'Review'],
    ]);
  });

  it('summarises citations', async () => {
    expect(await reader.getCitationSummary('paper.pdf')).toEqual({
      totalCitations: 4,
      totalReferences: 2,
      citationStyle: 'mixed',
      hasBibliography: true,
      heavilyCited: false,
      referenceYears: { min: 2012, max: 2020, range: 8, recentCount: 1 },
    });
  });

  it('returns processed text for one page or the whole document', async () => {
    const page = await reader.extractAcademicText('paper.pdf', 1);
    const doc = await reader.extractAcademicText('paper.pdf');

    expect(page).toEqual({ pageIndex: 1, processedText: 'Third sentence.', mathFormulas: [], blockCount: 1 });
    expect(doc.fullText).toBe('First sentence here. Second one.\n\nThird sentence.');
    expect(doc.totalPages).toBe(2);
  });

  it('chunks content across pages', async () => {
    expect(await reader.chunkAcademicContent('paper.pdf')).toEqual([
      { chunkId: 0, text: 'First sentence here. Second one. Third sentence.', pageStart: 0, pageEnd: 1, wordCount: 7 },
    ]);
  });

  it('analyses the overall structure', async () => {
    const analysis = await reader.analyzeDocumentStructure('paper.pdf');

    expect(analysis.documentType).toBe('academic_paper');
    expect(analysis.pageCount).toBe(2);
    expect(analysis.sections.hasConclusion).toBe(false);
    expect(analysis.citations.totalReferences).toBe(2);
  });

  it('propagates engine errors', async () => {
    await expect(reader.detectSections('other.pdf')).rejects.toMatchObject({ code: 'file_missing' });
    await expect(reader.extractAcademicText('paper.pdf', 5)).rejects.toBeInstanceOf(DocumentNotFoundError);
  });
});

describe('AcademicReader over PdfDocumentEngine', () => {
  const words = (first: string, n: number) => [first, ...Array.from({ length: n - 1 }, () => 'word')].join(' ');
  const abstract = `This ${words('study', 59)}`;
  const body = words('Body', 350);

  const textItem = (str: string, y: number, width: number) => ({
    str,
    transform: [10, 0, 0, 10, 50, y],
    width,
    height: 10,
  });

  const doc: PdfDocLike = {
    numPages: 1,
    getPage: async () => ({
      getViewport: () => ({ width: 600, height: 800 }),
      getTextContent: async () => ({
        items: [textItem('A Title Here', 740, 100), textItem(abstract, 690, 500), textItem(body, 590, 500)],
      }),
    }),
  };

  it('separates blocks with blank lines so the abstract fallback sees paragraphs', async () => {
    const engine = new PdfDocumentEngine(async () => doc);
    const pdfReader = new AcademicReader(engine);

    const raw = await engine.getRawText('untitled.pdf');
    expect(raw.split('\n\n')).toEqual(['A Title Here', abstract, body]);

    expect(await pdfReader.extractAbstract('untitled.pdf')).toEqual({
      abstract,
      wordCount: 60,
      found: true,
      method: 'heuristic',
    });
  });
});
