// src/academic-reader.ts
import { chunkPages } from './academic/chunks';
import { detectCitationStyle, findInTextCitations } from './academic/citations';
import { assembleDocumentText, processPageBlocks } from './academic/page-processor';
import { extractReferences, referenceYearStats } from './academic/references';
import {
  buildSectionSummary,
  detectSectionsInText,
  findAbstract,
  selectKeySections,
  summarizeSections,
} from './academic/sections';
import type {
  AbstractResult,
  AcademicDocumentText,
  Chunk,
  CitationExtraction,
  CitationSummary,
  DocumentStructureAnalysis,
  ProcessedPage,
  SectionDetection,
  SectionName,
  SectionSummary,
} from './academic/types';
import type { DocumentEngine } from './pdf/types';
import { DEFAULT_SETTINGS, type AcademicReaderSettings } from './types';

/**
 * Academic structure operations over documents served by a {@link DocumentEngine}.
 *
 * Section and citation operations read the engine's raw text; text and chunk
 * operations read positioned blocks page by page. Engine errors propagate
 * unchanged, heuristic misses come back as empty results.
 */
export class AcademicReader {
  private readonly engine: DocumentEngine;
  private readonly settings: AcademicReaderSettings;

  constructor(engine: DocumentEngine, settings: AcademicReaderSettings = DEFAULT_SETTINGS) {
    this.engine = engine;
    this.settings = settings;
  }

  async detectSections(path: string): Promise<SectionDetection> {
    const text = await this.engine.getRawText(path);
    return summarizeSections(detectSectionsInText(text));
  }

  async extractKeySections(path: string): Promise<Partial<Record<SectionName, string>>> {
    const detection = await this.detectSections(path);
    return selectKeySections(detection, this.settings.keySectionWordLimit);
  }

  async extractAbstract(path: string): Promise<AbstractResult> {
    const text = await this.engine.getRawText(path);
    const detection = summarizeSections(detectSectionsInText(text));
    return findAbstract(text, detection, { paragraphsScanned: this.settings.abstractParagraphsScanned });
  }

  async getSectionSummary(path: string): Promise<SectionSummary> {
    const detection = await this.detectSections(path);
    return buildSectionSummary(detection, this.settings.academicPaperMinSections);
  }

  async extractCitations(path: string): Promise<CitationExtraction> {
    const text = await this.engine.getRawText(path);
    const inTextCitations = findInTextCitations(text, { contextRadius: this.settings.citationContextRadius });

    const detection = summarizeSections(detectSectionsInText(text));
    const referencesSection = detection.sections.references;
    const references = referencesSection
      ? extractReferences(referencesSection.content, { minLength: this.settings.minReferenceLength })
      : [];

    return {
      inTextCitations,
      references,
      citationCount: inTextCitations.length,
      referenceCount: references.length,
      citationStyle: detectCitationStyle(inTextCitations),
    };
  }

  async getCitationSummary(path: string): Promise<CitationSummary> {
    const data = await this.extractCitations(path);
    return {
      totalCitations: data.citationCount,
      totalReferences: data.referenceCount,
      citationStyle: data.citationStyle,
      hasBibliography: data.referenceCount > 0,
      heavilyCited: data.citationCount > this.settings.heavilyCitedThreshold,
      referenceYears: referenceYearStats(data.references, this.settings.recentReferenceYear),
    };
  }

  extractAcademicText(path: string): Promise<AcademicDocumentText>;
  extractAcademicText(path: string, pageIndex: number): Promise<ProcessedPage>;
  async extractAcademicText(path: string, pageIndex?: number): Promise<AcademicDocumentText | ProcessedPage> {
    if (pageIndex !== undefined) return this.processPage(path, pageIndex);
    return assembleDocumentText(await this.processAllPages(path));
  }

  async chunkAcademicContent(path: string, chunkSize: number = this.settings.chunkSize): Promise<Chunk[]> {
    const pages = await this.processAllPages(path);
    return chunkPages(
      pages.map((p) => ({ pageIndex: p.pageIndex, text: p.processedText })),
      { chunkSize }
    );
  }

  async analyzeDocumentStructure(path: string): Promise<DocumentStructureAnalysis> {
    const handle = await this.engine.getDocument(path);
    const sections = await this.getSectionSummary(path);
    const citations = await this.getCitationSummary(path);
    return {
      documentType: sections.estimatedStructure,
      pageCount: handle.pageCount,
      sections,
      citations,
    };
  }

  private async processPage(path: string, pageIndex: number): Promise<ProcessedPage> {
    const blocks = await this.engine.getPageBlocks(path, pageIndex);
    return processPageBlocks(pageIndex, blocks);
  }

  private async processAllPages(path: string): Promise<ProcessedPage[]> {
    const { pageCount } = await this.engine.getDocument(path);
    const pages: ProcessedPage[] = [];
    for (let i = 0; i < pageCount; i++) {
      pages.push(await this.processPage(path, i));
    }
    return pages;
  }
}
