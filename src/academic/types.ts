// src/academic/types.ts
// Structured academic output. Every value is built fresh per call and never
// mutated afterwards.

import type { SectionName } from './patterns';

export type { SectionName } from './patterns';

export type ProcessedPage = {
  pageIndex: number;
  processedText: string;
  // [MATH_FORMULA_n] in processedText refers to mathFormulas[n - 1].
  mathFormulas: string[];
  blockCount: number;
};

export type AcademicDocumentText = {
  fullText: string;
  pages: ProcessedPage[];
  totalPages: number;
};

export type Section = {
  name: SectionName;
  content: string;
  lineStart: number;
  lineEnd: number;
  wordCount: number;
};

export type SectionInfo = Omit<Section, 'name'>;

export type SectionDetection = {
  sections: Partial<Record<SectionName, SectionInfo>>;
  sectionsFound: SectionName[];
  totalSections: number;
};

export type DocumentStructure = 'academic_paper' | 'other_document';

export type SectionSummary = {
  hasAbstract: boolean;
  hasIntroduction: boolean;
  hasMethods: boolean;
  hasResults: boolean;
  hasDiscussion: boolean;
  hasConclusion: boolean;
  hasReferences: boolean;
  totalSections: number;
  estimatedStructure: DocumentStructure;
  sectionStatistics: Partial<Record<SectionName, { wordCount: number; percentage: number }>>;
};

export type AbstractResult = {
  abstract: string;
  wordCount: number;
  found: boolean;
  method?: 'heuristic';
};

export type CitationType = 'numbered' | 'author_year' | 'other';

export type CitationMention = {
  citationText: string;
  // Character offset into the full document text.
  position: number;
  context: string;
  type: CitationType;
};

export type CitationStyle = 'numbered' | 'apa_harvard' | 'mixed' | 'unknown';

export type ReferenceEntry = {
  referenceNumber: number;
  rawText: string;
  authorsRaw: string;
  year: string;
  title: string;
  journal: string;
  volume: string;
  issue: string;
  pages: string;
  doi?: string;
  url?: string;
};

export type ReferenceYearStats = {
  min: number | null;
  max: number | null;
  range: number;
  recentCount: number;
};

export type CitationExtraction = {
  inTextCitations: CitationMention[];
  references: ReferenceEntry[];
  citationCount: number;
  referenceCount: number;
  citationStyle: CitationStyle;
};

export type CitationSummary = {
  totalCitations: number;
  totalReferences: number;
  citationStyle: CitationStyle;
  hasBibliography: boolean;
  heavilyCited: boolean;
  referenceYears: ReferenceYearStats;
};

export type Chunk = {
  chunkId: number;
  text: string;
  pageStart: number;
  pageEnd: number;
  wordCount: number;
};

export type DocumentStructureAnalysis = {
  documentType: DocumentStructure;
  pageCount: number;
  sections: SectionSummary;
  citations: CitationSummary;
};
