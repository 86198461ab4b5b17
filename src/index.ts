// src/index.ts
export * from './pdf';
export type * from './academic/types';
export { AcademicReader } from './academic-reader';
export { chunkPages, splitSentences } from './academic/chunks';
export { classifyCitation, detectCitationStyle, findInTextCitations } from './academic/citations';
export { isolateMathFormulas, MATH_PATTERNS } from './academic/math';
export { normalizeAcademicText, NORMALIZE_STEPS } from './academic/normalize';
export { assembleDocumentText, processPageBlocks } from './academic/page-processor';
export {
  DEFAULT_CITATION_PATTERNS,
  DEFAULT_REFERENCE_PATTERNS,
  DEFAULT_SECTION_PATTERNS,
  SECTION_NAMES,
} from './academic/patterns';
export { extractReferences, parseReference, referenceYearStats, segmentReferenceEntries } from './academic/references';
export {
  buildSectionSummary,
  detectSectionsInText,
  findAbstract,
  selectKeySections,
  summarizeSections,
} from './academic/sections';
export { DocumentCache } from './services/document-cache';
export { validateSettings } from './services/settings-validator';
export { DEFAULT_SETTINGS, type AcademicReaderSettings } from './types';
