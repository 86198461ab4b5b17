export interface AcademicReaderSettings {
  /** Soft character ceiling for content chunks */
  chunkSize: number;
  /** Key sections longer than this many words are truncated */
  keySectionWordLimit: number;
  /** Characters of context kept on each side of a citation mention */
  citationContextRadius: number;
  /** Reference entries shorter than this are treated as noise */
  minReferenceLength: number;
  // More mentions than this marks a paper as heavily cited.
  heavilyCitedThreshold: number;
  // References from this year onwards count as recent.
  recentReferenceYear: number;
  academicPaperMinSections: number;
  // Leading paragraphs searched when no abstract header exists.
  abstractParagraphsScanned: number;
}

export const DEFAULT_SETTINGS: AcademicReaderSettings = {
  chunkSize: 1000,
  keySectionWordLimit: 500,
  citationContextRadius: 50,
  minReferenceLength: 20,
  heavilyCitedThreshold: 20,
  recentReferenceYear: 2015,
  academicPaperMinSections: 4,
  abstractParagraphsScanned: 5,
};
