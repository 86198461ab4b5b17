// src/academic/sections.ts
// Line classifier + two-state segmentation of document text into named sections.
//
// Text before the first recognised header belongs to no section and is dropped.
// A header with no content lines after it records nothing.

import { countWords } from '../pdf/utils';
import { DEFAULT_SECTION_PATTERNS, SECTION_NAMES } from './patterns';
import type { SectionName, SectionPatternTable } from './patterns';
import type {
  AbstractResult,
  Section,
  SectionDetection,
  SectionInfo,
  SectionSummary,
} from './types';

export const KEY_SECTION_NAMES: readonly SectionName[] = ['abstract', 'introduction', 'methods', 'results', 'conclusion'];

const TRUNCATION_MARKER = '... [truncated]';
const ABSTRACT_KEYWORDS = ['study', 'research', 'analysis', 'investigation'];

export function matchSectionHeader(
  line: string,
  patterns: SectionPatternTable = DEFAULT_SECTION_PATTERNS
): SectionName | null {
  for (const entry of patterns) {
    if (entry.patterns.some((p) => p.test(line))) return entry.name;
  }
  return null;
}

export function detectSectionsInText(
  text: string,
  patterns: SectionPatternTable = DEFAULT_SECTION_PATTERNS
): Section[] {
  const lines = String(text ?? '').split('\n');
  const sections: Section[] = [];

  type OpenSection = { name: SectionName; content: string[]; lineStart: number };
  let open: OpenSection | null = null;

  const close = (lineEnd: number) => {
    if (!open || !open.content.length) return;
    const content = open.content.join('\n').trim();
    sections.push({
      name: open.name,
      content,
      lineStart: open.lineStart,
      lineEnd,
      wordCount: countWords(open.content.join(' ')),
    });
  };

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (!line) return;

    const header = matchSectionHeader(line, patterns);
    if (header) {
      close(i - 1);
      open = { name: header, content: [], lineStart: -1 };
      return;
    }

    if (!open) return;
    if (!open.content.length) open.lineStart = i;
    open.content.push(line);
  });

  close(lines.length - 1);
  return sections;
}

/**
 * Keyed view of detected sections. A name that occurs more than once keeps
 * its first occurrence, so `sectionsFound` stays in document order. Later
 * headings of the same name are ignored, including a second "References"
 * heading that may hold the actual bibliography.
 */
export function summarizeSections(sections: readonly Section[]): SectionDetection {
  const byName: SectionDetection['sections'] = {};
  const sectionsFound: SectionName[] = [];
  for (const s of sections) {
    if (byName[s.name]) continue;
    const info: SectionInfo = {
      content: s.content,
      lineStart: s.lineStart,
      lineEnd: s.lineEnd,
      wordCount: s.wordCount,
    };
    byName[s.name] = info;
    sectionsFound.push(s.name);
  }
  return { sections: byName, sectionsFound, totalSections: sectionsFound.length };
}

export function truncateWords(content: string, limit: number): string {
  const words = content.split(/\s+/).filter(Boolean);
  if (words.length <= limit) return content;
  return words.slice(0, limit).join(' ') + TRUNCATION_MARKER;
}

export function selectKeySections(
  detection: SectionDetection,
  wordLimit: number
): Partial<Record<SectionName, string>> {
  const out: Partial<Record<SectionName, string>> = {};
  for (const name of KEY_SECTION_NAMES) {
    const section = detection.sections[name];
    if (section) out[name] = truncateWords(section.content, wordLimit);
  }
  return out;
}

/**
 * Abstract section when detected; otherwise the first of the leading
 * paragraphs that is abstract-sized and mentions research vocabulary.
 */
export function findAbstract(
  text: string,
  detection: SectionDetection,
  opts: { paragraphsScanned: number }
): AbstractResult {
  const section = detection.sections.abstract;
  if (section) {
    return { abstract: section.content, wordCount: section.wordCount, found: true };
  }

  const paragraphs = String(text ?? '').split('\n\n').slice(0, opts.paragraphsScanned);
  for (const para of paragraphs) {
    const words = countWords(para);
    if (words <= 50 || words >= 300) continue;
    const lower = para.toLowerCase();
    if (ABSTRACT_KEYWORDS.some((k) => lower.includes(k))) {
      return { abstract: para.trim(), wordCount: words, found: true, method: 'heuristic' };
    }
  }

  return { abstract: '', wordCount: 0, found: false };
}

function round1(n: number): number {
  return Math.round(n * 10) / 10;
}

export function buildSectionSummary(detection: SectionDetection, academicPaperMinSections: number): SectionSummary {
  const has = (name: SectionName) => detection.sections[name] !== undefined;

  const totalWords = detection.sectionsFound.reduce((sum, name) => sum + (detection.sections[name]?.wordCount ?? 0), 0);
  const sectionStatistics: SectionSummary['sectionStatistics'] = {};
  for (const name of SECTION_NAMES) {
    const section = detection.sections[name];
    if (!section) continue;
    sectionStatistics[name] = {
      wordCount: section.wordCount,
      percentage: totalWords > 0 ? round1((section.wordCount / totalWords) * 100) : 0,
    };
  }

  return {
    hasAbstract: has('abstract'),
    hasIntroduction: has('introduction'),
    hasMethods: has('methods'),
    hasResults: has('results'),
    hasDiscussion: has('discussion'),
    hasConclusion: has('conclusion'),
    hasReferences: has('references'),
    totalSections: detection.totalSections,
    estimatedStructure: detection.totalSections >= academicPaperMinSections ? 'academic_paper' : 'other_document',
    sectionStatistics,
  };
}
