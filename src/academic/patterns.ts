// src/academic/patterns.ts
// Compiles the pattern tables in patterns.json. Matchers take these as
// parameters, so tables can be swapped or tuned without touching control flow.

import table from './patterns.json';

export const SECTION_NAMES = [
  'abstract',
  'introduction',
  'methods',
  'results',
  'discussion',
  'conclusion',
  'references',
] as const;

export type SectionName = (typeof SECTION_NAMES)[number];

export type SectionPatternTable = ReadonlyArray<{ name: SectionName; patterns: readonly RegExp[] }>;

export type LabelledPattern = { label: string; regex: RegExp };

export type ReferencePatternTable = {
  entryStart: readonly RegExp[];
  markers: readonly RegExp[];
  year: RegExp;
  doi: RegExp;
  url: RegExp;
  fields: readonly LabelledPattern[];
};

export function isSectionName(value: string): value is SectionName {
  return (SECTION_NAMES as readonly string[]).includes(value);
}

// Header lines are matched case-insensitively.
export function compileSectionPatterns(
  entries: ReadonlyArray<{ name: string; patterns: readonly string[] }>
): SectionPatternTable {
  return entries.map((entry) => {
    const name = entry.name;
    if (!isSectionName(name)) throw new Error(`Unknown section name in pattern table: ${name}`);
    return { name, patterns: entry.patterns.map((p) => new RegExp(p, 'i')) };
  });
}

export function compileLabelledPatterns(
  entries: ReadonlyArray<{ label: string; source: string }>,
  flags = ''
): LabelledPattern[] {
  return entries.map((e) => ({ label: e.label, regex: new RegExp(e.source, flags) }));
}

export function compileReferencePatterns(refs: typeof table.references): ReferencePatternTable {
  return {
    entryStart: refs.entryStart.map((p) => new RegExp(p)),
    markers: refs.markers.map((p) => new RegExp(p)),
    year: new RegExp(refs.year),
    doi: new RegExp(refs.doi, 'i'),
    url: new RegExp(refs.url),
    fields: compileLabelledPatterns(refs.fields),
  };
}

export const DEFAULT_SECTION_PATTERNS: SectionPatternTable = compileSectionPatterns(table.sections);
export const DEFAULT_CITATION_PATTERNS: readonly LabelledPattern[] = compileLabelledPatterns(table.citations);
export const DEFAULT_REFERENCE_PATTERNS: ReferencePatternTable = compileReferencePatterns(table.references);
