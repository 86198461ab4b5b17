// src/academic/references.ts
// Reference-list parsing, scoped to the content of a detected references section.
// Field extraction is best-effort: raw text and number are always kept, the
// rest stays empty when no pattern fits.

import { DEFAULT_REFERENCE_PATTERNS } from './patterns';
import type { ReferencePatternTable } from './patterns';
import type { ReferenceEntry, ReferenceYearStats } from './types';

export function segmentReferenceEntries(
  content: string,
  patterns: ReferencePatternTable = DEFAULT_REFERENCE_PATTERNS
): string[] {
  const lines = String(content ?? '')
    .split('\n')
    .map((l) => l.trim())
    .filter(Boolean);

  const entries: string[] = [];
  let current = '';
  for (const line of lines) {
    const startsEntry = patterns.entryStart.some((p) => p.test(line));
    if (startsEntry) {
      if (current) entries.push(current);
      current = line;
    } else {
      current = current ? `${current} ${line}` : line;
    }
  }
  if (current) entries.push(current);
  return entries;
}

function stripMarker(text: string, patterns: ReferencePatternTable): string {
  return patterns.markers.reduce((s, p) => s.replace(p, ''), text);
}

export function parseReference(
  rawText: string,
  referenceNumber: number,
  patterns: ReferencePatternTable = DEFAULT_REFERENCE_PATTERNS
): ReferenceEntry {
  const text = rawText.trim();
  const entry: ReferenceEntry = {
    referenceNumber,
    rawText: text,
    authorsRaw: '',
    year: '',
    title: '',
    journal: '',
    volume: '',
    issue: '',
    pages: '',
  };

  const yearMatch = patterns.year.exec(text);
  if (yearMatch) {
    entry.year = yearMatch[1];
    entry.authorsRaw = stripMarker(text.slice(0, yearMatch.index).trim(), patterns).trim();
  }

  const doiMatch = patterns.doi.exec(text);
  if (doiMatch) entry.doi = doiMatch[1];

  const urlMatch = patterns.url.exec(text);
  if (urlMatch) entry.url = urlMatch[0];

  const body = stripMarker(text, patterns);
  for (const field of patterns.fields) {
    const groups = field.regex.exec(body)?.groups;
    if (!groups) continue;
    entry.title = groups.title?.trim() ?? '';
    entry.journal = groups.journal?.trim() ?? '';
    entry.volume = groups.volume ?? '';
    entry.issue = groups.issue ?? '';
    entry.pages = groups.pages?.replace(/\s+/g, '') ?? '';
    break;
  }

  return entry;
}

/**
 * Entries shorter than `minLength` are noise and skipped; numbering counts
 * kept entries only, starting at 1.
 */
export function extractReferences(
  content: string,
  opts: { minLength?: number; patterns?: ReferencePatternTable } = {}
): ReferenceEntry[] {
  const minLength = opts.minLength ?? 20;
  const patterns = opts.patterns ?? DEFAULT_REFERENCE_PATTERNS;

  const out: ReferenceEntry[] = [];
  for (const raw of segmentReferenceEntries(content, patterns)) {
    if (raw.trim().length < minLength) continue;
    out.push(parseReference(raw, out.length + 1, patterns));
  }
  return out;
}

export function referenceYearStats(references: readonly ReferenceEntry[], recentYear = 2015): ReferenceYearStats {
  const years = references
    .map((r) => Number.parseInt(r.year.slice(0, 4), 10))
    .filter((y) => Number.isFinite(y));

  if (!years.length) return { min: null, max: null, range: 0, recentCount: 0 };

  const min = Math.min(...years);
  const max = Math.max(...years);
  return {
    min,
    max,
    range: max - min,
    recentCount: years.filter((y) => y >= recentYear).length,
  };
}
