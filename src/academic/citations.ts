// src/academic/citations.ts
// In-text citation mentions. Every pattern scans the whole text on its own;
// matches are pooled, ordered by offset and kept once per distinct text.

import { DEFAULT_CITATION_PATTERNS } from './patterns';
import type { LabelledPattern } from './patterns';
import type { CitationMention, CitationStyle, CitationType } from './types';

export function classifyCitation(citationText: string): CitationType {
  if (/^\[\d/.test(citationText)) return 'numbered';
  if (/^\([A-Z]/.test(citationText)) return 'author_year';
  return 'other';
}

export function findInTextCitations(
  text: string,
  opts: { patterns?: readonly LabelledPattern[]; contextRadius?: number } = {}
): CitationMention[] {
  const patterns = opts.patterns ?? DEFAULT_CITATION_PATTERNS;
  const radius = opts.contextRadius ?? 50;

  const pool: CitationMention[] = [];
  for (const p of patterns) {
    const regex = new RegExp(p.regex.source, 'g');
    let m: RegExpExecArray | null;
    while ((m = regex.exec(text)) !== null) {
      const citationText = m[0];
      const position = m.index;
      const contextStart = Math.max(0, position - radius);
      const contextEnd = Math.min(text.length, position + citationText.length + radius);
      pool.push({
        citationText,
        position,
        context: text.slice(contextStart, contextEnd),
        type: classifyCitation(citationText),
      });
    }
  }

  // Same text at a later offset collapses into the earliest mention.
  const seen = new Set<string>();
  const unique: CitationMention[] = [];
  for (const c of pool.sort((a, b) => a.position - b.position)) {
    if (seen.has(c.citationText)) continue;
    seen.add(c.citationText);
    unique.push(c);
  }
  return unique;
}

export function detectCitationStyle(mentions: readonly CitationMention[]): CitationStyle {
  if (!mentions.length) return 'unknown';
  const numbered = mentions.filter((c) => c.type === 'numbered').length;
  const authorYear = mentions.filter((c) => c.type === 'author_year').length;
  if (numbered > authorYear) return 'numbered';
  if (authorYear > numbered) return 'apa_harvard';
  return 'mixed';
}
