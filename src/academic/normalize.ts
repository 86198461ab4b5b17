// src/academic/normalize.ts
// Cleanup for text coming out of block extraction. The steps run in a fixed
// order and the result is idempotent: normalizing twice changes nothing.

type NormalizeStep = { label: string; pattern: RegExp; replacement: string };

export const NORMALIZE_STEPS: readonly NormalizeStep[] = [
  { label: 'collapse-whitespace', pattern: /\s+/g, replacement: ' ' },
  { label: 'split-camel-join', pattern: /([a-z])([A-Z])/g, replacement: '$1 $2' },
  // Continuation must start lowercase, or step 2 would split it again.
  { label: 'join-hyphenated', pattern: /(?<=\w)-\s+(?=[a-z])/g, replacement: '' },
  { label: 'tighten-punctuation', pattern: /\s+([.,;:])/g, replacement: '$1' },
  { label: 'paragraph-breaks', pattern: /\n\s*\n/g, replacement: '\n\n' },
];

export function normalizeAcademicText(text: string): string {
  let out = String(text ?? '');
  for (const step of NORMALIZE_STEPS) {
    out = out.replace(step.pattern, step.replacement);
  }
  return out.trim();
}
