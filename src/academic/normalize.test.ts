import { describe, expect, it } from 'vitest';
import { normalizeAcademicText, NORMALIZE_STEPS } from './normalize';

describe('normalizeAcademicText', () => {
  it('runs its steps in a fixed order', () => {
    expect(NORMALIZE_STEPS.map((s) => s.label)).toEqual([
      'collapse-whitespace',
      'split-camel-join',
      'join-hyphenated',
      'tighten-punctuation',
      'paragraph-breaks',
    ]);
  });

  it('splits words glued at a lowercase-uppercase boundary', () => {
    expect(normalizeAcademicText('the modelOutperforms prior work .')).toBe('the model Outperforms prior work.');
  });

  it('joins words hyphenated across a line wrap', () => {
    expect(normalizeAcademicText('data pro- cessing and re-\nsults')).toBe('data processing and results');
  });

  it('joins chained hyphen breaks in one pass', () => {
    expect(normalizeAcademicText('a- b- c')).toBe('abc');
  });

  it('keeps a hyphen break before an uppercase word', () => {
    expect(normalizeAcademicText('self- Attention')).toBe('self- Attention');
  });

  it('removes whitespace before clause punctuation', () => {
    expect(normalizeAcademicText('one , two ; three : four .')).toBe('one, two; three: four.');
  });

  it('collapses line breaks and surrounding whitespace', () => {
    expect(normalizeAcademicText('  first line\n\n\nsecond\tline  ')).toBe('first line second line');
  });

  it('is idempotent', () => {
    const inputs = [
      're- Apply theFix - now',
      'a- b- c- dE',
      'x  ,y ;z\n\n\nNext paraGraph .',
      'Intro-\nduction with [MATH_FORMULA_1] inline.',
      '   ',
    ];
    for (const input of inputs) {
      const once = normalizeAcademicText(input);
      expect(normalizeAcademicText(once)).toBe(once);
    }
  });
});
