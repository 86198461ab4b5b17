import { describe, expect, it } from 'vitest';
import { isolateMathFormulas, MATH_PATTERNS } from './math';

describe('isolateMathFormulas', () => {
  it('replaces inline math with numbered placeholders in match order', () => {
    const result = isolateMathFormulas('Energy $E=mc^2$ and $$x+y$$ ok');

    // The inline pattern runs first and takes the inner "$x+y$" of the display formula.
    expect(result.formulas).toEqual(['$E=mc^2$', '$x+y$']);
    expect(result.text).toBe('Energy [MATH_FORMULA_1] and $[MATH_FORMULA_2]$ ok');
  });

  it('applies patterns in the order given', () => {
    const [inline, display] = MATH_PATTERNS;

    expect(isolateMathFormulas('$$x$$').text).toBe('$[MATH_FORMULA_1]$');
    expect(isolateMathFormulas('$$x$$', { patterns: [display, inline] })).toEqual({
      text: '[MATH_FORMULA_1]',
      formulas: ['$$x$$'],
    });
  });

  it('captures equation environments across lines', () => {
    const result = isolateMathFormulas('see \\begin{equation}\na=b\n\\end{equation} here');

    expect(result.formulas).toEqual(['\\begin{equation}\na=b\n\\end{equation}']);
    expect(result.text).toBe('see [MATH_FORMULA_1] here');
  });

  it('treats a run of math symbols as one formula', () => {
    const result = isolateMathFormulas('where α and β≤γ hold');

    expect(result.formulas).toEqual(['α', 'β≤γ']);
    expect(result.text).toBe('where [MATH_FORMULA_1] and [MATH_FORMULA_2] hold');
  });

  it('numbers placeholders after startAt', () => {
    expect(isolateMathFormulas('x $a$', { startAt: 2 }).text).toBe('x [MATH_FORMULA_3]');
  });

  it('leaves plain prose untouched', () => {
    expect(isolateMathFormulas('No formulas here.')).toEqual({ text: 'No formulas here.', formulas: [] });
  });
});
