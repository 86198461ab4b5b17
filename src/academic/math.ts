// src/academic/math.ts
// Pull mathematical notation out of block text into a side list.
//
// Patterns run one at a time, in MATH_PATTERNS order, each over the text as the
// previous patterns left it. Every match becomes `[MATH_FORMULA_n]`. Changing
// the order changes the output.

export type MathPattern = { label: string; regex: RegExp };

export const MATH_PATTERNS: readonly MathPattern[] = [
  { label: 'inline', regex: /\$[^$]+\$/g },
  { label: 'display', regex: /\$\$[^$]+\$\$/g },
  { label: 'equation', regex: /\\begin\{equation\}.*?\\end\{equation\}/gs },
  { label: 'align', regex: /\\begin\{align\}.*?\\end\{align\}/gs },
  { label: 'symbols', regex: /[∑∏∫∮∆∇α-ωΑ-Ω≤≥≠±∞]+/g },
];

export type MathIsolation = {
  text: string;
  formulas: string[];
};

export function mathPlaceholder(n: number): string {
  return `[MATH_FORMULA_${n}]`;
}

/**
 * `startAt` is the number of formulas already isolated on the page, so
 * placeholder numbers stay unique across the blocks of one page.
 */
export function isolateMathFormulas(
  text: string,
  opts: { patterns?: readonly MathPattern[]; startAt?: number } = {}
): MathIsolation {
  const patterns = opts.patterns ?? MATH_PATTERNS;
  const startAt = opts.startAt ?? 0;
  const formulas: string[] = [];

  let current = text;
  for (const p of patterns) {
    const regex = new RegExp(p.regex.source, p.regex.flags.includes('g') ? p.regex.flags : `${p.regex.flags}g`);
    current = current.replace(regex, (match) => {
      formulas.push(match);
      return mathPlaceholder(startAt + formulas.length);
    });
  }

  return { text: current, formulas };
}
