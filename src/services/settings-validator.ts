/**
 * SettingsValidator - Validates and sanitizes reader settings
 *
 * PURPOSE
 * ───────
 * Settings arrive from a JSON file or from callers as loosely typed objects.
 * Every numeric field is checked and clamped so the pipeline never runs with
 * a negative chunk size or a zero context window.
 *
 * KEY RESPONSIBILITIES
 * ────────────────────
 * - Validate numeric ranges (chunk size, word limits, thresholds)
 * - Apply default values for missing properties
 * - Clamp out-of-range values instead of rejecting them
 * - Round fields that count things to whole numbers
 *
 * USAGE
 * ─────
 * ```typescript
 * const raw: unknown = JSON.parse(await readFile(configPath, 'utf8'));
 * const settings = validateSettings(raw);
 * const reader = new AcademicReader(engine, settings);
 * ```
 */

import { type AcademicReaderSettings, DEFAULT_SETTINGS } from '../types';

/**
 * Validation limits for numeric settings
 */
export const LIMITS = {
  chunkSize: { min: 100, max: 100_000 },
  keySectionWordLimit: { min: 10, max: 100_000 },
  citationContextRadius: { min: 0, max: 1000 },
  minReferenceLength: { min: 1, max: 1000 },
  heavilyCitedThreshold: { min: 0, max: 100_000 },
  recentReferenceYear: { min: 1000, max: 9999 },
  academicPaperMinSections: { min: 1, max: 7 },
  abstractParagraphsScanned: { min: 1, max: 100 }
} as const;

/**
 * Clamps a number between min and max values
 */
function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates a whole number and clamps it to the specified range
 */
function validateInteger(
  value: unknown,
  defaultValue: number,
  min: number,
  max: number
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return defaultValue;
  }
  return clamp(Math.round(value), min, max);
}

/**
 * Validates and sanitizes reader settings
 *
 * @param partial - Settings object from a config file or a caller; anything else yields defaults
 * @returns Fully valid settings with defaults applied
 */
export function validateSettings(partial: unknown): AcademicReaderSettings {
  // Handle null/undefined/non-objects by returning defaults
  if (!isRecord(partial)) {
    return { ...DEFAULT_SETTINGS };
  }

  const num = (key: keyof typeof LIMITS) =>
    validateInteger(partial[key], DEFAULT_SETTINGS[key], LIMITS[key].min, LIMITS[key].max);

  return {
    chunkSize: num('chunkSize'),
    keySectionWordLimit: num('keySectionWordLimit'),
    citationContextRadius: num('citationContextRadius'),
    minReferenceLength: num('minReferenceLength'),
    heavilyCitedThreshold: num('heavilyCitedThreshold'),
    recentReferenceYear: num('recentReferenceYear'),
    academicPaperMinSections: num('academicPaperMinSections'),
    abstractParagraphsScanned: num('abstractParagraphsScanned'),
  };
}
