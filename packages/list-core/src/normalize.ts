// packages/list-core/src/normalize.ts
//
// Text entering a SortedList must be normalized the same way every time, or
// a composed "é" and a decomposed "é" end up as different words that
// exactSearch cannot match. The list does not enforce this itself; callers
// run every word through normalizeInput first.

export type NormalizationForm = 'NFC' | 'NFD' | 'NFKC' | 'NFKD';

export const DEFAULT_NORMALIZATION_FORM: NormalizationForm = 'NFKC';

/**
 * normalizeInput trims surrounding whitespace and applies Unicode
 * normalization.
 *
 * Example:
 *   normalizeInput('  café ') → 'café'
 *   normalizeInput('ﬁle')      → 'file' (NFKC splits the ligature)
 */
export function normalizeInput(
  raw: string | null | undefined,
  form: NormalizationForm = DEFAULT_NORMALIZATION_FORM,
): string {
  if (raw == null) return '';
  return raw.trim().normalize(form);
}
