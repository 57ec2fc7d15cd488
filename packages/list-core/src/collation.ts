// packages/list-core/src/collation.ts
//
// Collation rules used to order a SortedList.
//
// A collation is anything that can compare two strings and return a negative
// number, zero, or a positive number. `Intl.Collator` already has that shape,
// so a collator can be passed straight to a SortedList.
//
// The rule is chosen once by the caller and handed to the list at
// construction; nothing here reads a process-wide locale.

/**
 * Collation is the total order a SortedList keeps its words in.
 *
 * compare must be consistent (antisymmetric and transitive) or the list's
 * sortedness guarantee does not hold. A result of 0 means "same position",
 * not "same string": exact-match checks still compare literally.
 */
export interface Collation {
  compare(a: string, b: string): number;
}

export interface CollationOptions {
  /**
   * Which differences affect ordering. Defaults to "base" (primary strength):
   * "a", "A" and "á" all sort together.
   */
  sensitivity?: Intl.CollatorOptions['sensitivity'];
  /** Sort "item2" before "item10". Off by default. */
  numeric?: boolean;
}

/**
 * createCollation builds a locale-aware collation backed by Intl.Collator.
 *
 * @param locale - BCP 47 tag such as "en" or "ja"
 *
 * Example:
 *   const collation = createCollation('en');
 *   collation.compare('apple', 'Apple') // → 0
 *   collation.compare('apple', 'banana') // → negative
 */
export function createCollation(
  locale = 'en',
  options: CollationOptions = {},
): Collation {
  return new Intl.Collator(locale, {
    usage: 'sort',
    sensitivity: options.sensitivity ?? 'base',
    numeric: options.numeric ?? false,
  });
}

/** Locales from `requested` the runtime's Intl data can collate. */
export function supportedLocales(requested: string | string[]): string[] {
  return Intl.Collator.supportedLocalesOf(requested);
}
