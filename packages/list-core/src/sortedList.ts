// packages/list-core/src/sortedList.ts
//
// SortedList keeps a sequence of words in ascending order under an injected
// collation rule. Words are placed with a lower-bound binary search as they
// are inserted, so the array is always sorted and never re-sorted.
//
// Lookups:
//   • exactSearch   → index of a literally equal word, or NOT_FOUND
//   • closestMatch  → nearest word, biased to the first word not smaller
//   • prefixMatches → autocomplete candidates (full scan, shortest first)
//
// Known limitation: exactSearch stops at the first collation-equal word it
// lands on. If that word differs literally (e.g. "Apple" vs "apple" under a
// case-insensitive collation) the search reports NOT_FOUND even when a literal
// match sits elsewhere in the same run of equal words. contains() inherits
// this.

import type { Collation } from './collation.js';

/** Sentinel returned by exactSearch on a miss. */
export const NOT_FOUND = -1;

export class SortedList implements Iterable<string> {
  private words: string[] = [];

  constructor(private readonly collationRule: Collation) {}

  get collation(): Collation {
    return this.collationRule;
  }

  get size(): number {
    return this.words.length;
  }

  /** Inserts word at its sorted position. Duplicates are kept. */
  insert(word: string): void {
    this.words.splice(this.insertPosition(word), 0, word);
  }

  /**
   * insertPosition returns the leftmost index at which word can be inserted
   * without breaking the order: everything before it compares strictly less,
   * everything from it onward compares greater or equal.
   *
   * Example:
   *   ["apple", "banana", "cherry"].insertPosition("banana") → 1
   *   ["apple", "banana", "cherry"].insertPosition("zebra")  → 3
   */
  insertPosition(word: string): number {
    let low = 0;
    let high = this.words.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.collationRule.compare(this.words[mid], word) < 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low;
  }

  /**
   * exactSearch binary-searches for word and returns its index, or NOT_FOUND.
   *
   * A collation-equal midpoint only counts when it is also literally equal.
   * Otherwise the search ends there with NOT_FOUND; neighbours in the same
   * equal run are not probed (see the limitation in the file header).
   */
  exactSearch(word: string): number {
    let low = 0;
    let high = this.words.length - 1;

    while (low <= high) {
      const mid = (low + high) >>> 1;
      const cmp = this.collationRule.compare(this.words[mid], word);

      if (cmp < 0) {
        low = mid + 1;
      } else if (cmp > 0) {
        high = mid - 1;
      } else {
        return this.words[mid] === word ? mid : NOT_FOUND;
      }
    }

    return NOT_FOUND;
  }

  /**
   * closestMatch finds the word nearest to the query.
   *
   * While searching it remembers the last word seen below the query
   * (bestLower) and the last word seen above it (bestUpper). A
   * collation-equal word is returned as soon as it is hit. Otherwise the
   * upper bound wins: for a half-typed word the next word up is usually the
   * one meant.
   *
   * @returns the closest word, or null when the list is empty
   *
   * Example:
   *   ["apple", "banana", "cherry"].closestMatch("ban") → "banana"
   *   ["apple", "banana", "cherry"].closestMatch("zzz") → "cherry"
   */
  closestMatch(word: string): string | null {
    if (this.words.length === 0) return null;

    let low = 0;
    let high = this.words.length - 1;
    let bestLower = -1;
    let bestUpper = -1;

    while (low <= high) {
      const mid = (low + high) >>> 1;
      const cmp = this.collationRule.compare(this.words[mid], word);

      if (cmp < 0) {
        bestLower = mid;
        low = mid + 1;
      } else if (cmp > 0) {
        bestUpper = mid;
        high = mid - 1;
      } else {
        return this.words[mid];
      }
    }

    if (bestUpper !== -1) return this.words[bestUpper];
    if (bestLower !== -1) return this.words[bestLower];
    return null;
  }

  /**
   * prefixMatches returns every word whose literal text starts with prefix,
   * ordered shortest first and then by collation.
   *
   * Collation order and literal-prefix order disagree (case, accents), so
   * this scans the whole list instead of narrowing with a binary search.
   * An empty prefix matches nothing.
   */
  prefixMatches(prefix: string): string[] {
    if (!prefix) return [];

    const matches = this.words.filter((w) => w.startsWith(prefix));
    return matches.sort(
      (a, b) => a.length - b.length || this.collationRule.compare(a, b),
    );
  }

  /** True when exactSearch finds word. */
  contains(word: string): boolean {
    return this.exactSearch(word) !== NOT_FOUND;
  }

  clear(): void {
    this.words = [];
  }

  get(index: number): string | undefined {
    return this.words[index];
  }

  /** Literal position of the first occurrence of word, or -1. */
  indexOf(word: string): number {
    return this.words.indexOf(word);
  }

  toArray(): string[] {
    return [...this.words];
  }

  /**
   * Two lists are equal when they hold the same words in the same order.
   * The collation rule is not compared.
   */
  equals(other: SortedList): boolean {
    if (this === other) return true;
    if (this.words.length !== other.words.length) return false;
    return this.words.every((w, i) => w === other.words[i]);
  }

  [Symbol.iterator](): Iterator<string> {
    return this.words[Symbol.iterator]();
  }

  toString(): string {
    return `[${this.words.join(', ')}]`;
  }
}
