// packages/list-core/src/session.ts
//
// WordListSession is what a front end talks to. It owns the normalization
// step the SortedList relies on and turns raw user text into the outcomes a
// view needs to display:
//
//   • addWord        → manual add (duplicates allowed)
//   • addRandomWords → sampled add, skipping words already in the list
//   • search         → exact match, else closest match + insert position
//   • suggest        → live prefix matches
//
// Every displayed word carries its index in the list so views can render
// "index: word" lines without reaching into the list themselves.

import { normalizeInput, DEFAULT_NORMALIZATION_FORM, type NormalizationForm } from './normalize.js';
import { NOT_FOUND, type SortedList } from './sortedList.js';
import type { WordSampler } from './wordSampler.js';
import { sessionLogger as log } from './logger.js';

export type IndexedWord = { index: number; word: string };

export type SearchOutcome =
  | { kind: 'empty' }
  | { kind: 'exact'; index: number; word: string }
  | { kind: 'closest'; insertPosition: number; index: number; word: string }
  | { kind: 'none'; insertPosition: number };

export type SuggestOutcome =
  | { kind: 'empty' }
  | { kind: 'matches'; matches: IndexedWord[] };

export interface WordListSessionOptions {
  normalization?: NormalizationForm;
}

export class WordListSession {
  private readonly normalization: NormalizationForm;

  constructor(
    readonly list: SortedList,
    private readonly sampler: WordSampler,
    options: WordListSessionOptions = {},
  ) {
    this.normalization = options.normalization ?? DEFAULT_NORMALIZATION_FORM;
  }

  get size(): number {
    return this.list.size;
  }

  normalize(raw: string): string {
    return normalizeInput(raw, this.normalization);
  }

  /** @returns the word as inserted, or null for blank input */
  addWord(raw: string): string | null {
    const word = this.normalize(raw);
    if (!word) return null;
    this.list.insert(word);
    log.debug({ word, size: this.list.size }, 'Added word');
    return word;
  }

  /**
   * Samples `count` words and inserts the ones not already present.
   * Sampler errors are passed through untouched.
   *
   * @returns the words actually inserted, in sample order
   */
  async addRandomWords(count: number): Promise<string[]> {
    const sampled = await this.sampler.getRandomWords(count);
    const added: string[] = [];

    for (const raw of sampled) {
      const word = this.normalize(raw);
      if (!word || this.list.contains(word)) continue;
      this.list.insert(word);
      added.push(word);
    }

    log.debug(
      { requested: count, sampled: sampled.length, added: added.length, size: this.list.size },
      'Added random words',
    );
    return added;
  }

  search(raw: string): SearchOutcome {
    const query = this.normalize(raw);
    if (!query) return { kind: 'empty' };

    const exact = this.list.exactSearch(query);
    if (exact !== NOT_FOUND) {
      return { kind: 'exact', index: exact, word: query };
    }

    const insertPosition = this.list.insertPosition(query);
    const closest = this.list.closestMatch(query);
    if (closest === null) return { kind: 'none', insertPosition };

    return {
      kind: 'closest',
      insertPosition,
      index: this.list.indexOf(closest),
      word: closest,
    };
  }

  suggest(raw: string): SuggestOutcome {
    const prefix = this.normalize(raw);
    if (!prefix) return { kind: 'empty' };

    const matches = this.list
      .prefixMatches(prefix)
      .map((word) => ({ index: this.list.indexOf(word), word }));
    return { kind: 'matches', matches };
  }

  entries(): IndexedWord[] {
    return this.list.toArray().map((word, index) => ({ index, word }));
  }

  clear(): void {
    this.list.clear();
    log.debug('Cleared list');
  }
}
