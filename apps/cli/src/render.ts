// apps/cli/src/render.ts
//
// Text shown for each session outcome. Every listed word is printed as
// "<index>: <word>" with its position in the sorted list.

import type { IndexedWord, SearchOutcome, SuggestOutcome } from '@wordlist/list-core';

export function renderEntries(entries: IndexedWord[]): string {
  if (entries.length === 0) return '(empty list)';
  return entries.map(({ index, word }) => `${index}: ${word}`).join('\n');
}

/** Blank queries fall back to the full list. */
export function renderSearch(outcome: SearchOutcome, entries: IndexedWord[]): string {
  switch (outcome.kind) {
    case 'empty':
      return renderEntries(entries);
    case 'exact':
      return `(Exact Match)\n${outcome.index}: ${outcome.word}`;
    case 'closest':
      return [
        '(Closest Match)',
        `Insert Position: ${outcome.insertPosition}`,
        `${outcome.index}: ${outcome.word}`,
      ].join('\n');
    case 'none':
      return `No match found. Would be inserted at index ${outcome.insertPosition}`;
  }
}

export function renderSuggestions(outcome: SuggestOutcome, entries: IndexedWord[]): string {
  if (outcome.kind === 'empty') return renderEntries(entries);
  if (outcome.matches.length === 0) return 'No matches found.';
  return ['(Live Matches)', ...outcome.matches.map(({ index, word }) => `${index}: ${word}`)].join(
    '\n',
  );
}

export function renderAdded(added: string[], requested: number): string {
  if (added.length === 0) return `No new words added (requested ${requested}).`;
  return `Added ${added.length} of ${requested} requested: ${added.join(', ')}`;
}
