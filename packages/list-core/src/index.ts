// packages/list-core/src/index.ts
//
// Entry point for the list-core package.
// Re-exports the sorted list, its collation rules, the word sampler and the
// session that front ends drive.
//
// Includes:
//   • sortedList.ts  → SortedList, NOT_FOUND
//   • collation.ts   → Collation, createCollation
//   • wordSampler.ts → WordSampler, sampleReservoir
//   • session.ts     → WordListSession and its outcome types
//   • normalize.ts   → normalizeInput
//   • random.ts      → seeded and default random sources
//   • errors.ts      → sampler error classes
//   • logger.ts      → pino logger and helpers
//
// Example usage:
//   import { SortedList, createCollation } from '@wordlist/list-core';

export * from './sortedList.js';
export * from './collation.js';
export * from './wordSampler.js';
export * from './session.js';
export * from './normalize.js';
export * from './random.js';
export * from './errors.js';
export * from './logger.js';
