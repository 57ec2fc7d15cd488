// packages/protocol/src/index.ts
//
// Shared definitions for word-list front ends.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - NormalizationForm: Unicode form applied to user input.
//   - Random counts:     how many sampled words one "random" action may add.
//   - Command:           the actions a front end can ask of a session.
//   - Config:            environment-driven settings.

import { z } from 'zod';

/** Unicode normalization applied to every word before it reaches the list. */
export const normalizationFormSchema = z.enum(['NFC', 'NFD', 'NFKC', 'NFKD']);
export type NormalizationForm = z.infer<typeof normalizationFormSchema>;

/* -------------------------------------------------------------------------- */
/*                                Random counts                               */
/* -------------------------------------------------------------------------- */

/** Preset batch sizes offered for random adds. */
export const RANDOM_WORD_OPTIONS = [5, 10, 20, 50, 100, 200, 500] as const;
export const DEFAULT_RANDOM_COUNT = 20;
export const MAX_RANDOM_COUNT = RANDOM_WORD_OPTIONS[RANDOM_WORD_OPTIONS.length - 1];

/**
 * Number of words for one random add (1–500). Accepts numeric strings so
 * values can come straight from a command line or an env var.
 */
export const randomCountSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(MAX_RANDOM_COUNT);

/* -------------------------------------------------------------------------- */
/*                                  Commands                                  */
/* -------------------------------------------------------------------------- */

/**
 * Command schema:
 *  - add      → insert one word (duplicates allowed)
 *  - random   → insert `count` sampled words not already present
 *  - search   → exact match, else closest match
 *  - suggest  → prefix matches for autocomplete
 *  - live     → toggle treating plain input as a suggest prefix
 *  - list / clear / help / quit
 */
export const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('add'), word: z.string().trim().min(1) }),
  z.object({ type: z.literal('random'), count: randomCountSchema }),
  z.object({ type: z.literal('search'), query: z.string() }),
  z.object({ type: z.literal('suggest'), prefix: z.string() }),
  z.object({ type: z.literal('live'), enabled: z.boolean() }),
  z.object({ type: z.literal('list') }),
  z.object({ type: z.literal('clear') }),
  z.object({ type: z.literal('help') }),
  z.object({ type: z.literal('quit') }),
]);
export type Command = z.infer<typeof commandSchema>;

/* -------------------------------------------------------------------------- */
/*                                   Config                                   */
/* -------------------------------------------------------------------------- */

export const logLevelSchema = z.enum([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);
export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Environment variables read at startup:
 *  - WORD_LIST_LOCALE:        collation locale (BCP 47), default "en"
 *  - WORD_LIST_FILE:          word list resource name, default "words.txt"
 *  - WORD_LIST_DIR:           directory to resolve it in (bundled list if unset)
 *  - WORD_LIST_NORMALIZATION: Unicode form for input, default "NFKC"
 *  - WORD_LIST_SEED:          fixed seed for reproducible random adds
 *  - WORD_LIST_RANDOM_COUNT:  default count for "random" without an argument
 *  - LOG_LEVEL:               pino level, default "info"
 */
export const configSchema = z.object({
  WORD_LIST_LOCALE: z.string().trim().min(1).default('en'),
  WORD_LIST_FILE: z.string().trim().min(1).default('words.txt'),
  WORD_LIST_DIR: z.string().trim().min(1).optional(),
  WORD_LIST_NORMALIZATION: normalizationFormSchema.default('NFKC'),
  WORD_LIST_SEED: z.string().min(1).optional(),
  WORD_LIST_RANDOM_COUNT: randomCountSchema.default(DEFAULT_RANDOM_COUNT),
  LOG_LEVEL: logLevelSchema.default('info'),
});
export type Config = z.infer<typeof configSchema>;
