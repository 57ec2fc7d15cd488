// packages/protocol/src/__tests__/protocol.test.ts
//
// Schema tests: command validation and environment defaults.

import {
  DEFAULT_RANDOM_COUNT,
  MAX_RANDOM_COUNT,
  commandSchema,
  configSchema,
  randomCountSchema,
} from '../index.js';

describe('randomCountSchema', () => {
  it('coerces numeric strings', () => {
    expect(randomCountSchema.parse('50')).toBe(50);
  });

  it('rejects counts outside 1–500 and fractions', () => {
    expect(randomCountSchema.safeParse(0).success).toBe(false);
    expect(randomCountSchema.safeParse(MAX_RANDOM_COUNT + 1).success).toBe(false);
    expect(randomCountSchema.safeParse('2.5').success).toBe(false);
    expect(randomCountSchema.safeParse('many').success).toBe(false);
  });
});

describe('commandSchema', () => {
  it('accepts each command shape', () => {
    expect(commandSchema.parse({ type: 'add', word: ' pear ' })).toEqual({
      type: 'add',
      word: 'pear',
    });
    expect(commandSchema.parse({ type: 'random', count: '10' })).toEqual({
      type: 'random',
      count: 10,
    });
    expect(commandSchema.parse({ type: 'live', enabled: true })).toEqual({
      type: 'live',
      enabled: true,
    });
    expect(commandSchema.parse({ type: 'quit' })).toEqual({ type: 'quit' });
  });

  it('rejects a blank word and unknown types', () => {
    expect(commandSchema.safeParse({ type: 'add', word: '   ' }).success).toBe(false);
    expect(commandSchema.safeParse({ type: 'shuffle' }).success).toBe(false);
  });
});

describe('configSchema', () => {
  it('fills defaults from an empty environment', () => {
    expect(configSchema.parse({})).toEqual({
      WORD_LIST_LOCALE: 'en',
      WORD_LIST_FILE: 'words.txt',
      WORD_LIST_NORMALIZATION: 'NFKC',
      WORD_LIST_RANDOM_COUNT: DEFAULT_RANDOM_COUNT,
      LOG_LEVEL: 'info',
    });
  });

  it('reads overrides and ignores unrelated variables', () => {
    const cfg = configSchema.parse({
      WORD_LIST_LOCALE: 'ja',
      WORD_LIST_DIR: '/srv/lists',
      WORD_LIST_NORMALIZATION: 'NFC',
      WORD_LIST_SEED: 'test-seed',
      WORD_LIST_RANDOM_COUNT: '100',
      LOG_LEVEL: 'debug',
      HOME: '/root',
    });
    expect(cfg).toEqual({
      WORD_LIST_LOCALE: 'ja',
      WORD_LIST_FILE: 'words.txt',
      WORD_LIST_DIR: '/srv/lists',
      WORD_LIST_NORMALIZATION: 'NFC',
      WORD_LIST_SEED: 'test-seed',
      WORD_LIST_RANDOM_COUNT: 100,
      LOG_LEVEL: 'debug',
    });
  });

  it('rejects an unknown normalization form', () => {
    expect(configSchema.safeParse({ WORD_LIST_NORMALIZATION: 'NFX' }).success).toBe(false);
  });
});
