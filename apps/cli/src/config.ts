// apps/cli/src/config.ts
//
// Reads settings from the environment (after dotenv has loaded .env) and
// validates them with the shared config schema. Bad settings stop startup
// with the schema's message instead of surfacing later as odd behaviour.

import { configSchema, type LogLevel, type NormalizationForm } from '@wordlist/protocol';

export interface AppConfig {
  locale: string;
  wordListFile: string;
  wordListDir?: string;
  normalization: NormalizationForm;
  seed?: string;
  defaultRandomCount: number;
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const cfg = parsed.data;
  return {
    locale: cfg.WORD_LIST_LOCALE,
    wordListFile: cfg.WORD_LIST_FILE,
    wordListDir: cfg.WORD_LIST_DIR,
    normalization: cfg.WORD_LIST_NORMALIZATION,
    seed: cfg.WORD_LIST_SEED,
    defaultRandomCount: cfg.WORD_LIST_RANDOM_COUNT,
    logLevel: cfg.LOG_LEVEL,
  };
}
