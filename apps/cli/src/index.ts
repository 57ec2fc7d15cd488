// apps/cli/src/index.ts
//
// Terminal front end for the sorted word list.
//
// Responsibilities:
//   • Load .env and validate configuration.
//   • Build the collation, list, sampler and session from it.
//   • Read commands from stdin and print each result.
//
// ---------------------------------------------------------------------------

import 'dotenv/config';
import { createInterface } from 'node:readline';

import {
  SortedList,
  WordListSession,
  WordSampler,
  createCollation,
  createLogger,
  logError,
  setLogLevel,
  supportedLocales,
} from '@wordlist/list-core';

import { loadConfig, type AppConfig } from './config.js';
import { WordListRepl } from './repl.js';

const log = createLogger('cli');

/* -------------------------------------------------------------------------- */
/*                                   Setup                                    */
/* -------------------------------------------------------------------------- */
let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logError(log, err);
  process.exit(1);
}
setLogLevel(config.logLevel);

if (supportedLocales(config.locale).length === 0) {
  log.warn({ locale: config.locale }, 'Locale not supported by Intl data, using runtime default');
}

const list = new SortedList(createCollation(config.locale));
const sampler = new WordSampler(config.wordListFile, {
  resourceDir: config.wordListDir,
  seed: config.seed,
});
const session = new WordListSession(list, sampler, { normalization: config.normalization });
const repl = new WordListRepl(session, { defaultRandomCount: config.defaultRandomCount });

log.info(
  {
    locale: config.locale,
    resource: sampler.resourcePath,
    normalization: config.normalization,
    seeded: config.seed !== undefined,
  },
  'word list ready',
);

/* -------------------------------------------------------------------------- */
/*                                    Loop                                    */
/* -------------------------------------------------------------------------- */
const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'words> ' });

console.log('Sorted Word List. Type "help" for commands.');
rl.prompt();

try {
  for await (const line of rl) {
    const { output, done } = await repl.handle(line);
    if (output) console.log(output);
    if (done) break;
    rl.setPrompt(repl.liveMode ? 'words (live)> ' : 'words> ');
    rl.prompt();
  }
} catch (err) {
  logError(log, err);
  process.exitCode = 1;
} finally {
  rl.close();
}
