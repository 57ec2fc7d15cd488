// apps/cli/src/repl.ts
//
// WordListRepl runs one parsed command at a time against a session and
// returns the text to print. It holds the only front-end state: whether
// live mode is on.
//
// Sampler failures (missing resource, empty list) are reported to the user
// and logged; anything else is a bug and is rethrown.

import {
  WordListError,
  createLogger,
  logError,
  type WordListSession,
} from '@wordlist/list-core';
import type { Command } from '@wordlist/protocol';

import { HELP_TEXT, parseCommand } from './commands.js';
import { renderAdded, renderEntries, renderSearch, renderSuggestions } from './render.js';

const log = createLogger('repl');

export type ReplResult = { output: string; done: boolean };

export interface WordListReplOptions {
  defaultRandomCount: number;
}

export class WordListRepl {
  private live = false;

  constructor(
    private readonly session: WordListSession,
    private readonly options: WordListReplOptions,
  ) {}

  get liveMode(): boolean {
    return this.live;
  }

  async handle(line: string): Promise<ReplResult> {
    const parsed = parseCommand(line, {
      live: this.live,
      defaultRandomCount: this.options.defaultRandomCount,
    });
    if (parsed === null) return { output: '', done: false };
    if (!parsed.ok) return { output: parsed.error, done: false };
    return this.run(parsed.command);
  }

  async run(command: Command): Promise<ReplResult> {
    const s = this.session;
    switch (command.type) {
      case 'add': {
        const word = s.addWord(command.word);
        return this.reply(word === null ? 'Nothing to add.' : renderEntries(s.entries()));
      }
      case 'random': {
        try {
          const added = await s.addRandomWords(command.count);
          return this.reply(`${renderAdded(added, command.count)}\n${renderEntries(s.entries())}`);
        } catch (err) {
          if (err instanceof WordListError) {
            logError(log, err, { command: command.type, count: command.count });
            return this.reply(`Error loading random words: ${err.message}`);
          }
          throw err;
        }
      }
      case 'search':
        return this.reply(renderSearch(s.search(command.query), s.entries()));
      case 'suggest':
        return this.reply(renderSuggestions(s.suggest(command.prefix), s.entries()));
      case 'live':
        this.live = command.enabled;
        return this.reply(`Live search ${command.enabled ? 'on' : 'off'}.`);
      case 'list':
        return this.reply(renderEntries(s.entries()));
      case 'clear':
        s.clear();
        return this.reply(renderEntries(s.entries()));
      case 'help':
        return this.reply(HELP_TEXT);
      case 'quit':
        return { output: 'Bye.', done: true };
    }
  }

  private reply(output: string): ReplResult {
    return { output, done: false };
  }
}
