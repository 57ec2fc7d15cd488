// apps/cli/src/commands.ts
//
// Turns one line of terminal input into a validated Command.
//
// The first word picks the command (case-insensitive); the rest of the line
// is its argument, passed through untrimmed inside so multi-word input still
// reaches the session's normalization step intact.
//
// With live mode on, a line that does not start with a command word is
// treated as a suggest prefix, so typing a few letters shows completions.

import { commandSchema, type Command } from '@wordlist/protocol';

export type ParseResult =
  | { ok: true; command: Command }
  | { ok: false; error: string };

export interface ParseOptions {
  live: boolean;
  defaultRandomCount: number;
}

export const HELP_TEXT = [
  'Commands:',
  '  add <word>        add a word to the list',
  '  random [count]    add up to count random words (1-500)',
  '  search <query>    exact match, else closest match',
  '  suggest <prefix>  words starting with prefix',
  '  live on|off       treat plain input as a suggest prefix',
  '  list              show the whole list',
  '  clear             empty the list',
  '  help              show this help',
  '  quit              exit',
].join('\n');

/**
 * parseCommand parses a line of input.
 *
 * @returns null for a blank line, otherwise a command or an error message
 *
 * Example:
 *   parseCommand('random 50', opts) → { ok: true, command: { type: 'random', count: 50 } }
 *   parseCommand('apple', { live: true, ... })
 *     → { ok: true, command: { type: 'suggest', prefix: 'apple' } }
 */
export function parseCommand(line: string, options: ParseOptions): ParseResult | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  const match = /^(\S+)\s*(.*)$/s.exec(trimmed);
  const keyword = (match?.[1] ?? '').toLowerCase();
  const rest = match?.[2] ?? '';

  switch (keyword) {
    case 'add':
      if (!rest) return { ok: false, error: 'Usage: add <word>' };
      return validate({ type: 'add', word: rest });
    case 'random':
      return validate({ type: 'random', count: rest || options.defaultRandomCount });
    case 'search':
      return validate({ type: 'search', query: rest });
    case 'suggest':
      return validate({ type: 'suggest', prefix: rest });
    case 'live': {
      const flag = rest.toLowerCase();
      if (flag !== 'on' && flag !== 'off') return { ok: false, error: 'Usage: live on|off' };
      return validate({ type: 'live', enabled: flag === 'on' });
    }
    case 'list':
    case 'clear':
    case 'help':
      return validate({ type: keyword });
    case 'quit':
    case 'exit':
      return validate({ type: 'quit' });
    default:
      if (options.live) return validate({ type: 'suggest', prefix: trimmed });
      return { ok: false, error: `Unknown command "${keyword}". Type "help" for commands.` };
  }
}

function validate(input: unknown): ParseResult {
  const parsed = commandSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
    return { ok: false, error: `Invalid command: ${where}${issue?.message ?? 'unknown error'}` };
  }
  return { ok: true, command: parsed.data };
}
