export type CommandName = 'start' | 'help' | 'clearchat' | 'stats';

export interface ParsedCommand {
  name: CommandName;
}

const COMMANDS = new Set<string>(['start', 'help', 'clearchat', 'stats']);

function isCommandName(value: string): value is CommandName {
  return COMMANDS.has(value);
}

/** Parses `/name args…`; group chats address bots as `/name@bot_username`. */
export function parseSlashCommand(input: string): ParsedCommand | null {
  const trimmed = input.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const withoutSlash = trimmed.slice(1).trim();
  if (withoutSlash.length === 0) {
    return null;
  }

  const [nameRaw] = withoutSlash.split(/\s+/g);
  if (!nameRaw) {
    return null;
  }

  const name = (nameRaw.split('@')[0] ?? '').toLowerCase();
  if (!isCommandName(name)) {
    return null;
  }

  return { name };
}

export function helpText(): string {
  return [
    '👋 Bot is ready.👋',
    'Available commands:',
    '  - /clearchat to clear pre-existing bot notifications.',
    '  - /stats to view usage statistics.',
  ].join('\n');
}
