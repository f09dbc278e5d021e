import type { BotCommand } from './types.js';

const COMMAND = /^\/([a-z0-9_]+)(?:@(\w+))?$/i;

/**
 * Reads `/name[@bot] args...`. When `botUsername` is given, commands addressed
 * to another bot are ignored.
 */
export function parseCommand(text?: string | null, botUsername?: string): BotCommand | undefined {
  const parts = (text ?? '').trim().split(/\s+/).filter(Boolean);
  const head = parts[0];
  if (!head) {
    return;
  }

  const match = COMMAND.exec(head);
  if (!match?.[1]) {
    return;
  }

  const mention = match[2];
  if (mention && botUsername && mention.toLowerCase() !== botUsername.replace(/^@/, '').toLowerCase()) {
    return;
  }

  return { name: match[1].toLowerCase(), args: parts.slice(1) };
}
