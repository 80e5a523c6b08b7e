import type { ReplySender } from './send-paged.js';

/** A chat message that reached the bot over the radio. */
export interface IncomingMessage {
  content: string;
  /** Raw frame the message arrived in, as bytes or hex */
  raw?: Uint8Array | string;
  /** Path as the radio rendered it, e.g. "01,7e,55 (3 hops via ROUTE_TYPE_FLOOD)" */
  path?: string;
}

export interface BotCommand {
  readonly name: string;
  readonly keywords: readonly string[];
  matches(message: IncomingMessage): boolean;
  execute(message: IncomingMessage, reply: ReplySender): Promise<void>;
}

/**
 * Keyword match on message content, case-insensitive, with an optional "!"
 * prefix. The keyword must be the whole message or be followed by a space.
 */
export function matchesKeyword(content: string, keywords: readonly string[]): boolean {
  let text = content.trim();
  if (text.startsWith('!')) text = text.slice(1).trim();
  const lower = text.toLowerCase();
  return keywords.some((keyword) => lower === keyword || lower.startsWith(`${keyword} `));
}
