export { PATHWATCH_VERSION } from 'pathwatch';
export { PathwatchBot } from './pathwatch-bot.js';
export type { PathwatchBotOptions, StatusHandler, ReportHandler } from './pathwatch-bot.js';
export {
  MultitestCommand,
  NO_PACKET_DATA_REPLY,
  NO_PACKET_HASH_REPLY,
  DEFAULT_TRIGGER_LOOKBACK_MS,
} from './multitest-command.js';
export type { MultitestCommandOptions } from './multitest-command.js';
export { matchesKeyword } from './command.js';
export type { BotCommand, IncomingMessage } from './command.js';
export { RateLimiter } from './rate-limiter.js';
export type { TxPacer } from './rate-limiter.js';
export { sendPaged } from './send-paged.js';
export type { ReplySender } from './send-paged.js';
export { loadBotConfig, DEFAULT_BOT_CONFIG } from './config.js';
export type { BotConfig } from './config.js';
