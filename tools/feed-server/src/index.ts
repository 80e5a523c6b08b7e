import type { RoutingInfo } from 'pathwatch';

export const FEED_SERVER_VERSION = '0.1.0';

/** One frame heard by the radio, pushed by the transport. */
export interface RfLogMessage {
  type: 'rf-log';
  rawHex: string;
  timestamp?: number;
  snr?: number;
  rssi?: number;
  packetHash?: string;
  routingInfo?: RoutingInfo;
  displayPath?: string;
}

/** A chat message addressed to the bot. */
export interface ChatMessage {
  type: 'message';
  content: string;
  /** Echoed back on every reply page */
  id?: string;
  rawHex?: string;
  path?: string;
}

export interface ReplyMessage {
  type: 'reply';
  text: string;
  page: number;
  pages: number;
  replyTo?: string;
}

export interface ErrorMessage {
  type: 'error';
  error: string;
}

export type FeedClientMessage = RfLogMessage | ChatMessage;
export type FeedServerMessage = ReplyMessage | ErrorMessage;

export { createFeedServer, parseFeedMessage } from './server.js';
export type { FeedServer, FeedServerOptions } from './server.js';
