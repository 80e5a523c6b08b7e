import { PathwatchBot } from 'pathwatch-bot';
import type { PathwatchBotOptions } from 'pathwatch-bot';
import { PathwatchError } from 'pathwatch';
import type { RoutingInfo } from 'pathwatch';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import type { FeedClientMessage, FeedServerMessage } from './index.js';

export interface FeedServerOptions {
  port: number;
  /** Bot to feed; one is created from `botOptions` when absent */
  bot?: PathwatchBot;
  botOptions?: PathwatchBotOptions;
}

export interface FeedServer {
  wss: WebSocketServer;
  bot: PathwatchBot;
  listening: Promise<void>;
  close: () => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string): PathwatchError {
  return new PathwatchError('INVALID_FEED_MESSAGE', message);
}

function optionalString(msg: Record<string, unknown>, key: string): string | undefined {
  const value = msg[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw invalid(`${key} must be a string`);
  return value;
}

function optionalNumber(msg: Record<string, unknown>, key: string): number | undefined {
  const value = msg[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) throw invalid(`${key} must be a number`);
  return value;
}

function parseRoutingInfo(value: unknown): RoutingInfo | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) throw invalid('routingInfo must be an object');

  const pathNodes = value.pathNodes ?? [];
  if (!Array.isArray(pathNodes) || !pathNodes.every((node): node is string => typeof node === 'string')) {
    throw invalid('routingInfo.pathNodes must be a list of strings');
  }
  const pathLength = optionalNumber(value, 'pathLength');
  if (pathLength === undefined) throw invalid('routingInfo.pathLength is required');

  return {
    pathLength,
    pathHex: optionalString(value, 'pathHex') ?? '',
    pathNodes,
    routeType: optionalString(value, 'routeType') ?? '',
    payloadType: optionalString(value, 'payloadType') ?? '',
    transportSize: optionalNumber(value, 'transportSize') ?? 0,
  };
}

/**
 * Parse and validate one client frame.
 * @throws PathwatchError INVALID_FEED_MESSAGE
 */
export function parseFeedMessage(data: string): FeedClientMessage {
  let msg: unknown;
  try {
    msg = JSON.parse(data);
  } catch {
    throw invalid('invalid JSON');
  }
  if (!isRecord(msg)) throw invalid('message must be an object');

  if (msg.type === 'rf-log') {
    const rawHex = optionalString(msg, 'rawHex');
    if (!rawHex) throw invalid('missing rawHex');
    return {
      type: 'rf-log',
      rawHex,
      timestamp: optionalNumber(msg, 'timestamp'),
      snr: optionalNumber(msg, 'snr'),
      rssi: optionalNumber(msg, 'rssi'),
      packetHash: optionalString(msg, 'packetHash'),
      routingInfo: parseRoutingInfo(msg.routingInfo),
      displayPath: optionalString(msg, 'displayPath'),
    };
  }

  if (msg.type === 'message') {
    const content = optionalString(msg, 'content');
    if (content === undefined) throw invalid('missing content');
    return {
      type: 'message',
      content,
      id: optionalString(msg, 'id'),
      rawHex: optionalString(msg, 'rawHex'),
      path: optionalString(msg, 'path'),
    };
  }

  throw invalid(`unknown message type: ${String(msg.type)}`);
}

function send(ws: WebSocket, msg: FeedServerMessage): void {
  if (ws.readyState === ws.OPEN) {
    ws.send(JSON.stringify(msg));
  }
}

/**
 * Arrival feed in front of a PathwatchBot. Transports push `rf-log` frames,
 * chat bridges push `message` frames and receive `reply` pages back.
 */
export function createFeedServer(options: FeedServerOptions): FeedServer {
  const bot = options.bot ?? new PathwatchBot(options.botOptions);
  const wss = new WebSocketServer({ port: options.port });

  const listening = new Promise<void>((resolve, reject) => {
    wss.once('listening', () => resolve());
    wss.once('error', reject);
  });

  wss.on('connection', (ws: WebSocket) => {
    // Protocol violations surface here; ws closes the offending connection itself.
    ws.on('error', (err) => {
      console.debug('[FeedServer] Connection error:', err.message);
    });

    ws.on('message', (raw: WebSocket.RawData) => {
      let msg: FeedClientMessage;
      try {
        msg = parseFeedMessage(raw.toString());
      } catch (err) {
        send(ws, { type: 'error', error: err instanceof Error ? err.message : 'invalid message' });
        return;
      }

      if (msg.type === 'rf-log') {
        const observation = bot.ingest({
          raw: msg.rawHex,
          timestamp: msg.timestamp,
          snr: msg.snr,
          rssi: msg.rssi,
          packetHash: msg.packetHash,
          routingInfo: msg.routingInfo,
          displayPath: msg.displayPath,
        });
        if (!observation) send(ws, { type: 'error', error: 'frame could not be decoded' });
        return;
      }

      const replyTo = msg.id;
      bot
        .handleMessage({ content: msg.content, raw: msg.rawHex, path: msg.path }, (text, page, pages) =>
          send(ws, { type: 'reply', text, page, pages, replyTo }),
        )
        .catch((err: unknown) => {
          console.error('[FeedServer] Command failed:', err);
          send(ws, { type: 'error', error: err instanceof Error ? err.message : String(err) });
        });
    });
  });

  return {
    wss,
    bot,
    listening,
    close: () => {
      for (const client of wss.clients) {
        client.close();
      }
      if (!options.bot) bot.destroy();
      wss.close();
    },
  };
}
