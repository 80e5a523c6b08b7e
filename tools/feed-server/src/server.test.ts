import { connect } from 'node:net';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import WebSocket from 'ws';
import type { FeedServer, FeedServerMessage } from './index.js';
import { createFeedServer, parseFeedMessage } from './server.js';

const PORT = 9124;
const MT_PAYLOAD_HEX = '01020304000000006d74';
const TRIGGER_HEX = `09025f00${MT_PAYLOAD_HEX}`;
const COPY_HEX = `090401005f00${MT_PAYLOAD_HEX}`;

function connectClient(): Promise<WebSocket> {
  return new Promise((resolve, reject) => {
    const ws = new WebSocket(`ws://localhost:${PORT}`);
    ws.on('open', () => resolve(ws));
    ws.on('error', reject);
  });
}

function waitForMessage(ws: WebSocket): Promise<FeedServerMessage> {
  return new Promise((resolve) => {
    ws.once('message', (data) => {
      resolve(JSON.parse(data.toString()));
    });
  });
}

/** Upgrades a plain socket, writes one frame with RSV1 set, and resolves on the server's close frame. */
function sendInvalidFrame(): Promise<void> {
  return new Promise((resolve, reject) => {
    let upgraded = false;
    const socket = connect(PORT, 'localhost', () => {
      socket.write(
        'GET / HTTP/1.1\r\n' +
          `Host: localhost:${PORT}\r\n` +
          'Upgrade: websocket\r\n' +
          'Connection: Upgrade\r\n' +
          'Sec-WebSocket-Key: dGVzdC1rZXktMDAwMDAwMA==\r\n' +
          'Sec-WebSocket-Version: 13\r\n\r\n',
      );
    });
    socket.on('data', (chunk: Buffer) => {
      if (!upgraded) {
        upgraded = true;
        // FIN + RSV1 + text, masked with a zero key, payload "hi"
        socket.write(Buffer.from([0xc1, 0x82, 0x00, 0x00, 0x00, 0x00, 0x68, 0x69]));
        return;
      }
      if (chunk[0] === 0x88) {
        socket.destroy();
        resolve();
      }
    });
    socket.on('error', reject);
  });
}

function send(ws: WebSocket, msg: unknown): void {
  ws.send(typeof msg === 'string' ? msg : JSON.stringify(msg));
}

describe('parseFeedMessage', () => {
  it('parses an rf-log frame', () => {
    expect(parseFeedMessage(JSON.stringify({ type: 'rf-log', rawHex: TRIGGER_HEX, snr: 6.5, rssi: -101 }))).toEqual({
      type: 'rf-log',
      rawHex: TRIGGER_HEX,
      timestamp: undefined,
      snr: 6.5,
      rssi: -101,
      packetHash: undefined,
      routingInfo: undefined,
      displayPath: undefined,
    });
  });

  it('fills routing info defaults', () => {
    const msg = parseFeedMessage(JSON.stringify({ type: 'rf-log', rawHex: TRIGGER_HEX, routingInfo: { pathLength: 0 } }));
    expect(msg).toMatchObject({
      routingInfo: { pathLength: 0, pathHex: '', pathNodes: [], routeType: '', payloadType: '', transportSize: 0 },
    });
  });

  it('parses a chat message', () => {
    expect(parseFeedMessage(JSON.stringify({ type: 'message', content: 'mt', id: 'm1' }))).toEqual({
      type: 'message',
      content: 'mt',
      id: 'm1',
      rawHex: undefined,
      path: undefined,
    });
  });

  it('rejects malformed input with INVALID_FEED_MESSAGE', () => {
    expect(() => parseFeedMessage('{')).toThrow(expect.objectContaining({ code: 'INVALID_FEED_MESSAGE', message: 'invalid JSON' }));
    expect(() => parseFeedMessage('[]')).toThrow('message must be an object');
    expect(() => parseFeedMessage(JSON.stringify({ type: 'rf-log', rawHex: 12 }))).toThrow('rawHex must be a string');
    expect(() => parseFeedMessage(JSON.stringify({ type: 'message' }))).toThrow('missing content');
    expect(() =>
      parseFeedMessage(JSON.stringify({ type: 'rf-log', rawHex: 'aa', routingInfo: { pathLength: 1, pathNodes: [1] } })),
    ).toThrow('routingInfo.pathNodes must be a list of strings');
  });
});

describe('feed server', () => {
  let server: FeedServer;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    server = createFeedServer({ port: PORT, botOptions: { config: { listeningDurationMs: 200 } } });
    await server.listening;
  });

  afterEach(() => {
    for (const c of clients) {
      if (c.readyState === WebSocket.OPEN) c.close();
    }
    clients.length = 0;
    server.close();
    vi.restoreAllMocks();
  });

  it('answers invalid JSON with an error and keeps the connection', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const reply = waitForMessage(ws);
    send(ws, 'not json');

    expect(await reply).toEqual({ type: 'error', error: 'invalid JSON' });
    expect(ws.readyState).toBe(WebSocket.OPEN);
  });

  it('survives a protocol-invalid frame and keeps serving', async () => {
    await sendInvalidFrame();

    const ws = await connectClient();
    clients.push(ws);
    send(ws, { type: 'rf-log', rawHex: TRIGGER_HEX });
    const marker = waitForMessage(ws);
    send(ws, { type: 'ping' });
    await marker;

    expect(server.bot.buffer.size).toBe(1);
    expect(console.debug).toHaveBeenCalledWith(
      '[FeedServer] Connection error:',
      'Invalid WebSocket frame: RSV1 must be clear',
    );
  });

  it('rejects unknown message types', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const reply = waitForMessage(ws);
    send(ws, { type: 'ping' });

    expect(await reply).toEqual({ type: 'error', error: 'unknown message type: ping' });
  });

  it('reports frames that do not decode', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const reply = waitForMessage(ws);
    send(ws, { type: 'rf-log', rawHex: '0905' });

    expect(await reply).toEqual({ type: 'error', error: 'frame could not be decoded' });
    expect(server.bot.buffer.size).toBe(0);
  });

  it('records decoded frames in the bot buffer', async () => {
    const ws = await connectClient();
    clients.push(ws);

    send(ws, { type: 'rf-log', rawHex: TRIGGER_HEX, snr: 4 });
    // Messages on one connection are handled in order; the error marks the rf-log as processed.
    const marker = waitForMessage(ws);
    send(ws, { type: 'ping' });
    await marker;

    expect(server.bot.buffer.size).toBe(1);
    expect(server.bot.buffer.entries()[0].snr).toBe(4);
  });

  it('runs multitest and replies with the collected paths', async () => {
    const ws = await connectClient();
    clients.push(ws);

    const reply = waitForMessage(ws);
    send(ws, { type: 'rf-log', rawHex: TRIGGER_HEX });
    send(ws, { type: 'message', content: 'mt', id: 'm1', rawHex: TRIGGER_HEX });
    send(ws, { type: 'rf-log', rawHex: COPY_HEX });

    expect(await reply).toEqual({
      type: 'reply',
      text: 'Found 2 unique path(s):\n01,5f\n5f',
      page: 1,
      pages: 1,
      replyTo: 'm1',
    });
  });

  it('stays quiet for messages no command handles', async () => {
    const ws = await connectClient();
    clients.push(ws);

    send(ws, { type: 'message', content: 'good morning' });
    const marker = waitForMessage(ws);
    send(ws, { type: 'ping' });

    expect(await marker).toEqual({ type: 'error', error: 'unknown message type: ping' });
  });
});
