import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ObservationBuffer } from '../observations/index.js';
import { CorrelationWindow } from './correlation-window.js';
import type { CorrelationReport, CorrelationSession, StartResult } from './correlation-window.js';

/** TXT_MSG payload: dest, src, MAC, zero timestamp, "mt" */
const MT_PAYLOAD = [0x01, 0x02, 0x03, 0x04, 0x00, 0x00, 0x00, 0x00, 0x6d, 0x74];
const MT_HASH = '88DA071731007E65';
const OTHER_PAYLOAD = [0x68, 0x65, 0x6c, 0x6c, 0x6f];

function copyOf(path: number[], payload: number[] = MT_PAYLOAD): Uint8Array {
  return Uint8Array.of(0x09, path.length, ...path, ...payload);
}

function started(result: StartResult): { session: CorrelationSession; finished: Promise<CorrelationReport> } {
  if (!result.ok) throw new Error(`expected session to start, got ${result.reason}`);
  return { session: result.session, finished: result.finished };
}

describe('CorrelationWindow', () => {
  let buffer: ObservationBuffer;
  let correlation: CorrelationWindow;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    buffer = new ObservationBuffer();
    correlation = new CorrelationWindow(buffer);
  });

  afterEach(() => {
    correlation.destroy();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('start', () => {
    it('should track the trigger identity', () => {
      const { session } = started(correlation.start(copyOf([0x5f, 0x00])));
      expect(session.targetHash).toBe(MT_HASH);
      expect(session.isListening).toBe(true);
      expect(correlation.activeSession).toBe(session);
    });

    it('should refuse a trigger without identity', () => {
      expect(correlation.start(Uint8Array.of(0x09))).toEqual({ ok: false, reason: 'NO_IDENTITY' });
      expect(correlation.activeSession).toBeNull();
    });

    it('should track a hash supplied by the transport', () => {
      const { session } = started(correlation.start(copyOf([]), { targetHash: 'abcdef0123456789' }));
      expect(session.targetHash).toBe('ABCDEF0123456789');
    });

    it('should hash the trigger itself when the supplied hash is blank or malformed', () => {
      expect(started(correlation.start(copyOf([]), { targetHash: '' })).session.targetHash).toBe(MT_HASH);
      expect(started(correlation.start(copyOf([]), { targetHash: 'not-a-hash' })).session.targetHash).toBe(MT_HASH);
    });

    it('should seed the session with the trigger path', () => {
      const { session } = started(
        correlation.start(copyOf([]), { initialPath: { kind: 'display', text: '5f (1 hops via ROUTE_TYPE_FLOOD)' } }),
      );
      expect(session.paths).toEqual(['5f']);
    });
  });

  describe('collecting paths', () => {
    it('should report every distinct path of the retransmissions, sorted', async () => {
      const { finished } = started(correlation.start(copyOf([])));

      vi.advanceTimersByTime(1000);
      buffer.record({ raw: copyOf([0x5f, 0x00]) });
      vi.advanceTimersByTime(1000);
      buffer.record({ raw: copyOf([0x01, 0x00, 0x5f, 0x00]) });
      await vi.advanceTimersByTimeAsync(4000);

      await expect(finished).resolves.toEqual({
        kind: 'paths',
        targetHash: MT_HASH,
        paths: ['01,5f', '5f'],
        matchingPackets: 2,
      });
    });

    it('should keep duplicate paths once', async () => {
      const { session, finished } = started(correlation.start(copyOf([])));

      buffer.record({ raw: copyOf([0x11, 0x00, 0x98, 0x00]) });
      buffer.record({ raw: copyOf([0x11, 0x00, 0x98, 0x00]) });
      buffer.record({ raw: copyOf([0xa4, 0x00, 0x55, 0x00]) });
      expect(session.paths).toEqual(['11,98', 'a4,55']);

      await vi.advanceTimersByTimeAsync(6000);
      await expect(finished).resolves.toMatchObject({ kind: 'paths', paths: ['11,98', 'a4,55'], matchingPackets: 3 });
    });

    it('should ignore observations of other packets however many arrive', async () => {
      const { session, finished } = started(correlation.start(copyOf([])));

      for (let i = 0; i < 50; i++) {
        buffer.record({ raw: copyOf([i, 0x00], OTHER_PAYLOAD) });
      }
      expect(session.paths).toEqual([]);

      await vi.advanceTimersByTimeAsync(6000);
      await expect(finished).resolves.toEqual({ kind: 'silent', targetHash: MT_HASH, durationMs: 6000 });
    });

    it('should report matches that carry no path as undecodable', async () => {
      const { finished } = started(correlation.start(copyOf([])));

      buffer.record({ raw: copyOf([]) });
      buffer.record({ raw: copyOf([0x5f]) });
      await vi.advanceTimersByTimeAsync(6000);

      await expect(finished).resolves.toEqual({ kind: 'undecodable', targetHash: MT_HASH, matchingPackets: 2 });
    });

    it('should prefer routing info supplied by the transport', () => {
      const { session } = started(correlation.start(copyOf([])));

      buffer.record({
        raw: copyOf([0x5f, 0x00]),
        routingInfo: {
          pathLength: 2,
          pathHex: 'abcd',
          pathNodes: ['ab', 'cd'],
          routeType: 'ROUTE_TYPE_FLOOD',
          payloadType: 'TXT_MSG',
          transportSize: 0,
        },
      });

      expect(session.paths).toEqual(['ab,cd']);
    });

    it('should fall back to the display path when the frame has none', () => {
      const { session } = started(correlation.start(copyOf([])));
      buffer.record({ raw: copyOf([0x5f]), displayPath: '01,5f (2 hops via ROUTE_TYPE_FLOOD)' });
      expect(session.paths).toEqual(['01,5f']);
    });

    it('should read one byte per hop when configured', () => {
      correlation.destroy();
      correlation = new CorrelationWindow(buffer, { pathBytesPerHop: 1 });
      const { session } = started(correlation.start(copyOf([])));

      buffer.record({ raw: copyOf([0x5f, 0x01]) });
      expect(session.paths).toEqual(['5f,01']);
    });

    it('should fire events as paths are collected and the session finishes', async () => {
      const onPathCollected = vi.fn();
      const onSessionFinished = vi.fn();
      correlation.destroy();
      correlation = new CorrelationWindow(buffer, { events: { onPathCollected, onSessionFinished } });
      started(correlation.start(copyOf([])));

      buffer.record({ raw: copyOf([0x5f, 0x00]) });
      buffer.record({ raw: copyOf([0x5f, 0x00]) });
      await vi.advanceTimersByTimeAsync(6000);

      expect(onPathCollected).toHaveBeenCalledTimes(1);
      expect(onPathCollected).toHaveBeenCalledWith(MT_HASH, '5f');
      expect(onSessionFinished).toHaveBeenCalledWith({
        kind: 'paths',
        targetHash: MT_HASH,
        paths: ['5f'],
        matchingPackets: 2,
      });
    });
  });

  describe('window bounds', () => {
    it('should pick up copies heard shortly before the trigger was handled', () => {
      buffer.record({ raw: copyOf([0xaa, 0x00]) });
      vi.advanceTimersByTime(1500);

      const { session } = started(correlation.start(copyOf([])));
      expect(session.paths).toEqual(['aa']);
    });

    it('should not reach further back than the lookback', async () => {
      buffer.record({ raw: copyOf([0xaa, 0x00]) });
      vi.advanceTimersByTime(2500);

      const { finished } = started(correlation.start(copyOf([])));
      await vi.advanceTimersByTimeAsync(6000);

      await expect(finished).resolves.toMatchObject({ kind: 'silent' });
    });

    it('should stop listening once the window closes', async () => {
      const { session, finished } = started(correlation.start(copyOf([])));
      await vi.advanceTimersByTimeAsync(6000);

      buffer.record({ raw: copyOf([0x5f, 0x00]) });

      expect(session.isListening).toBe(false);
      expect(session.paths).toEqual([]);
      await expect(finished).resolves.toMatchObject({ kind: 'silent' });
      expect(correlation.activeSession).toBeNull();
    });

    it('should reject arrivals considered after the duration has elapsed', () => {
      const { session } = started(correlation.start(copyOf([])));
      const late = buffer.record({ raw: copyOf([0x5f, 0x00]) });
      if (!late) throw new Error('expected observation');

      expect(session.consider(late, session.startedAt + 6000)).toBeNull();
      expect(session.consider(late, session.startedAt + 5999)).toBe('5f');
    });
  });

  describe('destroy', () => {
    it('should cancel pending windows without reporting', async () => {
      const onSessionFinished = vi.fn();
      correlation.destroy();
      correlation = new CorrelationWindow(buffer, { events: { onSessionFinished } });

      started(correlation.start(copyOf([])));
      started(correlation.start(copyOf([], OTHER_PAYLOAD)));
      expect(vi.getTimerCount()).toBe(2);

      correlation.destroy();
      expect(vi.getTimerCount()).toBe(0);

      await vi.advanceTimersByTimeAsync(6000);
      expect(onSessionFinished).not.toHaveBeenCalled();
      expect(correlation.activeSession).toBeNull();
    });

    it('should stop forwarding arrivals', () => {
      const { session } = started(correlation.start(copyOf([])));
      correlation.destroy();

      buffer.record({ raw: copyOf([0x5f, 0x00]) });
      expect(session.paths).toEqual([]);
      expect(session.isListening).toBe(false);
    });
  });

  describe('replacing a session', () => {
    it('should let a replaced session still report from the shared buffer', async () => {
      const onSessionReplaced = vi.fn();
      correlation.destroy();
      correlation = new CorrelationWindow(buffer, { events: { onSessionReplaced } });

      const first = started(correlation.start(copyOf([])));
      vi.advanceTimersByTime(1000);
      const second = started(correlation.start(copyOf([], OTHER_PAYLOAD)));

      expect(onSessionReplaced).toHaveBeenCalledWith(first.session, second.session);
      expect(correlation.activeSession).toBe(second.session);

      // Live arrivals now go to the second session; the first catches this in its closing scan.
      vi.advanceTimersByTime(1000);
      buffer.record({ raw: copyOf([0x5f, 0x00]) });
      expect(first.session.paths).toEqual([]);

      await vi.advanceTimersByTimeAsync(4000);
      await expect(first.finished).resolves.toMatchObject({ kind: 'paths', paths: ['5f'] });
    });

    it('should clear the registration when the older session finishes', async () => {
      const first = started(correlation.start(copyOf([])));
      vi.advanceTimersByTime(3000);
      const second = started(correlation.start(copyOf([], OTHER_PAYLOAD)));

      await vi.advanceTimersByTimeAsync(3000);
      await first.finished;
      expect(correlation.activeSession).toBeNull();

      // No longer registered, so this copy is only found by the closing scan.
      vi.advanceTimersByTime(1000);
      buffer.record({ raw: copyOf([0x77, 0x00], OTHER_PAYLOAD) });
      expect(second.session.paths).toEqual([]);

      await vi.advanceTimersByTimeAsync(2000);
      await expect(second.finished).resolves.toMatchObject({ kind: 'paths', paths: ['77'] });
    });
  });
});
