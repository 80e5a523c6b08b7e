/**
 * Path correlation: listen for a fixed window and collect every distinct
 * relay path that copies of one logical message arrived on.
 *
 * Lifecycle: idle → start() → listening → (duration elapsed) → idle
 *
 * Copies are recognised by identity hash, which ignores route type,
 * transport codes and path. Paths are gathered three ways:
 * - a backward scan at start, for copies heard just before the trigger was handled
 * - the buffer listener while the window is open
 * - one reconciliation scan when the window closes
 */

import { calculatePacketHash, isKnownPacketHash } from '../codec/index.js';
import type { ObservationBuffer, RFObservation } from '../observations/index.js';
import { DEFAULT_PATH_BYTES_PER_HOP, formatPath, hopsFromRoutingInfo, normalizePath } from '../path/index.js';
import type { PathHopList, PathSource } from '../path/index.js';

export const DEFAULT_LISTENING_DURATION_MS = 6_000;
export const DEFAULT_LOOKBACK_MS = 2_000;

export type CorrelationReport =
  | { kind: 'paths'; targetHash: string; paths: string[]; matchingPackets: number }
  | { kind: 'undecodable'; targetHash: string; matchingPackets: number }
  | { kind: 'silent'; targetHash: string; durationMs: number };

export interface CorrelationWindowEvents {
  onPathCollected: (targetHash: string, path: string) => void;
  onSessionReplaced: (previous: CorrelationSession, next: CorrelationSession) => void;
  onSessionFinished: (report: CorrelationReport) => void;
}

export interface CorrelationWindowOptions {
  listeningDurationMs?: number;
  lookbackMs?: number;
  pathBytesPerHop?: 1 | 2;
  events?: Partial<CorrelationWindowEvents>;
}

export interface StartOptions {
  /** Path of the triggering copy itself, when the command surface knows it */
  initialPath?: PathSource;
  /** Identity hash already reported by the transport; ignored unless well-formed */
  targetHash?: string;
}

export type StartResult =
  | { ok: true; session: CorrelationSession; finished: Promise<CorrelationReport> }
  | { ok: false; reason: 'NO_IDENTITY' };

/**
 * Hops for one observation. Transport-supplied routing info wins, then the
 * frame's own path bytes, then whatever display text came with it.
 */
export function pathFromObservation(observation: RFObservation, bytesPerHop: 1 | 2): PathHopList | null {
  if (observation.routingSource === 'transport') {
    const hops = hopsFromRoutingInfo(observation.routingInfo);
    if (hops && hops.length > 0) return hops;
  }

  const fromBytes = normalizePath({ kind: 'bytes', bytes: observation.path, bytesPerHop });
  if (fromBytes && fromBytes.length > 0) return fromBytes;

  if (observation.displayPath) {
    return normalizePath({ kind: 'display', text: observation.displayPath });
  }
  return fromBytes;
}

export class CorrelationSession {
  readonly targetHash: string;
  readonly startedAt: number;
  readonly durationMs: number;
  private collected = new Set<string>();
  private matched = new Set<RFObservation>();
  private listening = true;
  private readonly bytesPerHop: 1 | 2;
  private readonly onPathCollected?: (targetHash: string, path: string) => void;

  constructor(
    targetHash: string,
    startedAt: number,
    durationMs: number,
    bytesPerHop: 1 | 2,
    onPathCollected?: (targetHash: string, path: string) => void,
  ) {
    this.targetHash = targetHash;
    this.startedAt = startedAt;
    this.durationMs = durationMs;
    this.bytesPerHop = bytesPerHop;
    this.onPathCollected = onPathCollected;
  }

  get isListening(): boolean {
    return this.listening;
  }

  /** Collected paths, sorted. Not final until the session stops listening. */
  get paths(): string[] {
    return [...this.collected].sort();
  }

  get matchingPackets(): number {
    return this.matched.size;
  }

  /** Live arrival: only counted while listening and inside the window. */
  consider(observation: RFObservation, now: number = Date.now()): string | null {
    if (!this.listening || now - this.startedAt >= this.durationMs) return null;
    return this.absorb(observation);
  }

  /**
   * Take a matching observation into the session.
   * @returns The formatted path when one was decoded, else null
   */
  absorb(observation: RFObservation): string | null {
    if (observation.packetHash !== this.targetHash) return null;
    this.matched.add(observation);

    const hops = pathFromObservation(observation, this.bytesPerHop);
    if (!hops || hops.length === 0) {
      console.debug(
        `[CorrelationWindow] Matched ${this.targetHash} but no path decoded (path length ${observation.routingInfo.pathLength})`,
      );
      return null;
    }
    return this.addPath(hops);
  }

  scan(observations: Iterable<RFObservation>): void {
    for (const observation of observations) {
      this.absorb(observation);
    }
  }

  addPath(hops: PathHopList): string {
    const path = formatPath(hops);
    if (!this.collected.has(path)) {
      this.collected.add(path);
      console.debug(`[CorrelationWindow] Collected path ${path} (hash: ${this.targetHash})`);
      this.onPathCollected?.(this.targetHash, path);
    }
    return path;
  }

  stopListening(): void {
    this.listening = false;
  }

  report(): CorrelationReport {
    if (this.collected.size > 0) {
      return { kind: 'paths', targetHash: this.targetHash, paths: this.paths, matchingPackets: this.matched.size };
    }
    if (this.matched.size > 0) {
      return { kind: 'undecodable', targetHash: this.targetHash, matchingPackets: this.matched.size };
    }
    return { kind: 'silent', targetHash: this.targetHash, durationMs: this.durationMs };
  }
}

export class CorrelationWindow {
  private active: CorrelationSession | null = null;
  private timers = new Set<ReturnType<typeof setTimeout>>();
  private readonly buffer: ObservationBuffer;
  private readonly listeningDurationMs: number;
  private readonly lookbackMs: number;
  private readonly bytesPerHop: 1 | 2;
  private readonly events: Partial<CorrelationWindowEvents>;
  private readonly unsubscribe: () => void;

  constructor(buffer: ObservationBuffer, options: CorrelationWindowOptions = {}) {
    this.buffer = buffer;
    this.listeningDurationMs = options.listeningDurationMs ?? DEFAULT_LISTENING_DURATION_MS;
    this.lookbackMs = options.lookbackMs ?? DEFAULT_LOOKBACK_MS;
    this.bytesPerHop = options.pathBytesPerHop ?? DEFAULT_PATH_BYTES_PER_HOP;
    this.events = options.events ?? {};
    this.unsubscribe = buffer.subscribe((observation) => {
      this.active?.consider(observation);
    });
  }

  /** Session currently receiving live arrivals, if any. */
  get activeSession(): CorrelationSession | null {
    return this.active;
  }

  /**
   * Open a listening window for the trigger frame's identity.
   *
   * A session already listening is replaced, not cancelled: its timer still
   * fires and it still reports from the shared buffer.
   */
  start(triggerRaw: Uint8Array, options: StartOptions = {}): StartResult {
    const suppliedHash = options.targetHash?.toUpperCase();
    const targetHash = isKnownPacketHash(suppliedHash) ? suppliedHash : calculatePacketHash(triggerRaw);
    if (!isKnownPacketHash(targetHash)) {
      console.debug('[CorrelationWindow] Trigger frame has no identity, not starting');
      return { ok: false, reason: 'NO_IDENTITY' };
    }

    const session = new CorrelationSession(
      targetHash,
      Date.now(),
      this.listeningDurationMs,
      this.bytesPerHop,
      this.events.onPathCollected,
    );

    if (options.initialPath) {
      const hops = normalizePath(options.initialPath);
      if (hops && hops.length > 0) session.addPath(hops);
    }

    const previous = this.active;
    if (previous) {
      console.log(`[CorrelationWindow] Replacing session ${previous.targetHash} with ${targetHash}`);
      this.events.onSessionReplaced?.(previous, session);
    }
    this.active = session;
    console.log(`[CorrelationWindow] Tracking packet hash ${targetHash} for ${this.listeningDurationMs}ms`);

    session.scan(this.buffer.between(session.startedAt - this.lookbackMs, session.startedAt));

    const finished = new Promise<CorrelationReport>((resolve) => {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        resolve(this.finish(session));
      }, this.listeningDurationMs);
      this.timers.add(timer);
    });

    return { ok: true, session, finished };
  }

  /** Detach from the buffer and abandon open sessions; their `finished` promises never settle. */
  destroy(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.unsubscribe();
    this.active?.stopListening();
    this.active = null;
  }

  private finish(session: CorrelationSession): CorrelationReport {
    session.stopListening();
    // Cleared even if a newer session replaced this one; that session then
    // relies on its own closing scan for whatever arrives in the meantime.
    this.active = null;

    session.scan(
      this.buffer.between(session.startedAt - this.lookbackMs, session.startedAt + session.durationMs),
    );

    const report = session.report();
    console.log(`[CorrelationWindow] Session ${session.targetHash} finished: ${report.kind}`);
    this.events.onSessionFinished?.(report);
    return report;
  }
}
