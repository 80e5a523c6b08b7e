/**
 * Short-lived memory of every frame heard on the radio.
 *
 * The transport collaborator appends here; the correlation window only reads.
 * Entries age out after `maxAgeMs` and the buffer never holds more than
 * `maxEntries`, so nothing needs persisting.
 */

import {
  buildRoutingInfo,
  bytesToHex,
  calculatePacketHash,
  decodePacket,
  isKnownPacketHash,
  tryHexToBytes,
} from '../codec/index.js';
import type { RoutingInfo } from '../codec/index.js';
import { DEFAULT_PATH_BYTES_PER_HOP, hopsFromPathBytes } from '../path/index.js';

export interface RFObservation {
  /** Arrival time (ms since epoch) */
  timestamp: number;
  raw: Uint8Array;
  rawHex: string;
  packetHash: string;
  /** Raw path bytes from the frame */
  path: Uint8Array;
  routingInfo: RoutingInfo;
  /** Whether routingInfo came from the transport or was derived from the frame */
  routingSource: 'transport' | 'frame';
  /** Path as the transport rendered it for humans, if it did */
  displayPath?: string;
  snr?: number;
  rssi?: number;
}

/** One arrival as handed over by the transport. */
export interface ObservationInput {
  raw: Uint8Array | string;
  timestamp?: number;
  /** Pre-computed identity hash; derived from the frame when absent or malformed */
  packetHash?: string;
  /** Pre-computed routing metadata; derived from the frame when absent */
  routingInfo?: RoutingInfo;
  displayPath?: string;
  snr?: number;
  rssi?: number;
}

export type ObservationListener = (observation: RFObservation) => void;

export interface ObservationBufferOptions {
  /** Age after which observations are dropped (default: 15s) */
  maxAgeMs?: number;
  /** Hard cap on retained observations (default: 500) */
  maxEntries?: number;
  /** Bytes per hop used when deriving path nodes from raw path bytes */
  pathBytesPerHop?: 1 | 2;
}

export const DEFAULT_OBSERVATION_MAX_AGE_MS = 15_000;
export const DEFAULT_OBSERVATION_MAX_ENTRIES = 500;

export class ObservationBuffer {
  private observations: RFObservation[] = [];
  private listeners = new Set<ObservationListener>();
  private readonly maxAgeMs: number;
  private readonly maxEntries: number;
  private readonly pathBytesPerHop: 1 | 2;

  constructor(options: ObservationBufferOptions = {}) {
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_OBSERVATION_MAX_AGE_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_OBSERVATION_MAX_ENTRIES;
    this.pathBytesPerHop = options.pathBytesPerHop ?? DEFAULT_PATH_BYTES_PER_HOP;
  }

  /**
   * Append one arrival and notify listeners.
   * Frames that are not hex or do not decode are logged and dropped.
   * @returns The stored observation, or null when dropped
   */
  record(input: ObservationInput): RFObservation | null {
    const raw = typeof input.raw === 'string' ? tryHexToBytes(input.raw) : input.raw;
    if (!raw || raw.length === 0) {
      console.debug('[ObservationBuffer] Dropping frame: empty or not hex');
      return null;
    }

    const decoded = decodePacket(raw);
    if (!decoded.ok) {
      console.debug(`[ObservationBuffer] Dropping frame: ${decoded.error} (${decoded.detail})`);
      return null;
    }

    const { packet } = decoded;
    const suppliedHash = input.packetHash?.toUpperCase();
    const routingInfo =
      input.routingInfo ?? buildRoutingInfo(packet, hopsFromPathBytes(packet.path, this.pathBytesPerHop) ?? []);

    const observation: RFObservation = {
      timestamp: input.timestamp ?? Date.now(),
      raw,
      rawHex: bytesToHex(raw),
      packetHash: isKnownPacketHash(suppliedHash) ? suppliedHash : calculatePacketHash(raw),
      path: packet.path,
      routingInfo,
      routingSource: input.routingInfo ? 'transport' : 'frame',
      displayPath: input.displayPath,
      snr: input.snr,
      rssi: input.rssi,
    };

    this.observations.push(observation);
    this.prune(observation.timestamp);

    for (const listener of this.listeners) {
      try {
        listener(observation);
      } catch (err) {
        console.debug(`[ObservationBuffer] Listener failed for ${observation.packetHash}:`, err);
      }
    }

    return observation;
  }

  /**
   * Register a listener called synchronously after every append.
   * @returns Unsubscribe function
   */
  subscribe(listener: ObservationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** All retained observations, oldest first. */
  entries(): readonly RFObservation[] {
    return [...this.observations];
  }

  /** Observations with from <= timestamp <= to. */
  between(from: number, to: number): RFObservation[] {
    return this.observations.filter((o) => o.timestamp >= from && o.timestamp <= to);
  }

  /** Most recent observation no older than maxAgeMs, if any. */
  latest(maxAgeMs: number = this.maxAgeMs): RFObservation | undefined {
    const now = Date.now();
    const last = this.observations[this.observations.length - 1];
    if (!last || now - last.timestamp >= maxAgeMs) return undefined;
    return last;
  }

  countMatching(packetHash: string): number {
    return this.observations.filter((o) => o.packetHash === packetHash).length;
  }

  /** Drop observations older than maxAgeMs relative to `now`, then enforce the size cap. */
  prune(now: number = Date.now()): number {
    const before = this.observations.length;
    this.observations = this.observations.filter((o) => now - o.timestamp < this.maxAgeMs);
    if (this.observations.length > this.maxEntries) {
      this.observations.splice(0, this.observations.length - this.maxEntries);
    }
    return before - this.observations.length;
  }

  clear(): void {
    this.observations = [];
  }

  get size(): number {
    return this.observations.length;
  }
}
