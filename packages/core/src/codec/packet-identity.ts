import { createHash } from 'node:crypto';
import { tryHexToBytes } from './hex.js';
import {
  PH_TYPE_MASK,
  PH_TYPE_SHIFT,
  TRACE_PAYLOAD_TYPE,
  TRANSPORT_CODES_SIZE,
  hasTransportCodes,
  routeTypeFromHeader,
} from './packet-types.js';

/** Returned when the frame is structurally unusable. Never a real identity. */
export const UNKNOWN_PACKET_HASH = '0000000000000000';

const HASH_HEX_LENGTH = 16;

export function isKnownPacketHash(hash: string | null | undefined): hash is string {
  return typeof hash === 'string' && hash.length === HASH_HEX_LENGTH && hash !== UNKNOWN_PACKET_HASH;
}

/**
 * Content identity of a frame, matching the hash the radio firmware computes.
 *
 * SHA-256 over: payload type (1 byte), then path length as uint16 LE for
 * TRACE only, then the payload. Route type, transport codes and the path
 * itself are excluded so every rebroadcast of one message hashes the same.
 *
 * Re-parses the frame on its own rather than going through decodePacket, so
 * the result does not depend on codec limits such as the payload cap.
 *
 * @param payloadTypeOverride - Hash as this payload type instead of the header's
 * @returns 16 upper-case hex characters, or UNKNOWN_PACKET_HASH
 */
export function calculatePacketHash(raw: Uint8Array, payloadTypeOverride?: number): string {
  if (raw.length < 2) return UNKNOWN_PACKET_HASH;

  const header = raw[0];
  let offset = 1;
  if (hasTransportCodes(routeTypeFromHeader(header))) {
    offset += TRANSPORT_CODES_SIZE;
  }
  if (offset >= raw.length) return UNKNOWN_PACKET_HASH;

  const pathLength = raw[offset];
  offset += 1;
  if (offset + pathLength > raw.length) return UNKNOWN_PACKET_HASH;

  const payload = raw.subarray(offset + pathLength);
  const payloadType = (payloadTypeOverride ?? (header >> PH_TYPE_SHIFT)) & PH_TYPE_MASK;

  const hash = createHash('sha256');
  hash.update(Uint8Array.of(payloadType));
  if (payloadType === TRACE_PAYLOAD_TYPE) {
    hash.update(Uint8Array.of(pathLength & 0xff, (pathLength >> 8) & 0xff));
  }
  hash.update(payload);

  return hash.digest('hex').slice(0, HASH_HEX_LENGTH).toUpperCase();
}

export function calculatePacketHashHex(rawHex: string, payloadTypeOverride?: number): string {
  const raw = tryHexToBytes(rawHex);
  if (!raw) return UNKNOWN_PACKET_HASH;
  return calculatePacketHash(raw, payloadTypeOverride);
}
