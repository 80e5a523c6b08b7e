import { TextDecoder } from 'node:util';
import { bytesToHex, tryHexToBytes } from './hex.js';
import {
  MAX_PACKET_PAYLOAD,
  MAX_PATH_SIZE,
  PH_TYPE_MASK,
  PH_TYPE_SHIFT,
  PH_VER_MASK,
  PH_VER_SHIFT,
  TRANSPORT_CODES_SIZE,
  hasTransportCodes,
  payloadTypeFromCode,
  payloadTypeName,
  routeTypeFromHeader,
  routeTypeName,
} from './packet-types.js';
import type { PayloadType, RouteType } from './packet-types.js';

/**
 * Best-effort view of the payload. Text payloads that cannot be read
 * (too short, invalid UTF-8) and every other payload type fall back to hex.
 */
export type PacketContent =
  | { kind: 'text'; text: string; timestamp: number; sender?: string; message?: string }
  | { kind: 'hex'; hex: string };

export interface DecodedPacket {
  header: number;
  routeType: RouteType;
  payloadType: PayloadType;
  /** Raw 4-bit payload type, kept for reserved slots that decode as UNKNOWN */
  payloadTypeCode: number;
  payloadVersion: number;
  transportCodes: [number, number];
  pathLength: number;
  path: Uint8Array;
  payload: Uint8Array;
  content: PacketContent;
}

export type DecodeErrorCode = 'TOO_SHORT' | 'TRUNCATED' | 'PATH_TOO_LONG' | 'PAYLOAD_TOO_LONG' | 'INVALID_HEX';

export type DecodeResult =
  | { ok: true; packet: DecodedPacket }
  | { ok: false; error: DecodeErrorCode; detail: string };

/** Routing metadata in the shape the transport collaborator reports it. */
export interface RoutingInfo {
  pathLength: number;
  pathHex: string;
  pathNodes: string[];
  routeType: string;
  payloadType: string;
  transportSize: number;
}

/** TXT_MSG: dest hash(1) + src hash(1) + MAC(2) + timestamp(4) + text */
const TXT_MSG_TEXT_OFFSET = 8;
/** GRP_TXT: channel hash(1) + MAC(2) + timestamp(4) + "name: message" */
const GRP_TXT_TEXT_OFFSET = 7;

const utf8 = new TextDecoder('utf-8', { fatal: true });

function fail(error: DecodeErrorCode, detail: string): DecodeResult {
  return { ok: false, error, detail };
}

function readUint16LE(bytes: Uint8Array, offset: number): number {
  return bytes[offset] | (bytes[offset + 1] << 8);
}

function readUint32LE(bytes: Uint8Array, offset: number): number {
  return (bytes[offset] | (bytes[offset + 1] << 8) | (bytes[offset + 2] << 16) | (bytes[offset + 3] << 24)) >>> 0;
}

function decodeText(bytes: Uint8Array): string | null {
  try {
    return utf8.decode(bytes).replace(/\0+$/, '');
  } catch {
    return null;
  }
}

function extractContent(payloadType: PayloadType, payload: Uint8Array): PacketContent {
  if (payloadType === 'TXT_MSG' && payload.length >= TXT_MSG_TEXT_OFFSET) {
    const textBytes = payload.subarray(TXT_MSG_TEXT_OFFSET);
    const text = decodeText(textBytes);
    if (text === null) return { kind: 'hex', hex: bytesToHex(textBytes) };
    return { kind: 'text', text, timestamp: readUint32LE(payload, 4) };
  }

  if (payloadType === 'GRP_TXT' && payload.length >= GRP_TXT_TEXT_OFFSET) {
    const textBytes = payload.subarray(GRP_TXT_TEXT_OFFSET);
    const text = decodeText(textBytes);
    if (text === null) return { kind: 'hex', hex: bytesToHex(textBytes) };
    const timestamp = readUint32LE(payload, 3);
    const separator = text.indexOf(': ');
    if (separator > 0) {
      return { kind: 'text', text, timestamp, sender: text.slice(0, separator), message: text.slice(separator + 2) };
    }
    return { kind: 'text', text, timestamp };
  }

  return { kind: 'hex', hex: bytesToHex(payload) };
}

/**
 * Decode one raw mesh frame.
 * Structural problems come back as a typed failure; this never throws.
 */
export function decodePacket(raw: Uint8Array): DecodeResult {
  if (raw.length < 2) {
    return fail('TOO_SHORT', `frame is ${raw.length} byte(s), need at least 2`);
  }

  const header = raw[0];
  const routeType = routeTypeFromHeader(header);
  const payloadTypeCode = (header >> PH_TYPE_SHIFT) & PH_TYPE_MASK;
  const payloadType = payloadTypeFromCode(payloadTypeCode);
  const payloadVersion = (header >> PH_VER_SHIFT) & PH_VER_MASK;

  let offset = 1;
  const transportCodes: [number, number] = [0, 0];
  if (hasTransportCodes(routeType)) {
    if (raw.length < offset + TRANSPORT_CODES_SIZE) {
      return fail('TRUNCATED', 'frame ends inside transport codes');
    }
    transportCodes[0] = readUint16LE(raw, offset);
    transportCodes[1] = readUint16LE(raw, offset + 2);
    offset += TRANSPORT_CODES_SIZE;
  }

  if (offset >= raw.length) {
    return fail('TRUNCATED', 'frame ends before path length');
  }
  const pathLength = raw[offset];
  offset += 1;

  if (pathLength > MAX_PATH_SIZE) {
    return fail('PATH_TOO_LONG', `path length ${pathLength} exceeds ${MAX_PATH_SIZE}`);
  }
  if (offset + pathLength > raw.length) {
    return fail('TRUNCATED', `path of ${pathLength} byte(s) overruns ${raw.length}-byte frame`);
  }

  const path = raw.slice(offset, offset + pathLength);
  offset += pathLength;

  const payload = raw.slice(offset);
  if (payload.length > MAX_PACKET_PAYLOAD) {
    return fail('PAYLOAD_TOO_LONG', `payload length ${payload.length} exceeds ${MAX_PACKET_PAYLOAD}`);
  }

  return {
    ok: true,
    packet: {
      header,
      routeType,
      payloadType,
      payloadTypeCode,
      payloadVersion,
      transportCodes,
      pathLength,
      path,
      payload,
      content: extractContent(payloadType, payload),
    },
  };
}

export function decodePacketHex(rawHex: string): DecodeResult {
  const raw = tryHexToBytes(rawHex);
  if (!raw) return fail('INVALID_HEX', 'frame is not valid hex');
  return decodePacket(raw);
}

/** Routing metadata derived from a decoded frame; `pathNodes` comes from the path decoder. */
export function buildRoutingInfo(packet: DecodedPacket, pathNodes: string[]): RoutingInfo {
  return {
    pathLength: packet.pathLength,
    pathHex: bytesToHex(packet.path),
    pathNodes,
    routeType: routeTypeName(packet.routeType),
    payloadType: payloadTypeName(packet.payloadTypeCode),
    transportSize: hasTransportCodes(packet.routeType) ? TRANSPORT_CODES_SIZE : 0,
  };
}
