/**
 * Mesh packet header layout.
 *
 *   bit 7-6   payload version
 *   bit 5-2   payload type (16 slots, 12 defined)
 *   bit 1-0   route type
 *
 * Transport route types carry two little-endian uint16 transport codes
 * between the header and the path length byte.
 */

export const PH_ROUTE_MASK = 0x03;
export const PH_TYPE_SHIFT = 2;
export const PH_TYPE_MASK = 0x0f;
export const PH_VER_SHIFT = 6;
export const PH_VER_MASK = 0x03;

export const MAX_PATH_SIZE = 64;
export const MAX_PACKET_PAYLOAD = 240;
export const TRANSPORT_CODES_SIZE = 4;

export const ROUTE_TYPES = ['TRANSPORT_FLOOD', 'FLOOD', 'DIRECT', 'TRANSPORT_DIRECT'] as const;
export type RouteType = (typeof ROUTE_TYPES)[number];

export const PAYLOAD_TYPE_CODES = {
  REQ: 0x00,
  RESPONSE: 0x01,
  TXT_MSG: 0x02,
  ACK: 0x03,
  ADVERT: 0x04,
  GRP_TXT: 0x05,
  GRP_DATA: 0x06,
  ANON_REQ: 0x07,
  PATH: 0x08,
  TRACE: 0x09,
  MULTIPART: 0x0a,
  RAW_CUSTOM: 0x0f,
} as const;

export type KnownPayloadType = keyof typeof PAYLOAD_TYPE_CODES;

/** Codes 0x0B-0x0E are reserved by the wire format and decode as UNKNOWN. */
export type PayloadType = KnownPayloadType | 'UNKNOWN';

export const TRACE_PAYLOAD_TYPE = PAYLOAD_TYPE_CODES.TRACE;

export function isKnownPayloadType(name: string): name is KnownPayloadType {
  return Object.hasOwn(PAYLOAD_TYPE_CODES, name);
}

const PAYLOAD_TYPES_BY_CODE = new Map<number, KnownPayloadType>();
for (const [name, code] of Object.entries(PAYLOAD_TYPE_CODES)) {
  if (isKnownPayloadType(name)) PAYLOAD_TYPES_BY_CODE.set(code, name);
}

export function routeTypeFromHeader(header: number): RouteType {
  return ROUTE_TYPES[header & PH_ROUTE_MASK];
}

export function payloadTypeFromCode(code: number): PayloadType {
  return PAYLOAD_TYPES_BY_CODE.get(code & PH_TYPE_MASK) ?? 'UNKNOWN';
}

export function hasTransportCodes(routeType: RouteType): boolean {
  return routeType === 'TRANSPORT_FLOOD' || routeType === 'TRANSPORT_DIRECT';
}

/** Display name used in path strings, e.g. "01,7e (2 hops via ROUTE_TYPE_FLOOD)". */
export function routeTypeName(routeType: RouteType): string {
  return `ROUTE_TYPE_${routeType}`;
}

export function payloadTypeName(code: number): string {
  const known = PAYLOAD_TYPES_BY_CODE.get(code & PH_TYPE_MASK);
  return known ?? `UNKNOWN_${(code & PH_TYPE_MASK).toString(16).padStart(2, '0')}`;
}
