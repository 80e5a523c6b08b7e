export { decodePacket, decodePacketHex, buildRoutingInfo } from './packet-codec.js';
export type { DecodedPacket, DecodeResult, DecodeErrorCode, PacketContent, RoutingInfo } from './packet-codec.js';
export {
  calculatePacketHash,
  calculatePacketHashHex,
  isKnownPacketHash,
  UNKNOWN_PACKET_HASH,
} from './packet-identity.js';
export {
  MAX_PATH_SIZE,
  MAX_PACKET_PAYLOAD,
  PAYLOAD_TYPE_CODES,
  ROUTE_TYPES,
  TRACE_PAYLOAD_TYPE,
  payloadTypeFromCode,
  payloadTypeName,
  routeTypeName,
} from './packet-types.js';
export type { KnownPayloadType, PayloadType, RouteType } from './packet-types.js';
export { bytesToHex, hexToBytes, tryHexToBytes } from './hex.js';
