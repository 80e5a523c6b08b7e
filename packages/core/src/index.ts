export const PATHWATCH_VERSION = '0.1.0';

export {
  decodePacket,
  decodePacketHex,
  buildRoutingInfo,
  calculatePacketHash,
  calculatePacketHashHex,
  isKnownPacketHash,
  UNKNOWN_PACKET_HASH,
  MAX_PATH_SIZE,
  MAX_PACKET_PAYLOAD,
  PAYLOAD_TYPE_CODES,
  ROUTE_TYPES,
  TRACE_PAYLOAD_TYPE,
  payloadTypeFromCode,
  payloadTypeName,
  routeTypeName,
  bytesToHex,
  hexToBytes,
  tryHexToBytes,
} from './codec/index.js';
export type {
  DecodedPacket,
  DecodeResult,
  DecodeErrorCode,
  PacketContent,
  RoutingInfo,
  KnownPayloadType,
  PayloadType,
  RouteType,
} from './codec/index.js';

export {
  normalizePath,
  hopsFromPathBytes,
  hopsFromText,
  hopsFromDisplay,
  hopsFromRoutingInfo,
  formatPath,
  DEFAULT_PATH_BYTES_PER_HOP,
} from './path/index.js';
export type { PathHopList, PathSource } from './path/index.js';

export {
  ObservationBuffer,
  DEFAULT_OBSERVATION_MAX_AGE_MS,
  DEFAULT_OBSERVATION_MAX_ENTRIES,
} from './observations/index.js';
export type {
  RFObservation,
  ObservationInput,
  ObservationListener,
  ObservationBufferOptions,
} from './observations/index.js';

export {
  CorrelationWindow,
  CorrelationSession,
  pathFromObservation,
  DEFAULT_LISTENING_DURATION_MS,
  DEFAULT_LOOKBACK_MS,
  formatReport,
  paginate,
  paginateReport,
  MAX_REPLY_LENGTH,
  CONTINUATION_PREFIX,
} from './correlation/index.js';
export type {
  CorrelationReport,
  CorrelationWindowEvents,
  CorrelationWindowOptions,
  StartOptions,
  StartResult,
} from './correlation/index.js';

export { PathwatchError } from './errors/index.js';
export type { PathwatchErrorCode } from './errors/index.js';
