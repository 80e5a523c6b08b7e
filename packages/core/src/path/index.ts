export {
  normalizePath,
  hopsFromPathBytes,
  hopsFromText,
  hopsFromDisplay,
  hopsFromRoutingInfo,
  formatPath,
  DEFAULT_PATH_BYTES_PER_HOP,
} from './path-decoder.js';
export type { PathHopList, PathSource } from './path-decoder.js';
