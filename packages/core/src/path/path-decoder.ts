import type { RoutingInfo } from '../codec/index.js';

/** Ordered node-ID tokens, nearest hop first. An empty list is the direct path. */
export type PathHopList = string[];

/**
 * Where a path comes from.
 * - bytes: raw path bytes from the frame
 * - text: delimited hex such as "11,98,a4", "11 98 a4" or "1198a4"
 * - display: a human path string such as "01,7e,55 (3 hops via ROUTE_TYPE_FLOOD)"
 */
export type PathSource =
  | { kind: 'bytes'; bytes: Uint8Array; bytesPerHop?: 1 | 2 }
  | { kind: 'text'; text: string }
  | { kind: 'display'; text: string };

/**
 * Bytes consumed per hop when reading raw path bytes. Each pair is read as a
 * little-endian uint16 and its low byte names the hop.
 * TODO: confirm against captured firmware traffic; single-byte hops would make this 1.
 */
export const DEFAULT_PATH_BYTES_PER_HOP = 2;

const HOP_PATTERN = /^[0-9a-f]{2}$/i;
const HEX_RUN_PATTERN = /^(?:[0-9a-f]{2})+$/i;
const TOKEN_SEPARATORS = /[,:\s]+/;
const DIRECT_MARKER = /Direct|\b0 hops\b/;
/** "(3 hops)", "3 hops via ROUTE_TYPE_FLOOD": a count, never a hop */
const HOP_COUNT = /\(?\b\d+ hops?\b[^)]*\)?/g;
const ROUTE_SUFFIX = ' via ROUTE_TYPE_';

function hopToken(byte: number): string {
  return byte.toString(16).padStart(2, '0');
}

/** Raw path bytes to hops. Empty input is the direct path; a trailing partial hop is dropped. */
export function hopsFromPathBytes(bytes: Uint8Array, bytesPerHop: 1 | 2 = DEFAULT_PATH_BYTES_PER_HOP): PathHopList | null {
  if (bytes.length === 0) return [];

  const hops: PathHopList = [];
  for (let i = 0; i + bytesPerHop <= bytes.length; i += bytesPerHop) {
    hops.push(hopToken(bytes[i]));
  }
  return hops.length > 0 ? hops : null;
}

/** Delimited or flat hex text to hops. Hop counts and invalid tokens are skipped. */
export function hopsFromText(text: string): PathHopList | null {
  if (DIRECT_MARKER.test(text)) return [];

  const hops: PathHopList = [];
  for (const token of text.replace(HOP_COUNT, ' ').trim().split(TOKEN_SEPARATORS)) {
    if (HOP_PATTERN.test(token)) {
      hops.push(token.toLowerCase());
    } else if (HEX_RUN_PATTERN.test(token)) {
      for (let i = 0; i < token.length; i += 2) {
        hops.push(token.slice(i, i + 2).toLowerCase());
      }
    }
  }
  return hops.length > 0 ? hops : null;
}

/**
 * Human display text to hops.
 * Strips a trailing " via ROUTE_TYPE_*" and "(N hops ...)" before splitting.
 */
export function hopsFromDisplay(text: string): PathHopList | null {
  if (DIRECT_MARKER.test(text)) return [];

  let stripped = text;
  const routeSuffix = stripped.indexOf(ROUTE_SUFFIX);
  if (routeSuffix >= 0) stripped = stripped.slice(0, routeSuffix);
  const hopCount = stripped.indexOf('(');
  if (hopCount >= 0) stripped = stripped.slice(0, hopCount);

  return hopsFromText(stripped);
}

export function normalizePath(source: PathSource): PathHopList | null {
  switch (source.kind) {
    case 'bytes':
      return hopsFromPathBytes(source.bytes, source.bytesPerHop);
    case 'text':
      return hopsFromText(source.text);
    case 'display':
      return hopsFromDisplay(source.text);
  }
}

/**
 * Hops from transport routing metadata: path nodes when listed, else the path hex.
 * A zero path length is the direct path.
 */
export function hopsFromRoutingInfo(info: RoutingInfo): PathHopList | null {
  if (info.pathLength === 0) return [];
  if (info.pathNodes.length > 0) {
    const hops = info.pathNodes.map((node) => node.trim().toLowerCase()).filter((node) => HOP_PATTERN.test(node));
    if (hops.length > 0) return hops;
  }
  return info.pathHex ? hopsFromText(info.pathHex) : null;
}

export function formatPath(hops: PathHopList): string {
  return hops.join(',');
}
