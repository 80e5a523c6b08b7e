import { PathwatchError } from '../errors/index.js';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Parse a hex string (whitespace tolerated) into bytes.
 *
 * @throws PathwatchError INVALID_HEX on odd length or non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  const compact = hex.replace(/\s+/g, '');
  if (!HEX_PATTERN.test(compact)) {
    throw new PathwatchError('INVALID_HEX', 'Expected an even-length hex string', { length: compact.length });
  }
  const bytes = new Uint8Array(compact.length / 2);
  for (let i = 0; i < compact.length; i += 2) {
    bytes[i / 2] = Number.parseInt(compact.substring(i, i + 2), 16);
  }
  return bytes;
}

/** Like hexToBytes, but returns null instead of throwing. */
export function tryHexToBytes(hex: string): Uint8Array | null {
  try {
    return hexToBytes(hex);
  } catch (err) {
    if (err instanceof PathwatchError) return null;
    throw err;
  }
}
