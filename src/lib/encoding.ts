import { EncodingError } from './errors.js';

const HEX_PATTERN = /^[0-9a-fA-F]*$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function isValidHex(hex: string): boolean {
  return hex.length % 2 === 0 && HEX_PATTERN.test(hex);
}

export function decodeHex(hex: string): Buffer {
  if (hex.length % 2 !== 0) {
    throw new EncodingError('hex', 'decoding', hex, 'odd number of digits');
  }
  if (!HEX_PATTERN.test(hex)) {
    throw new EncodingError('hex', 'decoding', hex, 'non-hex character');
  }
  return Buffer.from(hex, 'hex');
}

export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex').toUpperCase();
}

// Line breaks and other whitespace are dropped first so wrapped files decode as one block
export function decodeBase64(encoded: string): Buffer {
  const compact = encoded.replace(/\s+/g, '');
  if (compact.length % 4 !== 0) {
    throw new EncodingError('base64', 'decoding', encoded, 'length is not a multiple of 4');
  }
  if (!BASE64_PATTERN.test(compact)) {
    throw new EncodingError('base64', 'decoding', encoded, 'invalid character');
  }
  return Buffer.from(compact, 'base64');
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

export function hexToBase64(hex: string): string {
  return encodeBase64(decodeHex(hex));
}
