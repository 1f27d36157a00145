import { decodeHex, encodeHex } from './encoding.js';

export function xorBytes(a: Uint8Array, b: Uint8Array): Buffer {
  if (a.length !== b.length) {
    throw new RangeError(`Cannot XOR buffers of different lengths (${a.length} vs ${b.length})`);
  }
  const out = Buffer.alloc(a.length);
  for (let i = 0; i < a.length; i++) {
    out[i] = a[i] ^ b[i];
  }
  return out;
}

// Fixed XOR of two equal-length hex strings, returned as uppercase hex
export function xorHex(hexA: string, hexB: string): string {
  return encodeHex(xorBytes(decodeHex(hexA), decodeHex(hexB)));
}

export function singleByteXor(bytes: Uint8Array, byte: number): Buffer {
  const out = Buffer.alloc(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    out[i] = bytes[i] ^ byte;
  }
  return out;
}

/**
 * XOR each byte with the key byte at `index % key.length`.
 * Applying it twice with the same key returns the input.
 *
 * A string key is taken as its UTF-8 bytes.
 */
export function repeatingKeyXor(bytes: Uint8Array, key: string | Uint8Array): Buffer {
  const keyBytes = typeof key === 'string' ? Buffer.from(key, 'utf8') : key;
  if (keyBytes.length === 0) {
    throw new RangeError('Repeating-key XOR needs a non-empty key');
  }
  const out = Buffer.alloc(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    out[i] = bytes[i] ^ keyBytes[i % keyBytes.length];
  }
  return out;
}
