import { xorBytes } from './xor.js';

export interface KeySizeCandidate {
  keySize: number;
  /** Mean Hamming distance between adjacent chunks, per byte. Lower is more likely. */
  distance: number;
}

function countSetBits(byte: number): number {
  let count = 0;
  for (let bits = byte; bits !== 0; bits >>= 1) {
    count += bits & 1;
  }
  return count;
}

// Number of differing bits between two equal-length buffers
export function hammingDistance(a: Uint8Array, b: Uint8Array): number {
  let distance = 0;
  for (const byte of xorBytes(a, b)) {
    distance += countSetBits(byte);
  }
  return distance;
}

/**
 * Score every key size in [1, maxKeySize) that leaves at least two full chunks,
 * sorted from most to least likely. Equal distances keep ascending key size order.
 */
export function rankKeySizes(
  bytes: Uint8Array,
  chunksToSample: number,
  maxKeySize: number
): KeySizeCandidate[] {
  const candidates: KeySizeCandidate[] = [];

  for (let keySize = 1; keySize < maxKeySize; keySize++) {
    if (2 * keySize > bytes.length) break;

    const chunkCount = Math.min(chunksToSample, Math.floor(bytes.length / keySize));
    const normalized: number[] = [];
    for (let i = 1; i < chunkCount; i++) {
      const previous = bytes.subarray((i - 1) * keySize, i * keySize);
      const current = bytes.subarray(i * keySize, (i + 1) * keySize);
      normalized.push(hammingDistance(previous, current) / keySize);
    }

    // Fewer than two sampled chunks: nothing to average
    if (normalized.length === 0) continue;

    const sum = normalized.reduce((total, value) => total + value, 0);
    candidates.push({ keySize, distance: sum / normalized.length });
  }

  // Array.prototype.sort is stable
  return candidates.sort((a, b) => a.distance - b.distance);
}

// The `topN` most probable repeating-key lengths
export function probableKeySizes(
  bytes: Uint8Array,
  topN: number,
  chunksToSample: number,
  maxKeySize: number
): number[] {
  return rankKeySizes(bytes, chunksToSample, maxKeySize)
    .slice(0, Math.max(0, topN))
    .map(candidate => candidate.keySize);
}

/**
 * Split `bytes` into `keySize` columns; column i holds every byte whose
 * position p satisfies p % keySize === i, in original order.
 */
export function transpose(bytes: Uint8Array, keySize: number): Buffer[] {
  if (!Number.isInteger(keySize) || keySize <= 0) {
    throw new RangeError(`Key size must be a positive integer, got ${keySize}`);
  }

  const columns: number[][] = Array.from({ length: keySize }, () => []);
  bytes.forEach((byte, index) => {
    columns[index % keySize].push(byte);
  });

  return columns.map(column => Buffer.from(column));
}
