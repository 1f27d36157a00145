import type { CharacterSet } from './charset.js';
import { probableKeySizes, transpose } from './distance.js';
import { isBetterScore, type FrequencyTable } from './frequency.js';
import { breakSingleByteXor } from './singleByteXor.js';
import { repeatingKeyXor } from './xor.js';

export interface KeySizeOptions {
  /** How many estimated key sizes to try */
  topN: number;
  /** Chunks compared per key size when estimating */
  chunksToSample: number;
  /** Exclusive upper bound for key sizes */
  maxKeySize: number;
}

export interface RecoveryOptions extends KeySizeOptions {
  frequencyTable: FrequencyTable;
  characterSet: CharacterSet;
  logger?: Pick<typeof console, 'log' | 'warn'>;
}

export interface KeyCandidate {
  keySize: number;
  /** Column scores summed and divided by the key size */
  score: number;
  key: string;
  keyBytes: Uint8Array;
}

export interface Recovery {
  /** One character per key byte (code point = byte value) */
  key: string;
  /**
   * The key as bytes. Prefer this over `key` for re-encryption: string keys
   * given to `repeatingKeyXor` are UTF-8 encoded, which differs for 0x80-0xFF.
   */
  keyBytes: Uint8Array;
  keySize: number;
  score: number;
  plaintext: Buffer;
  /** Every key size that broke, in estimator order */
  candidates: KeyCandidate[];
}

export interface RecoveryHooks {
  /** Called once with the estimated key sizes, before any is broken */
  onKeySizes?: (keySizes: number[]) => void;
  /** Called before each key size is broken */
  onKeySize?: (keySize: number, index: number, keySizes: number[]) => void;
}

// Reject tuning values that can only be caller mistakes
export function validateKeySizeOptions(options: KeySizeOptions): void {
  const values: Array<[keyof KeySizeOptions, number]> = [
    ['topN', options.topN],
    ['chunksToSample', options.chunksToSample],
    ['maxKeySize', options.maxKeySize],
  ];
  for (const [name, value] of values) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new RangeError(`${name} must be a positive integer, got ${value}`);
    }
  }
}

/**
 * Break each column of `bytes` for one key size. Undefined when any column
 * has no decodable candidate.
 */
export function evaluateKeySize(
  bytes: Uint8Array,
  keySize: number,
  frequencyTable: FrequencyTable,
  characterSet: CharacterSet
): KeyCandidate | undefined {
  const columns = transpose(bytes, keySize);
  const keyChars: string[] = [];
  let total = 0;

  for (const column of columns) {
    const result = breakSingleByteXor(column, frequencyTable, characterSet);
    if (!result) return undefined;
    total += result.score;
    keyChars.push(result.key);
  }

  // Key characters are byte-sized code points, so they map straight to key bytes
  const keyBytes = Uint8Array.from(keyChars, char => char.codePointAt(0) ?? 0);

  return {
    keySize,
    score: total / keySize,
    key: keyChars.join(''),
    keyBytes,
  };
}

// Highest normalized score; earlier candidates win ties
export function selectBestCandidate(candidates: readonly KeyCandidate[]): KeyCandidate | undefined {
  let best: KeyCandidate | undefined;
  for (const candidate of candidates) {
    if (isBetterScore(candidate.score, best?.score)) {
      best = candidate;
    }
  }
  return best;
}

export function decryptWith(bytes: Uint8Array, candidate: KeyCandidate): Buffer {
  return repeatingKeyXor(bytes, candidate.keyBytes);
}

/**
 * Recover key and plaintext of a repeating-key XOR ciphertext:
 * estimate key sizes, break each size column by column, keep the best
 * scoring size and decrypt with its key.
 *
 * Throws a RangeError for tuning values that are not positive integers.
 */
export function breakRepeatingKeyXor(
  bytes: Uint8Array,
  options: RecoveryOptions,
  hooks: RecoveryHooks = {}
): Recovery | undefined {
  validateKeySizeOptions(options);
  const { frequencyTable, characterSet, logger } = options;

  const keySizes = probableKeySizes(bytes, options.topN, options.chunksToSample, options.maxKeySize);
  logger?.log(`Probable key sizes: ${keySizes.length > 0 ? keySizes.join(', ') : 'none'}`);
  hooks.onKeySizes?.(keySizes);

  const candidates: KeyCandidate[] = [];
  keySizes.forEach((keySize, index) => {
    hooks.onKeySize?.(keySize, index, keySizes);
    const candidate = evaluateKeySize(bytes, keySize, frequencyTable, characterSet);
    if (!candidate) {
      logger?.warn(`Key size ${keySize} discarded: a column had no decodable candidate`);
      return;
    }
    logger?.log(`Key size ${keySize}: score ${candidate.score.toFixed(4)}`);
    candidates.push(candidate);
  });

  const best = selectBestCandidate(candidates);
  if (!best) return undefined;

  return {
    key: best.key,
    keyBytes: best.keyBytes,
    keySize: best.keySize,
    score: best.score,
    plaintext: decryptWith(bytes, best),
    candidates,
  };
}
