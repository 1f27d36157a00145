import type { CharacterSet } from './charset.js';
import { isBetterScore, scoreText, type FrequencyTable } from './frequency.js';
import { singleByteXor } from './xor.js';

export interface BreakResult {
  score: number;
  key: string;
  plaintext: string;
}

export interface DetectionResult extends BreakResult {
  /** Position of the winning buffer in the input list */
  index: number;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

// Undefined when the bytes are not valid UTF-8
function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) return undefined;
    throw error;
  }
}

/**
 * Try every character of the set as a single-byte key, score each decodable
 * plaintext and keep the best one. Characters above 0xFF are not byte keys
 * and are skipped.
 */
export function breakSingleByteXor(
  bytes: Uint8Array,
  expected: FrequencyTable,
  characterSet: CharacterSet
): BreakResult | undefined {
  if (bytes.length === 0) return undefined;

  let best: BreakResult | undefined;

  for (const char of characterSet) {
    const code = char.codePointAt(0);
    if (code === undefined || code > 0xff) continue;

    const plaintext = decodeUtf8(singleByteXor(bytes, code));
    if (plaintext === undefined) continue;

    const score = scoreText(plaintext, expected, characterSet);
    if (isBetterScore(score, best?.score)) {
      best = { score, key: char, plaintext };
    }
  }

  return best;
}

// Find which of several buffers was encrypted with a single-byte key
export function detectSingleByteXor(
  buffers: readonly Uint8Array[],
  expected: FrequencyTable,
  characterSet: CharacterSet
): DetectionResult | undefined {
  let best: DetectionResult | undefined;

  for (const [index, bytes] of buffers.entries()) {
    const result = breakSingleByteXor(bytes, expected, characterSet);
    if (result && isBetterScore(result.score, best?.score)) {
      best = { ...result, index };
    }
  }

  return best;
}
