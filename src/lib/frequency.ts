import type { CharacterSet } from './charset.js';

// Relative frequency of each character, as a fraction of ALL characters in the source text
export type FrequencyTable = ReadonlyMap<string, number>;

/**
 * Count the characters of `text` that belong to `characterSet` and divide by
 * the total number of characters in `text` (code points, including the ones
 * outside the set). Empty text gives an empty table.
 */
export function buildFrequencyTable(characterSet: CharacterSet, text: string): FrequencyTable {
  const counts = new Map<string, number>();
  let total = 0;

  for (const char of text) {
    total++;
    if (characterSet.has(char)) {
      counts.set(char, (counts.get(char) ?? 0) + 1);
    }
  }

  const table = new Map<string, number>();
  if (total === 0) return table;

  for (const [char, count] of counts) {
    table.set(char, count / total);
  }
  return table;
}

/**
 * Bhattacharyya coefficient between the expected distribution and the one
 * observed in `text`, summed over `characterSet`. Higher means closer.
 */
export function scoreText(text: string, expected: FrequencyTable, characterSet: CharacterSet): number {
  const actual = buildFrequencyTable(characterSet, text);

  let score = 0;
  for (const char of characterSet) {
    score += Math.sqrt((expected.get(char) ?? 0) * (actual.get(char) ?? 0));
  }
  return score;
}

// Strictly greater wins, so the first of equal scores is kept and NaN never wins
export function isBetterScore(candidate: number, best: number | undefined): boolean {
  if (best === undefined) return !Number.isNaN(candidate);
  return candidate > best;
}
