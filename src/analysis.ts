import { breakRepeatingKeyXor, type RecoveryOptions, type Recovery } from './lib/repeatingKey.js';

export interface AnalysisProgress {
  status: 'estimating' | 'solving' | 'completed' | 'error';
  progress: number;
  keySizes?: number[];
  solution?: Recovery;
  message?: string;
  error?: string;
}

export type ProgressListener = (update: AnalysisProgress) => void;

/**
 * Run the repeating-key recovery, reporting progress as it goes.
 * Returns the final message; failures come back as an `error` message.
 */
export function analyzeCiphertext(
  ciphertext: Uint8Array,
  options: RecoveryOptions,
  onProgress: ProgressListener = () => {}
): AnalysisProgress {
  try {
    // Step 1: Estimate key sizes
    onProgress({
      status: 'estimating',
      progress: 10,
      message: 'Comparing chunk bit distances...'
    });

    let keySizes: number[] = [];
    const solution = breakRepeatingKeyXor(ciphertext, options, {
      onKeySizes: sizes => {
        keySizes = sizes;
        onProgress({
          status: 'estimating',
          progress: 30,
          keySizes: sizes,
          message: sizes.length > 0
            ? `Probable key sizes: ${sizes.join(', ')}`
            : 'Ciphertext too short to estimate a key size'
        });
      },
      // Step 2: Break every column for each key size
      onKeySize: (keySize, index, sizes) => {
        onProgress({
          status: 'solving',
          progress: 30 + Math.round((60 * index) / sizes.length),
          message: `Breaking ${keySize} columns...`
        });
      }
    });

    // Step 3: Report the best scoring key
    if (!solution) {
      return {
        status: 'completed',
        progress: 100,
        keySizes,
        message: 'Analysis complete. No key size could be broken.'
      };
    }

    return {
      status: 'completed',
      progress: 100,
      keySizes,
      solution,
      message: `Analysis complete. Recovered a ${solution.keySize}-byte key.`
    };
  } catch (error) {
    return {
      status: 'error',
      progress: 0,
      error: error instanceof Error ? error.message : 'Ciphertext analysis failed'
    };
  }
}
