import { describe, it, expect, vi } from 'vitest';
import { analyzeCiphertext, type AnalysisProgress } from '../src/analysis.js';
import { defaultCharset } from '../src/lib/charset.js';
import { decodeBase64 } from '../src/lib/encoding.js';
import { englishTable, readFixture } from './helpers.js';

const options = {
    topN: 3,
    chunksToSample: 4,
    maxKeySize: 40,
    frequencyTable: englishTable(),
    characterSet: defaultCharset(),
};

describe('analyzeCiphertext', () => {
    it('reports each stage and completes with the recovered key', () => {
        const updates: AnalysisProgress[] = [];
        const result = analyzeCiphertext(decodeBase64(readFixture('tide-song.b64.txt')), options, update => {
            updates.push(update);
        });

        expect(updates.map(update => [update.status, update.progress])).toEqual([
            ['estimating', 10],
            ['estimating', 30],
            ['solving', 30],
            ['solving', 50],
            ['solving', 70],
        ]);
        expect(updates[1].keySizes).toEqual([18, 27, 9]);
        expect(updates[2].message).toBe('Breaking 18 columns...');

        expect(result.status).toBe('completed');
        expect(result.progress).toBe(100);
        expect(result.solution?.key).toBe('Lantern12');
        expect(result.solution?.plaintext.toString('utf8')).toBe(readFixture('tide-song.txt'));
        expect(result.message).toBe('Analysis complete. Recovered a 9-byte key.');
    });

    it('completes without a solution when the ciphertext is too short', () => {
        const onProgress = vi.fn();
        const result = analyzeCiphertext(Uint8Array.from([0x41]), options, onProgress);

        expect(result).toEqual({
            status: 'completed',
            progress: 100,
            keySizes: [],
            message: 'Analysis complete. No key size could be broken.',
        });
        expect(onProgress).toHaveBeenCalledTimes(2);
        expect(onProgress).toHaveBeenLastCalledWith({
            status: 'estimating',
            progress: 30,
            keySizes: [],
            message: 'Ciphertext too short to estimate a key size',
        });
    });

    it('turns invalid tuning into an error message', () => {
        const onProgress = vi.fn();
        const result = analyzeCiphertext(Uint8Array.from([1, 2, 3, 4]), { ...options, topN: 0 }, onProgress);
        expect(result).toEqual({
            status: 'error',
            progress: 0,
            error: 'topN must be a positive integer, got 0',
        });
        expect(onProgress).toHaveBeenCalledTimes(1);
    });

    it('passes the logger through to the key recovery', () => {
        const logger = { log: vi.fn(), warn: vi.fn() };
        analyzeCiphertext(decodeBase64(readFixture('tide-song.b64.txt')), { ...options, logger });

        expect(logger.log).toHaveBeenCalledWith('Probable key sizes: 18, 27, 9');
        expect(logger.log).toHaveBeenCalledTimes(4);
        expect(logger.warn).not.toHaveBeenCalled();
    });
});
