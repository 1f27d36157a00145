import { describe, it, expect } from 'vitest';
import { createCharset, defaultCharset } from '../src/lib/charset.js';
import { decodeHex } from '../src/lib/encoding.js';
import { breakSingleByteXor, detectSingleByteXor } from '../src/lib/singleByteXor.js';
import { englishTable, readFixture } from './helpers.js';

const table = englishTable();

describe('breakSingleByteXor', () => {
    it('recovers an English sentence', () => {
        const bytes = decodeHex('1b37373331363f78151b7f2b783431333d78397828372d363c78373e783a393b3736');
        const result = breakSingleByteXor(bytes, table, defaultCharset());
        expect(result?.key).toBe('X');
        expect(result?.plaintext).toBe("Cooking MC's like a pound of bacon");
        expect(result?.score).toBeGreaterThan(0);
    });

    it('keeps the first candidate when scores tie', () => {
        const bytes = Uint8Array.from([0x41]);
        expect(breakSingleByteXor(bytes, new Map(), createCharset('xy'))).toEqual({ score: 0, key: 'x', plaintext: '9' });
        expect(breakSingleByteXor(bytes, new Map(), createCharset('yx'))).toEqual({ score: 0, key: 'y', plaintext: '8' });
    });

    it('discards candidates that are not valid UTF-8', () => {
        // Every alphanumeric key leaves a lone byte >= 0x80
        expect(breakSingleByteXor(Uint8Array.from([0xff]), table, defaultCharset())).toBeUndefined();
    });

    it('keeps a leading byte order mark in the plaintext', () => {
        const key = 'k'.charCodeAt(0);
        const bytes = Uint8Array.from([0xef, 0xbb, 0xbf, 0x61].map(byte => byte ^ key));
        expect(breakSingleByteXor(bytes, new Map(), createCharset('k'))?.plaintext).toBe('\uFEFFa');
    });

    it('returns nothing for an empty character set', () => {
        expect(breakSingleByteXor(decodeHex('1b37'), table, createCharset(''))).toBeUndefined();
    });

    it('returns nothing for empty input', () => {
        expect(breakSingleByteXor(new Uint8Array(0), table, defaultCharset())).toBeUndefined();
    });

    it('skips characters that do not fit in a byte', () => {
        expect(breakSingleByteXor(decodeHex('41'), table, createCharset('λ'))).toBeUndefined();
    });
});

describe('detectSingleByteXor', () => {
    it('finds the one line encrypted with a single byte', () => {
        const lines = readFixture('detect-lines.hex.txt')
            .split('\n')
            .filter(line => line.length > 0)
            .map(line => decodeHex(line));

        const result = detectSingleByteXor(lines, table, defaultCharset());
        expect(result?.index).toBe(5);
        expect(result?.key).toBe('7');
        expect(result?.plaintext).toBe('Now the tide is turning slowly\n');
    });

    it('returns nothing when no buffer breaks', () => {
        expect(detectSingleByteXor([Uint8Array.from([0xff])], table, defaultCharset())).toBeUndefined();
        expect(detectSingleByteXor([], table, defaultCharset())).toBeUndefined();
    });
});
