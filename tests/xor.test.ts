import { describe, it, expect } from 'vitest';
import { repeatingKeyXor, singleByteXor, xorBytes, xorHex } from '../src/lib/xor.js';
import { bytesOf } from './helpers.js';

describe('xorBytes', () => {
    it('XORs equal-length buffers', () => {
        expect(Array.from(xorBytes(Uint8Array.from([0xff, 0x0f]), Uint8Array.from([0x0f, 0x0f])))).toEqual([0xf0, 0x00]);
    });

    it('rejects buffers of different lengths', () => {
        expect(() => xorBytes(Uint8Array.from([1, 2]), Uint8Array.from([1]))).toThrow(RangeError);
    });

    it('XORs two hex strings', () => {
        expect(xorHex('1c0111001f010100061a024b53535009181c', '686974207468652062756c6c277320657965'))
            .toBe('746865206B696420646F6E277420706C6179');
    });
});

describe('singleByteXor', () => {
    it('clears bytes equal to the key', () => {
        expect(Array.from(singleByteXor(Uint8Array.from([0xff, 0xff]), 0xff))).toEqual([0, 0]);
        expect(Array.from(singleByteXor(bytesOf('AA'), 'A'.charCodeAt(0)))).toEqual([0, 0]);
    });
});

describe('repeatingKeyXor', () => {
    it('cycles the key across the buffer', () => {
        const encrypted = repeatingKeyXor(bytesOf('I am alpha'), 'ICE');
        expect(Array.from(encrypted)).toEqual([0x00, 0x63, 0x24, 0x24, 0x63, 0x24, 0x25, 0x33, 0x2d, 0x28]);
        expect(repeatingKeyXor(encrypted, 'ICE').toString('utf8')).toBe('I am alpha');
    });

    it('is its own inverse', () => {
        const plaintexts = ['', 'a', 'The beam turns every twelve seconds.\n', 'été ☃'];
        const keys: Array<string | Uint8Array> = ['k', 'ICE', 'Lantern12', Uint8Array.from([0, 255, 128])];
        for (const plaintext of plaintexts) {
            for (const key of keys) {
                const bytes = bytesOf(plaintext);
                expect(repeatingKeyXor(repeatingKeyXor(bytes, key), key)).toEqual(bytes);
            }
        }
    });

    it('accepts raw key bytes', () => {
        expect(Array.from(repeatingKeyXor(Uint8Array.from([1, 2, 3]), Uint8Array.from([1])))).toEqual([0, 3, 2]);
    });

    it('rejects an empty key', () => {
        expect(() => repeatingKeyXor(bytesOf('abc'), '')).toThrow(RangeError);
        expect(() => repeatingKeyXor(bytesOf('abc'), new Uint8Array(0))).toThrow('non-empty key');
    });
});
