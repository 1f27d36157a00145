import { describe, it, expect } from 'vitest';
import { loadCorpus, loadFrequencyTable } from '../src/corpus.js';
import { defaultCharset, printableCharset } from '../src/lib/charset.js';
import { CORPUS_PATH, fixturePath } from './helpers.js';

describe('corpus loading', () => {
    it('reads the bundled English sample', async () => {
        const text = await loadCorpus(CORPUS_PATH);
        expect(text.startsWith('The harbour town woke slowly')).toBe(true);
    });

    it('builds a table that favours common letters', async () => {
        const table = await loadFrequencyTable(CORPUS_PATH, defaultCharset());
        expect(table.get('e') ?? 0).toBeGreaterThan(table.get('z') ?? 0);
        expect(table.has(' ')).toBe(false);
    });

    it('reuses the table for the same corpus and character set', () => {
        const first = loadFrequencyTable(CORPUS_PATH, defaultCharset());
        expect(loadFrequencyTable(CORPUS_PATH, defaultCharset())).toBe(first);
        expect(loadFrequencyTable(CORPUS_PATH, printableCharset())).not.toBe(first);
    });

    it('does not cache a failed load', async () => {
        const missing = fixturePath('missing-corpus.txt');
        const first = loadFrequencyTable(missing, defaultCharset());
        await expect(first).rejects.toMatchObject({ code: 'ENOENT' });
        const second = loadFrequencyTable(missing, defaultCharset());
        expect(second).not.toBe(first);
        await expect(second).rejects.toMatchObject({ code: 'ENOENT' });
    });
});
