import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defaultCharset } from '../src/lib/charset.js';
import { buildFrequencyTable, type FrequencyTable } from '../src/lib/frequency.js';

const here = path.dirname(fileURLToPath(import.meta.url));

export const CORPUS_PATH = path.join(here, '../data/corpus/english.txt');

export function fixturePath(name: string): string {
    return path.join(here, 'fixtures', name);
}

export function readFixture(name: string): string {
    return fs.readFileSync(fixturePath(name), 'utf8');
}

export function englishTable(characterSet = defaultCharset()): FrequencyTable {
    return buildFrequencyTable(characterSet, fs.readFileSync(CORPUS_PATH, 'utf8'));
}

export function bytesOf(text: string): Buffer {
    return Buffer.from(text, 'utf8');
}
