// Character sets used for frequency scoring and as single-byte key candidates.
// Iteration order is insertion order; the breakers rely on it to settle ties.

export type CharacterSet = ReadonlySet<string>;

export type CharsetName = 'alphanumeric' | 'printable';

export const CHARSET_NAMES: readonly CharsetName[] = ['alphanumeric', 'printable'];

function charRange(first: string, last: string): string[] {
  const chars: string[] = [];
  const start = first.charCodeAt(0);
  const end = last.charCodeAt(0);
  for (let code = start; code <= end; code++) {
    chars.push(String.fromCharCode(code));
  }
  return chars;
}

// Build a set from any iterable of characters (a string iterates by code point)
export function createCharset(chars: Iterable<string>): CharacterSet {
  return new Set(chars);
}

let alphanumeric: CharacterSet | null = null;
let printable: CharacterSet | null = null;

// a-z, A-Z, 0-9
export function defaultCharset(): CharacterSet {
  if (alphanumeric) return alphanumeric;
  alphanumeric = createCharset([
    ...charRange('a', 'z'),
    ...charRange('A', 'Z'),
    ...charRange('0', '9'),
  ]);
  return alphanumeric;
}

// Space through tilde; lets keys contain spaces and punctuation
export function printableCharset(): CharacterSet {
  if (printable) return printable;
  printable = createCharset(charRange(' ', '~'));
  return printable;
}

export function isCharsetName(value: string): value is CharsetName {
  return CHARSET_NAMES.some(name => name === value);
}

export function charsetByName(name: CharsetName): CharacterSet {
  return name === 'printable' ? printableCharset() : defaultCharset();
}
