export type Encoding = 'hex' | 'base64';
export type ParsingDirection = 'encoding' | 'decoding';

// Raised by the hex/base64 codecs when input is not in the expected format
export class EncodingError extends Error {
  readonly encoding: Encoding;
  readonly direction: ParsingDirection;
  readonly value: string;

  constructor(encoding: Encoding, direction: ParsingDirection, value: string, reason?: string) {
    const preview = value.length > 32 ? `${value.substring(0, 32)}...` : value;
    super(`${encoding} failed ${direction} for "${preview}"${reason ? `: ${reason}` : ''}`);
    this.name = 'EncodingError';
    this.encoding = encoding;
    this.direction = direction;
    this.value = value;
  }
}
