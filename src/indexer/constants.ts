/**
 * Constants for corpus scanning
 */

/** Line delimiter: `\n` */
export const ROW_DELIMITER = 0x0a;

/** UTF-8 byte order mark, skipped when it opens a file */
export const BYTE_ORDER_MARK = new Uint8Array([0xef, 0xbb, 0xbf]);

/** First byte of a stream that carries no sequence ids */
export const DEFAULT_STREAM_PREFIX = "|";

/** 2 MiB read buffer */
export const DEFAULT_BUFFER_SIZE = 2 * 1024 * 1024;

/** 32 MiB of sequences per index chunk */
export const DEFAULT_CHUNK_SIZE_BYTES = 32 * 1024 * 1024;

const DIGIT_ZERO = 0x30;
const DIGIT_NINE = 0x39;

export function isDigit(byte: number): boolean {
  return byte >= DIGIT_ZERO && byte <= DIGIT_NINE;
}

export function digitValue(byte: number): bigint {
  return BigInt(byte - DIGIT_ZERO);
}

/**
 * Whitespace as the C locale defines it: space, `\t`, `\n`, `\v`, `\f`, `\r`
 */
export function isWhitespace(byte: number): boolean {
  return byte === 0x20 || (byte >= 0x09 && byte <= 0x0d);
}
