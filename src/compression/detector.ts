/**
 * Compression format detection for corpus files
 *
 * A compressed corpus cannot be indexed: sequence offsets must address the
 * raw text so readers can seek straight to them.
 */

import type { CompressionFormat } from "../types";

const COMPRESSION_MAGIC_BYTES: ReadonlyArray<
  readonly [Exclude<CompressionFormat, "none">, Uint8Array]
> = [
  ["gzip", new Uint8Array([0x1f, 0x8b])],
  ["zstd", new Uint8Array([0x28, 0xb5, 0x2f, 0xfd])],
];

/**
 * Number of leading bytes needed to recognize every supported format
 */
export const MAGIC_BYTES_LENGTH = Math.max(
  ...COMPRESSION_MAGIC_BYTES.map(([, magic]) => magic.length)
);

/**
 * Recognize gzip or zstd input from the first bytes of a file
 *
 * @example
 * ```typescript
 * detectCompression(new Uint8Array([0x1f, 0x8b, 0x08])); // 'gzip'
 * ```
 */
export function detectCompression(header: Uint8Array): CompressionFormat {
  for (const [format, magic] of COMPRESSION_MAGIC_BYTES) {
    if (startsWith(header, magic)) return format;
  }
  return "none";
}

function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
  if (bytes.length < prefix.length) return false;
  return prefix.every((byte, i) => bytes[i] === byte);
}
