/**
 * Sequence key parsing at line starts
 *
 * A key is read from the cursor's position and stops before its terminating
 * byte, leaving that byte for the boundary scanner. Keys may span any number
 * of refills.
 *
 * @module indexer/key-resolver
 */

import type { KeyRegistry } from "../types";
import { digitValue, isDigit, isWhitespace } from "./constants";
import type { ScanCursor } from "./cursor";

/**
 * Key of a scanned sequence before it is filtered and interned
 *
 * - `line`: line-delimited streams, keyed by zero-based line number
 * - `numeric`: decimal sequence id
 * - `textual`: registry id of a whitespace-delimited word
 */
export type RawSequenceKey =
  | { readonly kind: "line"; readonly line: number }
  | { readonly kind: "numeric"; readonly value: bigint }
  | { readonly kind: "textual"; readonly id: number };

export interface KeyResolver {
  readonly mode: "numeric" | "textual";
  /**
   * Parse the key at the cursor position
   *
   * @returns The key, or `undefined` when the line does not start with one
   * or the input ends before the key is terminated
   */
  tryReadKey(cursor: ScanCursor): Promise<RawSequenceKey | undefined>;
}

/**
 * Keys made of decimal digits, e.g. `17 |features 1 2 3`
 */
export class NumericKeyResolver implements KeyResolver {
  readonly mode = "numeric";

  async tryReadKey(cursor: ScanCursor): Promise<RawSequenceKey | undefined> {
    let value = 0n;
    let found = false;

    while (!cursor.isExhausted()) {
      let consumed = 0;
      for (const byte of cursor.window()) {
        if (!isDigit(byte)) {
          cursor.advance(consumed);
          return found ? { kind: "numeric", value } : undefined;
        }
        value = value * 10n + digitValue(byte);
        found = true;
        consumed++;
      }
      cursor.advance(consumed);
      await cursor.refill();
    }

    return undefined;
  }
}

/**
 * Keys made of non-whitespace characters, e.g. `utt-0042 |features 1 2 3`
 *
 * Every key read is interned immediately so equal words resolve to one id.
 * Keys compare by their bytes: see {@link decodeKeyBytes}.
 */
export class TextualKeyResolver implements KeyResolver {
  readonly mode = "textual";

  constructor(private readonly registry: KeyRegistry) {}

  async tryReadKey(cursor: ScanCursor): Promise<RawSequenceKey | undefined> {
    // the window is only valid until the next refill, so parts are copied
    const parts: Uint8Array[] = [];

    while (!cursor.isExhausted()) {
      const window = cursor.window();
      const stop = window.findIndex(isWhitespace);
      if (stop !== -1) {
        parts.push(window.slice(0, stop));
        cursor.advance(stop);
        const bytes = concatBytes(parts);
        if (bytes.length === 0) {
          return undefined;
        }
        return { kind: "textual", id: this.registry.getOrCreate(decodeKeyBytes(bytes)) };
      }

      parts.push(window.slice());
      cursor.advance(window.length);
      await cursor.refill();
    }

    return undefined;
  }
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/** Low surrogates U+DC80..U+DCFF stand in for bytes 0x80..0xFF */
const ESCAPED_BYTE_BASE = 0xdc00;

/**
 * Registry string for the raw bytes of a textual key
 *
 * Valid UTF-8 decodes as usual. Any other key maps ASCII bytes to themselves
 * and every other byte to a lone low surrogate, which valid UTF-8 never
 * produces; distinct byte strings therefore never share a registry string.
 */
export function decodeKeyBytes(bytes: Uint8Array): string {
  try {
    return strictUtf8.decode(bytes);
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    let key = "";
    for (const byte of bytes) {
      key += String.fromCharCode(byte < 0x80 ? byte : ESCAPED_BYTE_BASE + byte);
    }
    return key;
  }
}

function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  if (parts.length === 1 && parts[0] !== undefined) return parts[0];
  const bytes = new Uint8Array(parts.reduce((total, part) => total + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    bytes.set(part, offset);
    offset += part.length;
  }
  return bytes;
}

export function createKeyResolver(numeric: boolean, registry: KeyRegistry): KeyResolver {
  return numeric ? new NumericKeyResolver() : new TextualKeyResolver(registry);
}

/**
 * The string a key is filtered and registered under
 *
 * Numeric ids use their decimal form, so `007` and `7` are one key.
 */
export function toRegistryKey(key: RawSequenceKey, registry: KeyRegistry): string {
  switch (key.kind) {
    case "line":
      return String(key.line);
    case "numeric":
      return key.value.toString();
    case "textual":
      return registry.lookup(key.id);
  }
}

export function sameKey(a: RawSequenceKey, b: RawSequenceKey): boolean {
  switch (a.kind) {
    case "line":
      return b.kind === "line" && a.line === b.line;
    case "numeric":
      return b.kind === "numeric" && a.value === b.value;
    case "textual":
      return b.kind === "textual" && a.id === b.id;
  }
}
