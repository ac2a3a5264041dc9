/**
 * Tests for compressed corpus detection
 */

import { describe, expect, test } from "vitest";
import { detectCompression, MAGIC_BYTES_LENGTH } from "../../src/compression/detector";

describe("detectCompression", () => {
  test("detects gzip", () => {
    expect(detectCompression(new Uint8Array([0x1f, 0x8b, 0x08, 0x00]))).toBe("gzip");
  });

  test("detects zstd", () => {
    expect(detectCompression(new Uint8Array([0x28, 0xb5, 0x2f, 0xfd]))).toBe("zstd");
  });

  test("plain text is not compressed", () => {
    expect(detectCompression(new TextEncoder().encode("17 |"))).toBe("none");
  });

  test("a truncated magic number is not a match", () => {
    expect(detectCompression(new Uint8Array([0x28, 0xb5, 0x2f]))).toBe("none");
    expect(detectCompression(new Uint8Array([0x1f]))).toBe("none");
    expect(detectCompression(new Uint8Array())).toBe("none");
  });

  test("the header length covers the longest magic number", () => {
    expect(MAGIC_BYTES_LENGTH).toBe(4);
  });
});
