import { describe, expect, test } from "vitest";
import { BufferError, FileError } from "../../src/errors";
import { ScanCursor } from "../../src/indexer/cursor";
import type { FileSource } from "../../src/io/file-source";
import { MemorySource } from "../../src/io/file-source";

function failingSource(read: FileSource["read"]): FileSource {
  return {
    name: "failing",
    read,
    sizeHint: () => 0,
    close: async () => {},
  };
}

describe("ScanCursor", () => {
  test("tracks absolute offsets across refills", async () => {
    const cursor = new ScanCursor(new MemorySource("abcdef"), 4);
    await cursor.prime();

    expect(cursor.remaining()).toBe(4);
    expect(cursor.offset()).toBe(0);
    expect(cursor.bufferEndOffset()).toBe(4);
    expect(cursor.peek()).toBe(0x61);
    expect(cursor.findByte(0x64)).toBe(3);
    expect(cursor.findByte(0x66)).toBeUndefined();

    cursor.advance(4);
    await cursor.refill();
    expect(cursor.offset()).toBe(4);
    expect(cursor.remaining()).toBe(2);
    expect(cursor.bufferEndOffset()).toBe(6);
    expect(new TextDecoder().decode(cursor.window())).toBe("ef");

    cursor.advance(2);
    await cursor.refill();
    expect(cursor.isExhausted()).toBe(true);
    expect(cursor.peek()).toBeUndefined();
    expect(cursor.offset()).toBe(6);
    expect(cursor.bufferEndOffset()).toBe(6);
  });

  test("priming tops up short reads to the minimum", async () => {
    const cursor = new ScanCursor(new MemorySource("abcd", { maxReadSize: 1 }), 1, 3);
    await cursor.prime();

    expect(cursor.remaining()).toBe(3);
    expect(new TextDecoder().decode(cursor.window())).toBe("abc");
  });

  test("an empty source is exhausted after priming", async () => {
    const cursor = new ScanCursor(new MemorySource(""), 8);
    await cursor.prime();
    expect(cursor.isExhausted()).toBe(true);
    expect(cursor.bufferEndOffset()).toBe(0);
  });

  test("refilling an exhausted cursor is a no-op", async () => {
    const cursor = new ScanCursor(new MemorySource(""), 8);
    await cursor.prime();
    await cursor.refill();
    expect(cursor.isExhausted()).toBe(true);
  });

  test("priming twice is rejected", async () => {
    const cursor = new ScanCursor(new MemorySource("abc"), 8);
    await cursor.prime();
    await expect(cursor.prime()).rejects.toBeInstanceOf(BufferError);
  });

  test("refill with unconsumed bytes is rejected", async () => {
    const cursor = new ScanCursor(new MemorySource("abcdef"), 4);
    await cursor.prime();
    cursor.advance(1);
    await expect(cursor.refill()).rejects.toMatchObject({ operation: "refill" });
  });

  test("advancing past the buffer is rejected", async () => {
    const cursor = new ScanCursor(new MemorySource("ab"), 4);
    await cursor.prime();
    expect(() => cursor.advance(3)).toThrow("Cannot advance 3 bytes with 2 buffered");
  });

  test("capacity must be positive", () => {
    expect(() => new ScanCursor(new MemorySource("a"), 0)).toThrow(BufferError);
  });

  test("read failures become FileErrors", async () => {
    const source = failingSource(async () => {
      throw new Error("device unavailable");
    });
    const cursor = new ScanCursor(source, 4);

    const error = await cursor.prime().catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FileError);
    expect(error).toMatchObject({
      operation: "read",
      filePath: "failing",
      message: "read operation failed: device unavailable",
    });
  });

  test("a source reporting more bytes than requested is rejected", async () => {
    const cursor = new ScanCursor(
      failingSource(async (_buffer, maxBytes) => maxBytes + 1),
      4
    );
    await expect(cursor.prime()).rejects.toMatchObject({ operation: "overflow" });
  });
});
