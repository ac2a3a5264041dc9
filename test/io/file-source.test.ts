import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CompressionError, FileError } from "../../src/errors";
import { MemorySource, openFileSource } from "../../src/io/file-source";

describe("openFileSource", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "file-source-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  test("reads the file sequentially from the start", async () => {
    const path = join(tempDir, "corpus.txt");
    writeFileSync(path, "abcdefg");

    const source = await openFileSource(path);
    try {
      expect(source.name).toBe(path);
      expect(source.sizeHint()).toBe(7);

      const buffer = new Uint8Array(4);
      expect(await source.read(buffer, 4)).toBe(4);
      expect(new TextDecoder().decode(buffer)).toBe("abcd");
      expect(await source.read(buffer, 4)).toBe(3);
      expect(new TextDecoder().decode(buffer.subarray(0, 3))).toBe("efg");
      expect(await source.read(buffer, 4)).toBe(0);
    } finally {
      await source.close();
    }
  });

  test("close is idempotent and stops reads", async () => {
    const path = join(tempDir, "corpus.txt");
    writeFileSync(path, "abc");

    const source = await openFileSource(path);
    await source.close();
    await source.close();
    await expect(source.read(new Uint8Array(1), 1)).rejects.toThrow(
      "Input file not open for reading"
    );
  });

  test("rejects a missing file", async () => {
    const path = join(tempDir, "missing.txt");
    const error = await openFileSource(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FileError);
    expect(error).toMatchObject({
      message: `Input file not found: ${path}`,
      operation: "open",
    });
  });

  test("rejects zstd content whatever the extension", async () => {
    const path = join(tempDir, "corpus.txt");
    writeFileSync(path, Buffer.from([0x28, 0xb5, 0x2f, 0xfd, 0x00]));
    const error = await openFileSource(path).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CompressionError);
    expect(error).toMatchObject({ format: "zstd", operation: "validate" });
  });

  test("accepts plain text with a compressed extension", async () => {
    const path = join(tempDir, "corpus.txt.gz");
    writeFileSync(path, "1 |x 1\n");
    const source = await openFileSource(path);
    await source.close();
    expect(source.sizeHint()).toBe(7);
  });

  test("accepts files shorter than the magic bytes", async () => {
    const path = join(tempDir, "tiny.txt");
    writeFileSync(path, "a");
    const source = await openFileSource(path);
    await source.close();
    expect(source.sizeHint()).toBe(1);
  });
});

describe("MemorySource", () => {
  test("caps every read at maxReadSize", async () => {
    const source = new MemorySource("abcde", { name: "mem", maxReadSize: 2 });
    const buffer = new Uint8Array(8);

    expect(source.name).toBe("mem");
    expect(source.sizeHint()).toBe(5);
    expect(await source.read(buffer, 8)).toBe(2);
    expect(await source.read(buffer, 1)).toBe(1);
    expect(await source.read(buffer, 8)).toBe(2);
    expect(await source.read(buffer, 8)).toBe(0);
  });

  test("accepts raw bytes", async () => {
    const source = new MemorySource(new Uint8Array([1, 2, 3]));
    const buffer = new Uint8Array(3);
    expect(await source.read(buffer, 3)).toBe(3);
    expect([...buffer]).toEqual([1, 2, 3]);
  });
});
