import { describe, expect, test } from "vitest";
import { IndexBuildError, ValidationError } from "../../src/errors";
import { ChunkedIndex } from "../../src/index-store/chunked-index";
import type { SequenceDescriptor } from "../../src/types";

function descriptor(
  fileOffsetBytes: number,
  byteSize: number,
  sequence: number,
  numberOfSamples = 1
): SequenceDescriptor {
  return { fileOffsetBytes, byteSize, numberOfSamples, key: { sequence, sample: 0 } };
}

describe("ChunkedIndex", () => {
  test("starts empty", () => {
    const index = new ChunkedIndex();
    expect(index.isEmpty()).toBe(true);
    expect(index.sequenceCount).toBe(0);
    expect(index.chunks).toEqual([]);
  });

  test("groups sequences into chunks by byte size", () => {
    const index = new ChunkedIndex({ chunkSizeBytes: 10 });
    index.append(descriptor(0, 4, 0, 2));
    index.append(descriptor(4, 4, 1));
    index.append(descriptor(8, 4, 2, 3));

    expect(index.isEmpty()).toBe(false);
    expect(index.sequenceCount).toBe(3);
    expect(
      index.chunks.map(({ id, startOffset, byteSize, numberOfSamples, sequences }) => ({
        id,
        startOffset,
        byteSize,
        numberOfSamples,
        count: sequences.length,
      }))
    ).toEqual([
      { id: 0, startOffset: 0, byteSize: 8, numberOfSamples: 3, count: 2 },
      { id: 1, startOffset: 8, byteSize: 4, numberOfSamples: 3, count: 1 },
    ]);
  });

  test("an oversized sequence gets a chunk of its own", () => {
    const index = new ChunkedIndex({ chunkSizeBytes: 10 });
    index.append(descriptor(0, 25, 0));
    index.append(descriptor(25, 1, 1));
    expect(index.chunks.map((chunk) => chunk.sequences.length)).toEqual([1, 1]);
  });

  test("leaves gaps from excluded sequences in place", () => {
    const index = new ChunkedIndex();
    index.append(descriptor(0, 4, 0));
    index.append(descriptor(100, 4, 1));
    expect([...index.sequences()].map((d) => d.fileOffsetBytes)).toEqual([0, 100]);
  });

  test("rejects overlapping ranges", () => {
    const index = new ChunkedIndex();
    index.append(descriptor(0, 4, 0));
    expect(() => index.append(descriptor(2, 4, 1))).toThrow(IndexBuildError);
    expect(() => index.append(descriptor(2, 4, 1))).toThrow(
      "Sequence at offset 2 overlaps the previous one ending at 4"
    );
    expect(index.sequenceCount).toBe(1);
  });

  test("rejects empty ranges and sequences without samples", () => {
    const index = new ChunkedIndex();
    expect(() => index.append(descriptor(0, 0, 0))).toThrow(ValidationError);
    expect(() => index.append(descriptor(0, 4, 0, 0))).toThrow(ValidationError);
    expect(index.isEmpty()).toBe(true);
  });

  test("primary indexes locate the first occurrence of a key", () => {
    const index = new ChunkedIndex({ chunkSizeBytes: 4 });
    index.append(descriptor(0, 4, 7));
    index.append(descriptor(4, 4, 3));
    index.append(descriptor(8, 4, 7));

    expect(index.locate(3)).toEqual({ chunkId: 1, indexInChunk: 0 });
    expect(index.find(7)).toEqual(descriptor(0, 4, 7));
    expect(index.find(5)).toBeUndefined();
  });

  test("secondary indexes keep no locations", () => {
    const index = new ChunkedIndex({ isPrimary: false });
    index.append(descriptor(0, 4, 0));
    expect(index.isPrimary).toBe(false);
    expect(index.locate(0)).toBeUndefined();
    expect(index.find(0)).toBeUndefined();
  });

  test("reserve records the expected size", () => {
    const index = new ChunkedIndex({ chunkSizeBytes: 10 });
    index.reserve(25);
    expect(index.reserved).toBe(25);
    expect(index.chunks).toEqual([]);
    index.reserve(-5);
    expect(index.reserved).toBe(0);
  });

  test("rejects a non-positive chunk size", () => {
    expect(() => new ChunkedIndex({ chunkSizeBytes: 0 })).toThrow(ValidationError);
  });
});
