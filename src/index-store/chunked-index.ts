/**
 * Chunked in-memory index of one corpus stream
 *
 * Sequences are grouped into chunks of roughly `chunkSizeBytes` so that
 * readers can load and shuffle a chunk at a time. The primary stream's
 * index also maps sequence ids to their location, which secondary streams
 * use to align with it.
 *
 * @module index-store/chunked-index
 */

import { IndexBuildError, ValidationError } from "../errors";
import { DEFAULT_CHUNK_SIZE_BYTES } from "../indexer/constants";
import type { IndexSink, SequenceDescriptor } from "../types";

/**
 * A group of consecutive sequences
 */
export interface ChunkDescriptor {
  readonly id: number;
  readonly sequences: readonly SequenceDescriptor[];
  /** Offset of the chunk's first sequence */
  readonly startOffset: number;
  /** Sum of the byte sizes of its sequences */
  readonly byteSize: number;
  /** Sum of the sample counts of its sequences */
  readonly numberOfSamples: number;
}

/**
 * Where a sequence lives in the index
 */
export interface SequenceLocation {
  readonly chunkId: number;
  readonly indexInChunk: number;
}

export interface ChunkedIndexOptions {
  readonly chunkSizeBytes?: number;
  readonly isPrimary?: boolean;
}

class MutableChunk implements ChunkDescriptor {
  readonly sequences: SequenceDescriptor[] = [];
  byteSize = 0;
  numberOfSamples = 0;

  constructor(
    readonly id: number,
    readonly startOffset: number
  ) {}

  add(descriptor: SequenceDescriptor): number {
    this.sequences.push(descriptor);
    this.byteSize += descriptor.byteSize;
    this.numberOfSamples += descriptor.numberOfSamples;
    return this.sequences.length - 1;
  }
}

/**
 * Index sink that groups appended sequences into chunks
 *
 * @example
 * ```typescript
 * const index = new ChunkedIndex({ chunkSizeBytes: 1024 * 1024 });
 * const indexer = new Indexer(source, index);
 * await indexer.build(CorpusDescriptor.all());
 * for (const chunk of index.chunks) {
 *   console.log(chunk.id, chunk.sequences.length);
 * }
 * ```
 */
export class ChunkedIndex implements IndexSink {
  readonly chunkSizeBytes: number;
  readonly isPrimary: boolean;

  private readonly chunkList: MutableChunk[] = [];
  private readonly locations = new Map<number, SequenceLocation>();
  private reservedBytes = 0;
  private sequenceTotal = 0;
  private lastEnd = 0;

  constructor(options: ChunkedIndexOptions = {}) {
    const chunkSizeBytes = options.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE_BYTES;
    if (!Number.isInteger(chunkSizeBytes) || chunkSizeBytes < 1) {
      throw new ValidationError(`chunkSizeBytes must be a positive integer, got ${chunkSizeBytes}`);
    }
    this.chunkSizeBytes = chunkSizeBytes;
    this.isPrimary = options.isPrimary ?? true;
  }

  isEmpty(): boolean {
    return this.sequenceTotal === 0;
  }

  /** Record the expected corpus size as a capacity hint; negative sizes count as 0 */
  reserve(estimatedByteSize: number): void {
    this.reservedBytes = Math.max(0, estimatedByteSize);
  }

  /** Byte size announced through {@link reserve} */
  get reserved(): number {
    return this.reservedBytes;
  }

  /**
   * Append the next sequence of the stream
   *
   * @throws {IndexBuildError} `out-of-order` if the range starts before the
   * end of the previously appended one
   */
  append(descriptor: SequenceDescriptor): void {
    if (descriptor.byteSize <= 0 || descriptor.numberOfSamples < 1) {
      throw new ValidationError(
        `Sequence at offset ${descriptor.fileOffsetBytes} has size ${descriptor.byteSize} and ${descriptor.numberOfSamples} samples`
      );
    }
    if (descriptor.fileOffsetBytes < this.lastEnd) {
      throw new IndexBuildError(
        `Sequence at offset ${descriptor.fileOffsetBytes} overlaps the previous one ending at ${this.lastEnd}`,
        "out-of-order",
        descriptor.fileOffsetBytes
      );
    }

    let chunk = this.chunkList[this.chunkList.length - 1];
    const full =
      chunk !== undefined &&
      chunk.byteSize > 0 &&
      chunk.byteSize + descriptor.byteSize > this.chunkSizeBytes;
    if (chunk === undefined || full) {
      chunk = new MutableChunk(this.chunkList.length, descriptor.fileOffsetBytes);
      this.chunkList.push(chunk);
    }

    const indexInChunk = chunk.add(descriptor);
    // the first occurrence of a key defines its location
    if (this.isPrimary && !this.locations.has(descriptor.key.sequence)) {
      this.locations.set(descriptor.key.sequence, { chunkId: chunk.id, indexInChunk });
    }
    this.sequenceTotal++;
    this.lastEnd = descriptor.fileOffsetBytes + descriptor.byteSize;
  }

  get chunks(): readonly ChunkDescriptor[] {
    return this.chunkList;
  }

  get sequenceCount(): number {
    return this.sequenceTotal;
  }

  /**
   * All sequences in file order
   */
  *sequences(): IterableIterator<SequenceDescriptor> {
    for (const chunk of this.chunkList) {
      yield* chunk.sequences;
    }
  }

  /**
   * Location of a sequence id; only the primary index keeps locations
   */
  locate(sequenceId: number): SequenceLocation | undefined {
    return this.locations.get(sequenceId);
  }

  find(sequenceId: number): SequenceDescriptor | undefined {
    const location = this.locate(sequenceId);
    if (location === undefined) return undefined;
    return this.chunkList[location.chunkId]?.sequences[location.indexInChunk];
  }
}
