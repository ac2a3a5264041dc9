/**
 * Block reader: a fixed-capacity buffer over a sequential byte source
 *
 * The cursor tracks the absolute file offset of every buffered byte. The
 * offset of the read position is always `startOffset + position`, where
 * `startOffset` is the absolute offset of the first byte in the buffer.
 *
 * @module indexer/cursor
 */

import { BufferError, FileError } from "../errors";
import type { FileSource } from "../io/file-source";

export class ScanCursor {
  private readonly buffer: Uint8Array;
  private position = 0;
  private end = 0;
  private startOffset = 0;
  private endOffset = 0;
  private exhausted = false;
  private primed = false;

  /**
   * @param source - Byte source, read strictly forward
   * @param capacity - Maximum bytes fetched by one refill
   * @param minimumPrime - Bytes {@link prime} tries to buffer before returning
   */
  constructor(
    private readonly source: FileSource,
    private readonly capacity: number,
    minimumPrime = 0
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new BufferError(
        `Buffer capacity must be a positive integer, got ${capacity}`,
        capacity,
        "allocate"
      );
    }
    this.buffer = new Uint8Array(Math.max(capacity, minimumPrime));
  }

  /** Bytes buffered past the read position */
  remaining(): number {
    return this.end - this.position;
  }

  /** Absolute offset of the read position */
  offset(): number {
    return this.startOffset + this.position;
  }

  /** Absolute offset one past the last buffered byte; the file size once exhausted */
  bufferEndOffset(): number {
    return this.endOffset;
  }

  /** The source returned no more bytes and the buffer is consumed */
  isExhausted(): boolean {
    return this.exhausted;
  }

  /** Byte at the read position, if one is buffered */
  peek(): number | undefined {
    return this.position < this.end ? this.buffer[this.position] : undefined;
  }

  /**
   * Unconsumed buffered bytes
   *
   * The view is only valid until the next refill.
   */
  window(): Uint8Array {
    return this.buffer.subarray(this.position, this.end);
  }

  /**
   * Distance from the read position to the next `byte` in the buffer
   */
  findByte(byte: number): number | undefined {
    const index = this.window().indexOf(byte);
    return index === -1 ? undefined : index;
  }

  advance(count: number): void {
    if (count < 0 || count > this.remaining()) {
      throw new BufferError(
        `Cannot advance ${count} bytes with ${this.remaining()} buffered`,
        this.capacity,
        "underflow",
        `Offset: ${this.offset()}`
      );
    }
    this.position += count;
  }

  /**
   * First fill of the buffer
   *
   * Keeps reading until `minimumPrime` bytes are buffered or the source
   * ends, so the caller can inspect a fixed-length file header even under
   * short reads. Only the first fill may be primed.
   */
  async prime(): Promise<void> {
    if (this.primed || this.endOffset > 0 || this.exhausted) {
      throw new BufferError("Cursor was already filled", this.capacity, "refill");
    }
    this.primed = true;

    const target = this.buffer.length;
    let bytesRead = await this.readInto(0, this.capacity);
    while (bytesRead > 0 && this.end < target) {
      bytesRead = await this.readInto(this.end, target - this.end);
    }
    if (this.end === 0) {
      this.exhausted = true;
    }
  }

  /**
   * Replace the buffer with the next block of the source
   *
   * Only legal once every buffered byte has been consumed. A zero-byte read
   * marks the cursor exhausted; refilling an exhausted cursor is a no-op.
   */
  async refill(): Promise<void> {
    if (this.exhausted) return;
    if (this.remaining() > 0) {
      throw new BufferError(
        `Refill would discard ${this.remaining()} unconsumed bytes`,
        this.capacity,
        "refill",
        `Offset: ${this.offset()}`
      );
    }

    this.startOffset = this.endOffset;
    this.position = 0;
    this.end = 0;

    const bytesRead = await this.readInto(0, this.capacity);
    if (bytesRead === 0) {
      this.exhausted = true;
    }
  }

  private async readInto(at: number, maxBytes: number): Promise<number> {
    let bytesRead: number;
    try {
      bytesRead = await this.source.read(this.buffer.subarray(at), maxBytes);
    } catch (error) {
      throw FileError.fromSystemError("read", this.source.name, error);
    }

    if (!Number.isInteger(bytesRead) || bytesRead < 0 || bytesRead > maxBytes) {
      throw new BufferError(
        `Source returned ${bytesRead} bytes for a read of at most ${maxBytes}`,
        this.capacity,
        "overflow"
      );
    }

    this.end += bytesRead;
    this.endOffset += bytesRead;
    if (this.endOffset - this.startOffset !== this.end) {
      throw new BufferError(
        `Buffer spans ${this.end} bytes but offsets ${this.startOffset}-${this.endOffset}`,
        this.capacity,
        "overflow"
      );
    }
    return bytesRead;
  }
}
