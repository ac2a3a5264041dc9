/**
 * Sequential byte sources for the indexer
 *
 * The scanner pulls bytes through a {@link FileSource}: one forward pass,
 * end of input signaled by a zero-byte read.
 */

import { type FileHandle, open } from "node:fs/promises";
import { detectCompression, MAGIC_BYTES_LENGTH } from "../compression/detector";
import { CompressionError, FileError } from "../errors";
import type { FilePath } from "../types";
import { exists, getSize, validatePath } from "./file-reader";

/**
 * Byte-oriented sequential reader
 */
export interface FileSource {
  /** Path or label used in error messages */
  readonly name: string;
  /**
   * Read up to `maxBytes` bytes into the start of `buffer`
   *
   * @returns Number of bytes read; 0 at end of input
   */
  read(buffer: Uint8Array, maxBytes: number): Promise<number>;
  /** Total size of the input in bytes, as known when the source was opened */
  sizeHint(): number;
  close(): Promise<void>;
}

/**
 * File source over a Node.js file handle
 */
export class NodeFileSource implements FileSource {
  private closed = false;

  constructor(
    private readonly handle: FileHandle,
    private readonly path: FilePath,
    private readonly size: number
  ) {}

  get name(): string {
    return this.path;
  }

  async read(buffer: Uint8Array, maxBytes: number): Promise<number> {
    if (this.closed) {
      throw new FileError("Input file not open for reading", this.path, "read");
    }
    try {
      // position null: read from the current file position and advance it
      const { bytesRead } = await this.handle.read(
        buffer,
        0,
        Math.min(maxBytes, buffer.length),
        null
      );
      return bytesRead;
    } catch (error) {
      throw FileError.fromSystemError("read", this.path, error);
    }
  }

  sizeHint(): number {
    return this.size;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.handle.close();
    } catch (error) {
      throw FileError.fromSystemError("close", this.path, error);
    }
  }
}

/**
 * Open a corpus file for indexing
 *
 * @throws {FileError} If the file does not exist or cannot be opened
 * @throws {CompressionError} If the file is gzip or zstd compressed
 *
 * @example
 * ```typescript
 * const source = await openFileSource("train.ctf");
 * try {
 *   // scan source
 * } finally {
 *   await source.close();
 * }
 * ```
 */
export async function openFileSource(path: string): Promise<NodeFileSource> {
  const validatedPath = validatePath(path);

  if (!(await exists(validatedPath))) {
    throw new FileError(
      `Input file not found: ${validatedPath}`,
      validatedPath,
      "open",
      undefined,
      "File does not exist or is not a regular file"
    );
  }

  const size = await getSize(validatedPath);

  let handle: FileHandle;
  try {
    handle = await open(validatedPath, "r");
  } catch (error) {
    throw FileError.fromSystemError("open", validatedPath, error);
  }

  try {
    const header = new Uint8Array(MAGIC_BYTES_LENGTH);
    const { bytesRead } = await handle.read(header, 0, header.length, 0);
    const format = detectCompression(header.subarray(0, bytesRead));
    if (format !== "none") {
      throw new CompressionError(
        `Input file appears to be ${format} compressed; sequence offsets require uncompressed text`,
        format,
        "validate",
        `File: ${validatedPath}`
      );
    }
  } catch (error) {
    await handle.close();
    if (error instanceof CompressionError) throw error;
    throw FileError.fromSystemError("read", validatedPath, error);
  }

  return new NodeFileSource(handle, validatedPath, size);
}

/**
 * In-memory source
 *
 * `maxReadSize` caps every read, which reproduces the short reads a pipe or
 * network file system can return.
 */
export class MemorySource implements FileSource {
  private readonly bytes: Uint8Array;
  private position = 0;

  constructor(
    content: Uint8Array | string,
    private readonly options: { readonly name?: string; readonly maxReadSize?: number } = {}
  ) {
    this.bytes = typeof content === "string" ? new TextEncoder().encode(content) : content;
  }

  get name(): string {
    return this.options.name ?? "<memory>";
  }

  async read(buffer: Uint8Array, maxBytes: number): Promise<number> {
    const count = Math.min(
      maxBytes,
      buffer.length,
      this.options.maxReadSize ?? Number.POSITIVE_INFINITY,
      this.bytes.length - this.position
    );
    buffer.set(this.bytes.subarray(this.position, this.position + count));
    this.position += count;
    return count;
  }

  sizeHint(): number {
    return this.bytes.length;
  }

  async close(): Promise<void> {}
}
