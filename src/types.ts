/**
 * Core type definitions for corpus indexing
 *
 * A corpus is a line-oriented text file; the index describes it as a list of
 * sequences, each a contiguous byte range tagged with an interned key.
 */

import { type } from "arktype";
import type { Logger } from "pino";

// =============================================================================
// INDEX TYPES
// =============================================================================

/**
 * Key of an indexed sequence
 *
 * `sequence` is the id the registry assigned to the sequence's textual key.
 * `sample` addresses a line inside the sequence and is always 0 at index time.
 */
export interface SequenceKey {
  readonly sequence: number;
  readonly sample: number;
}

/**
 * One indexed sequence: a byte range of the corpus and the key it carries
 */
export interface SequenceDescriptor {
  /** Absolute offset of the first byte of the sequence */
  readonly fileOffsetBytes: number;
  /** Length of the byte range, delimiter included */
  readonly byteSize: number;
  /** Number of lines folded into the sequence */
  readonly numberOfSamples: number;
  readonly key: SequenceKey;
}

/**
 * Bidirectional string ↔ id interning table shared by every stream of a corpus
 */
export interface KeyRegistry {
  /** Id of `key`, or `undefined` if it was never registered */
  tryGet(key: string): number | undefined;
  /** Register `key` under the next id and return it */
  addValue(key: string): number;
  /** Id of `key`, registering it first if needed */
  getOrCreate(key: string): number;
  /** Key registered under `id` */
  lookup(id: number): string;
}

/**
 * Decides which sequences belong to the active corpus partition
 */
export interface CorpusFilter {
  isIncluded(key: string): boolean;
  getRegistry(): KeyRegistry;
}

/**
 * Receives the descriptors of one scanned stream
 */
export interface IndexSink {
  isEmpty(): boolean;
  /** Capacity hint: total byte size of the stream about to be scanned */
  reserve(estimatedByteSize: number): void;
  append(descriptor: SequenceDescriptor): void;
}

// =============================================================================
// FILE I/O TYPES
// =============================================================================

/**
 * Branded type for validated file paths
 */
export type FilePath = string & {
  readonly __brand: "FilePath";
};

/**
 * File path validation schema
 * Rejects empty paths and paths with null bytes, normalizes separators
 */
export const FilePathSchema = type("string>0")
  .narrow((path, ctx) => {
    if (path.includes("\0")) {
      return ctx.reject({
        expected: "a path without null characters",
        actual: JSON.stringify(path),
      });
    }
    return true;
  })
  .pipe((path) => path.replace(/[\\/]+/g, "/") as FilePath);

/**
 * Compression formats recognized from magic bytes
 */
export type CompressionFormat = "gzip" | "zstd" | "none";

// =============================================================================
// INDEXER CONFIGURATION
// =============================================================================

/**
 * ArkType schema for indexer options
 *
 * - streamPrefix must be a single character or a byte value
 * - chunkSizeBytes and bufferSize must be positive integers
 */
export const IndexerOptionsSchema = type({
  "isPrimary?": "boolean",
  "skipSequenceIds?": "boolean",
  "numericSequenceId?": "boolean",
  "streamPrefix?": "string | number",
  "chunkSizeBytes?": "number.integer>=1",
  "bufferSize?": "number.integer>=1",
}).narrow((options, ctx) => {
  const prefix = options.streamPrefix;
  if (typeof prefix === "string" && (prefix.length !== 1 || prefix.charCodeAt(0) > 0x7f)) {
    return ctx.reject({
      expected: "a single ASCII character",
      actual: JSON.stringify(prefix),
      path: ["streamPrefix"],
    });
  }
  if (typeof prefix === "number" && (!Number.isInteger(prefix) || prefix < 0 || prefix > 0xff)) {
    return ctx.reject({
      expected: "a byte value between 0 and 255",
      actual: String(prefix),
      path: ["streamPrefix"],
    });
  }
  return true;
});

/**
 * Options fixed for the life of one scan
 */
export type IndexerOptions = typeof IndexerOptionsSchema.infer & {
  /** Logger for scan progress; silent when omitted */
  readonly logger?: Logger;
};

/**
 * Options after validation and defaults
 */
export interface ResolvedIndexerOptions {
  /** Whether this stream defines corpus sequence membership */
  readonly isPrimary: boolean;
  /** Treat every line as its own sequence, never parse keys */
  readonly skipSequenceIds: boolean;
  /** Keys are decimal numbers rather than whitespace-delimited words */
  readonly numericSequenceId: boolean;
  /** First byte marking a stream that carries no sequence ids */
  readonly streamPrefix: number;
  /** Chunking granularity forwarded to the index */
  readonly chunkSizeBytes: number;
  /** Read buffer capacity in bytes */
  readonly bufferSize: number;
  readonly logger: Logger;
}

// =============================================================================
// BUILD RESULTS
// =============================================================================

/**
 * Result type for operations that report failure without throwing
 *
 * @example
 * ```ts
 * const result = await indexer.build(corpus);
 * if (result.success) {
 *   console.log(result.value.appended);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

/**
 * Boundary policy chosen for a stream
 */
export type BoundaryPolicyKind = "line-delimited" | "key-grouped";

/**
 * What one build did
 */
export interface BuildSummary {
  /** The sink already held an index, nothing was scanned */
  readonly skipped: boolean;
  readonly policy?: BoundaryPolicyKind;
  /** Sequences discovered, included or not */
  readonly sequences: number;
  /** Sequences handed to the sink */
  readonly appended: number;
  /** Sequences dropped by the corpus filter */
  readonly excluded: number;
  /** Logical start offset (3 after a byte order mark) */
  readonly startOffset: number;
  /** Offset one past the last scanned byte */
  readonly endOffset: number;
}
