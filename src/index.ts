/**
 * corpus-index - streaming byte-offset indexes for line-oriented corpora
 *
 * Scans a text corpus once and records where every sequence starts, how
 * many bytes and lines it spans, and which key it carries, so readers can
 * seek straight to any sequence later.
 */

// Compression check
export { detectCompression } from "./compression/detector";
// Corpus membership and key interning
export { CorpusDescriptor, StringRegistry } from "./corpus";
// Error types
export {
  BufferError,
  CompressionError,
  CorpusIndexError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  IndexBuildError,
  type IndexBuildErrorKind,
  ParseError,
  ValidationError,
} from "./errors";
// Index storage
export {
  type ChunkDescriptor,
  ChunkedIndex,
  type ChunkedIndexOptions,
  readIndexFile,
  type SequenceLocation,
  writeIndexFile,
} from "./index-store";
// Indexer
export {
  type BoundaryPolicy,
  type BuildResult,
  buildIndex,
  type BuiltIndex,
  Indexer,
  KeyGroupedPolicy,
  LineDelimitedPolicy,
  type RawSequenceKey,
  ScanCursor,
  type ScannedSequence,
} from "./indexer";
// File I/O
export { exists, getSize, readByteRange, readToString } from "./io/file-reader";
export { type FileSource, MemorySource, NodeFileSource, openFileSource } from "./io/file-source";
export { createLogger, type Logger, type LoggingConfig } from "./logger";
// Random access
export { readSequence, readSequenceText } from "./reader/sequence-reader";
// Core types
export type {
  BoundaryPolicyKind,
  BuildSummary,
  CorpusFilter,
  FilePath,
  IndexerOptions,
  IndexSink,
  KeyRegistry,
  ResolvedIndexerOptions,
  Result,
  SequenceDescriptor,
  SequenceKey,
} from "./types";
