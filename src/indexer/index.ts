/**
 * Streaming corpus indexer
 *
 * @module indexer
 */

export type { BoundaryPolicy, ScannedSequence, ScanStart } from "./boundary";
export { KeyGroupedPolicy, LineDelimitedPolicy, openScan, selectBoundaryPolicy } from "./boundary";
export {
  BYTE_ORDER_MARK,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_CHUNK_SIZE_BYTES,
  DEFAULT_STREAM_PREFIX,
  ROW_DELIMITER,
} from "./constants";
export { ScanCursor } from "./cursor";
export { SequenceEmitter } from "./emitter";
export type { BuildResult, BuiltIndex } from "./indexer";
export { buildIndex, Indexer } from "./indexer";
export type { KeyResolver, RawSequenceKey } from "./key-resolver";
export {
  createKeyResolver,
  decodeKeyBytes,
  NumericKeyResolver,
  sameKey,
  TextualKeyResolver,
  toRegistryKey,
} from "./key-resolver";
export { resolveIndexerOptions } from "./options";
