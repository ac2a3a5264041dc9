export type { ChunkDescriptor, ChunkedIndexOptions, SequenceLocation } from "./chunked-index";
export { ChunkedIndex } from "./chunked-index";
export { readIndexFile, writeIndexFile } from "./index-file";
