/**
 * Indexer option validation and defaults
 *
 * @module indexer/options
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import { silentLogger } from "../logger";
import type { IndexerOptions, ResolvedIndexerOptions } from "../types";
import { IndexerOptionsSchema } from "../types";
import { DEFAULT_BUFFER_SIZE, DEFAULT_CHUNK_SIZE_BYTES, DEFAULT_STREAM_PREFIX } from "./constants";

/**
 * Validate options with ArkType and fill in defaults
 *
 * @throws {ValidationError} If any option is out of range
 */
export function resolveIndexerOptions(options: IndexerOptions = {}): ResolvedIndexerOptions {
  const { logger, ...rest } = options;
  const validated = IndexerOptionsSchema(rest);
  if (validated instanceof type.errors) {
    throw new ValidationError(`Invalid indexer options: ${validated.summary}`);
  }

  const prefix = validated.streamPrefix ?? DEFAULT_STREAM_PREFIX;

  return {
    isPrimary: validated.isPrimary ?? true,
    skipSequenceIds: validated.skipSequenceIds ?? false,
    numericSequenceId: validated.numericSequenceId ?? false,
    streamPrefix: typeof prefix === "string" ? prefix.charCodeAt(0) : prefix,
    chunkSizeBytes: validated.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE_BYTES,
    bufferSize: validated.bufferSize ?? DEFAULT_BUFFER_SIZE,
    logger: logger ?? silentLogger(),
  };
}
