/**
 * Persisted sequence indexes
 *
 * An index file has one tab-delimited line per sequence and no header, in
 * the spirit of a samtools `.fai`:
 *
 * ```
 * key	offset	byteSize	samples
 * ```
 *
 * Keys are stored as text; loading interns them into the caller's registry,
 * so ids follow that registry rather than the one used at build time.
 *
 * @module index-store/index-file
 */

import { type } from "arktype";
import { StringRegistry } from "../corpus/string-registry";
import { ParseError } from "../errors";
import { readToString, writeString } from "../io/file-reader";
import type { KeyRegistry } from "../types";
import type { ChunkedIndexOptions } from "./chunked-index";
import { ChunkedIndex } from "./chunked-index";

const INDEX_FORMAT = "sequence-index";
const COLUMN_COUNT = 4;

/**
 * ArkType schema for one index record
 *
 * - key must be non-empty and free of whitespace
 * - offset must be non-negative, byteSize and samples positive
 */
const IndexRecordSchema = type({
  key: "/^\\S+$/",
  offset: "number.integer>=0",
  byteSize: "number.integer>=1",
  samples: "number.integer>=1",
});

type IndexRecord = typeof IndexRecordSchema.infer;

/**
 * Write an index as text, one sequence per line in file order
 *
 * @throws {FileError} If the file cannot be written
 */
export async function writeIndexFile(
  path: string,
  index: ChunkedIndex,
  registry: KeyRegistry
): Promise<void> {
  const lines: string[] = [];
  for (const descriptor of index.sequences()) {
    lines.push(
      [
        registry.lookup(descriptor.key.sequence),
        descriptor.fileOffsetBytes.toString(),
        descriptor.byteSize.toString(),
        descriptor.numberOfSamples.toString(),
      ].join("\t")
    );
  }
  await writeString(path, lines.length === 0 ? "" : `${lines.join("\n")}\n`);
}

/**
 * Load an index file into a new {@link ChunkedIndex}
 *
 * @throws {ParseError} On malformed or out-of-order records
 * @throws {FileError} If the file cannot be read
 */
export async function readIndexFile(
  path: string,
  options: ChunkedIndexOptions & { readonly registry?: KeyRegistry } = {}
): Promise<{ readonly index: ChunkedIndex; readonly registry: KeyRegistry }> {
  const registry = options.registry ?? new StringRegistry();
  const index = new ChunkedIndex(options);
  const content = await readToString(path);

  let lineNumber = 0;
  for (const line of content.split("\n")) {
    lineNumber++;
    if (line.trim() === "") continue;

    const record = parseRecord(line, lineNumber);
    try {
      index.append({
        fileOffsetBytes: record.offset,
        byteSize: record.byteSize,
        numberOfSamples: record.samples,
        key: { sequence: registry.getOrCreate(record.key), sample: 0 },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ParseError(`Invalid index record: ${message}`, INDEX_FORMAT, lineNumber, line);
    }
  }

  return { index, registry };
}

function parseRecord(line: string, lineNumber: number): IndexRecord {
  const parts = line.split("\t");
  if (parts.length !== COLUMN_COUNT) {
    throw new ParseError(
      `Expected ${COLUMN_COUNT} columns, got ${parts.length}`,
      INDEX_FORMAT,
      lineNumber,
      line
    );
  }

  const [key, offsetStr, byteSizeStr, samplesStr] = parts;
  const validated = IndexRecordSchema({
    key,
    offset: parseInteger(offsetStr),
    byteSize: parseInteger(byteSizeStr),
    samples: parseInteger(samplesStr),
  });
  if (validated instanceof type.errors) {
    throw new ParseError(
      `Invalid index record: ${validated.summary}`,
      INDEX_FORMAT,
      lineNumber,
      line
    );
  }
  return validated;
}

function parseInteger(field: string | undefined): number {
  return field !== undefined && /^\d+$/.test(field) ? Number.parseInt(field, 10) : Number.NaN;
}
