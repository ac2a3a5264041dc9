/**
 * Random access to indexed sequences
 *
 * @module reader/sequence-reader
 */

import { readByteRange } from "../io/file-reader";
import type { SequenceDescriptor } from "../types";

/**
 * Read the raw bytes of one sequence, delimiters included
 *
 * @throws {FileError} If the range cannot be read
 */
export function readSequence(path: string, descriptor: SequenceDescriptor): Promise<Uint8Array> {
  return readByteRange(
    path,
    descriptor.fileOffsetBytes,
    descriptor.fileOffsetBytes + descriptor.byteSize
  );
}

/**
 * Read one sequence as UTF-8 text
 */
export async function readSequenceText(
  path: string,
  descriptor: SequenceDescriptor
): Promise<string> {
  return new TextDecoder().decode(await readSequence(path, descriptor));
}
