/**
 * File reading utilities built on the Effect platform file system
 *
 * Whole-file reads are reserved for small side files (key lists, persisted
 * indexes); corpora are scanned through {@link FileSource} and read back by
 * byte range.
 */

import { open } from "node:fs/promises";
import { FileSystem } from "@effect/platform";
import { NodeFileSystem } from "@effect/platform-node";
import { type } from "arktype";
import { Effect, Either } from "effect";
import { FileError } from "../errors";
import type { FilePath } from "../types";
import { FilePathSchema } from "../types";

/**
 * Check if a file exists and is a regular file
 *
 * @param path File path to check
 * @returns Promise resolving to true if the path names a regular file
 * @throws {FileError} If path validation fails or the path cannot be examined
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  return runFileProgram(program, "stat", validatedPath);
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  return runFileProgram(program, "stat", validatedPath);
}

/**
 * Read entire file to string
 *
 * @throws {FileError} If file cannot be read
 */
export async function readToString(path: string): Promise<string> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFileString(validatedPath);
  });

  return runFileProgram(program, "read", validatedPath);
}

/**
 * Write a string to a file, replacing its content
 *
 * @throws {FileError} If file cannot be written
 */
export async function writeString(path: string, content: string): Promise<void> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(validatedPath, content);
  });

  return runFileProgram(program, "write", validatedPath);
}

/**
 * Read a specific byte range from a file
 *
 * Random access into an indexed corpus: the range of a sequence descriptor is
 * `[fileOffsetBytes, fileOffsetBytes + byteSize)`.
 *
 * @param path File path to read from
 * @param start Starting byte offset (inclusive)
 * @param end Ending byte offset (exclusive)
 * @returns Promise resolving to byte array of requested range
 * @throws {FileError} If file cannot be read or range is invalid
 *
 * @example
 * ```typescript
 * const bytes = await readByteRange('corpus.txt', 1000, 2000);
 * const text = new TextDecoder().decode(bytes);
 * ```
 */
export async function readByteRange(path: string, start: number, end: number): Promise<Uint8Array> {
  const validatedPath = validatePath(path);

  if (start < 0 || end < 0) {
    throw new FileError("Byte range must be non-negative", validatedPath, "read");
  }
  if (start >= end) {
    throw new FileError("Start byte must be less than end byte", validatedPath, "read");
  }

  const program = Effect.tryPromise({
    try: async () => {
      const fileHandle = await open(validatedPath, "r");
      try {
        const buffer = new Uint8Array(end - start);
        const { bytesRead } = await fileHandle.read(buffer, 0, buffer.length, start);
        if (bytesRead < buffer.length) {
          throw new FileError(
            `Byte range ${start}-${end} extends past the end of the file`,
            validatedPath,
            "read"
          );
        }
        return buffer;
      } finally {
        await fileHandle.close();
      }
    },
    catch: (error) => error,
  });

  return runFileProgram(program, "read", validatedPath);
}

/**
 * Validate file path using ArkType and return branded type
 *
 * @throws {FileError} If the path is empty or malformed
 */
export function validatePath(path: string): FilePath {
  const validationResult = FilePathSchema(path);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
  }
  return validationResult;
}

/**
 * Run a file program on the Node file system, failing with a FileError
 */
async function runFileProgram<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem>,
  operation: FileError["operation"],
  path: FilePath
): Promise<A> {
  const result = await Effect.runPromise(
    program.pipe(
      Effect.mapError((error) => FileError.fromSystemError(operation, path, error)),
      Effect.either,
      Effect.provide(NodeFileSystem.layer)
    )
  );
  if (Either.isLeft(result)) {
    throw result.left;
  }
  return result.right;
}
