/**
 * Error handling for corpus indexing
 *
 * Every failure the indexer surfaces derives from {@link CorpusIndexError}.
 * Scan failures carry a kind and, where one is known, the byte offset at
 * which the scan stopped.
 */

/**
 * Base error class for all corpus-index errors
 */
export class CorpusIndexError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: string
  ) {
    super(message);
    this.name = "CorpusIndexError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options or arguments
 */
export class ValidationError extends CorpusIndexError {
  constructor(message: string, context?: string) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for persisted index files
 */
export class ParseError extends CorpusIndexError {
  constructor(
    message: string,
    public readonly format: string,
    public readonly lineNumber?: number,
    context?: string
  ) {
    super(
      lineNumber === undefined ? message : `${message} (line ${lineNumber})`,
      "PARSE_ERROR",
      context
    );
    this.name = "ParseError";
  }
}

/**
 * Reasons a scan can abort
 */
export type IndexBuildErrorKind = "empty-input" | "missing-sequence-id" | "out-of-order";

/**
 * Fatal outcome of an index build
 *
 * Raised inside the scan and surfaced to callers of `Indexer.build()` as the
 * error half of a `BuildResult`.
 */
export class IndexBuildError extends CorpusIndexError {
  constructor(
    message: string,
    public readonly kind: IndexBuildErrorKind,
    public readonly offset?: number,
    context?: string
  ) {
    super(message, "INDEX_BUILD_ERROR", context);
    this.name = "IndexBuildError";
  }

  static emptyInput(): IndexBuildError {
    return new IndexBuildError("Input file is empty", "empty-input", 0);
  }

  static missingSequenceId(offset: number): IndexBuildError {
    return new IndexBuildError(
      `Expected a sequence id at the offset ${offset}, none was found`,
      "missing-sequence-id",
      offset
    );
  }

  override toString(): string {
    let msg = super.toString();
    if (this.offset !== undefined) {
      msg += `\nByte offset: ${this.offset}`;
    }
    return msg;
  }
}

/**
 * Compression errors: a compressed corpus has no seekable byte offsets
 */
export class CompressionError extends CorpusIndexError {
  constructor(
    message: string,
    public readonly format: "gzip" | "zstd" | "none",
    public readonly operation: "detect" | "validate",
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", context);
    this.name = "CompressionError";
  }
}

/**
 * File I/O errors with the failing operation and the underlying system error
 */
export class FileError extends CorpusIndexError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "open" | "read" | "write" | "stat" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) {
      return systemError;
    }
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Buffer management errors raised when the scan cursor is misused
 */
export class BufferError extends CorpusIndexError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "allocate" | "refill" | "overflow" | "underflow",
    context?: string
  ) {
    super(message, "BUFFER_ERROR", context);
    this.name = "BufferError";
  }
}

/**
 * Error recovery suggestions for common issues
 */
export const ERROR_SUGGESTIONS = {
  EMPTY_INPUT: "The corpus file has no content to index; check the path and that it was fully written",
  MISSING_SEQUENCE_ID:
    "Every line must start with a sequence id, or disable key parsing with skipSequenceIds",
  COMPRESSED_INPUT: "Decompress the corpus first; byte offsets must point into the raw text",
  OUT_OF_ORDER: "Descriptors must be appended in file order without overlaps",
} as const;

/**
 * Get a suggestion for an index build error
 */
export function getErrorSuggestion(error: CorpusIndexError): string | undefined {
  if (error instanceof IndexBuildError) {
    switch (error.kind) {
      case "empty-input":
        return ERROR_SUGGESTIONS.EMPTY_INPUT;
      case "missing-sequence-id":
        return ERROR_SUGGESTIONS.MISSING_SEQUENCE_ID;
      case "out-of-order":
        return ERROR_SUGGESTIONS.OUT_OF_ORDER;
    }
  }
  if (error instanceof CompressionError) {
    return ERROR_SUGGESTIONS.COMPRESSED_INPUT;
  }
  return undefined;
}
