import { describe, expect, test } from "vitest";
import {
  BufferError,
  CompressionError,
  CorpusIndexError,
  ERROR_SUGGESTIONS,
  FileError,
  getErrorSuggestion,
  IndexBuildError,
  ParseError,
  ValidationError,
} from "../src/errors";

describe("error hierarchy", () => {
  test("every error is a CorpusIndexError with a code", () => {
    const errors: Array<[CorpusIndexError, string]> = [
      [new ValidationError("bad"), "VALIDATION_ERROR"],
      [new ParseError("bad", "sequence-index"), "PARSE_ERROR"],
      [IndexBuildError.emptyInput(), "INDEX_BUILD_ERROR"],
      [new CompressionError("bad", "gzip", "validate"), "COMPRESSION_ERROR"],
      [new FileError("bad", "a.txt", "read"), "FILE_ERROR"],
      [new BufferError("bad", 4, "underflow"), "BUFFER_ERROR"],
    ];
    for (const [error, code] of errors) {
      expect(error).toBeInstanceOf(CorpusIndexError);
      expect(error).toBeInstanceOf(Error);
      expect(error.code).toBe(code);
    }
  });

  test("toString includes context", () => {
    const error = new ValidationError("Option out of range", "bufferSize: 0");
    expect(error.toString()).toBe("ValidationError: Option out of range\nContext: bufferSize: 0");
  });

  test("ParseError appends the line number", () => {
    expect(new ParseError("Bad record", "sequence-index", 12).message).toBe("Bad record (line 12)");
    expect(new ParseError("Bad record", "sequence-index").message).toBe("Bad record");
  });
});

describe("IndexBuildError", () => {
  test("emptyInput", () => {
    const error = IndexBuildError.emptyInput();
    expect(error.kind).toBe("empty-input");
    expect(error.offset).toBe(0);
    expect(error.message).toBe("Input file is empty");
  });

  test("missingSequenceId reports the offset", () => {
    const error = IndexBuildError.missingSequenceId(42);
    expect(error.kind).toBe("missing-sequence-id");
    expect(error.message).toBe("Expected a sequence id at the offset 42, none was found");
    expect(error.toString()).toBe(
      "IndexBuildError: Expected a sequence id at the offset 42, none was found\nByte offset: 42"
    );
  });
});

describe("FileError", () => {
  test("fromSystemError adds a suggestion", () => {
    const cause = new Error("EACCES: permission denied, open 'train.txt'");
    const error = FileError.fromSystemError("open", "train.txt", cause);

    expect(error.message).toBe(
      "open operation failed: EACCES: permission denied, open 'train.txt'. Check file permissions or run with appropriate privileges"
    );
    expect(error.systemError).toBe(cause);
    expect(error.toString()).toContain(
      "\nSystem Error: Error: EACCES: permission denied, open 'train.txt'"
    );
  });

  test("fromSystemError keeps an existing FileError", () => {
    const original = new FileError("already wrapped", "train.txt", "read");
    expect(FileError.fromSystemError("stat", "other.txt", original)).toBe(original);
  });

  test("non-Error causes are stringified", () => {
    expect(FileError.fromSystemError("read", "train.txt", "boom").message).toBe(
      "read operation failed: boom"
    );
  });
});

describe("getErrorSuggestion", () => {
  test("maps build failures and compression to suggestions", () => {
    expect(getErrorSuggestion(IndexBuildError.emptyInput())).toBe(ERROR_SUGGESTIONS.EMPTY_INPUT);
    expect(getErrorSuggestion(IndexBuildError.missingSequenceId(0))).toBe(
      ERROR_SUGGESTIONS.MISSING_SEQUENCE_ID
    );
    expect(getErrorSuggestion(new IndexBuildError("overlap", "out-of-order", 4))).toBe(
      ERROR_SUGGESTIONS.OUT_OF_ORDER
    );
    expect(getErrorSuggestion(new CompressionError("gz", "gzip", "validate"))).toBe(
      ERROR_SUGGESTIONS.COMPRESSED_INPUT
    );
    expect(getErrorSuggestion(new ValidationError("bad"))).toBeUndefined();
  });
});
