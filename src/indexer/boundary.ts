/**
 * Boundary scanning: where one sequence ends and the next begins
 *
 * Both policies share the cursor set up by {@link openScan}, which performs
 * the first fill and skips a UTF-8 byte order mark. Each policy then scans
 * the rest of the input exactly once.
 *
 * @remarks
 * Line-delimited: every line is a sequence.
 *
 * Key-grouped: consecutive lines sharing a leading key form one sequence.
 * The key is read at each line start; a changed key closes the open
 * sequence at that line's first byte.
 *
 * @module indexer/boundary
 */

import type { Logger } from "pino";
import { IndexBuildError, ValidationError } from "../errors";
import type { FileSource } from "../io/file-source";
import type { BoundaryPolicyKind, ResolvedIndexerOptions } from "../types";
import { BYTE_ORDER_MARK, ROW_DELIMITER } from "./constants";
import { ScanCursor } from "./cursor";
import type { KeyResolver, RawSequenceKey } from "./key-resolver";
import { sameKey } from "./key-resolver";

/**
 * A closed sequence before filtering and interning
 */
export interface ScannedSequence {
  readonly fileOffsetBytes: number;
  readonly byteSize: number;
  readonly numberOfSamples: number;
  readonly key: RawSequenceKey;
}

export interface BoundaryPolicy {
  readonly kind: BoundaryPolicyKind;
  /**
   * Scan the remaining input
   *
   * Lazy, finite and single-pass: a policy can be scanned only once.
   */
  scan(): AsyncGenerator<ScannedSequence, void, undefined>;
}

/**
 * A primed cursor positioned at the first byte of content
 */
export interface ScanStart {
  readonly cursor: ScanCursor;
  /** 3 when a byte order mark was skipped, otherwise 0 */
  readonly startOffset: number;
}

/**
 * Fill the buffer for the first time and skip a byte order mark
 *
 * @throws {IndexBuildError} `empty-input` if there is nothing but an
 * optional byte order mark to index
 */
export async function openScan(
  source: FileSource,
  bufferSize: number,
  logger: Logger
): Promise<ScanStart> {
  const cursor = new ScanCursor(source, bufferSize, BYTE_ORDER_MARK.length);
  await cursor.prime();
  if (cursor.isExhausted()) {
    throw IndexBuildError.emptyInput();
  }

  if (startsWithByteOrderMark(cursor.window())) {
    cursor.advance(BYTE_ORDER_MARK.length);
    logger.debug({ source: source.name }, "skipped UTF-8 byte order mark");
    if (cursor.remaining() === 0) {
      await cursor.refill();
      if (cursor.isExhausted()) {
        throw IndexBuildError.emptyInput();
      }
    }
  }

  return { cursor, startOffset: cursor.offset() };
}

function startsWithByteOrderMark(bytes: Uint8Array): boolean {
  return (
    bytes.length >= BYTE_ORDER_MARK.length &&
    BYTE_ORDER_MARK.every((byte, index) => bytes[index] === byte)
  );
}

/**
 * Pick the policy for a stream from its options and its first content byte
 */
export function selectBoundaryPolicy(
  start: ScanStart,
  options: Pick<ResolvedIndexerOptions, "skipSequenceIds" | "streamPrefix">,
  resolver: KeyResolver
): BoundaryPolicy {
  if (options.skipSequenceIds || start.cursor.peek() === options.streamPrefix) {
    return new LineDelimitedPolicy(start.cursor);
  }
  return new KeyGroupedPolicy(start.cursor, resolver);
}

abstract class SinglePassPolicy implements BoundaryPolicy {
  abstract readonly kind: BoundaryPolicyKind;
  private started = false;

  constructor(protected readonly cursor: ScanCursor) {}

  scan(): AsyncGenerator<ScannedSequence, void, undefined> {
    if (this.started) {
      throw new ValidationError(`The ${this.kind} scan has already run; open a new scan to rescan`);
    }
    this.started = true;
    return this.run();
  }

  protected abstract run(): AsyncGenerator<ScannedSequence, void, undefined>;

  /**
   * Consume bytes up to and including the next delimiter
   *
   * On return the cursor is either exhausted or has at least one byte of
   * the next line buffered.
   */
  protected async skipLine(): Promise<void> {
    const cursor = this.cursor;
    while (!cursor.isExhausted()) {
      const distance = cursor.findByte(ROW_DELIMITER);
      if (distance !== undefined) {
        cursor.advance(distance + 1);
        if (cursor.remaining() === 0) {
          await cursor.refill();
        }
        return;
      }
      cursor.advance(cursor.remaining());
      await cursor.refill();
    }
  }
}

/**
 * Every line is its own sequence with one sample
 *
 * A sequence spans its line and the delimiter after it. A final line
 * without a delimiter is still emitted; parsing it is left to readers.
 */
export class LineDelimitedPolicy extends SinglePassPolicy {
  readonly kind = "line-delimited";

  protected async *run(): AsyncGenerator<ScannedSequence, void, undefined> {
    const cursor = this.cursor;
    let offset = cursor.offset();
    let line = 0;

    while (!cursor.isExhausted()) {
      const distance = cursor.findByte(ROW_DELIMITER);
      if (distance === undefined) {
        // only newly buffered bytes are searched after the refill
        cursor.advance(cursor.remaining());
        await cursor.refill();
        continue;
      }

      cursor.advance(distance + 1);
      const next = cursor.offset();
      yield lineSequence(offset, next, line);
      offset = next;
      line++;
    }

    const end = cursor.bufferEndOffset();
    if (offset < end) {
      yield lineSequence(offset, end, line);
    }
  }
}

function lineSequence(start: number, end: number, line: number): ScannedSequence {
  return {
    fileOffsetBytes: start,
    byteSize: end - start,
    numberOfSamples: 1,
    key: { kind: "line", line },
  };
}

/**
 * Consecutive lines with the same leading key form one sequence
 *
 * A line whose key cannot be parsed joins the open sequence; readers reject
 * it when they parse the content.
 */
export class KeyGroupedPolicy extends SinglePassPolicy {
  readonly kind = "key-grouped";

  constructor(
    cursor: ScanCursor,
    private readonly resolver: KeyResolver
  ) {
    super(cursor);
  }

  protected async *run(): AsyncGenerator<ScannedSequence, void, undefined> {
    const cursor = this.cursor;
    let sequenceStart = cursor.offset();

    let currentKey = await this.resolver.tryReadKey(cursor);
    if (currentKey === undefined) {
      throw IndexBuildError.missingSequenceId(sequenceStart);
    }
    let samples = 1;

    for (;;) {
      await this.skipLine();
      if (cursor.isExhausted()) break;

      const lineStart = cursor.offset();
      const key = await this.resolver.tryReadKey(cursor);
      if (key !== undefined && !sameKey(key, currentKey)) {
        yield {
          fileOffsetBytes: sequenceStart,
          byteSize: lineStart - sequenceStart,
          numberOfSamples: samples,
          key: currentKey,
        };
        sequenceStart = lineStart;
        currentKey = key;
        samples = 1;
      } else {
        samples++;
      }
    }

    yield {
      fileOffsetBytes: sequenceStart,
      byteSize: cursor.bufferEndOffset() - sequenceStart,
      numberOfSamples: samples,
      key: currentKey,
    };
  }
}
