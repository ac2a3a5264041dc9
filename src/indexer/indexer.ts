/**
 * Corpus indexer: one forward scan of a stream into an index sink
 *
 * Composes the pipeline block reader → boundary scanner → key resolver →
 * sequence emitter. An indexer owns its source and buffer; indexers over the
 * streams of one corpus share only the corpus descriptor and its registry.
 *
 * @module indexer/indexer
 */

import { CorpusIndexError } from "../errors";
import { ChunkedIndex } from "../index-store/chunked-index";
import type { FileSource } from "../io/file-source";
import { openFileSource } from "../io/file-source";
import type {
  BuildSummary,
  CorpusFilter,
  IndexerOptions,
  IndexSink,
  ResolvedIndexerOptions,
  Result,
  SequenceDescriptor,
} from "../types";
import type { BoundaryPolicy, ScanStart } from "./boundary";
import { openScan, selectBoundaryPolicy } from "./boundary";
import { SequenceEmitter } from "./emitter";
import { createKeyResolver } from "./key-resolver";
import { resolveIndexerOptions } from "./options";

/**
 * Outcome of {@link Indexer.build}
 */
export type BuildResult = Result<BuildSummary, CorpusIndexError>;

interface ScanSession {
  readonly start: ScanStart;
  readonly policy: BoundaryPolicy;
}

/**
 * Index builder for a single corpus stream
 *
 * @example
 * ```typescript
 * const source = await openFileSource("train.ctf");
 * const indexer = Indexer.withChunkedIndex(source, { numericSequenceId: true });
 * const result = await indexer.build(CorpusDescriptor.all());
 * if (result.success) {
 *   console.log(`${result.value.appended} sequences in ${indexer.sink.chunks.length} chunks`);
 * }
 * ```
 */
export class Indexer<S extends IndexSink = IndexSink> {
  readonly options: ResolvedIndexerOptions;

  /**
   * @throws {ValidationError} If the options are invalid
   */
  constructor(
    private readonly source: FileSource,
    readonly sink: S,
    options: IndexerOptions = {}
  ) {
    this.options = resolveIndexerOptions(options);
  }

  /**
   * Create an indexer whose sink is a {@link ChunkedIndex} configured from
   * the `chunkSizeBytes` and `isPrimary` options
   */
  static withChunkedIndex(source: FileSource, options: IndexerOptions = {}): Indexer<ChunkedIndex> {
    const resolved = resolveIndexerOptions(options);
    const index = new ChunkedIndex({
      chunkSizeBytes: resolved.chunkSizeBytes,
      isPrimary: resolved.isPrimary,
    });
    return new Indexer(source, index, options);
  }

  /**
   * Scan the stream and append every included sequence to the sink
   *
   * Does nothing if the sink already holds an index. Fatal scan failures are
   * returned, not thrown.
   */
  async build(corpus: CorpusFilter): Promise<BuildResult> {
    const logger = this.options.logger;

    if (!this.sink.isEmpty()) {
      logger.info({ source: this.source.name }, "index already built, skipping scan");
      return {
        success: true,
        value: {
          skipped: true,
          sequences: 0,
          appended: 0,
          excluded: 0,
          startOffset: 0,
          endOffset: 0,
        },
      };
    }

    this.sink.reserve(this.source.sizeHint());
    const emitter = new SequenceEmitter(corpus, this.sink);

    try {
      const session = await this.open(corpus);
      let sequences = 0;
      for await (const sequence of session.policy.scan()) {
        emitter.emit(sequence);
        sequences++;
      }

      const summary: BuildSummary = {
        skipped: false,
        policy: session.policy.kind,
        sequences,
        appended: emitter.appended,
        excluded: emitter.excluded,
        startOffset: session.start.startOffset,
        endOffset: session.start.cursor.bufferEndOffset(),
      };
      logger.debug({ source: this.source.name, ...summary }, "index built");
      return { success: true, value: summary };
    } catch (error) {
      if (error instanceof CorpusIndexError) {
        logger.error({ source: this.source.name, err: error }, "index build failed");
        return { success: false, error };
      }
      throw error;
    }
  }

  /**
   * Lazily scan the stream, yielding the descriptors of included sequences
   *
   * The sink is left untouched; keys are still interned in the corpus
   * registry. Failures are thrown from the iteration.
   */
  async *scan(corpus: CorpusFilter): AsyncGenerator<SequenceDescriptor, void, undefined> {
    const session = await this.open(corpus);
    const emitter = new SequenceEmitter(corpus, this.sink);
    for await (const sequence of session.policy.scan()) {
      const descriptor = emitter.describe(sequence);
      if (descriptor !== undefined) {
        yield descriptor;
      }
    }
  }

  private async open(corpus: CorpusFilter): Promise<ScanSession> {
    const start = await openScan(this.source, this.options.bufferSize, this.options.logger);
    const resolver = createKeyResolver(this.options.numericSequenceId, corpus.getRegistry());
    const policy = selectBoundaryPolicy(start, this.options, resolver);
    this.options.logger.debug(
      { source: this.source.name, policy: policy.kind, startOffset: start.startOffset },
      "boundary policy selected"
    );
    return { start, policy };
  }
}

export interface BuiltIndex {
  readonly index: ChunkedIndex;
  readonly summary: BuildSummary;
}

/**
 * Open a corpus file, index it into a new {@link ChunkedIndex}, and close it
 *
 * Failures to open the file are returned like scan failures.
 *
 * @throws {ValidationError} If the options are invalid
 */
export async function buildIndex(
  path: string,
  corpus: CorpusFilter,
  options: IndexerOptions = {}
): Promise<Result<BuiltIndex, CorpusIndexError>> {
  // reject bad options before the file is opened
  resolveIndexerOptions(options);

  let source: FileSource;
  try {
    source = await openFileSource(path);
  } catch (error) {
    if (error instanceof CorpusIndexError) {
      return { success: false, error };
    }
    throw error;
  }

  try {
    const indexer = Indexer.withChunkedIndex(source, options);
    const result = await indexer.build(corpus);
    if (!result.success) return result;
    return { success: true, value: { index: indexer.sink, summary: result.value } };
  } finally {
    await source.close();
  }
}
