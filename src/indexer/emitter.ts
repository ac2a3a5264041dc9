/**
 * Sequence emitter: turns scanned byte ranges into index entries
 *
 * @module indexer/emitter
 */

import type { CorpusFilter, IndexSink, SequenceDescriptor } from "../types";
import { toRegistryKey } from "./key-resolver";
import type { ScannedSequence } from "./boundary";

export class SequenceEmitter {
  private appendedCount = 0;
  private excludedCount = 0;

  constructor(
    private readonly corpus: CorpusFilter,
    private readonly sink: IndexSink
  ) {}

  get appended(): number {
    return this.appendedCount;
  }

  get excluded(): number {
    return this.excludedCount;
  }

  /**
   * Filter and intern a scanned sequence
   *
   * The discovered key is converted to its registry string once; that same
   * string is checked against the corpus filter and interned.
   *
   * @returns The descriptor, or `undefined` if the corpus excludes the key
   */
  describe(sequence: ScannedSequence): SequenceDescriptor | undefined {
    const registry = this.corpus.getRegistry();
    const key = toRegistryKey(sequence.key, registry);

    if (!this.corpus.isIncluded(key)) {
      this.excludedCount++;
      return undefined;
    }

    return {
      fileOffsetBytes: sequence.fileOffsetBytes,
      byteSize: sequence.byteSize,
      numberOfSamples: sequence.numberOfSamples,
      key: { sequence: registry.getOrCreate(key), sample: 0 },
    };
  }

  /**
   * Describe a scanned sequence and append it to the sink if included
   */
  emit(sequence: ScannedSequence): SequenceDescriptor | undefined {
    const descriptor = this.describe(sequence);
    if (descriptor !== undefined) {
      this.sink.append(descriptor);
      this.appendedCount++;
    }
    return descriptor;
  }
}
