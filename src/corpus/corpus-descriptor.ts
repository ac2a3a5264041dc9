/**
 * Corpus membership: which sequence keys belong to the active partition
 *
 * @module corpus/corpus-descriptor
 */

import { readToString } from "../io/file-reader";
import type { CorpusFilter, KeyRegistry } from "../types";
import { StringRegistry } from "./string-registry";

/**
 * Inclusion filter plus the registry every stream of the corpus shares
 *
 * A descriptor built from a key list registers the keys in list order up
 * front, so ids do not depend on which stream is scanned first.
 *
 * @example
 * ```typescript
 * const corpus = await CorpusDescriptor.fromFile("train.keys");
 * const result = await indexer.build(corpus);
 * ```
 */
export class CorpusDescriptor implements CorpusFilter {
  private constructor(
    private readonly registry: KeyRegistry,
    private readonly included: ReadonlySet<string> | undefined
  ) {}

  /**
   * Every discovered key is part of the corpus
   */
  static all(registry: KeyRegistry = new StringRegistry()): CorpusDescriptor {
    return new CorpusDescriptor(registry, undefined);
  }

  /**
   * Only the listed keys are part of the corpus
   */
  static fromKeys(
    keys: Iterable<string>,
    registry: KeyRegistry = new StringRegistry()
  ): CorpusDescriptor {
    const included = new Set<string>();
    for (const key of keys) {
      included.add(key);
      registry.getOrCreate(key);
    }
    return new CorpusDescriptor(registry, included);
  }

  /**
   * Read the key list from a file, one key per line
   *
   * Surrounding whitespace is trimmed and blank lines are ignored.
   *
   * @throws {FileError} If the file cannot be read
   */
  static async fromFile(
    path: string,
    registry: KeyRegistry = new StringRegistry()
  ): Promise<CorpusDescriptor> {
    const content = await readToString(path);
    const keys = content
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    return CorpusDescriptor.fromKeys(keys, registry);
  }

  isIncluded(key: string): boolean {
    return this.included === undefined || this.included.has(key);
  }

  getRegistry(): KeyRegistry {
    return this.registry;
  }
}
