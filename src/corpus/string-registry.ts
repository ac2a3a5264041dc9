/**
 * String interning shared by every stream of a corpus
 *
 * Ids are assigned 0, 1, 2, ... in first-seen order and never change. All
 * operations are synchronous, so a lookup and the insert that follows it can
 * never interleave with another scan on the event loop: two indexers sharing
 * a registry always agree on the id of a key.
 *
 * @module corpus/string-registry
 */

import { ValidationError } from "../errors";
import type { KeyRegistry } from "../types";

export class StringRegistry implements KeyRegistry {
  private readonly ids = new Map<string, number>();
  private readonly keys: string[] = [];

  tryGet(key: string): number | undefined {
    return this.ids.get(key);
  }

  /**
   * Register a key under the next id
   *
   * A key that is already registered keeps its id.
   */
  addValue(key: string): number {
    const existing = this.ids.get(key);
    if (existing !== undefined) return existing;

    const id = this.keys.length;
    this.keys.push(key);
    this.ids.set(key, id);
    return id;
  }

  getOrCreate(key: string): number {
    return this.ids.get(key) ?? this.addValue(key);
  }

  /**
   * @throws {ValidationError} If no key was registered under `id`
   */
  lookup(id: number): string {
    const key = this.keys[id];
    if (key === undefined) {
      throw new ValidationError(`No key is registered under id ${id}`);
    }
    return key;
  }

  get size(): number {
    return this.keys.length;
  }

  /**
   * Keys with their ids, in id order
   */
  *entries(): IterableIterator<[key: string, id: number]> {
    for (const [id, key] of this.keys.entries()) {
      yield [key, id];
    }
  }
}
