/**
 * Helpers for feeding pairs into maps
 */

import { ValidationError } from "./errors.js";
import type { Pair, PairSource } from "./types.js";

/**
 * A source that already knows its own inverse, such as any bidimap
 */
export interface Invertible<K, V> {
  readonly inverse: Iterable<readonly [V, K]>;
}

function isPairShape(item: unknown): boolean {
  return Array.isArray(item) && item.length === 2;
}

/**
 * Yield the pairs of a source, checking each item is a `[key, value]` array
 * @throws ValidationError naming the position of the first malformed item
 */
export function* pairs<K, V>(source: PairSource<K, V>): Generator<Pair<K, V>, void, undefined> {
  let position = 0;
  for (const item of source) {
    if (!isPairShape(item)) {
      throw new ValidationError(`Expected a [key, value] pair at position ${position}`);
    }
    yield [item[0], item[1]];
    position++;
  }
}

/**
 * Yield `[value, key]` for each pair of a source
 *
 * Sources exposing an `inverse` are read through it.
 */
export function* inverted<K, V>(
  source: PairSource<K, V> | Invertible<K, V>
): Generator<Pair<V, K>, void, undefined> {
  if ("inverse" in source) {
    for (const [value, key] of source.inverse) {
      yield [value, key];
    }
    return;
  }

  for (const [key, value] of pairs(source)) {
    yield [value, key];
  }
}

/**
 * Keyword-style input: the own enumerable string-keyed entries of a record
 */
export function entriesOf<V>(record: Readonly<Record<string, V>>): Array<Pair<string, V>> {
  return Object.entries(record);
}
