/**
 * Read-side behaviour shared by every map type
 */

import { inspect } from "node:util";
import { resolveOptions } from "./config.js";
import { sameValueZero } from "./engine/dual-index.js";
import type { View } from "./engine/view.js";
import { KeyNotFoundError } from "./errors.js";
import { formatMap } from "./format.js";
import { pairs } from "./pairs.js";
import type { CollisionPolicy } from "./policy.js";
import type { BidiMapOptions, Defined, Pair, PairSource, Readable } from "./types.js";
import { assertDefined } from "./validation.js";

/**
 * Constructor options, plus the view an instance wraps when it is derived
 * from another one
 */
export interface StoreOptions<W> extends BidiMapOptions {
  /** @internal */
  view?: W;
}

export function isBidiMap(value: unknown): value is BidiMapBase<Defined, Defined> {
  return value instanceof BidiMapBase;
}

function isMap(value: unknown): value is ReadonlyMap<unknown, unknown> {
  return value instanceof Map;
}

function isPlainRecord(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function sequenceEqual(
  a: Iterator<readonly [unknown, unknown]>,
  b: Iterator<readonly [unknown, unknown]>
): boolean {
  for (;;) {
    const x = a.next();
    const y = b.next();
    if (x.done === true || y.done === true) {
      return x.done === true && y.done === true;
    }
    if (!sameValueZero(x.value[0], y.value[0]) || !sameValueZero(x.value[1], y.value[1])) {
      return false;
    }
  }
}

export abstract class BidiMapBase<K extends Defined, V extends Defined> implements Readable<K, V> {
  protected readonly view: View<K, V>;
  readonly policy: CollisionPolicy;
  readonly #name: string | undefined;

  constructor(init: PairSource<K, V> | null | undefined, options: StoreOptions<View<K, V>>) {
    const resolved = resolveOptions(options);
    this.policy = resolved.policy;
    this.#name = resolved.name;
    this.view = options.view ?? this.createView();

    if (init !== null && init !== undefined) {
      for (const [key, value] of pairs(init)) {
        assertDefined(key, "key");
        assertDefined(value, "value");
        this.view.write(key, value, this.policy);
      }
    }
  }

  /**
   * Fresh, empty storage for a new instance
   */
  protected abstract createView(): View<K, V>;

  abstract get inverse(): BidiMapBase<V, K>;

  /**
   * Options for an instance of the same policy and name over another view
   */
  protected derive<W>(view: W): StoreOptions<W> {
    return { view, policy: this.policy, name: this.#name };
  }

  get size(): number {
    return this.view.index.size;
  }

  get ordered(): boolean {
    return this.view.ordered;
  }

  get displayName(): string {
    return this.#name ?? this.constructor.name;
  }

  get(key: K): V | undefined;
  get(key: K, fallback: V): V;
  get(key: K, fallback?: V): V | undefined {
    const value = this.view.index.get(key);
    return value === undefined ? fallback : value;
  }

  lookup(key: K): V {
    const value = this.view.index.get(key);
    if (value === undefined) {
      throw new KeyNotFoundError(key);
    }
    return value;
  }

  has(key: K): boolean {
    return this.view.index.has(key);
  }

  getKey(value: V): K | undefined;
  getKey(value: V, fallback: K): K;
  getKey(value: V, fallback?: K): K | undefined {
    const key = this.view.index.getKey(value);
    return key === undefined ? fallback : key;
  }

  lookupKey(value: V): K {
    const key = this.view.index.getKey(value);
    if (key === undefined) {
      throw new KeyNotFoundError(value, "value");
    }
    return key;
  }

  hasValue(value: V): boolean {
    return this.view.index.hasValue(value);
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.view.entries()) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.view.entries()) {
      yield value;
    }
  }

  entries(): IterableIterator<Pair<K, V>> {
    return this.view.entries();
  }

  [Symbol.iterator](): IterableIterator<Pair<K, V>> {
    return this.entries();
  }

  forEach(callback: (value: V, key: K, map: this) => void): void {
    for (const [key, value] of this.view.entries()) {
      callback(value, key, this);
    }
  }

  /**
   * Compare with another map, a `Map`, or a plain object
   *
   * Two ordered maps must hold the same pairs in the same order; any other
   * combination compares the pairs as a set. A plain object can only match a
   * map whose keys are all strings.
   */
  equals(other: unknown): boolean {
    if (other === this) {
      return true;
    }

    if (isBidiMap(other)) {
      const map = other;
      if (map.size !== this.size) return false;
      if (this.ordered && map.ordered) {
        return sequenceEqual(this.entries(), map.entries());
      }
      return this.#every((key, value) => map.has(key) && sameValueZero(map.get(key), value));
    }

    if (isMap(other)) {
      const map = other;
      if (map.size !== this.size) return false;
      return this.#every((key, value) => map.has(key) && sameValueZero(map.get(key), value));
    }

    if (isPlainRecord(other)) {
      const record = other;
      if (Object.keys(record).length !== this.size) return false;
      return this.#every(
        (key, value) =>
          typeof key === "string" && Object.hasOwn(record, key) && sameValueZero(record[key], value)
      );
    }

    return false;
  }

  toString(): string {
    return formatMap(this.displayName, this.size, this.view.entries());
  }

  toJSON(): Array<Pair<K, V>> {
    return Array.from(this.view.entries());
  }

  [inspect.custom](): string {
    return this.toString();
  }

  #every(test: (key: K, value: V) => boolean): boolean {
    for (const [key, value] of this.view.entries()) {
      if (!test(key, value)) return false;
    }
    return true;
  }
}
