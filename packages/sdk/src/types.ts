/**
 * Core types for bidirectional maps
 */

import type { CollisionPolicy, PolicyInput } from "./policy.js";

/**
 * Any value except `undefined`, which the maps reserve for "absent"
 */
export type Defined = {} | null;

/**
 * One association
 */
export type Pair<K, V> = [K, V];

/**
 * Anything that yields `[key, value]` pairs: arrays of pairs, `Map`s, other maps
 */
export type PairSource<K, V> = Iterable<readonly [K, V]>;

/**
 * Construction options shared by every map type
 */
export interface BidiMapOptions {
  /** Collision policy (default: `BIDIMAP_DEFAULT_POLICY`, else "strict") */
  policy?: PolicyInput;
  /** Display name used by `toString()` (default: the class name) */
  name?: string;
}

/**
 * Options for `putAll`
 */
export interface PutAllOptions {
  /** Collision policy for this batch only (default: "raise") */
  policy?: PolicyInput;
  /** Write no pair at all if any pair fails (default: true) */
  atomic?: boolean;
}

/**
 * Read access shared by every map type and its inverse
 */
export interface Readable<K extends Defined, V extends Defined> extends Iterable<Pair<K, V>> {
  readonly size: number;
  readonly policy: CollisionPolicy;
  readonly ordered: boolean;
  readonly displayName: string;
  readonly inverse: Readable<V, K>;

  get(key: K): V | undefined;
  get(key: K, fallback: V): V;
  /** Like `get`, but throws KeyNotFoundError when the key is absent */
  lookup(key: K): V;
  has(key: K): boolean;

  getKey(value: V): K | undefined;
  getKey(value: V, fallback: K): K;
  /** Like `getKey`, but throws KeyNotFoundError when the value is absent */
  lookupKey(value: V): K;
  hasValue(value: V): boolean;

  keys(): IterableIterator<K>;
  values(): IterableIterator<V>;
  entries(): IterableIterator<Pair<K, V>>;
  forEach(callback: (value: V, key: K, map: this) => void): void;

  /** Same set of pairs (same sequence when both sides are ordered) */
  equals(other: unknown): boolean;
  toString(): string;
  toJSON(): Array<Pair<K, V>>;
}

/**
 * Write access
 */
export interface Mutable<K extends Defined, V extends Defined> {
  /** Insert or update under the map's policy */
  set(key: K, value: V): this;
  /** Insert, refusing any collision */
  put(key: K, value: V): this;
  /** Insert, evicting whatever collides */
  forceSet(key: K, value: V): this;
  /** Remove an association; throws KeyNotFoundError when absent */
  delete(key: K): void;
  pop(key: K): V;
  pop(key: K, fallback: V): V;
  /** Remove and return the oldest association */
  popItem(): Pair<K, V>;
  /** Apply `set` to each pair in order; earlier pairs stay applied if a later one fails */
  update(source: PairSource<K, V>): this;
  forceUpdate(source: PairSource<K, V>): this;
  putAll(source: PairSource<K, V>, options?: PutAllOptions): this;
  clear(): void;
  setDefault(key: K, value: V): V;
}

/**
 * Insertion-order access
 */
export interface Ordered<K extends Defined, V extends Defined> {
  first(): Pair<K, V> | undefined;
  last(): Pair<K, V> | undefined;
  popFirst(): Pair<K, V>;
  popLast(): Pair<K, V>;
  moveToFront(key: K): this;
  moveToBack(key: K): this;
  reversed(): IterableIterator<Pair<K, V>>;
}

/**
 * Content-derived hash, stable for the object's lifetime
 */
export interface Hashable {
  hash(): string;
}
