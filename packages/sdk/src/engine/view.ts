/**
 * Views: one direction of a store
 *
 * A store is read and written through two views, forward and inverse, that
 * share its storage. The map classes only ever talk to a view.
 */

import type { CollisionPolicy } from "../policy.js";
import type { Defined, Pair } from "../types.js";
import type { DualIndex, WritePlan } from "./dual-index.js";

export type End = "front" | "back";

/**
 * Which existing association keeps its order position when a write collides
 * on both sides: the one holding the written key, or the one holding the
 * written value
 */
export type Anchor = "key" | "value";

export interface View<K extends Defined, V extends Defined> {
  readonly index: DualIndex<K, V>;
  readonly ordered: boolean;
  /**
   * Write a pair under the policy
   * @returns false if nothing changed
   */
  write(key: K, value: V, policy: CollisionPolicy): boolean;
  /** @returns The removed value, or undefined if the key was absent */
  remove(key: K): V | undefined;
  clear(): void;
  entries(): IterableIterator<Pair<K, V>>;
  /** Oldest association */
  first(): Pair<K, V> | undefined;
  inverted(): View<V, K>;
  /** Independent copy of the underlying store, seen from this direction */
  clone(): View<K, V>;
}

export interface OrderedView<K extends Defined, V extends Defined> extends View<K, V> {
  reversed(): IterableIterator<Pair<K, V>>;
  last(): Pair<K, V> | undefined;
  /** @returns false if the key is absent */
  move(key: K, to: End): boolean;
  inverted(): OrderedView<V, K>;
  clone(): OrderedView<K, V>;
}

/**
 * The forward view of a store, which also accepts plans made elsewhere
 */
export interface Store<K extends Defined, V extends Defined> extends View<K, V> {
  apply(plan: WritePlan<K, V>, anchor: Anchor): void;
  clone(): Store<K, V>;
}

export interface OrderedStore<K extends Defined, V extends Defined> extends Store<K, V>, OrderedView<K, V> {
  inverted(): OrderedView<V, K>;
  clone(): OrderedStore<K, V>;
}
