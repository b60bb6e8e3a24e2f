/**
 * The inverse direction of a store
 *
 * Reads go to the inverted index. A write plans against the inverted index,
 * then hands the plan, restated in forward terms, to the store it wraps, so
 * both directions share one copy of every association.
 */

import type { CollisionPolicy } from "../policy.js";
import type { Defined, Pair } from "../types.js";
import { flipPlan, type DualIndex } from "./dual-index.js";
import type { End, OrderedStore, OrderedView, Store, View } from "./view.js";

function* swapped<K, V>(source: Iterable<Pair<K, V>>): Generator<Pair<V, K>, void, undefined> {
  for (const [key, value] of source) {
    yield [value, key];
  }
}

function swap<K, V>(pair: Pair<K, V> | undefined): Pair<V, K> | undefined {
  return pair === undefined ? undefined : [pair[1], pair[0]];
}

export class InverseView<K extends Defined, V extends Defined> implements View<V, K> {
  protected readonly store: Store<K, V>;

  constructor(store: Store<K, V>) {
    this.store = store;
  }

  get index(): DualIndex<V, K> {
    return this.store.index.inverted();
  }

  get ordered(): boolean {
    return this.store.ordered;
  }

  write(value: V, key: K, policy: CollisionPolicy): boolean {
    const plan = this.index.plan(value, key, policy);
    if (plan === null) {
      return false;
    }
    this.store.apply(flipPlan(plan), "value");
    return true;
  }

  remove(value: V): K | undefined {
    const key = this.store.index.getKey(value);
    if (key === undefined) {
      return undefined;
    }
    this.store.remove(key);
    return key;
  }

  clear(): void {
    this.store.clear();
  }

  entries(): IterableIterator<Pair<V, K>> {
    return swapped(this.store.entries());
  }

  first(): Pair<V, K> | undefined {
    return swap(this.store.first());
  }

  inverted(): View<K, V> {
    return this.store;
  }

  clone(): View<V, K> {
    return this.store.clone().inverted();
  }
}

export class OrderedInverseView<K extends Defined, V extends Defined>
  extends InverseView<K, V>
  implements OrderedView<V, K>
{
  protected override readonly store: OrderedStore<K, V>;

  constructor(store: OrderedStore<K, V>) {
    super(store);
    this.store = store;
  }

  reversed(): IterableIterator<Pair<V, K>> {
    return swapped(this.store.reversed());
  }

  last(): Pair<V, K> | undefined {
    return swap(this.store.last());
  }

  move(value: V, to: End): boolean {
    const key = this.store.index.getKey(value);
    return key !== undefined && this.store.move(key, to);
  }

  override inverted(): OrderedView<K, V> {
    return this.store;
  }

  override clone(): OrderedView<V, K> {
    return this.store.clone().inverted();
  }
}
