/**
 * The insertion-ordered bidirectional map
 */

import type { StoreOptions } from "./base.js";
import { BidiMap } from "./bidimap.js";
import { LinkedStore } from "./engine/store.js";
import type { End, OrderedView } from "./engine/view.js";
import { EmptyMapError, KeyNotFoundError } from "./errors.js";
import { FrozenOrderedBidiMap } from "./frozen.js";
import { entriesOf } from "./pairs.js";
import type { BidiMapOptions, Defined, Ordered, Pair, PairSource } from "./types.js";

/**
 * A `BidiMap` that remembers insertion order
 *
 * Updating a key's value keeps the association where it is. So does giving an
 * existing value a new key, through `inverse.set(value, newKey)` or an
 * overwriting `set(newKey, value)`: the position follows the value.
 */
export class OrderedBidiMap<K extends Defined, V extends Defined>
  extends BidiMap<K, V>
  implements Ordered<K, V>
{
  protected declare readonly view: OrderedView<K, V>;
  #inverse: OrderedBidiMap<V, K> | undefined;

  constructor(init?: PairSource<K, V> | null, options: StoreOptions<OrderedView<K, V>> = {}) {
    super(init, options);
  }

  static override fromObject<V extends Defined>(
    record: Readonly<Record<string, V>>,
    options?: BidiMapOptions
  ): OrderedBidiMap<string, V> {
    return new OrderedBidiMap(entriesOf(record), options);
  }

  protected override createView(): OrderedView<K, V> {
    return new LinkedStore<K, V>();
  }

  override get inverse(): OrderedBidiMap<V, K> {
    if (this.#inverse === undefined) {
      const inverse = new OrderedBidiMap<V, K>(null, this.derive(this.view.inverted()));
      inverse.#inverse = this;
      this.#inverse = inverse;
    }
    return this.#inverse;
  }

  first(): Pair<K, V> | undefined {
    return this.view.first();
  }

  last(): Pair<K, V> | undefined {
    return this.view.last();
  }

  popFirst(): Pair<K, V> {
    return this.#popEnd(this.view.first(), "popFirst");
  }

  popLast(): Pair<K, V> {
    return this.#popEnd(this.view.last(), "popLast");
  }

  moveToFront(key: K): this {
    return this.#move(key, "front");
  }

  moveToBack(key: K): this {
    return this.#move(key, "back");
  }

  reversed(): IterableIterator<Pair<K, V>> {
    return this.view.reversed();
  }

  override copy(): OrderedBidiMap<K, V> {
    return new OrderedBidiMap<K, V>(null, this.derive(this.view.clone()));
  }

  override freeze(): FrozenOrderedBidiMap<K, V> {
    return new FrozenOrderedBidiMap<K, V>(null, this.derive(this.view.clone()));
  }

  #popEnd(end: Pair<K, V> | undefined, operation: string): Pair<K, V> {
    if (end === undefined) {
      throw new EmptyMapError(operation);
    }
    this.view.remove(end[0]);
    return end;
  }

  #move(key: K, to: End): this {
    if (!this.view.move(key, to)) {
      throw new KeyNotFoundError(key);
    }
    return this;
  }
}
