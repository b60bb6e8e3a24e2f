/**
 * Frozen maps: fixed content and a content hash
 *
 * Every mutator is still present, so callers that ignore the types get an
 * `ImmutableMapError` instead of a missing method. Their return type is
 * `never` to make the refusal visible at compile time.
 */

import { BidiMapBase, type StoreOptions } from "./base.js";
import { HashStore, LinkedStore } from "./engine/store.js";
import type { OrderedView, View } from "./engine/view.js";
import { ImmutableMapError } from "./errors.js";
import { contentHash } from "./hash.js";
import { logger } from "./observability/logs.js";
import { entriesOf } from "./pairs.js";
import type { BidiMapOptions, Defined, Hashable, Pair, PairSource } from "./types.js";

function refuse(map: { readonly displayName: string }, operation: string): ImmutableMapError {
  if (logger.enabled("debug")) {
    logger.debug("frozen.refuse", { operation, details: { name: map.displayName } });
  }
  return new ImmutableMapError(operation);
}

export class FrozenBidiMap<K extends Defined, V extends Defined>
  extends BidiMapBase<K, V>
  implements Hashable
{
  #inverse: FrozenBidiMap<V, K> | undefined;
  #hash: string | undefined;

  constructor(init?: PairSource<K, V> | null, options: StoreOptions<View<K, V>> = {}) {
    super(init, options);
  }

  static fromObject<V extends Defined>(
    record: Readonly<Record<string, V>>,
    options?: BidiMapOptions
  ): FrozenBidiMap<string, V> {
    return new FrozenBidiMap(entriesOf(record), options);
  }

  protected createView(): View<K, V> {
    return new HashStore<K, V>();
  }

  get inverse(): FrozenBidiMap<V, K> {
    if (this.#inverse === undefined) {
      const inverse = new FrozenBidiMap<V, K>(null, this.derive(this.view.inverted()));
      inverse.#inverse = this;
      this.#inverse = inverse;
    }
    return this.#inverse;
  }

  hash(): string {
    this.#hash ??= contentHash(this.view.entries());
    return this.#hash;
  }

  /** Frozen content never changes, so the copy is the map itself */
  copy(): this {
    return this;
  }

  freeze(): this {
    return this;
  }

  set(_key: K, _value: V): never {
    throw refuse(this, "set");
  }

  put(_key: K, _value: V): never {
    throw refuse(this, "put");
  }

  forceSet(_key: K, _value: V): never {
    throw refuse(this, "forceSet");
  }

  delete(_key: K): never {
    throw refuse(this, "delete");
  }

  pop(_key: K, _fallback?: V): never {
    throw refuse(this, "pop");
  }

  popItem(): never {
    throw refuse(this, "popItem");
  }

  update(_source: PairSource<K, V>): never {
    throw refuse(this, "update");
  }

  forceUpdate(_source: PairSource<K, V>): never {
    throw refuse(this, "forceUpdate");
  }

  putAll(_source: PairSource<K, V>, _options?: unknown): never {
    throw refuse(this, "putAll");
  }

  clear(): never {
    throw refuse(this, "clear");
  }

  setDefault(_key: K, _value: V): never {
    throw refuse(this, "setDefault");
  }
}

export class FrozenOrderedBidiMap<K extends Defined, V extends Defined> extends FrozenBidiMap<K, V> {
  protected declare readonly view: OrderedView<K, V>;
  #inverse: FrozenOrderedBidiMap<V, K> | undefined;

  constructor(init?: PairSource<K, V> | null, options: StoreOptions<OrderedView<K, V>> = {}) {
    super(init, options);
  }

  static override fromObject<V extends Defined>(
    record: Readonly<Record<string, V>>,
    options?: BidiMapOptions
  ): FrozenOrderedBidiMap<string, V> {
    return new FrozenOrderedBidiMap(entriesOf(record), options);
  }

  protected override createView(): OrderedView<K, V> {
    return new LinkedStore<K, V>();
  }

  override get inverse(): FrozenOrderedBidiMap<V, K> {
    if (this.#inverse === undefined) {
      const inverse = new FrozenOrderedBidiMap<V, K>(null, this.derive(this.view.inverted()));
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

  reversed(): IterableIterator<Pair<K, V>> {
    return this.view.reversed();
  }

  popFirst(): never {
    throw refuse(this, "popFirst");
  }

  popLast(): never {
    throw refuse(this, "popLast");
  }

  moveToFront(_key: K): never {
    throw refuse(this, "moveToFront");
  }

  moveToBack(_key: K): never {
    throw refuse(this, "moveToBack");
  }
}
