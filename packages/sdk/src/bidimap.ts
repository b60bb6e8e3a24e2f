/**
 * The mutable bidirectional map
 */

import { BidiMapBase, type StoreOptions } from "./base.js";
import { StagedIndex } from "./engine/dual-index.js";
import { HashStore } from "./engine/store.js";
import type { View } from "./engine/view.js";
import { EmptyMapError, KeyNotFoundError } from "./errors.js";
import { FrozenBidiMap } from "./frozen.js";
import { logger } from "./observability/logs.js";
import { entriesOf, pairs } from "./pairs.js";
import { OVERWRITE, RAISE, resolvePolicy, type CollisionPolicy } from "./policy.js";
import type { BidiMapOptions, Defined, Mutable, Pair, PairSource, PutAllOptions } from "./types.js";
import { assertDefined } from "./validation.js";

export class BidiMap<K extends Defined, V extends Defined>
  extends BidiMapBase<K, V>
  implements Mutable<K, V>
{
  #inverse: BidiMap<V, K> | undefined;

  /**
   * Create a map from `[key, value]` pairs
   *
   * Pairs that collide are resolved by the map's policy, exactly as `set`
   * would resolve them.
   */
  constructor(init?: PairSource<K, V> | null, options: StoreOptions<View<K, V>> = {}) {
    super(init, options);
  }

  /**
   * Create a map from the string-keyed entries of a plain object
   */
  static fromObject<V extends Defined>(
    record: Readonly<Record<string, V>>,
    options?: BidiMapOptions
  ): BidiMap<string, V> {
    return new BidiMap(entriesOf(record), options);
  }

  protected createView(): View<K, V> {
    return new HashStore<K, V>();
  }

  /**
   * The same associations seen from the value side
   *
   * Writes through the inverse change this map, and `m.inverse.inverse === m`.
   */
  get inverse(): BidiMap<V, K> {
    if (this.#inverse === undefined) {
      const inverse = new BidiMap<V, K>(null, this.derive(this.view.inverted()));
      inverse.#inverse = this;
      this.#inverse = inverse;
    }
    return this.#inverse;
  }

  set(key: K, value: V): this {
    this.write(key, value, this.policy);
    return this;
  }

  put(key: K, value: V): this {
    this.write(key, value, RAISE);
    return this;
  }

  forceSet(key: K, value: V): this {
    this.write(key, value, OVERWRITE);
    return this;
  }

  delete(key: K): void {
    if (!this.view.index.has(key)) {
      throw new KeyNotFoundError(key);
    }
    this.view.remove(key);
  }

  pop(key: K): V;
  pop(key: K, fallback: V): V;
  pop(key: K, fallback?: V): V {
    const value = this.view.remove(key);
    if (value !== undefined) {
      return value;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new KeyNotFoundError(key);
  }

  popItem(): Pair<K, V> {
    const oldest = this.view.first();
    if (oldest === undefined) {
      throw new EmptyMapError("popItem");
    }
    this.view.remove(oldest[0]);
    return oldest;
  }

  /**
   * Apply `set` to each pair in order
   *
   * Not atomic across pairs: when a pair is rejected, the pairs before it
   * stay applied. Use `putAll` for all-or-nothing.
   */
  update(source: PairSource<K, V>): this {
    for (const [key, value] of pairs(source)) {
      this.write(key, value, this.policy);
    }
    return this;
  }

  forceUpdate(source: PairSource<K, V>): this {
    for (const [key, value] of pairs(source)) {
      this.write(key, value, OVERWRITE);
    }
    return this;
  }

  /**
   * Insert many pairs under one policy ("raise" unless given)
   *
   * With `atomic` (the default), the whole batch is checked against the
   * current state and its own earlier pairs before anything is written, so a
   * rejected pair leaves the map exactly as it was, order included.
   */
  putAll(source: PairSource<K, V>, options: PutAllOptions = {}): this {
    const policy = options.policy === undefined ? RAISE : resolvePolicy(options.policy);
    // Read the whole source first: it may be a view of this map
    const items = Array.from(pairs(source));

    if (options.atomic !== false) {
      const staged = new StagedIndex(this.view.index);
      try {
        for (const [key, value] of items) {
          assertDefined(key, "key");
          assertDefined(value, "value");
          staged.stage(key, value, policy);
        }
      } catch (err) {
        if (logger.enabled("debug")) {
          logger.debug("putAll.reject", {
            message: err instanceof Error ? err.message : String(err),
            details: { name: this.displayName, pairs: items.length },
          });
        }
        throw err;
      }
    }

    for (const [key, value] of items) {
      this.write(key, value, policy);
    }
    return this;
  }

  clear(): void {
    this.view.clear();
  }

  setDefault(key: K, value: V): V {
    const existing = this.view.index.get(key);
    if (existing !== undefined) {
      return existing;
    }
    this.write(key, value, this.policy);
    return value;
  }

  /**
   * Independent copy with the same policy and name
   */
  copy(): BidiMap<K, V> {
    return new BidiMap<K, V>(null, this.derive(this.view.clone()));
  }

  /**
   * Frozen snapshot; later changes to this map do not reach it
   */
  freeze(): FrozenBidiMap<K, V> {
    return new FrozenBidiMap<K, V>(null, this.derive(this.view.clone()));
  }

  protected write(key: K, value: V, policy: CollisionPolicy): boolean {
    assertDefined(key, "key");
    assertDefined(value, "value");
    return this.view.write(key, value, policy);
  }
}
