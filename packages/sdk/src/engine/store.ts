/**
 * Stores: the storage behind a map and its inverse
 *
 * `HashStore` holds only the dual index. `LinkedStore` adds an order list and
 * keeps each association's position through updates: an update in place keeps
 * the position, and so does a key change on a surviving value.
 */

import type { CollisionPolicy } from "../policy.js";
import type { Defined, Pair } from "../types.js";
import { DualIndex, type WritePlan } from "./dual-index.js";
import { InverseView, OrderedInverseView } from "./inverse-view.js";
import { OrderList, type OrderNode } from "./order-list.js";
import type { Anchor, End, OrderedStore, OrderedView, Store, View } from "./view.js";

export class HashStore<K extends Defined, V extends Defined> implements Store<K, V> {
  readonly index: DualIndex<K, V>;
  readonly ordered = false;
  #inverse: InverseView<K, V> | undefined;

  constructor(index: DualIndex<K, V> = new DualIndex()) {
    this.index = index;
  }

  write(key: K, value: V, policy: CollisionPolicy): boolean {
    const plan = this.index.plan(key, value, policy);
    if (plan === null) {
      return false;
    }
    this.apply(plan);
    return true;
  }

  /**
   * Commit a plan. An unordered store keeps no positions, so there is no
   * anchor to honour and the parameter is left out.
   */
  apply(plan: WritePlan<K, V>): void {
    this.index.commit(plan);
  }

  remove(key: K): V | undefined {
    return this.index.remove(key);
  }

  clear(): void {
    this.index.clear();
  }

  entries(): IterableIterator<Pair<K, V>> {
    return this.index.entries();
  }

  first(): Pair<K, V> | undefined {
    const next = this.index.entries().next();
    return next.done ? undefined : next.value;
  }

  inverted(): View<V, K> {
    this.#inverse ??= new InverseView(this);
    return this.#inverse;
  }

  clone(): HashStore<K, V> {
    return new HashStore(this.index.clone());
  }
}

export class LinkedStore<K extends Defined, V extends Defined> implements OrderedStore<K, V> {
  readonly index: DualIndex<K, V>;
  readonly ordered = true;
  readonly #order: OrderList<K, V>;
  #inverse: OrderedInverseView<K, V> | undefined;

  constructor(index: DualIndex<K, V> = new DualIndex(), order: OrderList<K, V> = new OrderList()) {
    this.index = index;
    this.#order = order;
  }

  write(key: K, value: V, policy: CollisionPolicy): boolean {
    const plan = this.index.plan(key, value, policy);
    if (plan === null) {
      return false;
    }
    this.apply(plan, "key");
    return true;
  }

  apply(plan: WritePlan<K, V>, anchor: Anchor): void {
    this.index.commit(plan);
    this.#reorder(plan, anchor);
  }

  remove(key: K): V | undefined {
    const value = this.index.remove(key);
    const node = this.#order.node(key);
    if (node !== undefined) {
      this.#order.unlink(node);
    }
    return value;
  }

  clear(): void {
    this.index.clear();
    this.#order.clear();
  }

  *entries(): IterableIterator<Pair<K, V>> {
    for (const node of this.#order.nodes()) {
      yield [node.key, node.value];
    }
  }

  *reversed(): IterableIterator<Pair<K, V>> {
    for (const node of this.#order.nodes(true)) {
      yield [node.key, node.value];
    }
  }

  first(): Pair<K, V> | undefined {
    const head = this.#order.head;
    return head === null ? undefined : [head.key, head.value];
  }

  last(): Pair<K, V> | undefined {
    const tail = this.#order.tail;
    return tail === null ? undefined : [tail.key, tail.value];
  }

  move(key: K, to: End): boolean {
    const node = this.#order.node(key);
    if (node === undefined) {
      return false;
    }
    if (to === "front") {
      this.#order.moveToFront(node);
    } else {
      this.#order.moveToBack(node);
    }
    return true;
  }

  inverted(): OrderedView<V, K> {
    this.#inverse ??= new OrderedInverseView(this);
    return this.#inverse;
  }

  clone(): LinkedStore<K, V> {
    return new LinkedStore(this.index.clone(), this.#order.clone());
  }

  /**
   * Bring the order list in line with a committed plan
   */
  #reorder(plan: WritePlan<K, V>, anchor: Anchor): void {
    const order = this.#order;
    const keyNode = plan.oldValue === undefined ? undefined : order.node(plan.key);
    const valueNode = plan.oldKey === undefined ? undefined : order.node(plan.oldKey);

    let survivor: OrderNode<K, V>;
    if (keyNode !== undefined && valueNode !== undefined) {
      survivor = anchor === "key" ? keyNode : valueNode;
      order.unlink(anchor === "key" ? valueNode : keyNode);
    } else if (keyNode !== undefined) {
      survivor = keyNode;
    } else if (valueNode !== undefined) {
      survivor = valueNode;
    } else {
      order.append(plan.key, plan.value);
      return;
    }

    order.rekey(survivor, plan.key);
    survivor.value = plan.value;
  }
}
