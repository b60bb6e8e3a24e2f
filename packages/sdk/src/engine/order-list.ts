/**
 * Insertion order for ordered maps
 *
 * A doubly-linked list of nodes, one per association, indexed by key.
 * Unlinking keeps a node's own `prev`/`next`, so iteration carries on past a
 * node unlinked while it is being visited.
 */

export interface OrderNode<K, V> {
  key: K;
  value: V;
  prev: OrderNode<K, V> | null;
  next: OrderNode<K, V> | null;
}

export class OrderList<K, V> {
  #head: OrderNode<K, V> | null = null;
  #tail: OrderNode<K, V> | null = null;
  readonly #byKey = new Map<K, OrderNode<K, V>>();

  get size(): number {
    return this.#byKey.size;
  }

  get head(): OrderNode<K, V> | null {
    return this.#head;
  }

  get tail(): OrderNode<K, V> | null {
    return this.#tail;
  }

  node(key: K): OrderNode<K, V> | undefined {
    return this.#byKey.get(key);
  }

  append(key: K, value: V): OrderNode<K, V> {
    const node: OrderNode<K, V> = { key, value, prev: this.#tail, next: null };
    this.#attach(node);
    this.#byKey.set(key, node);
    return node;
  }

  unlink(node: OrderNode<K, V>): void {
    this.#detach(node);
    this.#byKey.delete(node.key);
  }

  /**
   * Re-index a node under a new key without moving it
   */
  rekey(node: OrderNode<K, V>, key: K): void {
    this.#byKey.delete(node.key);
    node.key = key;
    this.#byKey.set(key, node);
  }

  moveToFront(node: OrderNode<K, V>): void {
    if (this.#head === node) return;
    this.#detach(node);
    node.prev = null;
    node.next = this.#head;
    this.#attach(node);
  }

  moveToBack(node: OrderNode<K, V>): void {
    if (this.#tail === node) return;
    this.#detach(node);
    node.prev = this.#tail;
    node.next = null;
    this.#attach(node);
  }

  *nodes(reverse = false): Generator<OrderNode<K, V>, void, undefined> {
    let node = reverse ? this.#tail : this.#head;
    while (node !== null) {
      yield node;
      node = reverse ? node.prev : node.next;
    }
  }

  clear(): void {
    this.#head = null;
    this.#tail = null;
    this.#byKey.clear();
  }

  clone(): OrderList<K, V> {
    const copy = new OrderList<K, V>();
    for (const node of this.nodes()) {
      copy.append(node.key, node.value);
    }
    return copy;
  }

  #detach(node: OrderNode<K, V>): void {
    if (node.prev !== null) {
      node.prev.next = node.next;
    } else {
      this.#head = node.next;
    }
    if (node.next !== null) {
      node.next.prev = node.prev;
    } else {
      this.#tail = node.prev;
    }
  }

  #attach(node: OrderNode<K, V>): void {
    if (node.prev !== null) {
      node.prev.next = node;
    } else {
      this.#head = node;
    }
    if (node.next !== null) {
      node.next.prev = node;
    } else {
      this.#tail = node;
    }
  }
}
