/**
 * Dual index: a forward `Map<K, V>` and an inverse `Map<V, K>` kept in step
 *
 * Writes happen in two phases. `plan` inspects both maps and the policy and
 * either throws or describes the write; `commit` then applies it and cannot
 * fail. A rejected write therefore never touches either map. A batch is
 * checked the same way on a `StagedIndex` before any of it is written.
 */

import { KeyExistsError, ValueExistsError } from "../errors.js";
import { describe } from "../format.js";
import { logger } from "../observability/logs.js";
import { decide, type CollisionPolicy } from "../policy.js";
import type { Defined, Pair } from "../types.js";

/**
 * A write that has passed the policy check
 */
export interface WritePlan<K, V> {
  readonly key: K;
  readonly value: V;
  /** Value the key held before the write, if any */
  readonly oldValue: V | undefined;
  /** Key that owned the value before the write, if any */
  readonly oldKey: K | undefined;
}

/**
 * Restate a plan made against the inverted index in forward terms
 */
export function flipPlan<K, V>(plan: WritePlan<V, K>): WritePlan<K, V> {
  return {
    key: plan.value,
    value: plan.key,
    oldValue: plan.oldKey,
    oldKey: plan.oldValue,
  };
}

/**
 * Equality used by `Map`: like `===`, except NaN equals NaN
 */
export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b);
}

/**
 * Lookups a write is planned against
 */
export interface IndexReader<K, V> {
  get(key: K): V | undefined;
  getKey(value: V): K | undefined;
}

/**
 * Check a write against the policy and the state seen through `reader`
 *
 * @returns The plan, or null when the pair is already present or the policy
 *   says to skip the write
 * @throws KeyExistsError | ValueExistsError when the policy rejects the write
 */
export function planWrite<K, V>(
  reader: IndexReader<K, V>,
  key: K,
  value: V,
  policy: CollisionPolicy
): WritePlan<K, V> | null {
  const oldValue = reader.get(key);
  const oldKey = reader.getKey(value);

  if (oldKey !== undefined && sameValueZero(oldKey, key)) {
    return null;
  }

  const decision = decide(policy, {
    keyExists: oldValue !== undefined,
    valueExists: oldKey !== undefined,
  });

  switch (decision) {
    case "reject-key":
      throw new KeyExistsError(key, oldValue);
    case "reject-value":
      throw new ValueExistsError(oldKey, value);
    case "skip":
      return null;
    case "evict-and-proceed":
    case "proceed":
      return { key, value, oldValue, oldKey };
  }
}

export class DualIndex<K extends Defined, V extends Defined> {
  readonly #fwd: Map<K, V>;
  readonly #inv: Map<V, K>;
  #inverse: DualIndex<V, K> | undefined;

  constructor(fwd: Map<K, V> = new Map(), inv: Map<V, K> = new Map()) {
    this.#fwd = fwd;
    this.#inv = inv;
  }

  get size(): number {
    return this.#fwd.size;
  }

  get(key: K): V | undefined {
    return this.#fwd.get(key);
  }

  getKey(value: V): K | undefined {
    return this.#inv.get(value);
  }

  has(key: K): boolean {
    return this.#fwd.has(key);
  }

  hasValue(value: V): boolean {
    return this.#inv.has(value);
  }

  entries(): IterableIterator<Pair<K, V>> {
    return this.#fwd.entries();
  }

  /**
   * Check a write against the policy without mutating anything
   */
  plan(key: K, value: V, policy: CollisionPolicy): WritePlan<K, V> | null {
    const plan = planWrite(this, key, value, policy);
    if (logger.enabled("debug")) {
      if (plan === null && !sameValueZero(this.#inv.get(value), key)) {
        logger.debug("write.skip", { details: { key: describe(key), value: describe(value) } });
      } else if (plan !== null && plan.oldKey !== undefined) {
        logger.debug("write.evict", {
          message: `${describe(plan.oldKey)} => ${describe(value)}`,
          details: { key: describe(key) },
        });
      }
    }
    return plan;
  }

  /**
   * Apply a plan produced by `plan` on the current state
   */
  commit(plan: WritePlan<K, V>): void {
    if (plan.oldKey !== undefined) {
      this.#fwd.delete(plan.oldKey);
    }
    if (plan.oldValue !== undefined) {
      this.#inv.delete(plan.oldValue);
    }
    this.#fwd.set(plan.key, plan.value);
    this.#inv.set(plan.value, plan.key);
  }

  /**
   * Remove a key and its value from both maps
   * @returns The removed value, or undefined if the key was absent
   */
  remove(key: K): V | undefined {
    const value = this.#fwd.get(key);
    if (value === undefined) {
      return undefined;
    }
    this.#fwd.delete(key);
    this.#inv.delete(value);
    return value;
  }

  clear(): void {
    this.#fwd.clear();
    this.#inv.clear();
  }

  /**
   * The same two maps with the roles swapped
   */
  inverted(): DualIndex<V, K> {
    if (this.#inverse === undefined) {
      const inverse = new DualIndex<V, K>(this.#inv, this.#fwd);
      inverse.#inverse = this;
      this.#inverse = inverse;
    }
    return this.#inverse;
  }

  clone(): DualIndex<K, V> {
    return new DualIndex<K, V>(new Map(this.#fwd), new Map(this.#inv));
  }
}

/**
 * Pending writes layered over an index that stays untouched
 *
 * Lookups fall through to the base index unless a staged write has changed
 * the entry. A staged `undefined` marks an entry the batch removed.
 */
export class StagedIndex<K, V> implements IndexReader<K, V> {
  readonly #base: IndexReader<K, V>;
  readonly #fwd = new Map<K, V | undefined>();
  readonly #inv = new Map<V, K | undefined>();

  constructor(base: IndexReader<K, V>) {
    this.#base = base;
  }

  get(key: K): V | undefined {
    return this.#fwd.has(key) ? this.#fwd.get(key) : this.#base.get(key);
  }

  getKey(value: V): K | undefined {
    return this.#inv.has(value) ? this.#inv.get(value) : this.#base.getKey(value);
  }

  /**
   * Plan a write against the staged state and stage it
   *
   * @returns false when the write would change nothing
   * @throws KeyExistsError | ValueExistsError when the policy rejects the write
   */
  stage(key: K, value: V, policy: CollisionPolicy): boolean {
    const plan = planWrite(this, key, value, policy);
    if (plan === null) {
      return false;
    }
    if (plan.oldKey !== undefined) {
      this.#fwd.set(plan.oldKey, undefined);
    }
    if (plan.oldValue !== undefined) {
      this.#inv.set(plan.oldValue, undefined);
    }
    this.#fwd.set(key, value);
    this.#inv.set(value, key);
    return true;
  }
}
