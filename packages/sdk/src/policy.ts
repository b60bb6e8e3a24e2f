/**
 * Collision policies
 *
 * A policy decides what happens when a write would break the one-to-one
 * contract: the key is already mapped to another value, or the value is
 * already owned by another key. Policies are fixed per map at construction.
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { formatIssues } from "./validation.js";

export type CollisionBehavior = "raise" | "overwrite" | "ignore";

export interface CollisionPolicy {
  /** What to do when the key is already mapped to a different value */
  readonly onKeyCollision: CollisionBehavior;
  /** What to do when the value is already owned by a different key */
  readonly onValueCollision: CollisionBehavior;
}

/** Replace a key's value freely; refuse to steal a value from another key */
export const STRICT: CollisionPolicy = Object.freeze({
  onKeyCollision: "overwrite",
  onValueCollision: "raise",
});

/** Evict whatever association stands in the way */
export const OVERWRITE: CollisionPolicy = Object.freeze({
  onKeyCollision: "overwrite",
  onValueCollision: "overwrite",
});

/** Refuse any write that touches an existing association */
export const RAISE: CollisionPolicy = Object.freeze({
  onKeyCollision: "raise",
  onValueCollision: "raise",
});

/** Keep existing associations and drop the colliding write */
export const IGNORE: CollisionPolicy = Object.freeze({
  onKeyCollision: "ignore",
  onValueCollision: "ignore",
});

export const POLICIES = {
  strict: STRICT,
  overwrite: OVERWRITE,
  raise: RAISE,
  ignore: IGNORE,
} as const satisfies Record<string, CollisionPolicy>;

export type PolicyName = keyof typeof POLICIES;

export type PolicyInput = PolicyName | CollisionPolicy;

/**
 * What a pending write collides with
 */
export interface CollisionState {
  /** The key is mapped to a value other than the one being written */
  keyExists: boolean;
  /** The value is owned by a key other than the one being written */
  valueExists: boolean;
}

export type CollisionDecision =
  | "proceed"
  | "evict-and-proceed"
  | "skip"
  | "reject-key"
  | "reject-value";

/**
 * Decide how a write proceeds
 *
 * The key rule is consulted before the value rule, so a write colliding on
 * both sides under `raise` reports the key collision.
 */
export function decide(policy: CollisionPolicy, state: CollisionState): CollisionDecision {
  if (state.keyExists) {
    if (policy.onKeyCollision === "raise") return "reject-key";
    if (policy.onKeyCollision === "ignore") return "skip";
  }

  if (state.valueExists) {
    switch (policy.onValueCollision) {
      case "raise":
        return "reject-value";
      case "ignore":
        return "skip";
      case "overwrite":
        return "evict-and-proceed";
    }
  }

  return "proceed";
}

const BehaviorSchema = z.enum(["raise", "overwrite", "ignore"]);

export const CollisionPolicySchema = z
  .object({
    onKeyCollision: BehaviorSchema,
    onValueCollision: BehaviorSchema,
  })
  .strict();

export const PolicyNameSchema = z.enum(["strict", "overwrite", "raise", "ignore"]);

const PolicyInputSchema = z.union([PolicyNameSchema, CollisionPolicySchema]);

/**
 * Validate a policy name or object and return the canonical policy
 * @throws ValidationError if the input is not a valid policy
 */
export function resolvePolicy(input: unknown): CollisionPolicy {
  const result = PolicyInputSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError("Invalid collision policy", formatIssues(result.error));
  }

  const policy = result.data;
  if (typeof policy === "string") {
    return POLICIES[policy];
  }

  const name = policyName(policy);
  return name === undefined ? Object.freeze({ ...policy }) : POLICIES[name];
}

/**
 * Name of the preset matching a policy, if any
 */
export function policyName(policy: CollisionPolicy): PolicyName | undefined {
  for (const name of PolicyNameSchema.options) {
    const preset = POLICIES[name];
    if (
      preset.onKeyCollision === policy.onKeyCollision &&
      preset.onValueCollision === policy.onValueCollision
    ) {
      return name;
    }
  }
  return undefined;
}
