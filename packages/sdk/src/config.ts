/**
 * Construction options and environment defaults
 */

import { z } from "zod";
import { ValidationError } from "./errors.js";
import { resolvePolicy, STRICT, type CollisionPolicy } from "./policy.js";
import type { BidiMapOptions } from "./types.js";
import { formatIssues, IdentifierSchema } from "./validation.js";

export interface ResolvedOptions {
  policy: CollisionPolicy;
  name: string | undefined;
}

const OptionsSchema = z.object({
  policy: z.unknown().optional(),
  name: IdentifierSchema.optional(),
});

/**
 * Policy used when a constructor gets none
 * Priority: BIDIMAP_DEFAULT_POLICY env var > "strict"
 */
export function defaultPolicy(): CollisionPolicy {
  const fromEnv = process.env.BIDIMAP_DEFAULT_POLICY;
  if (fromEnv === undefined || fromEnv === "") {
    return STRICT;
  }
  try {
    return resolvePolicy(fromEnv);
  } catch (err) {
    throw new ValidationError(`Invalid BIDIMAP_DEFAULT_POLICY "${fromEnv}"`, [], { cause: err });
  }
}

/**
 * Validate constructor options and fill in defaults
 * @throws ValidationError if the policy or name is invalid
 */
export function resolveOptions(options: BidiMapOptions = {}): ResolvedOptions {
  const result = OptionsSchema.safeParse({ policy: options.policy, name: options.name });
  if (!result.success) {
    throw new ValidationError("Invalid options", formatIssues(result.error));
  }

  const { policy, name } = result.data;
  return {
    policy: policy === undefined ? defaultPolicy() : resolvePolicy(policy),
    name,
  };
}
