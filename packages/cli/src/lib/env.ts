/**
 * Environment and configuration resolution
 */

import { PolicyNameSchema } from "@bidimap/sdk";
import type { PolicyName } from "@bidimap/sdk";
import { CliError } from "./errors.js";

/**
 * Resolve the collision policy
 * Priority: CLI option > BIDIMAP_POLICY env var > default "strict"
 */
export function resolvePolicyName(cliPolicy?: PolicyName): PolicyName {
  if (cliPolicy !== undefined) {
    return cliPolicy;
  }

  const fromEnv = process.env.BIDIMAP_POLICY?.trim();
  if (!fromEnv) {
    return "strict";
  }

  const result = PolicyNameSchema.safeParse(fromEnv);
  if (!result.success) {
    throw new CliError(`Invalid BIDIMAP_POLICY "${fromEnv}"`, { cause: result.error });
  }
  return result.data;
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(flag?: boolean): boolean {
  return flag === true || process.env.BIDIMAP_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
