/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { PolicyNameSchema } from "@bidimap/sdk";
import type { PolicyName, Primitive } from "@bidimap/sdk";

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

/**
 * Parse a key or value argument: JSON when it parses, the raw string otherwise
 *
 * `1` is the number 1, `'"1"'` the string "1", `abc` the string "abc".
 */
export function parseElement(value: string, name: string): Primitive {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return value;
  }

  if (
    parsed === null ||
    typeof parsed === "string" ||
    typeof parsed === "boolean" ||
    (typeof parsed === "number" && Number.isFinite(parsed))
  ) {
    return parsed;
  }
  throw new InvalidArgumentError(`${name} must be a string, number, boolean or null`);
}

/**
 * Parse a collision policy name
 */
export function parsePolicy(value: string): PolicyName {
  const result = PolicyNameSchema.safeParse(value.trim());
  if (!result.success) {
    throw new InvalidArgumentError(
      `Unknown policy "${value}" (expected one of ${PolicyNameSchema.options.join(", ")})`
    );
  }
  return result.data;
}
