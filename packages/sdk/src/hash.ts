/**
 * Content hashing for frozen maps
 *
 * The hash of a map is a sha256 over the sorted digests of its pairs, so it
 * does not depend on iteration order. Maps that compare equal therefore hash
 * equal, whether or not they are ordered.
 */

import { createHash } from "node:crypto";
import { describe, stableStringify } from "./format.js";
import type { Hashable } from "./types.js";

function isHashable(value: object): value is Hashable {
  return "hash" in value && typeof value.hash === "function";
}

function sha256(text: string): string {
  return createHash("sha256").update(text).digest("hex");
}

/**
 * Tagged text form of one element
 *
 * Equal elements (SameValueZero) always encode the same. Distinct objects with
 * the same content also encode the same, which only costs a hash collision.
 */
export function encodeElement(value: unknown): string {
  switch (typeof value) {
    case "string":
      return `s:${value}`;
    case "number":
      return `n:${Object.is(value, -0) ? 0 : value}`;
    case "bigint":
      return `i:${value}`;
    case "boolean":
      return `b:${value}`;
    case "symbol":
      return `y:${value.description ?? ""}`;
    case "function":
      return `f:${value.name}`;
    case "object":
      return value === null ? "null" : encodeObject(value);
    default:
      return "u";
  }
}

function encodeObject(value: object): string {
  if (isHashable(value)) {
    return `h:${value.hash()}`;
  }
  try {
    return `o:${stableStringify(value, 0)}`;
  } catch {
    // Cycles and bigints inside objects
    return `o:${describe(value)}`;
  }
}

export function contentHash(entries: Iterable<readonly [unknown, unknown]>): string {
  const digests: string[] = [];
  for (const [key, value] of entries) {
    digests.push(sha256(JSON.stringify([encodeElement(key), encodeElement(value)])));
  }
  digests.sort();
  return sha256(digests.join("\n"));
}
