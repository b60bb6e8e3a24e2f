/**
 * Deterministic formatting utilities
 */

import { inspect } from "node:util";

/**
 * Stable, deterministic JSON stringification with sorted object keys
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 * @throws Error if circular references detected
 */
export function stableStringify(value: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown): unknown => {
    if (input === null || typeof input !== "object") {
      return input;
    }

    // Detect cycles
    if (seen.has(input)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(input);

    try {
      // Arrays: preserve order but normalize contents
      if (Array.isArray(input)) {
        return input.map(normalize);
      }

      // Objects: sort keys by code point and normalize values
      const entries: Array<[string, unknown]> = Object.entries(input);
      entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      const out: Record<string, unknown> = {};
      for (const [key, entry] of entries) {
        out[key] = normalize(entry);
      }
      return out;
    } finally {
      seen.delete(input);
    }
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Render a single key or value for messages and representations
 */
export function describe(value: unknown): string {
  return inspect(value, { depth: 2, breakLength: Infinity, maxArrayLength: 20 });
}

/**
 * Render a map as `Name(size) { k => v, ... }` in the given order
 */
export function formatMap(
  name: string,
  size: number,
  entries: Iterable<readonly [unknown, unknown]>
): string {
  const parts: string[] = [];
  for (const [key, value] of entries) {
    parts.push(`${describe(key)} => ${describe(value)}`);
  }
  return parts.length === 0 ? `${name}(${size}) {}` : `${name}(${size}) { ${parts.join(", ")} }`;
}
