/**
 * Output rendering helpers
 */

import type { BidiMapBase, Primitive } from "@bidimap/sdk";
import { serialize } from "@bidimap/sdk";
import { writeStdout } from "./io.js";

type Color = "red" | "green";

/**
 * Print JSON to stdout
 * @param data - Data to serialize
 * @param options - Rendering options
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print a map as a bidimap document (already newline-terminated)
 */
export function printMap(map: BidiMapBase<Primitive, Primitive>, options?: { raw?: boolean }): void {
  writeStdout(serialize(map, options?.raw ? 0 : 2));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
