/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "bidimap-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "bidimap-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write `data` as pretty JSON to `dir/name`, or `text` verbatim when a string is given
 * @returns Absolute path of the written file
 */
export async function writeFixture(dir: string, name: string, data: unknown): Promise<string> {
  const path = join(dir, name);
  const content = typeof data === "string" ? data : JSON.stringify(data, null, 2) + "\n";
  await writeFile(path, content, "utf8");
  return path;
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
